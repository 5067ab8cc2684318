import express from "express";
import type { DietPlanController } from "../../controllers/dietPlan.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { generateDietPlanSchema } from "../../validators/diet-plan.validator";

export const createDietPlanRouter = (controller: DietPlanController) => {
  const router = express.Router();

  router.post(
    "/",
    validateContentType,
    validateRequest(generateDietPlanSchema),
    controller.generateDietPlan
  );

  return router;
};
