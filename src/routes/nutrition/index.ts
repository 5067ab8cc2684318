import express from "express";
import type { NutritionController } from "../../controllers/nutrition.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { nutritionBreakdownSchema } from "../../validators/nutrition.validator";

export const createNutritionRouter = (controller: NutritionController) => {
  const router = express.Router();

  router.post(
    "/",
    validateContentType,
    validateRequest(nutritionBreakdownSchema),
    controller.nutritionBreakdown
  );

  return router;
};
