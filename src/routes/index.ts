import express from "express";
import type { AppContext } from "../common/context";
import { DietPlanController } from "../controllers/dietPlan.controller";
import { NutritionController } from "../controllers/nutrition.controller";
import { DietPlanGeneratorService } from "../services/dietPlanGenerator.service";
import { NutritionAnalysisService } from "../services/nutritionAnalysis.service";
import type { ServiceInfoResponse } from "../types/response/service.response";
import { ENDPOINTS, SERVICE_INFO } from "../utils/constants";
import { createDocsRouter } from "./docs";
import { createHealthRouter } from "./health";
import { createDietPlanRouter } from "./diet-plan";
import { createNutritionRouter } from "./nutrition";

export const createRoutes = (context: AppContext) => {
  const router = express.Router();

  const dietPlanController = new DietPlanController(
    new DietPlanGeneratorService(context.textGenerator)
  );
  const nutritionController = new NutritionController(
    new NutritionAnalysisService(context.textGenerator)
  );

  router.get("/", (_req, res) => {
    const info: ServiceInfoResponse = {
      message: SERVICE_INFO.NAME,
      version: SERVICE_INFO.VERSION,
      endpoints: { ...ENDPOINTS },
    };
    res.json(info);
  });

  router.use("/health", createHealthRouter(Boolean(context.config.gemini.apiKey)));

  router.use("/", createDocsRouter());

  // AI endpoints
  router.use("/generate_diet_plan", createDietPlanRouter(dietPlanController));
  router.use("/nutrition_breakdown", createNutritionRouter(nutritionController));

  return router;
};
