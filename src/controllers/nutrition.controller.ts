import type { Request, Response } from "express";
import { ParseError, ValidationError, errorMessage } from "../common/errors";
import type { NutritionAnalysisService } from "../services/nutritionAnalysis.service";
import type { NutritionRequest } from "../types/request/nutritionRequest";
import { logger } from "../utils/logger";
import { sendError, sendSuccess } from "../utils/response";

export class NutritionController {
  constructor(private readonly nutritionAnalysis: NutritionAnalysisService) {}

  /**
   * @route POST /nutrition_breakdown
   * @desc Analyze calories and macros of a list of foods
   */
  nutritionBreakdown = async (
    req: Request<Record<string, string>, unknown, NutritionRequest>,
    res: Response
  ) => {
    try {
      logger.info(`Analyzing nutrition for ${req.body.foods.length} food items`);

      const breakdown = await this.nutritionAnalysis.analyzeNutrition(req.body);

      logger.info("Nutrition breakdown completed successfully");
      sendSuccess(res, breakdown);
    } catch (error) {
      if (error instanceof ParseError || error instanceof ValidationError) {
        logger.error(`Error parsing response: ${error.message}`);
        sendError(res, error.message, 500);
        return;
      }
      logger.error(`Error analyzing nutrition: ${errorMessage(error)}`);
      sendError(res, `Failed to analyze nutrition: ${errorMessage(error)}`, 500);
    }
  };
}
