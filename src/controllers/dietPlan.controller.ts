import type { Request, Response } from "express";
import { ParseError, ValidationError, errorMessage } from "../common/errors";
import type { DietPlanGeneratorService } from "../services/dietPlanGenerator.service";
import type { DietPlanRequest } from "../types/request/dietPlanRequest";
import { logger } from "../utils/logger";
import { sendError, sendSuccess } from "../utils/response";

export class DietPlanController {
  constructor(private readonly dietPlanGenerator: DietPlanGeneratorService) {}

  /**
   * @route POST /generate_diet_plan
   * @desc Generate a personalized daily diet plan
   */
  generateDietPlan = async (
    req: Request<Record<string, string>, unknown, DietPlanRequest>,
    res: Response
  ) => {
    try {
      logger.info(`Generating diet plan for user: ${req.body.name}`);

      const dietPlan = await this.dietPlanGenerator.generateDietPlan(req.body);

      logger.info("Diet plan generated successfully");
      sendSuccess(res, dietPlan);
    } catch (error) {
      if (error instanceof ParseError || error instanceof ValidationError) {
        logger.error(`Error parsing response: ${error.message}`);
        sendError(res, error.message, 500);
        return;
      }
      logger.error(`Error generating diet plan: ${errorMessage(error)}`);
      sendError(res, `Failed to generate diet plan: ${errorMessage(error)}`, 500);
    }
  };
}
