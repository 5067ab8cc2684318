import type { DietPlanRequest } from "../types/request/dietPlanRequest";
import type { DietPlanResponse } from "../types/response/dietPlan.response";
import { dietPlanResponseSchema } from "../validators/diet-plan.validator";
import { extractJson, validateResponse } from "../utils/responseParser";
import { logger } from "../utils/logger";
import { buildDietPlanPrompt } from "./prompt.service";
import type { TextGenerator } from "./gemini.service";

export class DietPlanGeneratorService {
  constructor(private readonly textGenerator: TextGenerator) {}

  /**
   * Prompt the model for a daily plan and validate the reply.
   * Throws UpstreamError, ParseError or ValidationError.
   */
  async generateDietPlan(request: DietPlanRequest): Promise<DietPlanResponse> {
    const prompt = buildDietPlanPrompt(request);
    const text = await this.textGenerator.generateText(prompt);

    const parsed = extractJson(text);
    logger.debug("Parsed diet plan response", { parsed });

    const dietPlan = validateResponse(dietPlanResponseSchema, parsed);
    logger.info(
      `Diet plan generated: ${dietPlan.daily_plan.total_calories} kcal, ${dietPlan.daily_plan.snacks.length} snacks`
    );
    return dietPlan;
  }
}
