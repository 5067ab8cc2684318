import type { NutritionRequest } from "../types/request/nutritionRequest";
import type { NutritionBreakdownResponse } from "../types/response/nutrition.response";
import { nutritionResponseSchema } from "../validators/nutrition.validator";
import { extractJson, validateResponse } from "../utils/responseParser";
import { buildNutritionPrompt } from "./prompt.service";
import type { TextGenerator } from "./gemini.service";

export class NutritionAnalysisService {
  constructor(private readonly textGenerator: TextGenerator) {}

  async analyzeNutrition(request: NutritionRequest): Promise<NutritionBreakdownResponse> {
    const prompt = buildNutritionPrompt(request);
    const text = await this.textGenerator.generateText(prompt);
    return validateResponse(nutritionResponseSchema, extractJson(text));
  }
}
