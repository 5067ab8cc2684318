import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import { UpstreamError, errorMessage } from "../common/errors";
import type { AppConfig } from "../configs/environment";
import { logger } from "../utils/logger";

/**
 * The one capability the request pipeline needs from a generative model.
 */
export interface TextGenerator {
  generateText(prompt: string): Promise<string>;
}

export class GeminiTextGenerator implements TextGenerator {
  private model: GenerativeModel;

  constructor(config: AppConfig["gemini"]) {
    const gemini = new GoogleGenerativeAI(config.apiKey);
    this.model = gemini.getGenerativeModel(
      {
        model: config.model,
        generationConfig: {
          temperature: config.temperature,
          maxOutputTokens: config.maxTokens,
        },
      },
      { timeout: config.timeoutMs }
    );
    logger.info(`Gemini model ${config.model} initialized ✅`);
  }

  async generateText(prompt: string): Promise<string> {
    try {
      logger.info("Calling Google Gemini API...");
      const result = await this.model.generateContent(prompt);
      // text() throws when the candidate was blocked
      return result.response.text();
    } catch (error) {
      logger.error(`Gemini request failed: ${errorMessage(error)}`);
      throw new UpstreamError(errorMessage(error), { cause: error });
    }
  }
}
