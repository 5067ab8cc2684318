import axios from "axios";
import { z } from "zod";
import { UpstreamError, errorMessage } from "../common/errors";
import { logger } from "../utils/logger";

const GEMINI_API_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const modelsPageSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        displayName: z.string().optional(),
        supportedGenerationMethods: z.array(z.string()).default([]),
      })
    )
    .default([]),
  nextPageToken: z.string().optional(),
});

export type GeminiModelInfo = z.infer<typeof modelsPageSchema>["models"][number];

/**
 * List every model the API key can reach, following pagination.
 */
export const listGeminiModels = async (
  apiKey: string,
  baseUrl = GEMINI_API_BASE_URL
): Promise<GeminiModelInfo[]> => {
  const models: GeminiModelInfo[] = [];
  let pageToken: string | undefined;

  do {
    try {
      const response = await axios.get(`${baseUrl}/models`, {
        params: { key: apiKey, pageSize: 1000, pageToken },
      });
      const page = modelsPageSchema.parse(response.data);
      models.push(...page.models);
      pageToken = page.nextPageToken;
    } catch (error) {
      logger.error(`Listing Gemini models failed: ${errorMessage(error)}`);
      throw new UpstreamError(errorMessage(error), { cause: error });
    }
  } while (pageToken);

  return models;
};
