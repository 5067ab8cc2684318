import type { z } from "zod";
import { ParseError, ValidationError, errorMessage } from "../common/errors";
import type { JsonValue } from "../types/model/json";
import { RESPONSE_SNIPPET_LENGTH } from "./constants";
import { logger } from "./logger";

const JSON_FENCE = "```json";
const FENCE = "```";

/**
 * Cut the payload out of a model reply. Only the first fenced block is
 * considered, and a fence inside the payload ends it early.
 */
const sliceFenced = (text: string, marker: string): string => {
  const start = text.indexOf(marker) + marker.length;
  // With no closing fence, end is -1 and the slice drops the last character.
  const end = text.indexOf(FENCE, start);
  return text.slice(start, end);
};

/**
 * Extract a JSON value from raw model output, stripping an optional
 * markdown code fence.
 */
export const extractJson = (text: string): JsonValue => {
  let payload = text;
  if (text.includes(JSON_FENCE)) {
    payload = sliceFenced(text, JSON_FENCE);
  } else if (text.includes(FENCE)) {
    payload = sliceFenced(text, FENCE);
  }
  payload = payload.trim();

  try {
    const parsed: JsonValue = JSON.parse(payload);
    return parsed;
  } catch (error) {
    const snippet = payload.slice(0, RESPONSE_SNIPPET_LENGTH);
    logger.error(`Failed to parse Gemini response as JSON: ${errorMessage(error)}`);
    logger.error(`Response content: ${snippet}`);
    throw new ParseError(`Failed to parse AI response: ${errorMessage(error)}`, snippet);
  }
};

/**
 * Validate an extracted JSON value against a response schema. Every
 * mismatch is reported in one ValidationError.
 */
export const validateResponse = <T>(
  schema: z.ZodType<T>,
  value: JsonValue
): T => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid AI response structure: ${summary}`, issues);
  }
  return parsed.data;
};
