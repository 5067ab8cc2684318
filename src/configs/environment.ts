import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "../common/errors";

dotenv.config();

const numeric = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? fallback : Number(value)))
    .pipe(z.number().finite());

const envSchema = z.object({
  GOOGLE_API_KEY: z
    .string({ required_error: "GOOGLE_API_KEY environment variable is required" })
    .trim()
    .min(1, "GOOGLE_API_KEY environment variable is required"),

  PORT: numeric(8000).pipe(z.number().int().positive()),
  HOST: z.string().optional(),

  GEMINI_MODEL: z.string().optional(),
  GEMINI_TEMPERATURE: z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : undefined))
    .pipe(z.number().min(0).max(2).optional()),
  GEMINI_MAX_TOKENS: z
    .string()
    .optional()
    .transform((value) => (value ? Number(value) : undefined))
    .pipe(z.number().int().positive().optional()),
  GEMINI_TIMEOUT_MS: numeric(60_000).pipe(z.number().int().positive()),

  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = {
  port: number;
  host: string;
  gemini: {
    apiKey: string;
    model: string;
    temperature?: number;
    maxTokens?: number;
    timeoutMs: number;
  };
  api: {
    cors: {
      origin: string | string[];
    };
  };
};

const buildConfig = (env: z.infer<typeof envSchema>): AppConfig => ({
  port: env.PORT,
  host: env.HOST || "0.0.0.0",
  gemini: {
    apiKey: env.GOOGLE_API_KEY,
    model: env.GEMINI_MODEL || "gemini-2.5-flash",
    temperature: env.GEMINI_TEMPERATURE,
    maxTokens: env.GEMINI_MAX_TOKENS,
    timeoutMs: env.GEMINI_TIMEOUT_MS,
  },
  api: {
    cors: {
      origin:
        !env.CORS_ORIGIN || env.CORS_ORIGIN === "*"
          ? "*"
          : env.CORS_ORIGIN.split(",").map((origin) => origin.trim()),
    },
  },
});

/**
 * Parse and validate an environment map. Throws ConfigError listing every
 * invalid or missing variable.
 */
export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  return buildConfig(parsed.data);
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
};
