import "dotenv/config";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().url().optional(),
  CORS_ORIGIN: z.string().default("*"),

  // Recognizer defaults, overridable per request
  PLATE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(60),
  PLATE_LOW_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(100).default(30),
  PLATE_INCLUDE_LOW_CONFIDENCE: booleanFlag.default("false"),
  PLATE_INCLUDE_UNVERIFIED: booleanFlag.default("false"),
  PLATE_CUSTOM_PATTERN: z.string().min(1).optional(),
  PLATE_MERGE_WINDOW: z.coerce.number().int().min(1).max(3).default(1),
});

export type Env = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = envSchema.parse(source);

  return {
    env: env.NODE_ENV,
    isProduction: env.NODE_ENV === "production",
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    corsOrigin: env.CORS_ORIGIN,
    recognizer: {
      confidenceThreshold: env.PLATE_CONFIDENCE_THRESHOLD,
      lowConfidenceThreshold: env.PLATE_LOW_CONFIDENCE_THRESHOLD,
      includeLowConfidence: env.PLATE_INCLUDE_LOW_CONFIDENCE,
      includeUnverified: env.PLATE_INCLUDE_UNVERIFIED,
      customPattern: env.PLATE_CUSTOM_PATTERN,
      mergeWindow: env.PLATE_MERGE_WINDOW,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
