import { z } from "zod";
import { searchModeSchema } from "@shared/schema";
import { DEFAULT_CHAPTER_MARKER } from "../services/outlineBuilder";

// Environment configuration and validation
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

const environmentSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  START_PAGE: z.coerce.number().int().positive().default(1),
  CHAPTER_MARKER: z.string().trim().min(1).default(DEFAULT_CHAPTER_MARKER),
  SEARCH_MODE: searchModeSchema.default("full-text"),
  DESCEND_INTO_UNMATCHED: booleanFlag.default("true"),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(900), // 15 minutes
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  PDF_PATH: z.string().min(1).optional(),
  OUTPUT_PATH: z.string().min(1).optional(),
  APP_VERSION: z.string().default("1.0.0"),
});

export type EnvironmentConfig = z.infer<typeof environmentSchema>;

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Empty variables count as unset
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = environmentSchema.safeParse(defined);
  if (!result.success) {
    const invalid = result.error.errors.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    console.error("❌ Invalid environment variables:", invalid);
    throw new Error(`Invalid environment variables: ${invalid.join(", ")}`);
  }

  const config = result.data;
  if (config.NODE_ENV !== "test") {
    console.log("✅ Environment validation passed");
    console.log("📊 Configuration:", {
      environment: config.NODE_ENV,
      startPage: config.START_PAGE,
      chapterMarker: config.CHAPTER_MARKER,
      searchMode: config.SEARCH_MODE,
      uploadLimit: `${config.MAX_UPLOAD_MB}MB`,
      rateLimit: `${config.RATE_LIMIT_MAX} requests per ${config.RATE_LIMIT_WINDOW / 60} minutes`,
    });
  }

  return config;
}
