import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

/**
 * Optional cut override; a blank value counts as unset
 */
export const optionalCutSchema = z.preprocess(
  value => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().min(0).max(1).optional()
);

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().optional(),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
    NODE_ENV: z.string().optional(),
    SCORING_PROFILE_PATH: z.string().min(1).optional(),
    ENGAGEMENT_CUT: optionalCutSchema,
    RISK_CUT: optionalCutSchema,
  })
  .passthrough();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ServiceConfig {
  port: number;
  logLevel: LogLevel;
  nodeEnv: string;
  /** Optional JSON file overriding the built-in weights, bounds and thresholds */
  scoringProfilePath: string | undefined;
  engagementCut: number | undefined;
  riskCut: number | undefined;
}

/**
 * Read service settings from an environment map
 */
export function readConfig(source: Record<string, string | undefined>): ServiceConfig {
  const parsed = envSchema.parse(source);
  return {
    port: parsed.PORT ?? 3000,
    logLevel: parsed.LOG_LEVEL ?? "info",
    nodeEnv: parsed.NODE_ENV ?? "development",
    scoringProfilePath: parsed.SCORING_PROFILE_PATH,
    engagementCut: parsed.ENGAGEMENT_CUT,
    riskCut: parsed.RISK_CUT,
  };
}

/**
 * Environment configuration
 */
export const config = readConfig(process.env);
