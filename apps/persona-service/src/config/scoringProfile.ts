import { readFileSync } from "fs";
import { z } from "zod";
import { ScoringConfig, ScoringProfile, ThresholdConfig } from "../types/persona";
import { ConfigError } from "../errors";
import { validateScoringConfig } from "../services/scoring";
import { DEFAULT_THRESHOLDS, validateThresholds } from "../services/classifier";
import type { ServiceConfig } from "./index";

// ============================================================================
// DEFAULT PROFILE
// Signal names match what the tabular mappers produce
// ============================================================================

/**
 * Built-in scoring config, used when no profile file is configured
 */
export function getDefaultScoringConfig(): ScoringConfig {
  return {
    weights: {
      engagement: {
        campaign_contacts: 0.3,
        previous_contacts: 0.3,
        call_duration_seconds: 0.4,
      },
      persistence: {
        previous_contacts: 0.6,
        tenure_months: 0.4,
      },
      financial: {
        has_housing_loan: 0.3,
        has_personal_loan: 0.3,
        has_credit_default: 0.2,
        account_balance: 0.2,
      },
    },
    bounds: {
      campaign_contacts: { min: 0, max: 10 },
      previous_contacts: { min: 0, max: 10 },
      call_duration_seconds: { min: 0, max: 1000 },
      tenure_months: { min: 0, max: 120 },
      has_housing_loan: { min: 0, max: 1 },
      has_personal_loan: { min: 0, max: 1 },
      has_credit_default: { min: 0, max: 1 },
      // A larger balance means less exposure
      account_balance: { min: -2000, max: 10000, invert: true },
    },
  };
}

// ============================================================================
// SCHEMAS
// ============================================================================

export const signalBoundsSchema = z.object({
  min: z.number(),
  max: z.number(),
  invert: z.boolean().optional(),
});

export const scoringConfigSchema = z.object({
  weights: z.object({
    engagement: z.record(z.number()),
    persistence: z.record(z.number()),
    financial: z.record(z.number()),
  }),
  bounds: z.record(signalBoundsSchema),
});

export const thresholdsSchema = z.object({
  engagement_cut: z.number(),
  risk_cut: z.number(),
});

const profileFileSchema = z.object({
  weights: scoringConfigSchema.shape.weights,
  bounds: scoringConfigSchema.shape.bounds,
  thresholds: thresholdsSchema.partial().optional(),
});

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validate a parsed profile document (the content of a profile JSON file)
 */
export function parseScoringProfile(input: unknown): ScoringProfile {
  const parsed = profileFileSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "profile"}: ${i.message}`);
    throw new ConfigError(`Invalid scoring profile: ${issues.join("; ")}`, issues);
  }

  const scoring: ScoringConfig = {
    weights: parsed.data.weights,
    bounds: parsed.data.bounds,
  };
  const thresholds: ThresholdConfig = { ...DEFAULT_THRESHOLDS, ...parsed.data.thresholds };

  const issues = [...validateScoringConfig(scoring), ...validateThresholds(thresholds)];
  if (issues.length > 0) {
    throw new ConfigError(`Invalid scoring profile: ${issues.join("; ")}`, issues);
  }

  return { scoring, thresholds };
}

export function loadScoringProfile(path: string): ScoringProfile {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read scoring profile ${path}: ${message}`);
  }
  return parseScoringProfile(document);
}

/**
 * Profile the service runs with: the configured file or the built-in
 * defaults, with cut overrides from the environment applied on top
 */
export function resolveScoringProfile(
  serviceConfig: Pick<ServiceConfig, "scoringProfilePath" | "engagementCut" | "riskCut">
): ScoringProfile {
  const base: ScoringProfile = serviceConfig.scoringProfilePath
    ? loadScoringProfile(serviceConfig.scoringProfilePath)
    : { scoring: getDefaultScoringConfig(), thresholds: { ...DEFAULT_THRESHOLDS } };

  return {
    scoring: base.scoring,
    thresholds: {
      engagement_cut: serviceConfig.engagementCut ?? base.thresholds.engagement_cut,
      risk_cut: serviceConfig.riskCut ?? base.thresholds.risk_cut,
    },
  };
}
