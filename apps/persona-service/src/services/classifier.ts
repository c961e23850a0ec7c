import {
  ScoredCustomerRecord,
  ThresholdConfig,
  PersonaLabel,
  ClassificationResult,
  CustomerScores,
} from "../types/persona";
import { ConfigError } from "../errors";

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  engagement_cut: 0.6,
  risk_cut: 0.6,
};

// ============================================================================
// PERSONA RULES
// Evaluated top to bottom, first match wins. Cuts are inclusive on the high
// side. persistence_score is never consulted.
// ============================================================================

export interface PersonaRule {
  id: string;
  persona: PersonaLabel;
  matches: (scores: CustomerScores, thresholds: ThresholdConfig) => boolean;
  describe: (scores: CustomerScores, thresholds: ThresholdConfig) => string;
}

const isEngaged = (s: CustomerScores, t: ThresholdConfig) => s.engagement_score >= t.engagement_cut;
const isAtRisk = (s: CustomerScores, t: ThresholdConfig) => s.financial_exposure >= t.risk_cut;

export const PERSONA_RULES: readonly PersonaRule[] = [
  {
    id: "engaged_low_risk",
    persona: "HighlyEngagedLoyalist",
    matches: (s, t) => isEngaged(s, t) && !isAtRisk(s, t),
    describe: (s, t) =>
      `Engagement ${fmt(s.engagement_score)} >= ${fmt(t.engagement_cut)} and exposure ${fmt(s.financial_exposure)} < ${fmt(t.risk_cut)}`,
  },
  {
    id: "disengaged_at_risk",
    persona: "FinanciallyStressedRepeater",
    matches: (s, t) => !isEngaged(s, t) && isAtRisk(s, t),
    describe: (s, t) =>
      `Engagement ${fmt(s.engagement_score)} < ${fmt(t.engagement_cut)} and exposure ${fmt(s.financial_exposure)} >= ${fmt(t.risk_cut)}`,
  },
  {
    id: "disengaged_low_risk",
    persona: "CuriousSafeExplorer",
    matches: (s, t) => !isEngaged(s, t) && !isAtRisk(s, t),
    describe: (s, t) =>
      `Engagement ${fmt(s.engagement_score)} < ${fmt(t.engagement_cut)} and exposure ${fmt(s.financial_exposure)} < ${fmt(t.risk_cut)}`,
  },
  {
    id: "fallback",
    persona: "ModeratePotential",
    matches: () => true,
    describe: (s, t) =>
      `Engagement ${fmt(s.engagement_score)} >= ${fmt(t.engagement_cut)} and exposure ${fmt(s.financial_exposure)} >= ${fmt(t.risk_cut)}`,
  },
];

// ============================================================================
// THRESHOLD VALIDATION
// ============================================================================

export function validateThresholds(thresholds: ThresholdConfig): string[] {
  const issues: string[] = [];
  for (const key of ["engagement_cut", "risk_cut"] as const) {
    const value = thresholds[key];
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`${key}: must be a number between 0 and 1`);
    }
  }
  return issues;
}

export function assertValidThresholds(thresholds: ThresholdConfig): void {
  const issues = validateThresholds(thresholds);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid thresholds: ${issues.join("; ")}`, issues);
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Classify a scored record and report which rule fired
 */
export function explainClassification(
  record: ScoredCustomerRecord,
  thresholds: ThresholdConfig
): ClassificationResult {
  for (const rule of PERSONA_RULES) {
    if (rule.matches(record, thresholds)) {
      return {
        persona: rule.persona,
        rule_id: rule.id,
        reason: rule.describe(record, thresholds),
      };
    }
  }
  // Unreachable: the last rule always matches
  throw new Error("Persona rule table is not exhaustive");
}

export function classify(record: ScoredCustomerRecord, thresholds: ThresholdConfig): PersonaLabel {
  const rule = PERSONA_RULES.find(r => r.matches(record, thresholds));
  if (!rule) throw new Error("Persona rule table is not exhaustive");
  return rule.persona;
}

function fmt(value: number): string {
  return String(Number(value.toFixed(6)));
}
