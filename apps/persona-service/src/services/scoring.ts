import {
  RawCustomerRecord,
  ScoredCustomerRecord,
  ScoringConfig,
  ScoreCategory,
  SignalBounds,
  CustomerScores,
  SCORE_CATEGORIES,
} from "../types/persona";
import { ConfigError, ValidationError } from "../errors";

/** Allowed drift of a category's weight sum from 1.0 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/** Normalized value used for a missing signal */
export const MISSING_SIGNAL_VALUE = 0.5;

// ============================================================================
// CATEGORY MAPPING
// Maps weight categories to the score field they produce
// ============================================================================

const CATEGORY_OUTPUT: Record<ScoreCategory, keyof CustomerScores> = {
  engagement: "engagement_score",
  persistence: "persistence_score",
  financial: "financial_exposure",
};

// ============================================================================
// CONFIG VALIDATION
// ============================================================================

/**
 * Collect every problem with a scoring config.
 * An empty list means the config is usable.
 */
export function validateScoringConfig(config: ScoringConfig): string[] {
  const issues: string[] = [];
  const push = (issue: string) => {
    if (!issues.includes(issue)) issues.push(issue);
  };

  for (const category of SCORE_CATEGORIES) {
    const entries = Object.entries(config.weights[category] ?? {});
    if (entries.length === 0) {
      push(`${category}: no weighted signals`);
      continue;
    }

    let sum = 0;
    for (const [signal, weight] of entries) {
      if (typeof weight !== "number" || !Number.isFinite(weight)) {
        push(`${category}.${signal}: weight must be a finite number`);
        continue;
      }
      if (weight < 0) {
        push(`${category}.${signal}: negative weight ${weight}`);
      }
      sum += weight;

      const bounds: SignalBounds | undefined = config.bounds[signal];
      if (!bounds) {
        push(`${signal}: missing bounds`);
      } else if (
        !Number.isFinite(bounds.min) ||
        !Number.isFinite(bounds.max) ||
        bounds.min >= bounds.max
      ) {
        push(`${signal}: bounds min must be below max`);
      }
    }

    if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
      push(`${category}: weights sum to ${Number(sum.toFixed(6))}, expected 1.0`);
    }
  }

  return issues;
}

export function assertValidScoringConfig(config: ScoringConfig): void {
  const issues = validateScoringConfig(config);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid scoring config: ${issues.join("; ")}`, issues);
  }
}

// ============================================================================
// MAIN SCORING FUNCTION
// ============================================================================

/**
 * Derive engagement, persistence and financial exposure for one record.
 * Missing signals are scored at the 0.5 midpoint; out-of-range values clamp.
 *
 * @throws ConfigError when the weights or bounds are invalid
 * @throws ValidationError when a weighted signal holds a non-numeric value
 */
export function calculateScores(
  record: RawCustomerRecord,
  config: ScoringConfig
): ScoredCustomerRecord {
  assertValidScoringConfig(config);

  const imputed = new Set<string>();
  const scores: CustomerScores = {
    engagement_score: 0,
    persistence_score: 0,
    financial_exposure: 0,
  };

  for (const category of SCORE_CATEGORIES) {
    let total = 0;
    for (const [signal, weight] of Object.entries(config.weights[category])) {
      const raw = readSignal(record, signal);
      if (raw === null) {
        imputed.add(signal);
        total += weight * MISSING_SIGNAL_VALUE;
      } else {
        total += weight * normalizeSignal(raw, config.bounds[signal]);
      }
    }
    // Clamp to absorb floating-point drift in the weight sum
    scores[CATEGORY_OUTPUT[category]] = clamp01(total);
  }

  return {
    id: record.id,
    signals: { ...record.signals },
    ...scores,
    imputed_signals: [...imputed].sort(),
  };
}

/**
 * Min-max normalize a raw value into [0, 1]
 */
export function normalizeSignal(value: number, bounds: SignalBounds): number {
  const normalized = clamp01((value - bounds.min) / (bounds.max - bounds.min));
  return bounds.invert ? 1 - normalized : normalized;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Read a signal, returning null when it is missing.
 * NaN counts as missing (blank numeric cells parse to NaN).
 */
function readSignal(record: RawCustomerRecord, signal: string): number | null {
  const value = Object.prototype.hasOwnProperty.call(record.signals, signal)
    ? record.signals[signal]
    : undefined;

  if (value === undefined || value === null) return null;

  if (typeof value !== "number") {
    throw new ValidationError(
      `Signal "${signal}" must be numeric, got ${describeValue(value)}`,
      { recordId: record.id, field: signal }
    );
  }

  return Number.isNaN(value) ? null : value;
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return `string "${value}"`;
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}
