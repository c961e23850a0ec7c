/**
 * Customer Persona Scoring Types
 * Shared by the scoring core, the ingestion mappers and the HTTP routes
 */

// ============================================================================
// ENUMS
// ============================================================================

export type PersonaLabel =
  | 'HighlyEngagedLoyalist'
  | 'ModeratePotential'
  | 'CuriousSafeExplorer'
  | 'FinanciallyStressedRepeater';

export type ScoreCategory = 'engagement' | 'persistence' | 'financial';

/** Fixed label order used for summaries, profiles and charts */
export const PERSONA_LABELS: readonly PersonaLabel[] = [
  'HighlyEngagedLoyalist',
  'ModeratePotential',
  'CuriousSafeExplorer',
  'FinanciallyStressedRepeater',
];

export const SCORE_CATEGORIES: readonly ScoreCategory[] = ['engagement', 'persistence', 'financial'];

export const PERSONA_DISPLAY_NAMES: Record<PersonaLabel, string> = {
  HighlyEngagedLoyalist: 'Highly Engaged Loyalist',
  ModeratePotential: 'Moderate Potential',
  CuriousSafeExplorer: 'Curious Safe Explorer',
  FinanciallyStressedRepeater: 'Financially Stressed Repeater',
};

export const PERSONA_COLORS: Record<PersonaLabel, string> = {
  HighlyEngagedLoyalist: '#1f77b4',
  ModeratePotential: '#2ca02c',
  CuriousSafeExplorer: '#ff7f0e',
  FinanciallyStressedRepeater: '#d62728',
};

// ============================================================================
// INPUT TYPES
// ============================================================================

/**
 * One row of the input dataset
 * Signals are named; which category a signal feeds is decided by the weights.
 * Values are expected to be numbers, null or absent. A malformed row may carry
 * anything else, which the calculator rejects.
 */
export interface RawCustomerRecord {
  /** Opaque identifier, unique within a batch */
  id: string;
  signals: Record<string, unknown>;
}

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

/** Per-category signal weights; each category must sum to 1.0 */
export type WeightConfig = Record<ScoreCategory, Record<string, number>>;

/**
 * Expected domain of a raw signal, used for min-max normalization.
 * `invert` flips the normalized value for signals where more means less.
 */
export interface SignalBounds {
  min: number;
  max: number;
  invert?: boolean;
}

export interface ScoringConfig {
  weights: WeightConfig;
  bounds: Record<string, SignalBounds>;
}

export interface ThresholdConfig {
  /** Boundary for "high engagement" (inclusive) */
  engagement_cut: number;
  /** Boundary for "at risk" (inclusive) */
  risk_cut: number;
}

/** Everything a caller needs to run a batch */
export interface ScoringProfile {
  scoring: ScoringConfig;
  thresholds: ThresholdConfig;
}

// ============================================================================
// OUTPUT TYPES
// ============================================================================

export interface CustomerScores {
  /** Weighted engagement signals, 0-1 */
  engagement_score: number;
  /** Weighted tenure/repeat signals, 0-1. Display only, never gates a persona */
  persistence_score: number;
  /** Weighted financial-risk signals, 0-1 (higher = riskier) */
  financial_exposure: number;
}

export interface ScoredCustomerRecord extends RawCustomerRecord, CustomerScores {
  /** Weighted signals that were missing and scored at the 0.5 midpoint */
  imputed_signals: string[];
}

export interface LabeledCustomerRecord extends ScoredCustomerRecord {
  persona: PersonaLabel;
}

export interface ClassificationResult {
  persona: PersonaLabel;
  rule_id: string;
  reason: string;
}

export interface KpiCount {
  count: number;
  /** Fraction of the batch total, 0-1 (0 for an empty batch) */
  percentage: number;
}

export interface BatchSummary {
  total: number;
  persona_counts: Record<PersonaLabel, number>;
  persona_percentages: Record<PersonaLabel, number>;
  high_engagement: KpiCount;
  at_risk: KpiCount;
  /** Number of personas with at least one record */
  active_personas: number;
}

/** Per-persona averages behind the dashboard's deep-dive view */
export interface PersonaProfile {
  persona: PersonaLabel;
  count: number;
  avg_engagement: number;
  avg_persistence: number;
  avg_financial_exposure: number;
}

/** A record skipped by the pipeline */
export interface RecordError {
  /** Position of the record in the input batch */
  index: number;
  record_id: string | null;
  field: string | null;
  message: string;
}

export interface PipelineResult {
  records: LabeledCustomerRecord[];
  summary: BatchSummary;
  errors: RecordError[];
  profiles: PersonaProfile[];
}

export interface LabeledRecordFilter {
  personas?: PersonaLabel[];
  engagementRange?: { min: number; max: number };
}
