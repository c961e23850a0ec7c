/**
 * Scoring core exports
 */

export * from "./types/persona";
export { ConfigError, ValidationError } from "./errors";
export {
  calculateScores,
  normalizeSignal,
  validateScoringConfig,
  assertValidScoringConfig,
  MISSING_SIGNAL_VALUE,
  WEIGHT_SUM_TOLERANCE,
} from "./services/scoring";
export {
  classify,
  explainClassification,
  validateThresholds,
  DEFAULT_THRESHOLDS,
  PERSONA_RULES,
} from "./services/classifier";
export { runPipeline, summarizeBatch, mergeBatchSummaries, parseRawRecord } from "./services/pipeline";
export { buildPersonaProfiles, filterLabeledRecords, engagementExtent, personaLegend } from "./services/insights";
export { ingestCustomerCsv, parseCustomerCsv, mapRowsToRecords } from "./services/ingest";
export { getDefaultScoringConfig, loadScoringProfile, parseScoringProfile } from "./config/scoringProfile";
