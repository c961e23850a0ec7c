import { z } from "zod";
import {
  BatchSummary,
  KpiCount,
  LabeledCustomerRecord,
  PersonaLabel,
  PipelineResult,
  RawCustomerRecord,
  RecordError,
  ScoringConfig,
  ThresholdConfig,
  PERSONA_LABELS,
} from "../types/persona";
import { ValidationError } from "../errors";
import { assertValidScoringConfig, calculateScores } from "./scoring";
import { assertValidThresholds, classify } from "./classifier";
import { buildPersonaProfiles } from "./insights";
import { createLogger } from "../logger";

const logger = createLogger("pipeline");

const rawRecordSchema = z.object({
  id: z
    .union([z.string().trim().min(1), z.number().finite()])
    .transform(value => String(value)),
  signals: z.record(z.unknown()),
});

// ============================================================================
// MAIN PIPELINE
// ============================================================================

/**
 * Score, classify and summarize a batch.
 *
 * Config problems fail the whole call before any record is touched.
 * Malformed records (bad shape, non-numeric signal, repeated id) are skipped
 * and reported in `errors`; the rest of the batch still goes through.
 */
export function runPipeline(
  records: readonly unknown[],
  scoring: ScoringConfig,
  thresholds: ThresholdConfig
): PipelineResult {
  assertValidScoringConfig(scoring);
  assertValidThresholds(thresholds);

  const labeled: LabeledCustomerRecord[] = [];
  const errors: RecordError[] = [];
  const seenIds = new Set<string>();

  records.forEach((input, index) => {
    try {
      const record = parseRawRecord(input);
      if (seenIds.has(record.id)) {
        throw new ValidationError(`Duplicate record id "${record.id}"`, {
          recordId: record.id,
          field: "id",
        });
      }
      seenIds.add(record.id);
      labeled.push(labelRecord(record, scoring, thresholds));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      errors.push({
        index,
        record_id: error.recordId,
        field: error.field,
        message: error.message,
      });
    }
  });

  if (errors.length > 0) {
    logger.warn(`Skipped ${errors.length} of ${records.length} records`);
  }

  return {
    records: labeled,
    summary: summarizeBatch(labeled, thresholds),
    errors,
    profiles: buildPersonaProfiles(labeled),
  };
}

function labelRecord(
  record: RawCustomerRecord,
  scoring: ScoringConfig,
  thresholds: ThresholdConfig
): LabeledCustomerRecord {
  const scored = calculateScores(record, scoring);
  const persona = classify(scored, thresholds);

  Object.freeze(scored.signals);
  Object.freeze(scored.imputed_signals);
  return Object.freeze({ ...scored, persona });
}

/**
 * Check the shape of one input record
 */
export function parseRawRecord(input: unknown): RawCustomerRecord {
  const parsed = rawRecordSchema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : null;
  const recordId = extractId(input);
  throw new ValidationError(
    `Malformed record${field ? ` (${field})` : ""}: ${issue?.message ?? "invalid shape"}`,
    { recordId, field }
  );
}

function extractId(input: unknown): string | null {
  if (typeof input !== "object" || input === null || !("id" in input)) return null;
  const id = input.id;
  return typeof id === "string" || typeof id === "number" ? String(id) : null;
}

// ============================================================================
// AGGREGATION
// ============================================================================

/**
 * Single-pass KPI aggregation. An empty batch yields zeros, never an error.
 */
export function summarizeBatch(
  records: readonly LabeledCustomerRecord[],
  thresholds: ThresholdConfig
): BatchSummary {
  const counts = emptyPersonaCounts();
  let highEngagement = 0;
  let atRisk = 0;

  for (const record of records) {
    counts[record.persona]++;
    if (record.engagement_score >= thresholds.engagement_cut) highEngagement++;
    if (record.financial_exposure >= thresholds.risk_cut) atRisk++;
  }

  return buildSummary(records.length, counts, highEngagement, atRisk);
}

/**
 * Combine summaries of two disjoint partial batches.
 * Commutative and associative; percentages are recomputed from the counts.
 */
export function mergeBatchSummaries(a: BatchSummary, b: BatchSummary): BatchSummary {
  const counts = emptyPersonaCounts();
  for (const persona of PERSONA_LABELS) {
    counts[persona] = a.persona_counts[persona] + b.persona_counts[persona];
  }

  return buildSummary(
    a.total + b.total,
    counts,
    a.high_engagement.count + b.high_engagement.count,
    a.at_risk.count + b.at_risk.count
  );
}

function buildSummary(
  total: number,
  counts: Record<PersonaLabel, number>,
  highEngagement: number,
  atRisk: number
): BatchSummary {
  const percentages = emptyPersonaCounts();
  let activePersonas = 0;

  for (const persona of PERSONA_LABELS) {
    percentages[persona] = share(counts[persona], total);
    if (counts[persona] > 0) activePersonas++;
  }

  return {
    total,
    persona_counts: counts,
    persona_percentages: percentages,
    high_engagement: kpi(highEngagement, total),
    at_risk: kpi(atRisk, total),
    active_personas: activePersonas,
  };
}

function emptyPersonaCounts(): Record<PersonaLabel, number> {
  return {
    HighlyEngagedLoyalist: 0,
    ModeratePotential: 0,
    CuriousSafeExplorer: 0,
    FinanciallyStressedRepeater: 0,
  };
}

function kpi(count: number, total: number): KpiCount {
  return { count, percentage: share(count, total) };
}

function share(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}
