import express, { Router, Request, Response } from "express";
import { z } from "zod";
import {
  LabeledCustomerRecord,
  LabeledRecordFilter,
  PersonaProfile,
  BatchSummary,
  RecordError,
  ScoringConfig,
  ScoringProfile,
  ThresholdConfig,
} from "../types/persona";
import { ConfigError, ValidationError } from "../errors";
import { runPipeline, summarizeBatch } from "../services/pipeline";
import {
  buildPersonaProfiles,
  engagementExtent,
  filterLabeledRecords,
  personaLegend,
  PersonaLegendEntry,
} from "../services/insights";
import { ingestCustomerCsv } from "../services/ingest";
import { scoringConfigSchema, thresholdsSchema } from "../config/scoringProfile";
import { optionalCutSchema } from "../config";
import { createLogger } from "../logger";

const logger = createLogger("personas");

const personaLabelSchema = z.enum([
  "HighlyEngagedLoyalist",
  "ModeratePotential",
  "CuriousSafeExplorer",
  "FinanciallyStressedRepeater",
]);

const rangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine(range => range.min <= range.max, { message: "min must not exceed max" });

const scoreRequestSchema = z.object({
  records: z.array(z.unknown()),
  scoring: scoringConfigSchema.optional(),
  thresholds: thresholdsSchema.partial().optional(),
  filters: z
    .object({
      personas: z.array(personaLabelSchema).optional(),
      engagement_range: rangeSchema.optional(),
    })
    .optional(),
});

const cutQuerySchema = z.object({
  engagement_cut: optionalCutSchema,
  risk_cut: optionalCutSchema,
});

export interface PersonaBatchResponse {
  records: LabeledCustomerRecord[];
  summary: BatchSummary;
  profiles: PersonaProfile[];
  errors: RecordError[];
  /** Engagement range of the whole batch, before filters */
  engagement_extent: { min: number; max: number } | null;
  legend: PersonaLegendEntry[];
}

/**
 * Run a batch and shape it for the dashboard.
 * KPIs and profiles are computed over the filtered records.
 */
export function buildPersonaResponse(
  records: readonly unknown[],
  scoring: ScoringConfig,
  thresholds: ThresholdConfig,
  filter: LabeledRecordFilter = {}
): PersonaBatchResponse {
  const result = runPipeline(records, scoring, thresholds);
  const visible = filterLabeledRecords(result.records, filter);

  return {
    records: visible,
    summary: summarizeBatch(visible, thresholds),
    profiles: buildPersonaProfiles(visible),
    errors: result.errors,
    engagement_extent: engagementExtent(result.records),
    legend: personaLegend(),
  };
}

/**
 * Persona scoring endpoints, bound to the service's scoring profile
 */
export function createPersonasRouter(profile: ScoringProfile): Router {
  const router = Router();

  /**
   * POST /personas/score
   * JSON batch: { records, scoring?, thresholds?, filters? }
   */
  router.post("/score", (req: Request, res: Response) => {
    const parsed = scoreRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: "Invalid request body",
        issues: parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`),
      });
    }

    try {
      const { records, scoring, thresholds, filters } = parsed.data;
      const effectiveThresholds: ThresholdConfig = { ...profile.thresholds, ...thresholds };

      const response = buildPersonaResponse(
        records,
        scoring ?? profile.scoring,
        effectiveThresholds,
        {
          personas: filters?.personas,
          engagementRange: filters?.engagement_range,
        }
      );

      logBatch("json", response);
      return res.status(200).json(response);
    } catch (error) {
      return sendError(res, error);
    }
  });

  /**
   * POST /personas/score-csv
   * Raw CSV upload; cuts may be overridden with ?engagement_cut=&risk_cut=
   */
  router.post(
    "/score-csv",
    express.text({ type: ["text/csv", "text/plain"], limit: "10mb" }),
    (req: Request, res: Response) => {
      const text: unknown = req.body;
      if (typeof text !== "string" || !text.trim()) {
        return res.status(400).json({ error: "Expected a non-empty text/csv body" });
      }

      const query = cutQuerySchema.safeParse(req.query);
      if (!query.success) {
        return res.status(400).json({
          error: "Invalid query",
          issues: query.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
        });
      }

      try {
        const { source, records } = ingestCustomerCsv(text);
        const thresholds: ThresholdConfig = {
          engagement_cut: query.data.engagement_cut ?? profile.thresholds.engagement_cut,
          risk_cut: query.data.risk_cut ?? profile.thresholds.risk_cut,
        };

        const response = buildPersonaResponse(records, profile.scoring, thresholds);

        logBatch(source, response);
        return res.status(200).json(response);
      } catch (error) {
        return sendError(res, error);
      }
    }
  );

  return router;
}

function sendError(res: Response, error: unknown) {
  if (error instanceof ConfigError) {
    logger.error("Config error:", error.message);
    return res.status(422).json({ error: error.message, issues: error.issues });
  }
  if (error instanceof ValidationError) {
    return res.status(400).json({ error: error.message });
  }

  const message = error instanceof Error ? error.message : "Unknown error";
  logger.error("Error:", message);
  return res.status(500).json({ error: message });
}

function logBatch(source: string, response: PersonaBatchResponse) {
  logger.info(`Scored batch from ${source}:`, {
    total: response.summary.total,
    skipped: response.errors.length,
    active_personas: response.summary.active_personas,
  });

  logger.debug("Persona counts:", response.summary.persona_counts);
}
