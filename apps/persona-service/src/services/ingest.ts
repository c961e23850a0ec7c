import { parse } from "csv-parse/sync";
import { z } from "zod";
import { RawCustomerRecord } from "../types/persona";
import { ValidationError } from "../errors";
import { isBankMarketingHeader, mapBankMarketingRow } from "../mappers/bankMarketing";
import { mapGenericRow } from "../mappers/generic";
import { createLogger } from "../logger";

const logger = createLogger("ingest");

export type TabularSource = "bank_marketing" | "generic";

export interface IngestResult {
  source: TabularSource;
  records: RawCustomerRecord[];
}

const rowsSchema = z.array(z.record(z.string().optional()));

/**
 * Normalize a header cell to snake_case ("Call Duration" -> "call_duration")
 */
export function normalizeHeader(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Normalize every header cell; two cells that normalize to the same name are rejected
 */
export function normalizeHeaderRow(header: string[]): string[] {
  const columns = header.map(normalizeHeader);
  const duplicates = [...new Set(columns.filter((column, i) => column && columns.indexOf(column) !== i))];
  if (duplicates.length > 0) {
    throw new ValidationError(`Duplicate CSV columns after normalization: ${duplicates.join(", ")}`, {
      field: duplicates[0],
    });
  }
  return columns;
}

/**
 * Parse CSV text with a header row into normalized rows
 */
export function parseCustomerCsv(text: string): Record<string, string | undefined>[] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      columns: normalizeHeaderRow,
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Unreadable CSV: ${message}`);
  }

  return rowsSchema.parse(parsed);
}

/**
 * Detect the layout from the header and map every row
 * Row numbers (used as fallback ids) are 1-based and exclude the header.
 */
export function mapRowsToRecords(rows: Record<string, string | undefined>[]): IngestResult {
  const columns = [...new Set(rows.flatMap(row => Object.keys(row)))];

  if (isBankMarketingHeader(columns)) {
    return {
      source: "bank_marketing",
      records: rows.map((row, i) => mapBankMarketingRow(row, i + 1)),
    };
  }

  return {
    source: "generic",
    records: rows.map((row, i) => mapGenericRow(row, i + 1)),
  };
}

export function ingestCustomerCsv(text: string): IngestResult {
  const rows = parseCustomerCsv(text);
  logger.info(`Parsed ${rows.length} rows`);
  return mapRowsToRecords(rows);
}
