import { RawCustomerRecord } from "../types/persona";
import { firstPresent, parseFlagCell } from "./cells";
import { ID_COLUMNS } from "./bankMarketing";

/**
 * Map a row of any other layout: every non-id column becomes a signal
 * of the same name. Only signals named in the weights affect the scores.
 */
export function mapGenericRow(row: Record<string, string | undefined>, rowNumber: number): RawCustomerRecord {
  const signals: Record<string, unknown> = {};
  for (const [column, cell] of Object.entries(row)) {
    if (ID_COLUMNS.includes(column)) continue;
    signals[column] = parseFlagCell(cell);
  }

  return {
    id: firstPresent(row, ID_COLUMNS) ?? String(rowNumber),
    signals,
  };
}
