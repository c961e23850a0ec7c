/**
 * Cell parsing shared by the tabular mappers
 */

const MISSING_TOKENS = ["", "na", "n/a", "nan", "null", "none", "unknown", "?"];
const TRUE_TOKENS = ["yes", "y", "true", "t"];
const FALSE_TOKENS = ["no", "n", "false", "f"];

export function isMissingCell(cell: string | undefined): boolean {
  return cell === undefined || MISSING_TOKENS.includes(cell.trim().toLowerCase());
}

/**
 * Parse a numeric cell.
 * Missing tokens become null; text that is not a number is passed through
 * unchanged so the pipeline reports the record.
 */
export function parseNumericCell(cell: string | undefined): number | string | null {
  if (cell === undefined || isMissingCell(cell)) return null;
  const value = Number(cell.trim().replace(/,/g, ""));
  return Number.isFinite(value) ? value : cell;
}

/**
 * Parse a yes/no cell into 1/0. Numeric cells are accepted as-is.
 */
export function parseFlagCell(cell: string | undefined): number | string | null {
  if (cell === undefined || isMissingCell(cell)) return null;
  const token = cell.trim().toLowerCase();
  if (TRUE_TOKENS.includes(token)) return 1;
  if (FALSE_TOKENS.includes(token)) return 0;
  return parseNumericCell(cell);
}

/**
 * First non-missing value among candidate columns
 */
export function firstPresent(
  row: Record<string, string | undefined>,
  columns: string[]
): string | undefined {
  for (const column of columns) {
    const cell = row[column];
    if (cell !== undefined && !isMissingCell(cell)) return cell.trim();
  }
  return undefined;
}
