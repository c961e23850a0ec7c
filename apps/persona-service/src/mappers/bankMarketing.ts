import { RawCustomerRecord } from "../types/persona";
import { firstPresent, parseFlagCell, parseNumericCell } from "./cells";

/**
 * Bank direct-marketing export, one row per contacted customer
 * (headers already normalized to snake_case)
 */
export interface BankMarketingRow {
  id?: string;
  customer_id?: string;
  campaign?: string;
  previous?: string;
  duration?: string;
  tenure?: string;
  tenure_months?: string;
  housing?: string;
  loan?: string;
  default?: string;
  balance?: string;
  [column: string]: string | undefined;
}

const BANK_MARKETING_COLUMNS = ["campaign", "previous", "duration", "housing", "loan", "default", "balance"];

export const ID_COLUMNS = ["id", "customer_id"];

/**
 * Detect the bank-marketing layout from its header
 * At least two of its characteristic columns must be present
 */
export function isBankMarketingHeader(columns: string[]): boolean {
  return BANK_MARKETING_COLUMNS.filter(c => columns.includes(c)).length >= 2;
}

/**
 * Map a bank-marketing row to the scoring input
 * Absent columns become missing signals, which score at the neutral midpoint
 */
export function mapBankMarketingRow(row: BankMarketingRow, rowNumber: number): RawCustomerRecord {
  return {
    id: firstPresent(row, ID_COLUMNS) ?? String(rowNumber),
    signals: {
      campaign_contacts: parseNumericCell(row.campaign),
      previous_contacts: parseNumericCell(row.previous),
      call_duration_seconds: parseNumericCell(row.duration),
      tenure_months: parseNumericCell(row.tenure_months ?? row.tenure),
      has_housing_loan: parseFlagCell(row.housing),
      has_personal_loan: parseFlagCell(row.loan),
      has_credit_default: parseFlagCell(row.default),
      account_balance: parseNumericCell(row.balance),
    },
  };
}
