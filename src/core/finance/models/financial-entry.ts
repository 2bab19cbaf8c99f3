/**
 * Financial entry validation and wire format
 */

import { ErrorCode, ValidationError } from "../../errors.js";
import { hasPair } from "../../taxonomy/models/taxonomy.js";
import { FinancialEntrySchema, formatIssues, type FinancialEntry } from "../../../utils/validation.js";
import { err, ok, type Result } from "../../../types/result.js";
import type { FinancialEntryPayload, TaxonomySnapshot } from "../../../types/index.js";

export type { FinancialEntry };

const AMOUNT_PATTERN = /^\d+(\.\d{1,2})?$/;

/**
 * Parse a typed amount: digits with up to two decimals, greater than zero
 */
export function parseAmount(text: string): number | null {
  const trimmed = text.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return null;
  }
  const amount = Number(trimmed);
  return amount > 0 ? amount : null;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function toIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Validate an entry, including that its category pair exists in `snapshot`
 */
export function validateEntry(
  input: unknown,
  snapshot: TaxonomySnapshot
): Result<FinancialEntry, ValidationError> {
  const parsed = FinancialEntrySchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    return err(
      new ValidationError(`Invalid entry: ${issues.join("; ")}`, ErrorCode.VALIDATION_FAILED, {
        issues,
      })
    );
  }

  const entry = parsed.data;
  if (!hasPair(snapshot, entry.category, entry.subcategory)) {
    return err(
      new ValidationError(
        `"${entry.category} / ${entry.subcategory}" is not in the category tree`,
        ErrorCode.TAXONOMY_UNKNOWN_NODE,
        { category: entry.category, subcategory: entry.subcategory }
      )
    );
  }
  return ok(entry);
}

export function toPayload(entry: FinancialEntry): FinancialEntryPayload {
  return {
    date: entry.date,
    name: entry.name,
    amount: entry.amount,
    category: entry.category,
    subcategory: entry.subcategory,
    payment_method: entry.paymentMethod,
    notes: entry.notes ?? "",
  };
}
