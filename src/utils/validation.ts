/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration, server responses and user input
 * at runtime.
 *
 * @module
 */

import { z } from "zod";
import { PAYMENT_METHODS, RECORD_TYPES } from "../types/index.js";

// =============================================================================
// Records
// =============================================================================

export const RecordTypeSchema = z.enum(RECORD_TYPES);

// =============================================================================
// Configuration
// =============================================================================

/**
 * Contents of config.json. Every key is optional; the environment may fill
 * the gaps.
 */
export const StoredConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  editor: z.string().min(1).optional(),
});

export type StoredConfig = z.infer<typeof StoredConfigSchema>;

/**
 * Effective configuration after merging file, environment and defaults
 */
export const BucketConfigSchema = z.object({
  baseUrl: z.string({ required_error: "baseUrl is not set" }).url("baseUrl must be a URL"),
  apiKey: z.string({ required_error: "apiKey is not set" }).min(1, "apiKey is empty"),
  editor: z.string().min(1),
});

// =============================================================================
// Taxonomy
// =============================================================================

export const TaxonomyTreeSchema = z.record(z.array(z.string().min(1)));

/**
 * Body of GET /finance/categories
 */
export const TaxonomyResponseSchema = z.object({
  categories: TaxonomyTreeSchema,
});

// =============================================================================
// Finance
// =============================================================================

export const PaymentMethodSchema = z.enum(PAYMENT_METHODS);

export const FinancialEntrySchema = z.object({
  date: z.string().date("date must be a calendar date (YYYY-MM-DD)"),
  name: z.string().trim().min(1, "name is required"),
  amount: z
    .number()
    .positive("amount must be positive")
    .multipleOf(0.01, "amount takes at most two decimals"),
  category: z.string().min(1),
  subcategory: z.string().min(1),
  paymentMethod: PaymentMethodSchema,
  notes: z.string().optional(),
});

export type FinancialEntry = z.infer<typeof FinancialEntrySchema>;

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
