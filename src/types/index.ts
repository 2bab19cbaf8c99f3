/**
 * Shared types for bucket
 */

// =============================================================================
// Records
// =============================================================================

export const RECORD_TYPES = ["task", "note", "bookmark"] as const;

/**
 * Kinds of text record the server keeps, one live body per kind
 */
export type RecordType = (typeof RECORD_TYPES)[number];

// =============================================================================
// Remote Store
// =============================================================================

/**
 * Status/body pair of a finished HTTP round trip
 */
export interface StoreResponse {
  status: number;
  body: string;
}

/**
 * Resources the reconciliation engine can fetch and replace as a whole
 */
export type RemoteResource = "records" | "transactions" | "categories";

/**
 * Replace payloads, one shape per content kind
 */
export type RecordReplacePayload = { type: RecordType; content: string };
export type ContentReplacePayload = { content: string };
export type ReplacePayload = RecordReplacePayload | ContentReplacePayload;

// =============================================================================
// Taxonomy
// =============================================================================

/**
 * Category tree as the server sends it: category name to ordered subcategory names
 */
export type TaxonomyTree = Record<string, string[]>;

export interface CategoryNode {
  readonly name: string;
  readonly subcategories: readonly string[];
}

/**
 * Ordered local copy of the taxonomy
 */
export type TaxonomySnapshot = readonly CategoryNode[];

// =============================================================================
// Finance
// =============================================================================

export const PAYMENT_METHODS = ["credit", "debit"] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/**
 * Flat body of a financial entry submission
 */
export interface FinancialEntryPayload {
  date: string;
  name: string;
  amount: number;
  category: string;
  subcategory: string;
  payment_method: PaymentMethod;
  notes: string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface BucketConfig {
  /** Server root, e.g. https://example.com/bucket */
  baseUrl: string;
  /** Sent as X-API-Key on every request */
  apiKey: string;
  /** Editor command, may carry arguments ("code --wait") */
  editor: string;
}
