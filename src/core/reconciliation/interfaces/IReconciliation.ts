/**
 * Reconciliation Interfaces
 *
 * Contract for the fetch → edit → diff → confirm → push cycle over a whole
 * remote resource.
 */

import type { ReplacePayload, StoreResponse } from "../../../types/index.js";

// =============================================================================
// Content Kinds
// =============================================================================

export type ContentKindName = "single-record" | "ledger" | "taxonomy-tree";

/**
 * How one payload shape is presented for editing and wrapped for replacement.
 * `T` is whatever `deserialize` makes of the edited text.
 */
export interface ContentKind<T> {
  readonly name: ContentKindName;

  /** Extension of the temporary buffer, so editors pick the right mode */
  readonly extension: string;

  /**
   * Turn the fetched body into editable text
   * @throws when the body cannot be presented (e.g. a malformed tree)
   */
  serialize(body: string): string;

  /**
   * Read the edited text back
   * @throws when the text cannot be turned into a payload
   */
  deserialize(text: string): T;

  wrap(value: T): ReplacePayload;
}

// =============================================================================
// Request & Outcome
// =============================================================================

export interface ReconcileRequest<T> {
  fetch: () => Promise<StoreResponse>;
  replace: (payload: ReplacePayload) => Promise<StoreResponse>;
  kind: ContentKind<T>;
}

/**
 * How one reconciliation run ended. Only `pushed` and `push-failed` mean a
 * replace call went out.
 */
export type ReconcileOutcome =
  | { type: "no-change" }
  | { type: "discarded"; reason: "declined" | "empty" }
  | { type: "pushed"; status: number; body: string }
  | { type: "push-failed"; status: number; body: string }
  | { type: "fetch-failed"; status: number; body: string }
  | { type: "edit-failed"; error: Error };

export type ReconcileOutcomeType = ReconcileOutcome["type"];

export interface IReconciliationEngine {
  reconcile<T>(request: ReconcileRequest<T>): Promise<ReconcileOutcome>;
}
