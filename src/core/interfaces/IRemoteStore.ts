/**
 * IRemoteStore - HTTP-backed storage for records, the ledger and the taxonomy
 *
 * Non-2xx answers are returned as status/body pairs, never thrown. Only a
 * failed round trip (no answer at all) rejects, with a RemoteStoreError.
 *
 * @module
 */

import type {
  FinancialEntryPayload,
  RecordType,
  RemoteResource,
  ReplacePayload,
  StoreResponse,
  TaxonomySnapshot,
} from "../../types/index.js";

/**
 * Result of listing the taxonomy
 */
export type TaxonomyListing =
  | { ok: true; status: number; snapshot: TaxonomySnapshot }
  | { ok: false; status: number; body: string };

export interface IRemoteStore {
  /**
   * Read a whole resource as text
   * @param query - Query parameters, e.g. `{ type: "note" }` for records
   */
  fetch(resource: RemoteResource, query?: Record<string, string>): Promise<StoreResponse>;

  /**
   * Replace a whole resource
   */
  replace(resource: RemoteResource, payload: ReplacePayload): Promise<StoreResponse>;

  /**
   * Store a new record body
   */
  createRecord(type: RecordType, body: string): Promise<StoreResponse>;

  /**
   * Submit one financial entry
   */
  submitEntry(payload: FinancialEntryPayload): Promise<StoreResponse>;

  createCategory(name: string): Promise<StoreResponse>;

  createSubcategory(category: string, name: string): Promise<StoreResponse>;

  /**
   * Fetch the taxonomy and decode it into an ordered snapshot
   * @throws RemoteStoreError when a 2xx body is not a category tree
   */
  listTaxonomy(): Promise<TaxonomyListing>;
}

/**
 * The subset of the store the taxonomy resolver writes through
 */
export type ITaxonomyWriter = Pick<IRemoteStore, "createCategory" | "createSubcategory">;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
