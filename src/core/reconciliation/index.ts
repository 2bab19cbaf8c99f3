/**
 * Reconciliation Module
 *
 * Read-modify-write of whole remote resources through an external editor:
 * a single record, the transaction ledger, or the category tree.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Content kinds
export * from "./content-kinds.js";

// Implementation
export * from "./impl/ReconciliationEngine.js";
