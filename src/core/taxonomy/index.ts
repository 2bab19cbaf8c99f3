/**
 * Taxonomy Module
 *
 * Resolves a (category, subcategory) pair for a financial entry against the
 * remote category tree, creating missing nodes on the way.
 */

// Snapshot and events
export * from "./models/taxonomy.js";

// State machine
export * from "./state-machine.js";

// Interactive driver
export * from "./impl/TaxonomyResolver.js";
