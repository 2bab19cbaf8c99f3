/**
 * Taxonomy snapshot and its event projection
 *
 * The snapshot is the resolver's local cache of the remote category tree.
 * It only moves forward through events, and an event exists only once the
 * server accepted the matching create call.
 */

import { ErrorCode, ValidationError } from "../../errors.js";
import type { CategoryNode, TaxonomySnapshot, TaxonomyTree } from "../../../types/index.js";

// =============================================================================
// Events
// =============================================================================

export type TaxonomyEvent =
  | { type: "category-created"; category: string }
  | { type: "subcategory-created"; category: string; subcategory: string };

// =============================================================================
// Conversions
// =============================================================================

/**
 * Build an ordered snapshot from a server tree. Key order is display order.
 */
export function snapshotFromTree(tree: TaxonomyTree): TaxonomySnapshot {
  return Object.entries(tree).map(([name, subcategories]) => ({
    name,
    subcategories: [...subcategories],
  }));
}

export function treeFromSnapshot(snapshot: TaxonomySnapshot): TaxonomyTree {
  const tree: TaxonomyTree = {};
  for (const node of snapshot) {
    tree[node.name] = [...node.subcategories];
  }
  return tree;
}

// =============================================================================
// Queries
// =============================================================================

export function findCategory(
  snapshot: TaxonomySnapshot,
  name: string
): CategoryNode | undefined {
  return snapshot.find((node) => node.name === name);
}

/**
 * True when both names are present in the snapshot, the subcategory under the category
 */
export function hasPair(
  snapshot: TaxonomySnapshot,
  category: string,
  subcategory: string
): boolean {
  return findCategory(snapshot, category)?.subcategories.includes(subcategory) ?? false;
}

// =============================================================================
// Projection
// =============================================================================

/**
 * Apply one event and return the next snapshot. The input is not modified.
 * Re-applying an event is a no-op.
 *
 * @throws ValidationError if a subcategory event names an unknown category
 */
export function applyTaxonomyEvent(
  snapshot: TaxonomySnapshot,
  event: TaxonomyEvent
): TaxonomySnapshot {
  switch (event.type) {
    case "category-created": {
      if (findCategory(snapshot, event.category)) {
        return snapshot;
      }
      return [...snapshot, { name: event.category, subcategories: [] }];
    }

    case "subcategory-created": {
      const parent = findCategory(snapshot, event.category);
      if (!parent) {
        throw new ValidationError(
          `Unknown category "${event.category}"`,
          ErrorCode.TAXONOMY_UNKNOWN_NODE,
          { category: event.category }
        );
      }
      if (parent.subcategories.includes(event.subcategory)) {
        return snapshot;
      }
      return snapshot.map((node) =>
        node === parent
          ? { name: node.name, subcategories: [...node.subcategories, event.subcategory] }
          : node
      );
    }
  }
}

/**
 * Fold a sequence of events over a snapshot
 */
export function replayTaxonomyEvents(
  snapshot: TaxonomySnapshot,
  events: readonly TaxonomyEvent[]
): TaxonomySnapshot {
  return events.reduce(applyTaxonomyEvent, snapshot);
}
