/**
 * Taxonomy resolution state machine
 *
 * Pure transitions from (state, input) to (state, effect). The driver in
 * impl/TaxonomyResolver.ts performs effects (remote creates, messages) and
 * feeds their results back in as inputs.
 */

import { applyTaxonomyEvent, findCategory } from "./models/taxonomy.js";
import type { TaxonomySnapshot } from "../../types/index.js";

// =============================================================================
// States, Inputs, Effects
// =============================================================================

export type ResolverState =
  | { phase: "select-category"; snapshot: TaxonomySnapshot }
  | { phase: "create-category"; snapshot: TaxonomySnapshot; pending?: string }
  | { phase: "select-subcategory"; snapshot: TaxonomySnapshot; category: string }
  | {
      phase: "create-subcategory";
      snapshot: TaxonomySnapshot;
      category: string;
      pending?: string;
    }
  | {
      phase: "resolved";
      snapshot: TaxonomySnapshot;
      category: string;
      subcategory: string;
    };

export type ResolverPhase = ResolverState["phase"];

export type ResolvedState = Extract<ResolverState, { phase: "resolved" }>;

export type ResolverInput =
  | { type: "entered"; text: string }
  | { type: "create-succeeded" }
  | { type: "create-failed"; status: number; body: string };

export type ResolverEffect =
  | { type: "none" }
  | { type: "invalid-choice"; text: string; max: number }
  | { type: "empty-name" }
  | { type: "create-category"; name: string }
  | { type: "create-subcategory"; category: string; name: string }
  | { type: "create-failed"; status: number; body: string };

export interface Transition {
  state: ResolverState;
  effect: ResolverEffect;
}

const NONE: ResolverEffect = { type: "none" };

// =============================================================================
// Entry
// =============================================================================

/**
 * An empty taxonomy offers nothing to select, so creation is mandatory
 */
export function initialState(snapshot: TaxonomySnapshot): ResolverState {
  return snapshot.length === 0
    ? { phase: "create-category", snapshot }
    : { phase: "select-category", snapshot };
}

export function isResolved(state: ResolverState): state is ResolvedState {
  return state.phase === "resolved";
}

/**
 * Parse a 1-based menu choice. Anything but digits in 1..max is rejected.
 */
export function parseChoice(text: string, max: number): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const choice = Number.parseInt(trimmed, 10);
  return choice >= 1 && choice <= max ? choice : null;
}

/**
 * Existing names offered in a select phase; the create option follows them
 */
export function selectableNames(state: ResolverState): readonly string[] {
  switch (state.phase) {
    case "select-category":
      return state.snapshot.map((node) => node.name);
    case "select-subcategory":
      return findCategory(state.snapshot, state.category)?.subcategories ?? [];
    default:
      return [];
  }
}

// =============================================================================
// Transition Function
// =============================================================================

export function transition(state: ResolverState, input: ResolverInput): Transition {
  switch (state.phase) {
    case "select-category":
      return input.type === "entered" ? selectCategory(state, input.text) : stay(state);

    case "select-subcategory":
      return input.type === "entered" ? selectSubcategory(state, input.text) : stay(state);

    case "create-category":
      return createCategory(state, input);

    case "create-subcategory":
      return createSubcategory(state, input);

    case "resolved":
      return stay(state);
  }
}

function stay(state: ResolverState, effect: ResolverEffect = NONE): Transition {
  return { state, effect };
}

function selectCategory(
  state: Extract<ResolverState, { phase: "select-category" }>,
  text: string
): Transition {
  const names = selectableNames(state);
  const choice = parseChoice(text, names.length + 1);
  if (choice === null) {
    return stay(state, { type: "invalid-choice", text, max: names.length + 1 });
  }

  if (choice === names.length + 1) {
    return stay({ phase: "create-category", snapshot: state.snapshot });
  }

  const node = state.snapshot[choice - 1];
  if (!node) {
    return stay(state, { type: "invalid-choice", text, max: names.length + 1 });
  }
  return stay(
    node.subcategories.length === 0
      ? { phase: "create-subcategory", snapshot: state.snapshot, category: node.name }
      : { phase: "select-subcategory", snapshot: state.snapshot, category: node.name }
  );
}

function selectSubcategory(
  state: Extract<ResolverState, { phase: "select-subcategory" }>,
  text: string
): Transition {
  const names = selectableNames(state);
  const choice = parseChoice(text, names.length + 1);
  if (choice === null) {
    return stay(state, { type: "invalid-choice", text, max: names.length + 1 });
  }

  if (choice === names.length + 1) {
    return stay({ phase: "create-subcategory", snapshot: state.snapshot, category: state.category });
  }

  const subcategory = names[choice - 1];
  if (subcategory === undefined) {
    return stay(state, { type: "invalid-choice", text, max: names.length + 1 });
  }
  return stay({
    phase: "resolved",
    snapshot: state.snapshot,
    category: state.category,
    subcategory,
  });
}

function createCategory(
  state: Extract<ResolverState, { phase: "create-category" }>,
  input: ResolverInput
): Transition {
  switch (input.type) {
    case "entered": {
      const name = input.text.trim();
      if (name.length === 0) {
        return stay({ phase: "create-category", snapshot: state.snapshot }, { type: "empty-name" });
      }
      return stay(
        { phase: "create-category", snapshot: state.snapshot, pending: name },
        { type: "create-category", name }
      );
    }

    case "create-succeeded": {
      if (state.pending === undefined) {
        return stay(state);
      }
      const snapshot = applyTaxonomyEvent(state.snapshot, {
        type: "category-created",
        category: state.pending,
      });
      // A brand-new category has no subcategories to select from
      return stay({ phase: "create-subcategory", snapshot, category: state.pending });
    }

    case "create-failed":
      return stay(
        { phase: "create-category", snapshot: state.snapshot },
        { type: "create-failed", status: input.status, body: input.body }
      );
  }
}

function createSubcategory(
  state: Extract<ResolverState, { phase: "create-subcategory" }>,
  input: ResolverInput
): Transition {
  const idle = { phase: "create-subcategory", snapshot: state.snapshot, category: state.category } as const;

  switch (input.type) {
    case "entered": {
      const name = input.text.trim();
      if (name.length === 0) {
        return stay(idle, { type: "empty-name" });
      }
      return stay(
        { ...idle, pending: name },
        { type: "create-subcategory", category: state.category, name }
      );
    }

    case "create-succeeded": {
      if (state.pending === undefined) {
        return stay(state);
      }
      const snapshot = applyTaxonomyEvent(state.snapshot, {
        type: "subcategory-created",
        category: state.category,
        subcategory: state.pending,
      });
      return stay({
        phase: "resolved",
        snapshot,
        category: state.category,
        subcategory: state.pending,
      });
    }

    case "create-failed":
      return stay(idle, { type: "create-failed", status: input.status, body: input.body });
  }
}
