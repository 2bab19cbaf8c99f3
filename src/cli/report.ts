/**
 * Terminal rendering of flow outcomes
 */

import chalk from "chalk";
import type { ReconcileOutcome } from "../core/reconciliation/index.js";
import type { ReadOutcome, WriteOutcome } from "../core/records/index.js";
import type { ExpenseOutcome } from "../core/finance/index.js";

/**
 * Lines describing an outcome, without color
 */
export function describeOutcome(
  outcome: ReconcileOutcome | WriteOutcome | ReadOutcome | ExpenseOutcome
): string[] {
  switch (outcome.type) {
    case "no-change":
      return ["No changes made."];
    case "discarded":
      return [outcome.reason === "empty" ? "Edited content is empty. Nothing pushed." : "Changes discarded."];
    case "cancelled":
      return ["No content entered. Cancelled."];
    case "viewed":
      return [];
    case "edit-failed":
      return [`Edit failed: ${outcome.error.message}`];
    case "invalid":
      return ["Entry not submitted:", ...outcome.issues.map((issue) => `  ${issue}`)];
    case "pushed":
    case "push-failed":
    case "fetch-failed":
    case "submitted":
    case "rejected":
    case "taxonomy-unavailable":
      return [`Status: ${outcome.status}`, `Response: ${outcome.body}`];
  }
}

function isFailure(outcome: ReconcileOutcome | WriteOutcome | ReadOutcome | ExpenseOutcome): boolean {
  switch (outcome.type) {
    case "edit-failed":
    case "push-failed":
    case "fetch-failed":
    case "rejected":
    case "taxonomy-unavailable":
    case "invalid":
      return true;
    default:
      return false;
  }
}

export function printOutcome(
  outcome: ReconcileOutcome | WriteOutcome | ReadOutcome | ExpenseOutcome
): void {
  let color = chalk.dim;
  if (isFailure(outcome)) {
    color = chalk.red;
  } else if (outcome.type === "pushed" || outcome.type === "submitted") {
    color = chalk.green;
  }
  const lines = describeOutcome(outcome);
  if (lines.length === 0) {
    return;
  }
  console.log();
  for (const line of lines) {
    console.log(color(line));
  }
}
