/**
 * Default command - Interactive menu over every flow
 */

import * as p from "@clack/prompts";
import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { isBucketError } from "../../core/errors.js";
import { createCliContext, type CliContext } from "../context.js";
import { printOutcome } from "../report.js";
import { RecordTypeSchema } from "../../utils/validation.js";
import { RECORD_TYPES, type RecordType } from "../../types/index.js";

const logger = createLogger("default");

type MenuAction = "write" | "read" | "edit" | "expense" | "ledger" | "categories" | "exit";

const MENU_OPTIONS: Array<{ value: MenuAction; label: string; hint?: string }> = [
  { value: "write", label: "Write entry", hint: "task, note or bookmark" },
  { value: "read", label: "Read entry" },
  { value: "edit", label: "Edit entry", hint: "push changes back" },
  { value: "expense", label: "Add expense" },
  { value: "ledger", label: "Edit ledger", hint: "CSV" },
  { value: "categories", label: "Edit categories", hint: "JSON" },
  { value: "exit", label: "Exit" },
];

export async function defaultCommand(context?: CliContext): Promise<void> {
  const ctx = context ?? createCliContext();
  logger.info("Interactive session started");

  p.intro(chalk.bgCyan.black(" bucket "));

  for (;;) {
    const action = await p.select({
      message: "What do you want to do?",
      options: MENU_OPTIONS,
    });

    if (p.isCancel(action) || !isMenuAction(action) || action === "exit") {
      p.outro("Goodbye!");
      return;
    }

    await runAction(ctx, action);
  }
}

async function runAction(ctx: CliContext, action: Exclude<MenuAction, "exit">): Promise<void> {
  try {
    switch (action) {
      case "write":
      case "read":
      case "edit": {
        const type = await chooseRecordType(action);
        if (type === null) return;
        const outcome =
          action === "write"
            ? await ctx.records.write(type)
            : action === "read"
              ? await ctx.records.read(type)
              : await ctx.records.edit(type);
        printOutcome(outcome);
        return;
      }
      case "expense":
        printOutcome(await ctx.expenses.addEntry());
        return;
      case "ledger":
        printOutcome(await ctx.expenses.editLedger());
        return;
      case "categories":
        printOutcome(await ctx.expenses.editCategories());
        return;
    }
  } catch (error) {
    // Known failures end the action, not the session
    if (!isBucketError(error)) {
      throw error;
    }
    logger.error({ err: error, action }, "Action failed");
    console.log(chalk.red(`\nError: ${error.message}`));
  }
}

async function chooseRecordType(action: "write" | "read" | "edit"): Promise<RecordType | null> {
  const choice = await p.select({
    message: `${capitalize(action)} which entry?`,
    options: [
      ...RECORD_TYPES.map((type) => ({ value: type, label: capitalize(type) })),
      { value: "back", label: "Back to main menu" },
    ],
  });

  if (p.isCancel(choice)) {
    return null;
  }
  const parsed = RecordTypeSchema.safeParse(choice);
  return parsed.success ? parsed.data : null;
}

function isMenuAction(value: unknown): value is MenuAction {
  return MENU_OPTIONS.some((option) => option.value === value);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
