#!/usr/bin/env node

/**
 * bucket CLI
 * Capture and revise tasks, notes, bookmarks and expenses on a bucket server
 */

import { Command } from "commander";
import chalk from "chalk";
import { defaultCommand } from "./commands/default.js";
import { writeCommand, readCommand, editCommand } from "./commands/records.js";
import { expenseCommand, ledgerCommand, categoriesCommand } from "./commands/finance.js";
import { statusCommand } from "./commands/status.js";
import { configCommand } from "./commands/config.js";
import { isBucketError, wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("bucket")
  .description("Capture and revise tasks, notes, bookmarks and expenses")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .action(() => defaultCommand());

// =============================================================================
// Commands
// =============================================================================

program
  .command("write")
  .description("Write a new entry in the editor and post it")
  .argument("<type>", "task, note or bookmark")
  .action((type: string) => writeCommand(type));

program
  .command("read")
  .description("Open the current entry in the editor")
  .argument("<type>", "task, note or bookmark")
  .action((type: string) => readCommand(type));

program
  .command("edit")
  .description("Edit the current entry and push it back if it changed")
  .argument("<type>", "task, note or bookmark")
  .action((type: string) => editCommand(type));

program
  .command("expense")
  .description("Record an expense")
  .action(() => expenseCommand());

program
  .command("ledger")
  .description("Edit the full transaction ledger as CSV")
  .action(() => ledgerCommand());

program
  .command("categories")
  .description("Edit the full category tree as JSON")
  .action(() => categoriesCommand());

program
  .command("status")
  .description("Check the server connection")
  .action(() => statusCommand());

program
  .command("config")
  .description("Show or update configuration")
  .option("--set-key <key>", "Store the API key")
  .option("--set-url <url>", "Store the server base URL")
  .option("--set-editor <command>", "Store the editor command")
  .action(configCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const failure = wrapError(error);
  logger.error({ error: failure.toJSON() }, "CLI error occurred");
  console.error(chalk.red(`\nError: ${failure.message}`));
  const verbose = process.env.DEBUG || process.env.NODE_ENV === "development";
  if (verbose && !isBucketError(error) && error instanceof Error) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
