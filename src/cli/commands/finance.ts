/**
 * expense / ledger / categories commands - Finance flows
 */

import chalk from "chalk";
import { createLogger } from "../../utils/index.js";
import { createCliContext, type CliContext } from "../context.js";
import { printOutcome } from "../report.js";

const logger = createLogger("finance-command");

/**
 * Capture one expense
 */
export async function expenseCommand(context?: CliContext): Promise<void> {
  const { expenses } = context ?? createCliContext();
  logger.info("Expense command");

  console.log();
  console.log(chalk.cyan.bold("New Expense"));
  console.log(chalk.dim("─".repeat(50)));

  printOutcome(await expenses.addEntry());
}

/**
 * Edit the full transaction ledger as CSV
 */
export async function ledgerCommand(context?: CliContext): Promise<void> {
  const { expenses } = context ?? createCliContext();
  logger.info("Ledger command");
  printOutcome(await expenses.editLedger());
}

/**
 * Edit the full category tree as JSON
 */
export async function categoriesCommand(context?: CliContext): Promise<void> {
  const { expenses } = context ?? createCliContext();
  logger.info("Categories command");
  printOutcome(await expenses.editCategories());
}
