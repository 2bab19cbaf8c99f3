/**
 * status command - Check that the server answers with these credentials
 */

import chalk from "chalk";
import ora from "ora";
import { createLogger, maskSecret } from "../../utils/index.js";
import { createCliContext, type CliContext } from "../context.js";

const logger = createLogger("status");

export async function statusCommand(context?: CliContext): Promise<void> {
  const { config, store } = context ?? createCliContext();
  logger.info({ baseUrl: config.baseUrl }, "Checking status");

  console.log();
  console.log(chalk.cyan.bold("bucket Status"));
  console.log(chalk.dim("─".repeat(50)));
  console.log(`  Server:     ${chalk.cyan(config.baseUrl)}`);
  console.log(`  API key:    ${chalk.dim(maskSecret(config.apiKey))}`);
  console.log(`  Editor:     ${config.editor}`);
  console.log();

  const spinner = ora("Contacting server...").start();
  try {
    const listing = await store.listTaxonomy();
    if (listing.ok) {
      const subcategories = listing.snapshot.reduce((sum, node) => sum + node.subcategories.length, 0);
      spinner.succeed(
        `Server reachable: ${listing.snapshot.length} categories, ${subcategories} subcategories`
      );
    } else {
      spinner.fail(`Server answered ${listing.status}: ${listing.body}`);
    }
  } catch (error) {
    spinner.fail("Server unreachable");
    throw error;
  }
}
