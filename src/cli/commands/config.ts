/**
 * config command - Show or update bucket configuration
 */

import chalk from "chalk";
import { getConfigPath, createLogger, maskSecret } from "../../utils/index.js";
import { DEFAULT_EDITOR, readStoredConfig, updateStoredConfig } from "../../utils/config.js";
import type { StoredConfig } from "../../utils/validation.js";

const logger = createLogger("config");

export interface ConfigOptions {
  setKey?: string;
  setUrl?: string;
  setEditor?: string;
}

/**
 * Manage bucket configuration
 */
export async function configCommand(options: ConfigOptions): Promise<void> {
  logger.info({ keys: Object.keys(options) }, "Config command");

  const patch: StoredConfig = {};
  if (options.setKey !== undefined) patch.apiKey = options.setKey;
  if (options.setUrl !== undefined) patch.baseUrl = options.setUrl;
  if (options.setEditor !== undefined) patch.editor = options.setEditor;

  if (Object.keys(patch).length > 0) {
    const saved = updateStoredConfig(patch);
    console.log(chalk.green(`Saved ${Object.keys(patch).join(", ")} to ${getConfigPath()}`));
    showConfig(saved);
    return;
  }

  showConfig(readStoredConfig());
}

/**
 * Show stored configuration alongside environment overrides
 */
function showConfig(stored: StoredConfig): void {
  const env = process.env;

  console.log();
  console.log(chalk.cyan.bold("bucket Configuration"));
  console.log(chalk.dim("─".repeat(50)));
  console.log(`  File:       ${chalk.dim(getConfigPath())}`);
  console.log();
  console.log(`  Server:     ${describe(stored.baseUrl, env.BUCKET_BASE_URL)}`);
  console.log(
    `  API key:    ${describe(
      stored.apiKey && maskSecret(stored.apiKey),
      env.BUCKET_API_KEY && maskSecret(env.BUCKET_API_KEY)
    )}`
  );
  console.log(`  Editor:     ${describe(stored.editor, env.EDITOR, DEFAULT_EDITOR)}`);

  console.log();
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.dim("To set the key:    bucket config --set-key <key>"));
  console.log(chalk.dim("To set the server: bucket config --set-url <url>"));
  console.log(chalk.dim("To set the editor: bucket config --set-editor <command>"));
  console.log();
}

function describe(stored?: string, fromEnv?: string, fallback?: string): string {
  if (fromEnv) {
    return `${chalk.cyan(fromEnv)} ${chalk.dim("(environment)")}`;
  }
  if (stored) {
    return chalk.cyan(stored);
  }
  if (fallback) {
    return `${fallback} ${chalk.dim("(default)")}`;
  }
  return chalk.yellow("not set");
}
