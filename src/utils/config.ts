/**
 * Configuration loading
 *
 * Effective settings come from config.json in the bucket home directory,
 * overridden by BUCKET_BASE_URL, BUCKET_API_KEY and EDITOR.
 */

import { BucketConfigSchema, StoredConfigSchema, formatIssues, type StoredConfig } from "./validation.js";
import { fileExists, getConfigPath, readJson, writeJson } from "./index.js";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import type { BucketConfig } from "../types/index.js";

export const DEFAULT_EDITOR = "nano";

/**
 * Read config.json. A missing file yields an empty config.
 */
export function readStoredConfig(configPath: string = getConfigPath()): StoredConfig {
  if (!fileExists(configPath)) {
    return {};
  }

  const raw = readJson(configPath);
  if (raw === null) {
    throw new ConfigurationError(`${configPath} is not valid JSON`, ErrorCode.CONFIG_INVALID, {
      configPath,
    });
  }

  const parsed = StoredConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `${configPath} is invalid: ${formatIssues(parsed.error).join("; ")}`,
      ErrorCode.CONFIG_INVALID,
      { configPath }
    );
  }
  return parsed.data;
}

/**
 * Merge stored config with the environment and validate the result
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  configPath: string = getConfigPath()
): BucketConfig {
  const stored = readStoredConfig(configPath);

  const merged = {
    baseUrl: env.BUCKET_BASE_URL ?? stored.baseUrl,
    apiKey: env.BUCKET_API_KEY ?? stored.apiKey,
    editor: env.EDITOR || stored.editor || DEFAULT_EDITOR,
  };

  const parsed = BucketConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const missingKey = parsed.error.issues.some((issue) => issue.path[0] === "apiKey");
    throw new ConfigurationError(
      `Configuration incomplete: ${formatIssues(parsed.error).join("; ")}. ` +
        `Set it with "bucket config" or the BUCKET_* environment variables.`,
      missingKey ? ErrorCode.CONFIG_MISSING_API_KEY : ErrorCode.CONFIG_INVALID,
      { configPath }
    );
  }
  return parsed.data;
}

/**
 * Apply a partial update to config.json and return the stored result
 */
export function updateStoredConfig(
  patch: StoredConfig,
  configPath: string = getConfigPath()
): StoredConfig {
  const next = { ...readStoredConfig(configPath), ...patch };

  const parsed = StoredConfigSchema.safeParse(next);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Refusing to save invalid configuration: ${formatIssues(parsed.error).join("; ")}`,
      ErrorCode.CONFIG_INVALID,
      { configPath }
    );
  }

  try {
    writeJson(configPath, parsed.data);
  } catch (error) {
    throw new ConfigurationError(
      `Could not write ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIG_WRITE_FAILED,
      { configPath }
    );
  }
  return parsed.data;
}
