/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".bucket";
export const CONFIG_FILE = "config.json";

export function getHomeDir(): string {
  return process.env.BUCKET_HOME ?? path.join(os.homedir(), CONFIG_DIR);
}

export function getConfigDir(): string {
  return getHomeDir();
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE);
}

export function getLogsDir(): string {
  return path.join(getConfigDir(), "logs");
}

// =============================================================================
// Basic File Operations
// =============================================================================

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Read and parse a JSON file. Returns null when the file is missing or is not
 * valid JSON; callers validate the shape.
 */
export function readJson(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
  try {
    return JSON.parse(content) as unknown;
  } catch {
    return null;
  }
}

export function writeJson(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

// =============================================================================
// Text Helpers
// =============================================================================

/**
 * Strip trailing whitespace. Both sides of an edit session go through this
 * before they are compared.
 */
export function normalizeContent(content: string): string {
  return content.trimEnd();
}

/**
 * Mask a secret for display, keeping the last four characters.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 4) {
    return "*".repeat(secret.length);
  }
  return `${"*".repeat(secret.length - 4)}${secret.slice(-4)}`;
}
