/**
 * Core module - flows and their collaborators, shared by the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export contracts and core modules
export * from "./interfaces/index.js";
export * from "./store/index.js";
export * from "./editor/index.js";
export * from "./reconciliation/index.js";
export * from "./taxonomy/index.js";
export * from "./records/index.js";
export * from "./finance/index.js";

// Re-export types
export * from "../types/index.js";
