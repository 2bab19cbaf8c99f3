/**
 * Finance Module
 */

export * from "./models/financial-entry.js";
export * from "./ExpenseService.js";
