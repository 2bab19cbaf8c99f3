/**
 * Records Module
 */

export * from "./RecordService.js";
