/**
 * Wiring of the flows for one CLI invocation
 */

import { HttpRemoteStore } from "../core/store/index.js";
import { ExternalEditor } from "../core/editor/index.js";
import { ReconciliationEngine } from "../core/reconciliation/index.js";
import { RecordService } from "../core/records/index.js";
import { ExpenseService } from "../core/finance/index.js";
import { ErrorCode, ValidationError } from "../core/errors.js";
import type { IEditingSurface, IPrompter, IRemoteStore } from "../core/interfaces/index.js";
import { loadConfig } from "../utils/config.js";
import { RecordTypeSchema } from "../utils/validation.js";
import { ReadlinePrompter } from "./interactive.js";
import { RECORD_TYPES, type BucketConfig, type RecordType } from "../types/index.js";

export interface CliContext {
  config: BucketConfig;
  store: IRemoteStore;
  surface: IEditingSurface;
  prompter: IPrompter;
  records: RecordService;
  expenses: ExpenseService;
}

export function createCliContext(config: BucketConfig = loadConfig()): CliContext {
  const store = new HttpRemoteStore({ baseUrl: config.baseUrl, apiKey: config.apiKey });
  const surface = new ExternalEditor({ command: config.editor });
  const prompter = new ReadlinePrompter();
  const engine = new ReconciliationEngine({ surface, prompter });

  return {
    config,
    store,
    surface,
    prompter,
    records: new RecordService({ store, surface, engine }),
    expenses: new ExpenseService({ store, prompter, engine }),
  };
}

/**
 * Validate a record type given on the command line
 */
export function parseRecordType(value: string): RecordType {
  const parsed = RecordTypeSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(
      `Unknown record type "${value}". Expected one of: ${RECORD_TYPES.join(", ")}`,
      ErrorCode.INVALID_ARGUMENT
    );
  }
  return parsed.data;
}
