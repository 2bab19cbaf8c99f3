/**
 * write / read / edit commands - Record flows
 */

import { createLogger } from "../../utils/index.js";
import { createCliContext, parseRecordType, type CliContext } from "../context.js";
import { printOutcome } from "../report.js";

const logger = createLogger("records-command");

export async function writeCommand(type: string, context?: CliContext): Promise<void> {
  const recordType = parseRecordType(type);
  const { records } = context ?? createCliContext();
  logger.info({ recordType }, "Write command");
  printOutcome(await records.write(recordType));
}

export async function readCommand(type: string, context?: CliContext): Promise<void> {
  const recordType = parseRecordType(type);
  const { records } = context ?? createCliContext();
  logger.info({ recordType }, "Read command");
  printOutcome(await records.read(recordType));
}

export async function editCommand(type: string, context?: CliContext): Promise<void> {
  const recordType = parseRecordType(type);
  const { records } = context ?? createCliContext();
  logger.info({ recordType }, "Edit command");
  printOutcome(await records.edit(recordType));
}
