/**
 * Reconciliation Engine
 *
 * One read-modify-write cycle over a remote resource: fetch it, hand it to
 * the editing surface, compare, confirm, push. The content kind decides how
 * the text is presented and wrapped; the control flow is shared.
 */

import chalk from "chalk";
import { isSuccessStatus, type IEditingSurface, type IPrompter } from "../../interfaces/index.js";
import { fromPromise, fromThrowable } from "../../../types/result.js";
import { normalizeContent } from "../../../utils/index.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import type {
  IReconciliationEngine,
  ReconcileOutcome,
  ReconcileRequest,
} from "../interfaces/IReconciliation.js";

const defaultLogger = createLogger("reconciliation");

export interface ReconciliationEngineOptions {
  surface: IEditingSurface;
  prompter: IPrompter;
  logger?: Logger;
}

export class ReconciliationEngine implements IReconciliationEngine {
  private readonly surface: IEditingSurface;
  private readonly prompter: IPrompter;
  private readonly logger: Logger;

  constructor(options: ReconciliationEngineOptions) {
    this.surface = options.surface;
    this.prompter = options.prompter;
    this.logger = options.logger ?? defaultLogger;
  }

  async reconcile<T>({ fetch, replace, kind }: ReconcileRequest<T>): Promise<ReconcileOutcome> {
    const log = this.logger.child({ kind: kind.name });

    const fetched = await fromPromise(fetch());
    if (!fetched.ok) {
      log.error({ err: fetched.error }, "Fetch failed without a response");
      return { type: "fetch-failed", status: 0, body: fetched.error.message };
    }
    const remote = fetched.value;
    if (!isSuccessStatus(remote.status)) {
      log.warn({ status: remote.status }, "Fetch rejected");
      return { type: "fetch-failed", status: remote.status, body: remote.body };
    }

    const serialized = fromThrowable(() => kind.serialize(normalizeContent(remote.body)));
    if (!serialized.ok) {
      log.error({ err: serialized.error }, "Could not present fetched content");
      return { type: "edit-failed", error: serialized.error };
    }
    const originalContent = normalizeContent(serialized.value);

    const edited = await fromPromise(this.surface.edit(originalContent, { extension: kind.extension }));
    if (!edited.ok) {
      log.error({ err: edited.error }, "Edit session failed");
      return { type: "edit-failed", error: edited.error };
    }
    const newContent = normalizeContent(edited.value);

    if (newContent === originalContent) {
      log.info("No changes");
      return { type: "no-change" };
    }
    if (newContent.length === 0) {
      log.info("Edited buffer is empty, nothing to push");
      return { type: "discarded", reason: "empty" };
    }

    const value = fromThrowable(() => kind.deserialize(newContent));
    if (!value.ok) {
      log.error({ err: value.error }, "Edited content rejected");
      return { type: "edit-failed", error: value.error };
    }

    const confirmed = await this.prompter.confirm(chalk.yellow("Content changed. Push to server? (y/N) "));
    if (!confirmed) {
      log.info("Push declined");
      return { type: "discarded", reason: "declined" };
    }

    const pushed = await fromPromise(replace(kind.wrap(value.value)));
    if (!pushed.ok) {
      log.error({ err: pushed.error }, "Push failed without a response");
      return { type: "push-failed", status: 0, body: pushed.error.message };
    }

    const { status, body } = pushed.value;
    log.info({ status }, "Push finished");
    return isSuccessStatus(status)
      ? { type: "pushed", status, body }
      : { type: "push-failed", status, body };
  }
}
