/**
 * Record flows: write a new body, view the current one, edit it in place
 */

import { isSuccessStatus, type IEditingSurface, type IRemoteStore } from "../interfaces/index.js";
import { singleRecordKind, type IReconciliationEngine, type ReconcileOutcome } from "../reconciliation/index.js";
import { fromPromise } from "../../types/result.js";
import { normalizeContent } from "../../utils/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { RecordType } from "../../types/index.js";

const defaultLogger = createLogger("records");

export type WriteOutcome =
  | { type: "cancelled" }
  | { type: "submitted"; status: number; body: string }
  | { type: "edit-failed"; error: Error };

export type ReadOutcome =
  | { type: "viewed" }
  | { type: "fetch-failed"; status: number; body: string }
  | { type: "edit-failed"; error: Error };

export interface RecordServiceOptions {
  store: IRemoteStore;
  surface: IEditingSurface;
  engine: IReconciliationEngine;
  logger?: Logger;
}

export class RecordService {
  private readonly store: IRemoteStore;
  private readonly surface: IEditingSurface;
  private readonly engine: IReconciliationEngine;
  private readonly logger: Logger;

  constructor(options: RecordServiceOptions) {
    this.store = options.store;
    this.surface = options.surface;
    this.engine = options.engine;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Compose a new record in the editor and post it. An empty buffer cancels.
   *
   * @throws RemoteStoreError when the server cannot be reached
   */
  async write(type: RecordType): Promise<WriteOutcome> {
    const edited = await fromPromise(this.surface.edit("", { extension: ".md" }));
    if (!edited.ok) {
      return { type: "edit-failed", error: edited.error };
    }

    const body = edited.value.trim();
    if (body.length === 0) {
      this.logger.info({ recordType: type }, "Empty record, nothing posted");
      return { type: "cancelled" };
    }

    const { status, body: responseBody } = await this.store.createRecord(type, body);
    this.logger.info({ recordType: type, status }, "Record posted");
    return { type: "submitted", status, body: responseBody };
  }

  /**
   * Open the current record in the editor for viewing. Changes are not pushed.
   *
   * @throws RemoteStoreError when the server cannot be reached
   */
  async read(type: RecordType): Promise<ReadOutcome> {
    const response = await this.store.fetch("records", { type });
    if (!isSuccessStatus(response.status)) {
      return { type: "fetch-failed", status: response.status, body: response.body };
    }

    const viewed = await fromPromise(
      this.surface.edit(normalizeContent(response.body), { extension: ".md" })
    );
    if (!viewed.ok) {
      return { type: "edit-failed", error: viewed.error };
    }
    return { type: "viewed" };
  }

  /**
   * Edit the current record and push it back if it changed
   */
  edit(type: RecordType): Promise<ReconcileOutcome> {
    this.logger.debug({ recordType: type }, "Editing record");
    return this.engine.reconcile({
      fetch: () => this.store.fetch("records", { type }),
      replace: (payload) => this.store.replace("records", payload),
      kind: singleRecordKind(type),
    });
  }
}
