/**
 * Finance flows: capture an expense, edit the ledger, edit the category tree
 */

import chalk from "chalk";
import { isSuccessStatus, type IPrompter, type IRemoteStore } from "../interfaces/index.js";
import {
  ledgerKind,
  taxonomyTreeKind,
  type IReconciliationEngine,
  type ReconcileOutcome,
} from "../reconciliation/index.js";
import { TaxonomyResolver } from "../taxonomy/index.js";
import {
  parseAmount,
  toIsoDate,
  toPayload,
  validateEntry,
  type FinancialEntry,
} from "./models/financial-entry.js";
import { FinancialEntrySchema } from "../../utils/validation.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import type { PaymentMethod } from "../../types/index.js";

const defaultLogger = createLogger("finance");

export type ExpenseOutcome =
  | { type: "taxonomy-unavailable"; status: number; body: string }
  | { type: "invalid"; issues: string[] }
  | { type: "submitted"; entry: FinancialEntry; status: number; body: string }
  | { type: "rejected"; entry: FinancialEntry; status: number; body: string };

export interface ExpenseServiceOptions {
  store: IRemoteStore;
  prompter: IPrompter;
  engine: IReconciliationEngine;
  /** Source of "today" for a blank date */
  now?: () => Date;
  logger?: Logger;
}

export class ExpenseService {
  private readonly store: IRemoteStore;
  private readonly prompter: IPrompter;
  private readonly engine: IReconciliationEngine;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: ExpenseServiceOptions) {
    this.store = options.store;
    this.prompter = options.prompter;
    this.engine = options.engine;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Prompt for an expense, resolve its category pair and submit it
   *
   * @throws RemoteStoreError when the server cannot be reached
   */
  async addEntry(): Promise<ExpenseOutcome> {
    const listing = await this.store.listTaxonomy();
    if (!listing.ok) {
      return { type: "taxonomy-unavailable", status: listing.status, body: listing.body };
    }

    const date = await this.askUntil("Date (YYYY-MM-DD, blank for today): ", (text) => {
      const value = text.length === 0 ? toIsoDate(this.now()) : text;
      return FinancialEntrySchema.shape.date.safeParse(value).success ? value : null;
    });
    const name = await this.askUntil("Name: ", (text) => (text.length > 0 ? text : null));
    const amount = await this.askUntil("Amount: ", parseAmount);
    const paymentMethod = await this.askUntil(
      "Payment method (1. credit, 2. debit): ",
      parsePaymentMethod
    );
    const notes = await this.prompter.ask("Notes (optional): ");

    const resolver = new TaxonomyResolver({ store: this.store, prompter: this.prompter });
    const { category, subcategory, snapshot } = await resolver.resolve(listing.snapshot);

    const validated = validateEntry(
      {
        date,
        name,
        amount,
        category,
        subcategory,
        paymentMethod,
        notes: notes.length > 0 ? notes : undefined,
      },
      snapshot
    );
    if (!validated.ok) {
      this.logger.warn({ issues: validated.error.issues }, "Entry failed validation");
      return {
        type: "invalid",
        issues: validated.error.issues.length > 0 ? validated.error.issues : [validated.error.message],
      };
    }

    const entry = validated.value;
    const { status, body } = await this.store.submitEntry(toPayload(entry));
    this.logger.info({ status, category, subcategory }, "Entry submitted");
    return isSuccessStatus(status)
      ? { type: "submitted", entry, status, body }
      : { type: "rejected", entry, status, body };
  }

  editLedger(): Promise<ReconcileOutcome> {
    return this.engine.reconcile({
      fetch: () => this.store.fetch("transactions"),
      replace: (payload) => this.store.replace("transactions", payload),
      kind: ledgerKind,
    });
  }

  editCategories(): Promise<ReconcileOutcome> {
    return this.engine.reconcile({
      fetch: () => this.store.fetch("categories"),
      replace: (payload) => this.store.replace("categories", payload),
      kind: taxonomyTreeKind,
    });
  }

  private async askUntil<T>(question: string, parse: (text: string) => T | null): Promise<T> {
    for (;;) {
      const value = parse(await this.prompter.ask(question));
      if (value !== null) {
        return value;
      }
      this.prompter.show(chalk.yellow("Invalid value, try again."));
    }
  }
}

export function parsePaymentMethod(text: string): PaymentMethod | null {
  switch (text.trim().toLowerCase()) {
    case "1":
    case "credit":
      return "credit";
    case "2":
    case "debit":
      return "debit";
    default:
      return null;
  }
}
