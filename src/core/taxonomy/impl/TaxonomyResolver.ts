/**
 * Interactive driver for the taxonomy state machine
 */

import chalk from "chalk";
import {
  initialState,
  isResolved,
  selectableNames,
  transition,
  type ResolverEffect,
  type ResolverInput,
  type ResolverState,
} from "../state-machine.js";
import { isSuccessStatus, type IPrompter, type ITaxonomyWriter } from "../../interfaces/index.js";
import { createLogger, type Logger } from "../../../utils/logger.js";
import type { StoreResponse, TaxonomySnapshot } from "../../../types/index.js";

const defaultLogger = createLogger("taxonomy");

export interface ResolvedTaxonomy {
  category: string;
  subcategory: string;
  /** Snapshot including every node created during resolution */
  snapshot: TaxonomySnapshot;
}

export interface TaxonomyResolverOptions {
  store: ITaxonomyWriter;
  prompter: IPrompter;
  logger?: Logger;
}

export class TaxonomyResolver {
  private readonly store: ITaxonomyWriter;
  private readonly prompter: IPrompter;
  private readonly logger: Logger;

  constructor(options: TaxonomyResolverOptions) {
    this.store = options.store;
    this.prompter = options.prompter;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Resolve a (category, subcategory) pair against `snapshot`, creating nodes
   * remotely where the user asks for new ones. Loops until the user gets there.
   */
  async resolve(snapshot: TaxonomySnapshot): Promise<ResolvedTaxonomy> {
    let state: ResolverState = initialState(snapshot);

    while (!isResolved(state)) {
      const text = await this.prompter.ask(this.render(state));
      let step = transition(state, { type: "entered", text });

      while (step.effect.type === "create-category" || step.effect.type === "create-subcategory") {
        const input = await this.perform(step.effect);
        step = transition(step.state, input);
      }

      this.report(step.effect);
      state = step.state;
    }

    this.logger.info(
      { category: state.category, subcategory: state.subcategory },
      "Taxonomy resolved"
    );
    return { category: state.category, subcategory: state.subcategory, snapshot: state.snapshot };
  }

  /**
   * Print the menu or hint for a state and return the question to ask
   */
  private render(state: ResolverState): string {
    switch (state.phase) {
      case "select-category":
      case "select-subcategory": {
        const names = selectableNames(state);
        const heading =
          state.phase === "select-category" ? "Category" : `Subcategory of ${state.category}`;
        const createLabel =
          state.phase === "select-category" ? "Create new category" : "Create new subcategory";

        this.prompter.show("");
        this.prompter.show(chalk.cyan.bold(heading));
        names.forEach((name, i) => this.prompter.show(`  ${i + 1}. ${name}`));
        this.prompter.show(chalk.dim(`  ${names.length + 1}. ${createLabel}`));
        return `Choose (1-${names.length + 1}): `;
      }

      case "create-category":
        if (state.snapshot.length === 0) {
          this.prompter.show(chalk.dim("No categories yet, create one."));
        }
        return "New category name: ";

      case "create-subcategory":
        return `New subcategory for ${state.category}: `;

      case "resolved":
        return "";
    }
  }

  private async perform(
    effect: Extract<ResolverEffect, { type: "create-category" | "create-subcategory" }>
  ): Promise<ResolverInput> {
    let response: StoreResponse;
    try {
      response =
        effect.type === "create-category"
          ? await this.store.createCategory(effect.name)
          : await this.store.createSubcategory(effect.category, effect.name);
    } catch (error) {
      this.logger.error({ err: error, effect }, "Create call failed without a response");
      return {
        type: "create-failed",
        status: 0,
        body: error instanceof Error ? error.message : String(error),
      };
    }

    if (!isSuccessStatus(response.status)) {
      this.logger.warn({ effect, status: response.status }, "Create call rejected");
      return { type: "create-failed", status: response.status, body: response.body };
    }

    this.logger.info({ effect, status: response.status }, "Created taxonomy node");
    return { type: "create-succeeded" };
  }

  private report(effect: ResolverEffect): void {
    switch (effect.type) {
      case "invalid-choice":
        this.prompter.show(chalk.yellow(`Invalid choice. Enter a number from 1 to ${effect.max}.`));
        break;
      case "empty-name":
        this.prompter.show(chalk.yellow("A name is required."));
        break;
      case "create-failed":
        this.prompter.show(chalk.red(`Status: ${effect.status}`));
        this.prompter.show(chalk.red(`Response: ${effect.body}`));
        break;
      default:
        break;
    }
  }
}
