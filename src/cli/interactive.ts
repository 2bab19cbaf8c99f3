import * as readline from "node:readline";
import type { IPrompter } from "../core/interfaces/index.js";

/**
 * Create a readline interface for interactive mode
 */
export function createReadlineInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

/**
 * Ask a question and get user input
 */
export async function askQuestion(
  rl: readline.Interface,
  question: string
): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      resolve(answer.trim());
    });
  });
}

/**
 * True for y/yes in any case
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Terminal prompter. Each question gets its own readline interface, closed
 * before the answer is returned, so stdin is free when an editor takes over
 * the terminal.
 */
export class ReadlinePrompter implements IPrompter {
  async ask(question: string): Promise<string> {
    const rl = createReadlineInterface();
    try {
      return await askQuestion(rl, question);
    } finally {
      rl.close();
    }
  }

  async confirm(question: string): Promise<boolean> {
    return isAffirmative(await this.ask(question));
  }

  show(line: string): void {
    console.log(line);
  }
}
