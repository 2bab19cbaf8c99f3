/**
 * IPrompter - line-oriented conversation with the user
 *
 * Flows that need an answer (a menu choice, a name, a yes/no) go through this
 * interface so they can be driven by a script in tests.
 *
 * @module
 */

export interface IPrompter {
  /**
   * Ask a question and resolve with the trimmed answer
   */
  ask(question: string): Promise<string>;

  /**
   * Ask a yes/no question. Only an explicit yes counts as consent.
   */
  confirm(question: string): Promise<boolean>;

  /**
   * Print a line of output
   */
  show(line: string): void;
}
