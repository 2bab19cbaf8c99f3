/**
 * IEditingSurface - blocking round trip of a text buffer through an editor
 *
 * @module
 */

export interface EditOptions {
  /** File extension of the temporary buffer, including the dot (".md") */
  extension?: string;
}

export interface IEditingSurface {
  /**
   * Let the user edit `initialText` and resolve with the text they left behind.
   * Whatever backs the session (a temporary file) is gone once this settles.
   *
   * @throws EditFailureError when the buffer cannot be created or read back,
   * or the editor cannot be launched or exits unsuccessfully
   */
  edit(initialText: string, options?: EditOptions): Promise<string>;
}
