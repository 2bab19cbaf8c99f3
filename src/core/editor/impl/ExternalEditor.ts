/**
 * Editing surface backed by an external editor process
 *
 * Writes the text to a temporary file, runs the configured editor on it with
 * the terminal attached, and reads the file back once the editor exits.
 */

import { spawn } from "node:child_process";
import { TempBuffer } from "../temp-buffer.js";
import { EditFailureError, ErrorCode } from "../../errors.js";
import type { EditOptions, IEditingSurface } from "../../interfaces/index.js";
import { createLogger, type Logger } from "../../../utils/logger.js";

const defaultLogger = createLogger("editor");

/**
 * Runs `command` on `filePath` and resolves with the exit code, or null when
 * the process was killed by a signal
 */
export type EditorLauncher = (command: string, filePath: string) => Promise<number | null>;

export interface ExternalEditorOptions {
  /** Editor command line, e.g. "nvim" or "code --wait" */
  command: string;
  launcher?: EditorLauncher;
  /** Parent directory for temporary buffers */
  tmpRoot?: string;
  logger?: Logger;
}

/**
 * Split an editor command on whitespace into program and arguments
 */
export function splitCommand(command: string): [string, ...string[]] {
  const [program, ...args] = command.trim().split(/\s+/);
  if (!program) {
    throw new EditFailureError("Editor command is empty", ErrorCode.EDIT_LAUNCH_FAILED);
  }
  return [program, ...args];
}

/**
 * Default launcher: spawn the editor with inherited stdio and wait for it.
 * Ctrl+C belongs to the editor while it runs, so SIGINT is ignored here
 * until the child is gone.
 */
export const spawnEditor: EditorLauncher = (command, filePath) =>
  new Promise((resolve, reject) => {
    const [program, ...args] = splitCommand(command);
    const ignoreInterrupt = (): void => {};
    process.on("SIGINT", ignoreInterrupt);

    const child = spawn(program, [...args, filePath], { stdio: "inherit" });
    child.once("error", (error) => {
      process.off("SIGINT", ignoreInterrupt);
      reject(error);
    });
    child.once("exit", (code) => {
      process.off("SIGINT", ignoreInterrupt);
      resolve(code);
    });
  });

export class ExternalEditor implements IEditingSurface {
  private readonly command: string;
  private readonly launcher: EditorLauncher;
  private readonly tmpRoot?: string;
  private readonly logger: Logger;

  constructor(options: ExternalEditorOptions) {
    this.command = options.command;
    this.launcher = options.launcher ?? spawnEditor;
    this.tmpRoot = options.tmpRoot;
    this.logger = options.logger ?? defaultLogger;
  }

  async edit(initialText: string, options: EditOptions = {}): Promise<string> {
    const buffer = await TempBuffer.create(initialText, {
      extension: options.extension,
      tmpRoot: this.tmpRoot,
    }).catch((error: unknown) => {
      throw new EditFailureError(
        `Could not create temporary buffer: ${describe(error)}`,
        ErrorCode.EDIT_BUFFER_FAILED
      );
    });

    this.logger.debug({ filePath: buffer.path, command: this.command }, "Opening editor");

    try {
      let exitCode: number | null;
      try {
        exitCode = await this.launcher(this.command, buffer.path);
      } catch (error) {
        throw new EditFailureError(
          `Could not launch editor "${this.command}": ${describe(error)}`,
          ErrorCode.EDIT_LAUNCH_FAILED,
          { filePath: buffer.path }
        );
      }

      if (exitCode !== 0) {
        throw new EditFailureError(
          exitCode === null
            ? `Editor "${this.command}" was terminated by a signal`
            : `Editor "${this.command}" exited with status ${exitCode}`,
          ErrorCode.EDIT_EXIT_STATUS,
          { filePath: buffer.path, exitCode }
        );
      }

      try {
        return await buffer.read();
      } catch (error) {
        throw new EditFailureError(
          `Could not read back ${buffer.path}: ${describe(error)}`,
          ErrorCode.EDIT_BUFFER_FAILED,
          { filePath: buffer.path }
        );
      }
    } finally {
      await buffer.release();
      this.logger.debug({ filePath: buffer.path }, "Released edit buffer");
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
