/**
 * Scoped temporary file for one edit session
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

export interface TempBufferOptions {
  /** File extension including the dot */
  extension?: string;
  /** Parent directory for the buffer, defaults to the OS temp dir */
  tmpRoot?: string;
}

/**
 * A file in its own private directory. `release()` removes both and is safe
 * to call more than once.
 */
export class TempBuffer {
  private released = false;

  private constructor(
    public readonly path: string,
    private readonly dir: string
  ) {}

  static async create(initialText: string, options: TempBufferOptions = {}): Promise<TempBuffer> {
    const { extension = ".txt", tmpRoot = os.tmpdir() } = options;
    const dir = await fs.mkdtemp(path.join(tmpRoot, "bucket-"));
    const filePath = path.join(dir, `edit${extension}`);

    try {
      await fs.writeFile(filePath, initialText, "utf-8");
    } catch (error) {
      await fs.rm(dir, { recursive: true, force: true });
      throw error;
    }
    return new TempBuffer(filePath, dir);
  }

  read(): Promise<string> {
    return fs.readFile(this.path, "utf-8");
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await fs.rm(this.dir, { recursive: true, force: true });
  }
}
