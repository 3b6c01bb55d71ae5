/**
 * Output File
 * Write handle owned by a single write call, opened and closed around it
 */

import { mkdir, open, type FileHandle } from "fs/promises";
import { dirname } from "path";

/**
 * Metadata writers can read from the handle:
 * - file_path: the file being written
 * - dir_path: the output template a page file was derived from
 */
export type OutputFileMetaKey = "file_path" | "dir_path";

export class OutputFile {
  private readonly meta = new Map<OutputFileMetaKey, string>();
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle,
  ) {}

  /**
   * Create (or truncate) the file, creating parent directories as needed
   */
  static async open(path: string): Promise<OutputFile> {
    await mkdir(dirname(path), { recursive: true });
    const handle = await open(path, "w");
    return new OutputFile(path, handle);
  }

  setMeta(key: OutputFileMetaKey, value: string): void {
    this.meta.set(key, value);
  }

  getMeta(key: OutputFileMetaKey): string | undefined {
    return this.meta.get(key);
  }

  /**
   * Append data at the current position
   */
  async write(data: string | Uint8Array): Promise<void> {
    if (this.closed) {
      throw new Error(`Output file already closed: ${this.path}`);
    }
    await this.handle.appendFile(data);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
