// CHANGE: File-backed byte sink for stream downloads.
// WHY: The target only appears once the download completes (temporary file, then rename).

import fs from "fs-extra";
import path from "path";
import { debug } from "./logger.js";
import { ByteSink } from "./types.js";

/**
 * Writes chunks to `<path>.part` and moves it onto `path` when closed.
 */
export class FileSink implements ByteSink {
  readonly path: string;
  private readonly tempPath: string;
  private readonly fd: number;
  private bytesWritten = 0;
  private released = false;

  private constructor(targetPath: string, tempPath: string, fd: number) {
    this.path = targetPath;
    this.tempPath = tempPath;
    this.fd = fd;
  }

  /**
   * Create parent directories and open the temporary file.
   */
  static async open(targetPath: string): Promise<FileSink> {
    await fs.ensureDir(path.dirname(targetPath));
    const tempPath = `${targetPath}.part`;
    const fd = await fs.open(tempPath, "w");
    return new FileSink(targetPath, tempPath, fd);
  }

  async write(chunk: Buffer): Promise<void> {
    let offset = 0;
    while (offset < chunk.byteLength) {
      const { bytesWritten } = await fs.write(this.fd, chunk, offset, chunk.byteLength - offset);
      offset += bytesWritten;
    }
    this.bytesWritten += offset;
  }

  async close(): Promise<void> {
    await this.release();
    await fs.move(this.tempPath, this.path, { overwrite: true });
    debug(`Saved ${this.bytesWritten} bytes to ${this.path}`);
  }

  /**
   * Close the descriptor if still open and delete the temporary file.
   */
  async abort(): Promise<void> {
    await this.release();
    await fs.remove(this.tempPath);
    debug(`Discarded ${this.bytesWritten} partial bytes for ${this.path}`);
  }

  private async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    await fs.close(this.fd);
  }
}
