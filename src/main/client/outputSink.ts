import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IOFailureError } from '../utils/errors';
import { resolveTransferName, sanitizePath } from '../utils/pathSecurity';
import type { ChunkSink } from '../transfer/chunker';

export interface OutputHandle extends ChunkSink {
  readonly targetPath: string;
  /** Moves the received bytes to the target path. */
  commit(): Promise<string>;
  /** Removes whatever was written so far. */
  discard(): Promise<void>;
}

export interface OutputSink {
  create(filename: string): Promise<OutputHandle>;
}

/**
 * Writes downloads into a directory. Bytes land in a `.part-<id>` file that
 * is renamed on commit, so an interrupted transfer never occupies the
 * target name.
 */
export class LocalOutputSink implements OutputSink {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async create(filename: string): Promise<OutputHandle> {
    let targetPath: string;
    try {
      targetPath = sanitizePath(resolveTransferName(filename), this.directory);
    } catch (error) {
      throw new IOFailureError(`Refusing to write '${filename}'`, { cause: error });
    }

    const tempFilePath = `${targetPath}.part-${uuidv4()}`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      const handle = await fs.open(tempFilePath, 'w');
      return new LocalOutputHandle(targetPath, tempFilePath, handle);
    } catch (error) {
      throw new IOFailureError(`Cannot create '${tempFilePath}'`, { cause: error });
    }
  }
}

class LocalOutputHandle implements OutputHandle {
  private closed = false;

  constructor(
    readonly targetPath: string,
    private readonly tempFilePath: string,
    private readonly handle: fs.FileHandle
  ) {}

  async append(data: Buffer): Promise<void> {
    if (data.length === 0) return;
    try {
      await this.handle.write(data);
    } catch (error) {
      throw new IOFailureError(`Failed to write '${this.targetPath}'`, { cause: error });
    }
  }

  async commit(): Promise<string> {
    try {
      await this.close();
      await fs.rename(this.tempFilePath, this.targetPath);
    } catch (error) {
      await this.discard();
      throw new IOFailureError(`Failed to finalize '${this.targetPath}'`, { cause: error });
    }
    return this.targetPath;
  }

  async discard(): Promise<void> {
    let closeError: unknown = null;
    try {
      await this.close();
    } catch (error) {
      closeError = error;
    }

    try {
      await fs.rm(this.tempFilePath, { force: true });
    } catch (error) {
      throw new IOFailureError(`Failed to remove '${this.tempFilePath}'`, { cause: error });
    }
    if (closeError !== null) {
      throw new IOFailureError(`Failed to close '${this.tempFilePath}'`, { cause: closeError });
    }
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
