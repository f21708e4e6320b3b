import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileEntry } from '../../shared/types/transfer';
import { FileNotFoundError, IOFailureError, isErrnoException } from '../utils/errors';
import { validateTransferPath } from '../utils/pathSecurity';

export interface FileReadHandle {
  readonly size: number;
  read(offset: number, length: number): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * The directory a server exposes. Files are treated as immutable for the
 * duration of a transfer.
 */
export interface FileDirectory {
  list(): Promise<FileEntry[]>;
  openForRead(name: string): Promise<FileReadHandle>;
}

export class LocalFileDirectory implements FileDirectory {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async ensureExists(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  async list(): Promise<FileEntry[]> {
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    const files: FileEntry[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      try {
        const stats = await fs.stat(path.join(this.root, entry.name));
        files.push({ name: entry.name, size: stats.size });
      } catch (error) {
        // Removed between readdir and stat.
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          throw error;
        }
      }
    }

    return files.sort((a, b) => a.name.localeCompare(b.name));
  }

  async openForRead(name: string): Promise<FileReadHandle> {
    let filePath: string;
    try {
      filePath = validateTransferPath(name, this.root);
    } catch {
      throw new FileNotFoundError(name);
    }

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, 'r');
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        throw new FileNotFoundError(name);
      }
      throw new IOFailureError(`Cannot open '${name}'`, { cause: error });
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new FileNotFoundError(name);
      }
      return new LocalFileReadHandle(name, handle, stats.size);
    } catch (error) {
      await handle.close();
      if (error instanceof FileNotFoundError) throw error;
      throw new IOFailureError(`Cannot stat '${name}'`, { cause: error });
    }
  }
}

class LocalFileReadHandle implements FileReadHandle {
  constructor(
    private readonly name: string,
    private readonly handle: fs.FileHandle,
    readonly size: number
  ) {}

  async read(offset: number, length: number): Promise<Buffer> {
    const buffer = Buffer.alloc(length);
    let filled = 0;

    try {
      while (filled < length) {
        const { bytesRead } = await this.handle.read(buffer, filled, length - filled, offset + filled);
        if (bytesRead === 0) {
          throw new IOFailureError(`'${this.name}' shrank while it was being read`);
        }
        filled += bytesRead;
      }
    } catch (error) {
      if (error instanceof IOFailureError) throw error;
      throw new IOFailureError(`Failed to read '${this.name}'`, { cause: error });
    }

    return buffer;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
