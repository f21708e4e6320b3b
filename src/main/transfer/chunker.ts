import type { FileChunkResponse } from '../../shared/types/protocol';
import type { ChunkRange, TransferDescriptor } from '../../shared/types/transfer';
import { DEFAULT_MAX_CHUNK_SIZE } from '../../shared/constants/protocol';
import { ChunkSizeMismatchError, OutOfOrderChunkError } from '../utils/errors';

/**
 * Number of chunks needed for a file. An empty file is sent as a single
 * empty chunk so every transfer carries at least one chunk.
 */
export function countChunks(fileSize: number, maxChunkSize = DEFAULT_MAX_CHUNK_SIZE): number {
  assertSizes(fileSize, maxChunkSize);
  return Math.max(1, Math.ceil(fileSize / maxChunkSize));
}

export function chunkRange(
  index: number,
  fileSize: number,
  maxChunkSize = DEFAULT_MAX_CHUNK_SIZE
): ChunkRange {
  const total = countChunks(fileSize, maxChunkSize);
  if (!Number.isInteger(index) || index < 0 || index >= total) {
    throw new RangeError(`Chunk index ${index} outside [0, ${total})`);
  }

  const start = index * maxChunkSize;
  const end = Math.min(fileSize, start + maxChunkSize);
  return { chunkNumber: index + 1, start, end, size: end - start };
}

export function* planChunks(
  fileSize: number,
  maxChunkSize = DEFAULT_MAX_CHUNK_SIZE
): Generator<ChunkRange> {
  const total = countChunks(fileSize, maxChunkSize);
  for (let index = 0; index < total; index++) {
    yield chunkRange(index, fileSize, maxChunkSize);
  }
}

export function createTransferDescriptor(
  filename: string,
  fileSize: number,
  maxChunkSize = DEFAULT_MAX_CHUNK_SIZE
): TransferDescriptor {
  return {
    filename,
    fileSize,
    numChunks: countChunks(fileSize, maxChunkSize),
    chunkSize: maxChunkSize,
  };
}

/**
 * Share of the file received so far. An empty file is complete as soon as
 * its single empty chunk arrives.
 */
export function progressPercent(bytesReceived: number, fileSize: number): number {
  if (bytesReceived >= fileSize) {
    return 100;
  }
  return (bytesReceived / fileSize) * 100;
}

export interface ChunkSink {
  append(data: Buffer): Promise<void>;
}

/**
 * Receiving side of the chunker: accepts chunks strictly in order,
 * starting at 1, and appends them to the sink.
 */
export class ChunkAssembler {
  private nextChunk = 1;
  private received = 0;

  constructor(
    readonly descriptor: TransferDescriptor,
    private readonly sink: ChunkSink
  ) {}

  get expectedChunk(): number {
    return this.nextChunk;
  }

  get bytesReceived(): number {
    return this.received;
  }

  get isComplete(): boolean {
    return (
      this.nextChunk > this.descriptor.numChunks && this.received === this.descriptor.fileSize
    );
  }

  /** Throws before touching the sink if the header does not fit the sequence. */
  validate(header: FileChunkResponse): void {
    if (
      header.chunkNumber !== this.nextChunk ||
      header.totalChunks !== this.descriptor.numChunks
    ) {
      throw new OutOfOrderChunkError(this.nextChunk, header.chunkNumber);
    }

    const remaining = this.descriptor.fileSize - this.received;
    const isLast = header.chunkNumber === this.descriptor.numChunks;
    const expectedSize = isLast ? remaining : Math.min(remaining, this.descriptor.chunkSize);
    if (header.chunkSize !== expectedSize) {
      throw new ChunkSizeMismatchError(header.chunkNumber, expectedSize, header.chunkSize);
    }
  }

  /** Returns the progress percentage after the chunk is appended. */
  async accept(header: FileChunkResponse, data: Buffer): Promise<number> {
    this.validate(header);
    if (data.length !== header.chunkSize) {
      throw new ChunkSizeMismatchError(header.chunkNumber, header.chunkSize, data.length);
    }

    await this.sink.append(data);
    this.received += data.length;
    this.nextChunk += 1;
    return progressPercent(this.received, this.descriptor.fileSize);
  }
}

function assertSizes(fileSize: number, maxChunkSize: number): void {
  if (!Number.isSafeInteger(fileSize) || fileSize < 0) {
    throw new RangeError(`Invalid file size ${fileSize}`);
  }
  if (!Number.isSafeInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new RangeError(`Invalid chunk size ${maxChunkSize}`);
  }
}
