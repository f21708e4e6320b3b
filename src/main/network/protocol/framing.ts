import type { Readable, Writable } from 'stream';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MAX_FRAME_SIZE,
  FRAME_HEADER_SIZE,
  MAX_FRAME_LENGTH,
} from '../../../shared/constants/protocol';
import { ConnectionClosedError, FrameTooLargeError } from '../../utils/errors';

export interface FrameReaderOptions {
  maxFrameSize?: number;
  /** Bytes buffered ahead of the current read before the stream is paused. */
  bufferSize?: number;
  /** 0 disables. */
  readTimeoutMs?: number;
}

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Length-prefixed frame: 4-byte unsigned big-endian length, then the payload.
 */
export function encodeFrame(payload: Buffer): Buffer {
  if (payload.length > MAX_FRAME_LENGTH) {
    throw new FrameTooLargeError(payload.length, MAX_FRAME_LENGTH);
  }

  const header = Buffer.allocUnsafe(FRAME_HEADER_SIZE);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload], FRAME_HEADER_SIZE + payload.length);
}

/**
 * Writes one frame as a single write and resolves once the stream has
 * accepted it, so a slow reader throttles the writer.
 */
export function writeFrame(stream: Writable, payload: Buffer): Promise<void> {
  if (stream.destroyed || stream.writableEnded) {
    return Promise.reject(new ConnectionClosedError('Cannot write frame to a closed stream'));
  }

  const frame = encodeFrame(payload);

  return new Promise<void>((resolve, reject) => {
    stream.write(frame, (error) => {
      if (error) {
        reject(new ConnectionClosedError('Failed to write frame', { cause: error }));
      } else {
        resolve();
      }
    });
  });
}

export class FrameReader {
  private readonly chunks: Buffer[] = [];
  private readonly maxFrameSize: number;
  private readonly bufferSize: number;
  private readonly readTimeoutMs: number;
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;
  private reading = false;

  constructor(
    private readonly stream: Readable,
    options: FrameReaderOptions = {}
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    this.readTimeoutMs = options.readTimeoutMs ?? 0;

    stream.on('data', this.handleData);
    stream.on('end', this.handleEnd);
    stream.on('close', this.handleEnd);
    stream.on('error', this.handleError);
  }

  async readFrame(): Promise<Buffer> {
    if (this.reading) {
      throw new Error('FrameReader does not support concurrent reads');
    }

    this.reading = true;
    try {
      const header = await this.readExact(FRAME_HEADER_SIZE);
      const length = header.readUInt32BE(0);
      if (length > this.maxFrameSize) {
        throw new FrameTooLargeError(length, this.maxFrameSize);
      }
      return length === 0 ? Buffer.alloc(0) : await this.readExact(length);
    } finally {
      this.reading = false;
    }
  }

  dispose(): void {
    this.stream.off('data', this.handleData);
    this.stream.off('end', this.handleEnd);
    this.stream.off('close', this.handleEnd);
    this.stream.off('error', this.handleError);
    this.rejectPending(new ConnectionClosedError('Frame reader disposed'));
    this.ended = true;
  }

  private readExact(size: number): Promise<Buffer> {
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size));
    }

    if (this.ended) {
      return Promise.reject(this.closedError());
    }

    return new Promise<Buffer>((resolve, reject) => {
      const pending: PendingRead = { size, resolve, reject };
      this.armTimer(pending);
      this.pending = pending;
      this.stream.resume();
    });
  }

  private take(size: number): Buffer {
    const out = Buffer.allocUnsafe(size);
    let offset = 0;

    while (offset < size) {
      const head = this.chunks[0];
      const needed = size - offset;
      if (head.length <= needed) {
        head.copy(out, offset);
        offset += head.length;
        this.chunks.shift();
      } else {
        head.copy(out, offset, 0, needed);
        this.chunks[0] = head.subarray(needed);
        offset += needed;
      }
    }

    this.buffered -= size;
    return out;
  }

  private readonly handleData = (chunk: Buffer | string): void => {
    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    this.chunks.push(data);
    this.buffered += data.length;

    const pending = this.pending;
    if (pending && this.buffered >= pending.size) {
      this.clearPending(pending);
      pending.resolve(this.take(pending.size));
    } else if (pending) {
      // Any progress restarts the idle timer.
      this.armTimer(pending);
    }

    if (!this.pending && this.buffered >= this.bufferSize) {
      this.stream.pause();
    }
  };

  private readonly handleEnd = (): void => {
    this.ended = true;
    this.rejectPending(this.closedError());
  };

  private readonly handleError = (error: Error): void => {
    this.failure = new ConnectionClosedError(`Connection error: ${error.message}`, {
      cause: error,
    });
    this.ended = true;
    this.rejectPending(this.failure);
  };

  private closedError(): Error {
    if (this.failure) {
      return this.failure;
    }
    return this.buffered > 0
      ? new ConnectionClosedError('Connection closed in the middle of a frame')
      : new ConnectionClosedError();
  }

  private rejectPending(error: Error): void {
    const pending = this.pending;
    if (pending) {
      this.clearPending(pending);
      pending.reject(error);
    }
  }

  private armTimer(pending: PendingRead): void {
    if (this.readTimeoutMs <= 0) return;

    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    pending.timer = setTimeout(() => {
      this.failure = new ConnectionClosedError(`No data received for ${this.readTimeoutMs}ms`);
      this.ended = true;
      this.rejectPending(this.failure);
    }, this.readTimeoutMs);
  }

  private clearPending(pending: PendingRead): void {
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    this.pending = null;
  }
}
