import type { FileTransferErrorCode } from '../../shared/types/transfer';

const PROTOCOL_ERROR_CODES = new Set<FileTransferErrorCode>([
  'ConnectionClosed',
  'FrameTooLarge',
  'MalformedMessage',
  'UnexpectedMessage',
]);

export class FileTransferError extends Error {
  constructor(
    readonly code: FileTransferErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = `${code}Error`;
  }
}

export class ConnectionClosedError extends FileTransferError {
  constructor(message = 'Connection closed by peer', options?: { cause?: unknown }) {
    super('ConnectionClosed', message, options);
  }
}

export class FrameTooLargeError extends FileTransferError {
  constructor(
    readonly declaredLength: number,
    readonly maxFrameSize: number
  ) {
    super('FrameTooLarge', `Frame of ${declaredLength} bytes exceeds limit of ${maxFrameSize}`);
  }
}

export class MalformedMessageError extends FileTransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MalformedMessage', message, options);
  }
}

export class UnexpectedMessageError extends FileTransferError {
  constructor(
    readonly expected: string,
    readonly received: string
  ) {
    super('UnexpectedMessage', `Expected ${expected} but received ${received}`);
  }
}

export class FileNotFoundError extends FileTransferError {
  constructor(readonly filename: string) {
    super('NotFound', `File '${filename}' not found`);
  }
}

export class OutOfOrderChunkError extends FileTransferError {
  constructor(
    readonly expectedChunk: number,
    readonly receivedChunk: number
  ) {
    super('OutOfOrderChunk', `Expected chunk ${expectedChunk} but received ${receivedChunk}`);
  }
}

export class ChunkSizeMismatchError extends FileTransferError {
  constructor(
    readonly chunkNumber: number,
    readonly expectedSize: number,
    readonly actualSize: number
  ) {
    super('ChunkSizeMismatch', `Chunk ${chunkNumber} has ${actualSize} bytes, expected ${expectedSize}`);
  }
}

export class IOFailureError extends FileTransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOFailure', message, options);
  }
}

/** An `error` response sent by the server. */
export class RemoteError extends FileTransferError {
  constructor(message: string) {
    super('RemoteError', message);
  }
}

/**
 * Errors after which the byte stream can no longer be trusted.
 */
export function isProtocolError(error: unknown): error is FileTransferError {
  return error instanceof FileTransferError && PROTOCOL_ERROR_CODES.has(error.code);
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
