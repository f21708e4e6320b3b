export type FileTransferErrorCode =
  | 'ConnectionClosed'
  | 'FrameTooLarge'
  | 'MalformedMessage'
  | 'UnexpectedMessage'
  | 'NotFound'
  | 'OutOfOrderChunk'
  | 'ChunkSizeMismatch'
  | 'IOFailure'
  | 'RemoteError';

export interface FileEntry {
  name: string;
  size: number;
}

export interface TransferDescriptor {
  filename: string;
  fileSize: number;
  numChunks: number;
  chunkSize: number;
}

export interface ChunkRange {
  chunkNumber: number;
  start: number; // inclusive
  end: number; // exclusive
  size: number;
}

export interface TransferProgress {
  filename: string;
  chunkNumber: number;
  totalChunks: number;
  percent: number;
  bytesReceived: number;
  totalBytes: number;
}

export type FileTransferResult =
  | {
      filename: string;
      success: true;
      path: string;
      bytes: number;
    }
  | {
      filename: string;
      success: false;
      errorCode: FileTransferErrorCode;
      error: string;
    };

export interface BatchTransferResult {
  success: boolean;
  results: FileTransferResult[];
}
