export type Command = ListFilesCommand | DownloadFileCommand | DownloadMultipleCommand | DisconnectCommand;

export interface ListFilesCommand {
  type: 'list_files';
}

export interface DownloadFileCommand {
  type: 'download_file';
  filename: string;
}

export interface DownloadMultipleCommand {
  type: 'download_multiple';
  filenames: string[];
}

export interface DisconnectCommand {
  type: 'disconnect';
}

export type Response =
  | FileListResponse
  | FileInfoResponse
  | FileChunkResponse
  | FileCompleteResponse
  | MultipleTransferStartResponse
  | MultipleTransferCompleteResponse
  | ErrorResponse;

export interface FileListEntry {
  name: string;
  size: number;
  sizeMb: number;
}

export interface FileListResponse {
  type: 'file_list';
  files: FileListEntry[];
}

/** Transfer descriptor announced before the first chunk of a file. */
export interface FileInfoResponse {
  type: 'file_info';
  filename: string;
  fileSize: number;
  numChunks: number;
  chunkSize: number;
}

/** Precedes exactly one raw frame of `chunkSize` bytes. */
export interface FileChunkResponse {
  type: 'file_chunk';
  chunkNumber: number;
  totalChunks: number;
  chunkSize: number;
}

export interface FileCompleteResponse {
  type: 'file_complete';
  filename: string;
}

export interface MultipleTransferStartResponse {
  type: 'multiple_transfer_start';
  totalFiles: number;
  filenames: string[];
}

export interface MultipleTransferCompleteResponse {
  type: 'multiple_transfer_complete';
  totalFiles: number;
}

export interface ErrorResponse {
  type: 'error';
  message: string;
}
