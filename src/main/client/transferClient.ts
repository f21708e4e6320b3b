import { EventEmitter, once } from 'events';
import net, { Socket } from 'net';
import type { Command, FileListEntry, Response } from '../../shared/types/protocol';
import type {
  BatchTransferResult,
  FileTransferResult,
  TransferDescriptor,
  TransferProgress,
} from '../../shared/types/transfer';
import { decodeResponse, encodeCommand } from '../network/protocol/codec';
import { FrameReader, writeFrame } from '../network/protocol/framing';
import { ChunkAssembler, countChunks } from '../transfer/chunker';
import {
  ConnectionClosedError,
  FileTransferError,
  IOFailureError,
  isProtocolError,
  MalformedMessageError,
  RemoteError,
  toErrorMessage,
  UnexpectedMessageError,
} from '../utils/errors';
import { logger } from '../utils/logger';
import type { OutputHandle, OutputSink } from './outputSink';

const DISCONNECT_TIMEOUT_MS = 1000;

export interface TransferClientOptions {
  host: string;
  port: number;
  bufferSize: number;
  maxFrameSize: number;
  /** 0 disables. */
  readTimeoutMs: number;
}

/**
 * Client side of the protocol. One command is in flight at a time; calls
 * made while another is running wait their turn.
 *
 * Emits `progress` (TransferProgress), `file-complete` (FileTransferResult)
 * and `disconnected` (Error | undefined).
 */
export class FileTransferClient extends EventEmitter {
  private socket: Socket | null = null;
  private reader: FrameReader | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly options: TransferClientOptions,
    private readonly sink: OutputSink
  ) {
    super();
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    const { host, port } = this.options;
    const socket = net.createConnection({ host, port });
    try {
      await once(socket, 'connect');
    } catch (error) {
      socket.destroy();
      logger.error(`Failed to connect to server at ${host}:${port}`, {
        error: toErrorMessage(error),
      });
      throw error;
    }

    socket.setNoDelay(true);
    socket.on('error', (error) => {
      logger.debug(`Client socket error: ${error.message}`);
    });

    this.socket = socket;
    this.reader = new FrameReader(socket, {
      maxFrameSize: this.options.maxFrameSize,
      bufferSize: this.options.bufferSize,
      readTimeoutMs: this.options.readTimeoutMs,
    });
    logger.info(`Connected to server at ${host}:${port}`);
  }

  async disconnect(): Promise<void> {
    await this.exclusive(async () => {
      const socket = this.socket;
      if (!socket) return;

      try {
        await this.send({ type: 'disconnect' });
        socket.end();
        await waitForClose(socket, DISCONNECT_TIMEOUT_MS);
      } catch (error) {
        logger.debug(`Disconnect message not delivered: ${toErrorMessage(error)}`);
      } finally {
        this.teardown();
      }
      logger.info('Disconnected from server');
    });
  }

  async listFiles(): Promise<FileListEntry[]> {
    return this.exclusive(async () => {
      await this.send({ type: 'list_files' });
      const response = await this.receive();

      if (response.type === 'error') {
        throw new RemoteError(response.message);
      }
      if (response.type !== 'file_list') {
        throw new UnexpectedMessageError('file_list', response.type);
      }
      return response.files;
    });
  }

  /**
   * Resolves with a failed result for per-file problems (missing file, bad
   * chunk sequence, local disk errors) and rejects when the connection
   * itself can no longer be used.
   */
  async downloadFile(filename: string): Promise<FileTransferResult> {
    return this.exclusive(async () => {
      await this.send({ type: 'download_file', filename });
      const result = await this.receiveFile(filename);
      this.emit('file-complete', result);
      return result;
    });
  }

  /**
   * Downloads the files in order. A failed file does not stop the batch;
   * a broken connection fails the current and all remaining files.
   */
  async downloadMultiple(filenames: string[]): Promise<BatchTransferResult> {
    return this.exclusive(async () => {
      const results: FileTransferResult[] = [];
      let batchError: FileTransferError | null = null;

      try {
        await this.send({ type: 'download_multiple', filenames });
        const start = await this.receive();
        if (start.type === 'error') {
          const error = new RemoteError(start.message);
          return { success: false, results: filenames.map((name) => failed(name, error)) };
        }
        if (start.type !== 'multiple_transfer_start') {
          throw new UnexpectedMessageError('multiple_transfer_start', start.type);
        }
        if (start.totalFiles !== filenames.length) {
          throw new MalformedMessageError(
            `Server announced ${start.totalFiles} files, ${filenames.length} were requested`
          );
        }

        logger.info(`Starting download of ${filenames.length} files`);
        for (const [index, filename] of filenames.entries()) {
          logger.info(`File ${index + 1}/${filenames.length}: ${filename}`);
          const result = await this.receiveFile(filename);
          results.push(result);
          this.emit('file-complete', result);
        }

        const end = await this.receive();
        if (end.type !== 'multiple_transfer_complete') {
          throw new UnexpectedMessageError('multiple_transfer_complete', end.type);
        }
      } catch (error) {
        if (!isProtocolError(error)) throw error;
        batchError = error;
        this.teardown(error);
        for (const filename of filenames.slice(results.length)) {
          results.push(failed(filename, error));
        }
      }

      const success = batchError === null && results.every((result) => result.success);
      logger.info(
        `Batch finished: ${results.filter((r) => r.success).length}/${filenames.length} files downloaded`
      );
      return { success, results };
    });
  }

  private async receiveFile(requested: string): Promise<FileTransferResult> {
    const info = await this.receive();
    if (info.type === 'error') {
      logger.warn(`Server refused ${requested}: ${info.message}`);
      return failed(requested, new RemoteError(info.message));
    }
    if (info.type !== 'file_info') {
      throw new UnexpectedMessageError('file_info', info.type);
    }

    const descriptor: TransferDescriptor = {
      filename: info.filename,
      fileSize: info.fileSize,
      numChunks: info.numChunks,
      chunkSize: info.chunkSize,
    };
    if (descriptor.numChunks !== countChunks(descriptor.fileSize, descriptor.chunkSize)) {
      throw new MalformedMessageError(
        `file_info for ${descriptor.filename} announces ${descriptor.numChunks} chunks for ${descriptor.fileSize} bytes`
      );
    }

    logger.info(
      `Downloading ${descriptor.filename} (${descriptor.fileSize} bytes, ${descriptor.numChunks} chunks)`
    );

    let output: OutputHandle | null = null;
    let failure: FileTransferError | null = null;
    try {
      output = await this.sink.create(descriptor.filename);
    } catch (error) {
      failure = asTransferError(error);
    }

    try {
      const assembler = output ? new ChunkAssembler(descriptor, output) : null;

      for (let index = 0; index < descriptor.numChunks; index++) {
        const header = await this.receive();
        if (header.type === 'error') {
          // The server abandoned this file; nothing else follows for it.
          await output?.discard();
          return failed(requested, failure ?? new RemoteError(header.message));
        }
        if (header.type !== 'file_chunk') {
          throw new UnexpectedMessageError('file_chunk', header.type);
        }

        const data = await this.requireReader().readFrame();
        if (failure || !assembler) {
          continue;
        }

        try {
          const percent = await assembler.accept(header, data);
          this.reportProgress(descriptor, header.chunkNumber, assembler.bytesReceived, percent);
        } catch (error) {
          failure = asTransferError(error);
          logger.warn(`Abandoning ${descriptor.filename}: ${failure.message}`);
          await output?.discard();
        }
      }

      const done = await this.receive();
      if (done.type !== 'file_complete') {
        throw new UnexpectedMessageError('file_complete', done.type);
      }

      if (failure || !output || !assembler) {
        return failed(requested, failure ?? new IOFailureError('No output for download'));
      }
      if (!assembler.isComplete) {
        await output.discard();
        return failed(
          requested,
          new IOFailureError(
            `Received ${assembler.bytesReceived} of ${descriptor.fileSize} bytes for ${descriptor.filename}`
          )
        );
      }

      const path = await output.commit();
      logger.info(`Successfully downloaded ${descriptor.filename}`);
      return { filename: requested, success: true, path, bytes: assembler.bytesReceived };
    } catch (error) {
      if (output) {
        await output.discard().catch((discardError) => {
          logger.warn(`Failed to remove partial download: ${toErrorMessage(discardError)}`);
        });
      }
      if (error instanceof IOFailureError) {
        return failed(requested, error);
      }
      throw error;
    }
  }

  private reportProgress(
    descriptor: TransferDescriptor,
    chunkNumber: number,
    bytesReceived: number,
    percent: number
  ): void {
    const progress: TransferProgress = {
      filename: descriptor.filename,
      chunkNumber,
      totalChunks: descriptor.numChunks,
      percent,
      bytesReceived,
      totalBytes: descriptor.fileSize,
    };
    this.emit('progress', progress);
  }

  private async send(command: Command): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new ConnectionClosedError('Not connected to server');
    }
    await writeFrame(socket, encodeCommand(command));
  }

  private async receive(): Promise<Response> {
    return decodeResponse(await this.requireReader().readFrame());
  }

  private requireReader(): FrameReader {
    if (!this.reader) {
      throw new ConnectionClosedError('Not connected to server');
    }
    return this.reader;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task).catch((error: unknown) => {
      if (isProtocolError(error)) {
        this.teardown(error);
      }
      throw error;
    });
    // Keeps the chain alive; callers still see the rejection through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private teardown(error?: Error): void {
    if (!this.socket) return;

    if (error) {
      logger.warn(`Closing connection after protocol failure: ${error.message}`);
    }
    this.reader?.dispose();
    this.socket.destroy();
    this.reader = null;
    this.socket = null;
    this.emit('disconnected', error);
  }
}

function failed(filename: string, error: FileTransferError): FileTransferResult {
  return { filename, success: false, errorCode: error.code, error: error.message };
}

function asTransferError(error: unknown): FileTransferError {
  if (error instanceof FileTransferError) {
    return error;
  }
  return new IOFailureError(toErrorMessage(error), { cause: error });
}

function waitForClose(socket: Socket, timeoutMs: number): Promise<void> {
  if (socket.destroyed) return Promise.resolve();

  return new Promise<void>((resolve) => {
    const timer = setTimeout(resolve, timeoutMs);
    socket.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
  });
}
