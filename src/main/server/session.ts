import { EventEmitter } from 'events';
import type { Socket } from 'net';
import type { Command, Response } from '../../shared/types/protocol';
import type { TransferDescriptor } from '../../shared/types/transfer';
import { decodeCommand, encodeResponse } from '../network/protocol/codec';
import { FrameReader, writeFrame } from '../network/protocol/framing';
import { createTransferDescriptor, planChunks } from '../transfer/chunker';
import {
  ConnectionClosedError,
  FileNotFoundError,
  isProtocolError,
  toErrorMessage,
} from '../utils/errors';
import type { FileDirectory, FileReadHandle } from './fileDirectory';
import { toMegabytes } from '../utils/formatters';
import { logger } from '../utils/logger';

export type SessionState = 'awaiting-command' | 'processing' | 'closed' | 'failed';

export interface SessionOutcome {
  state: 'closed' | 'failed';
  error?: Error;
}

export interface SessionContext {
  id: string;
  directory: FileDirectory;
  maxChunkSize: number;
  maxFrameSize: number;
  bufferSize: number;
  /** 0 disables. */
  idleTimeoutMs: number;
}

/**
 * Server side of one connection: reads a command, answers it, and repeats
 * until the client disconnects or the stream breaks.
 */
export class FileTransferSession extends EventEmitter {
  private readonly reader: FrameReader;
  private currentState: SessionState = 'awaiting-command';
  private timedOut = false;

  constructor(
    private readonly socket: Socket,
    private readonly context: SessionContext
  ) {
    super();
    this.reader = new FrameReader(socket, {
      maxFrameSize: context.maxFrameSize,
      bufferSize: context.bufferSize,
    });

    // Outlives the reader so late write errors never go unhandled.
    socket.on('error', (error) => {
      logger.debug(`Session ${context.id} socket error: ${error.message}`);
    });
  }

  get id(): string {
    return this.context.id;
  }

  get state(): SessionState {
    return this.currentState;
  }

  async run(): Promise<SessionOutcome> {
    if (this.context.idleTimeoutMs > 0) {
      this.socket.setTimeout(this.context.idleTimeoutMs, () => {
        this.timedOut = true;
        logger.warn(`Session ${this.id} idle for ${this.context.idleTimeoutMs}ms, closing`);
        this.socket.destroy();
      });
    }

    try {
      for (;;) {
        this.transition('awaiting-command');
        const command = decodeCommand(await this.reader.readFrame());

        this.transition('processing');
        this.emit('command', command);
        if (command.type === 'disconnect') {
          break;
        }
        await this.dispatch(command);
      }

      return this.finish({ state: 'closed' });
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (failure instanceof ConnectionClosedError && !this.timedOut) {
        return this.finish({ state: 'closed' });
      }

      if (isProtocolError(failure) && failure.code !== 'ConnectionClosed') {
        await this.send({ type: 'error', message: failure.message }).catch((sendError) => {
          logger.debug(`Session ${this.id} could not report failure: ${toErrorMessage(sendError)}`);
        });
      }
      return this.finish({ state: 'failed', error: failure });
    }
  }

  private async dispatch(command: Exclude<Command, { type: 'disconnect' }>): Promise<void> {
    switch (command.type) {
      case 'list_files':
        await this.sendFileList();
        break;
      case 'download_file':
        await this.sendFile(command.filename);
        break;
      case 'download_multiple':
        await this.sendMultipleFiles(command.filenames);
        break;
    }
  }

  private async sendFileList(): Promise<void> {
    let response: Response;
    try {
      const entries = await this.context.directory.list();
      response = {
        type: 'file_list',
        files: entries.map((entry) => ({
          name: entry.name,
          size: entry.size,
          sizeMb: toMegabytes(entry.size),
        })),
      };
      logger.info(`Session ${this.id}: sent file list with ${entries.length} files`);
    } catch (error) {
      logger.error(`Session ${this.id}: failed to list files`, { error: toErrorMessage(error) });
      response = { type: 'error', message: `Error listing files: ${toErrorMessage(error)}` };
    }

    await this.send(response);
  }

  private async sendMultipleFiles(filenames: string[]): Promise<void> {
    await this.send({ type: 'multiple_transfer_start', totalFiles: filenames.length, filenames });

    let sent = 0;
    for (const [index, filename] of filenames.entries()) {
      logger.info(`Session ${this.id}: sending file ${index + 1}/${filenames.length}: ${filename}`);
      if (await this.sendFile(filename)) {
        sent += 1;
      }
    }

    await this.send({ type: 'multiple_transfer_complete', totalFiles: filenames.length });
    logger.info(`Session ${this.id}: batch finished, ${sent}/${filenames.length} files sent`);
  }

  /**
   * Streams one file. Missing files and local read errors are answered with
   * an `error` response and reported as `false`; stream failures propagate.
   */
  private async sendFile(filename: string): Promise<boolean> {
    let handle: FileReadHandle;
    try {
      handle = await this.context.directory.openForRead(filename);
    } catch (error) {
      if (error instanceof FileNotFoundError) {
        logger.warn(`Session ${this.id}: ${error.message}`);
        await this.send({ type: 'error', message: error.message });
      } else {
        logger.error(`Session ${this.id}: cannot open ${filename}`, {
          error: toErrorMessage(error),
        });
        await this.send({ type: 'error', message: `Error sending file: ${toErrorMessage(error)}` });
      }
      return false;
    }

    try {
      const descriptor = createTransferDescriptor(filename, handle.size, this.context.maxChunkSize);
      await this.send({ type: 'file_info', ...descriptor });
      if (!(await this.streamChunks(handle, descriptor))) {
        return false;
      }

      await this.send({ type: 'file_complete', filename });
      logger.info(`Session ${this.id}: file '${filename}' sent successfully`);
      this.emit('file-sent', descriptor);
      return true;
    } finally {
      await handle.close().catch((error) => {
        logger.warn(`Session ${this.id}: failed to close ${filename}`, {
          error: toErrorMessage(error),
        });
      });
    }
  }

  private async streamChunks(
    handle: FileReadHandle,
    descriptor: TransferDescriptor
  ): Promise<boolean> {
    for (const range of planChunks(descriptor.fileSize, descriptor.chunkSize)) {
      let data: Buffer;
      try {
        data = await handle.read(range.start, range.size);
      } catch (error) {
        logger.error(`Session ${this.id}: read failed for ${descriptor.filename}`, {
          chunk: range.chunkNumber,
          error: toErrorMessage(error),
        });
        await this.send({ type: 'error', message: `Error sending file: ${toErrorMessage(error)}` });
        return false;
      }

      await this.send({
        type: 'file_chunk',
        chunkNumber: range.chunkNumber,
        totalChunks: descriptor.numChunks,
        chunkSize: data.length,
      });
      await writeFrame(this.socket, data);
      logger.debug(
        `Session ${this.id}: sent chunk ${range.chunkNumber}/${descriptor.numChunks} of ${descriptor.filename}`
      );
    }
    return true;
  }

  private async send(response: Response): Promise<void> {
    await writeFrame(this.socket, encodeResponse(response));
  }

  private transition(next: SessionState): void {
    if (this.currentState === next) return;
    const previous = this.currentState;
    this.currentState = next;
    this.emit('state-change', next, previous);
  }

  private finish(outcome: SessionOutcome): SessionOutcome {
    this.transition(outcome.state);
    this.reader.dispose();
    this.socket.setTimeout(0);

    if (outcome.state === 'closed') {
      this.socket.end();
      logger.info(`Session ${this.id} closed`);
      this.emit('closed');
    } else {
      this.socket.destroy();
      logger.warn(`Session ${this.id} failed: ${outcome.error?.message ?? 'unknown error'}`);
      this.emit('failed', outcome.error);
    }

    return outcome;
  }
}
