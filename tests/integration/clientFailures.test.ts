import fs from 'fs/promises';
import net, { Server, Socket } from 'net';
import os from 'os';
import path from 'path';
import { FileTransferClient } from '../../src/main/client/transferClient';
import { LocalOutputSink } from '../../src/main/client/outputSink';
import { decodeCommand, encodeResponse } from '../../src/main/network/protocol/codec';
import { encodeFrame, FrameReader, writeFrame } from '../../src/main/network/protocol/framing';
import { ConnectionClosedError } from '../../src/main/utils/errors';
import type { Command, Response } from '../../src/shared/types/protocol';

type Reply = (socket: Socket, command: Command) => Promise<void>;

const send = (socket: Socket, response: Response) => writeFrame(socket, encodeResponse(response));

/** Minimal in-process server whose replies are scripted per test. */
async function startScriptedServer(reply: Reply): Promise<{ server: Server; port: number; sockets: Socket[] }> {
  const sockets: Socket[] = [];
  const server = net.createServer((socket) => {
    sockets.push(socket);
    socket.on('error', () => undefined);
    const reader = new FrameReader(socket);

    const loop = async (): Promise<void> => {
      for (;;) {
        const command = decodeCommand(await reader.readFrame());
        if (command.type === 'disconnect') {
          socket.end();
          return;
        }
        await reply(socket, command);
      }
    };
    loop().catch(() => socket.destroy());
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Scripted server is not bound to a TCP port');
  }
  return { server, port: address.port, sockets };
}

describe('Client failure handling', () => {
  let tempDir: string;
  let downloadDir: string;
  let scripted: { server: Server; port: number; sockets: Socket[] } | null = null;

  const payload = Buffer.from('abcdefghijklmnopqrstuvwxy');

  async function connect(reply: Reply): Promise<FileTransferClient> {
    scripted = await startScriptedServer(reply);
    const client = new FileTransferClient(
      {
        host: '127.0.0.1',
        port: scripted.port,
        bufferSize: 4096,
        maxFrameSize: 1024,
        readTimeoutMs: 0,
      },
      new LocalOutputSink(downloadDir)
    );
    await client.connect();
    return client;
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'filewire-client-'));
    downloadDir = path.join(tempDir, 'downloads');
  });

  afterEach(async () => {
    if (scripted) {
      const { server, sockets } = scripted;
      sockets.forEach((socket) => socket.destroy());
      await new Promise<void>((resolve) => server.close(() => resolve()));
      scripted = null;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('leaves no partial file when the connection drops mid-chunk', async () => {
    const client = await connect(async (socket, command) => {
      if (command.type !== 'download_file') return;
      await send(socket, {
        type: 'file_info',
        filename: command.filename,
        fileSize: 25,
        numChunks: 3,
        chunkSize: 10,
      });
      await send(socket, { type: 'file_chunk', chunkNumber: 1, totalChunks: 3, chunkSize: 10 });
      await writeFrame(socket, payload.subarray(0, 10));
      await send(socket, { type: 'file_chunk', chunkNumber: 2, totalChunks: 3, chunkSize: 10 });
      // Header announces 10 bytes, only 3 follow.
      socket.end(encodeFrame(payload.subarray(10, 20)).subarray(0, 7));
    });
    const disconnected = new Promise<unknown>((resolve) => client.once('disconnected', resolve));

    const error = await client.downloadFile('a.txt').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionClosedError);
    expect(error).toHaveProperty('message', 'Connection closed in the middle of a frame');
    await expect(disconnected).resolves.toBeInstanceOf(ConnectionClosedError);
    expect(client.connected).toBe(false);
    expect(await fs.readdir(downloadDir)).toEqual([]);
  });

  it('fails a file with out-of-order chunks and stays in sync', async () => {
    const client = await connect(async (socket, command) => {
      if (command.type === 'list_files') {
        await send(socket, { type: 'file_list', files: [] });
        return;
      }
      if (command.type !== 'download_file') return;

      await send(socket, {
        type: 'file_info',
        filename: command.filename,
        fileSize: 25,
        numChunks: 3,
        chunkSize: 10,
      });
      for (const [chunkNumber, start, end] of [
        [2, 10, 20],
        [1, 0, 10],
        [3, 20, 25],
      ]) {
        await send(socket, { type: 'file_chunk', chunkNumber, totalChunks: 3, chunkSize: end - start });
        await writeFrame(socket, payload.subarray(start, end));
      }
      await send(socket, { type: 'file_complete', filename: command.filename });
    });

    const result = await client.downloadFile('a.txt');

    expect(result).toEqual({
      filename: 'a.txt',
      success: false,
      errorCode: 'OutOfOrderChunk',
      error: 'Expected chunk 1 but received 2',
    });
    expect(await fs.readdir(downloadDir)).toEqual([]);
    await expect(client.listFiles()).resolves.toEqual([]);
    await client.disconnect();
  });

  it('abandons a file when the server reports an error mid-transfer', async () => {
    const client = await connect(async (socket, command) => {
      if (command.type !== 'download_file') return;
      await send(socket, {
        type: 'file_info',
        filename: command.filename,
        fileSize: 25,
        numChunks: 3,
        chunkSize: 10,
      });
      await send(socket, { type: 'file_chunk', chunkNumber: 1, totalChunks: 3, chunkSize: 10 });
      await writeFrame(socket, payload.subarray(0, 10));
      await send(socket, { type: 'error', message: 'Error sending file: disk unplugged' });
    });

    const result = await client.downloadFile('a.txt');

    expect(result).toEqual({
      filename: 'a.txt',
      success: false,
      errorCode: 'RemoteError',
      error: 'Error sending file: disk unplugged',
    });
    expect(await fs.readdir(downloadDir)).toEqual([]);
    expect(client.connected).toBe(true);
    await client.disconnect();
  });

  it('fails the current and remaining files when the connection drops mid-batch', async () => {
    const client = await connect(async (socket, command) => {
      if (command.type !== 'download_multiple') return;
      await send(socket, {
        type: 'multiple_transfer_start',
        totalFiles: command.filenames.length,
        filenames: command.filenames,
      });
      await send(socket, { type: 'file_info', filename: 'a.txt', fileSize: 5, numChunks: 1, chunkSize: 10 });
      await send(socket, { type: 'file_chunk', chunkNumber: 1, totalChunks: 1, chunkSize: 5 });
      await writeFrame(socket, Buffer.from('hello'));
      await send(socket, { type: 'file_complete', filename: 'a.txt' });
      await send(socket, { type: 'file_info', filename: 'b.txt', fileSize: 25, numChunks: 3, chunkSize: 10 });
      socket.end();
    });

    const batch = await client.downloadMultiple(['a.txt', 'b.txt', 'c.txt']);

    expect(batch).toEqual({
      success: false,
      results: [
        { filename: 'a.txt', success: true, path: path.join(downloadDir, 'a.txt'), bytes: 5 },
        {
          filename: 'b.txt',
          success: false,
          errorCode: 'ConnectionClosed',
          error: 'Connection closed by peer',
        },
        {
          filename: 'c.txt',
          success: false,
          errorCode: 'ConnectionClosed',
          error: 'Connection closed by peer',
        },
      ],
    });
    expect(client.connected).toBe(false);
    expect(await fs.readdir(downloadDir)).toEqual(['a.txt']);
  });

  it('fails a file whose chunk size is wrong and stays in sync', async () => {
    const client = await connect(async (socket, command) => {
      if (command.type === 'list_files') {
        await send(socket, { type: 'file_list', files: [] });
        return;
      }
      if (command.type !== 'download_file') return;

      await send(socket, {
        type: 'file_info',
        filename: command.filename,
        fileSize: 25,
        numChunks: 3,
        chunkSize: 10,
      });
      for (const [chunkNumber, start, end] of [
        [1, 0, 10],
        [2, 10, 14],
        [3, 20, 25],
      ]) {
        await send(socket, { type: 'file_chunk', chunkNumber, totalChunks: 3, chunkSize: end - start });
        await writeFrame(socket, payload.subarray(start, end));
      }
      await send(socket, { type: 'file_complete', filename: command.filename });
    });

    const result = await client.downloadFile('a.txt');

    expect(result).toEqual({
      filename: 'a.txt',
      success: false,
      errorCode: 'ChunkSizeMismatch',
      error: 'Chunk 2 has 4 bytes, expected 10',
    });
    expect(await fs.readdir(downloadDir)).toEqual([]);
    await expect(client.listFiles()).resolves.toEqual([]);
    await client.disconnect();
  });

  it('rejects a response of the wrong type', async () => {
    const client = await connect(async (socket) => {
      await send(socket, { type: 'file_complete', filename: 'a.txt' });
    });

    await expect(client.listFiles()).rejects.toThrow('Expected file_list but received file_complete');
    expect(client.connected).toBe(false);
  });
});
