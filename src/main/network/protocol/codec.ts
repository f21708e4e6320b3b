import type {
  Command,
  FileListEntry,
  Response,
} from '../../../shared/types/protocol';
import { MalformedMessageError, toErrorMessage } from '../../utils/errors';
import {
  ensureArray,
  ensureNumber,
  ensureObject,
  ensureString,
  ensureStringArray,
  PlainObject,
} from '../../utils/validation';

const MAX_FILENAME_LENGTH = 1024;
const MAX_BATCH_ENTRIES = 10_000;

/*
 * Control messages travel as UTF-8 JSON with snake_case fields and a `type`
 * tag, e.g. {"type":"download_file","filename":"a.txt"}.
 */

export function encodeCommand(command: Command): Buffer {
  return toBytes(commandToWire(command));
}

export function encodeResponse(response: Response): Buffer {
  return toBytes(responseToWire(response));
}

export function decodeCommand(payload: Buffer): Command {
  const wire = parseWire(payload);
  return guard(() => commandFromWire(wire));
}

export function decodeResponse(payload: Buffer): Response {
  const wire = parseWire(payload);
  return guard(() => responseFromWire(wire));
}

function commandToWire(command: Command): PlainObject {
  switch (command.type) {
    case 'list_files':
    case 'disconnect':
      return { type: command.type };
    case 'download_file':
      return { type: command.type, filename: command.filename };
    case 'download_multiple':
      return { type: command.type, filenames: command.filenames };
  }
}

function responseToWire(response: Response): PlainObject {
  switch (response.type) {
    case 'file_list':
      return {
        type: response.type,
        files: response.files.map((file) => ({
          name: file.name,
          size: file.size,
          size_mb: file.sizeMb,
        })),
      };
    case 'file_info':
      return {
        type: response.type,
        filename: response.filename,
        file_size: response.fileSize,
        num_chunks: response.numChunks,
        chunk_size: response.chunkSize,
      };
    case 'file_chunk':
      return {
        type: response.type,
        chunk_number: response.chunkNumber,
        total_chunks: response.totalChunks,
        chunk_size: response.chunkSize,
      };
    case 'file_complete':
      return { type: response.type, filename: response.filename };
    case 'multiple_transfer_start':
      return {
        type: response.type,
        total_files: response.totalFiles,
        filenames: response.filenames,
      };
    case 'multiple_transfer_complete':
      return { type: response.type, total_files: response.totalFiles };
    case 'error':
      return { type: response.type, message: response.message };
  }
}

function commandFromWire(wire: PlainObject): Command {
  const type = ensureString(wire.type, 'type');
  switch (type) {
    case 'list_files':
    case 'disconnect':
      return { type };
    case 'download_file':
      return { type, filename: filename(wire.filename, 'filename') };
    case 'download_multiple':
      return {
        type,
        filenames: ensureStringArray(wire.filenames, 'filenames', {
          maxEntries: MAX_BATCH_ENTRIES,
          maxLength: MAX_FILENAME_LENGTH,
        }),
      };
    default:
      throw new Error(`Unknown command type "${type}"`);
  }
}

function responseFromWire(wire: PlainObject): Response {
  const type = ensureString(wire.type, 'type');
  switch (type) {
    case 'file_list':
      return {
        type,
        files: ensureArray(wire.files, 'files').map((entry, index) =>
          fileListEntry(entry, `files[${index}]`)
        ),
      };
    case 'file_info':
      return {
        type,
        filename: filename(wire.filename, 'filename'),
        fileSize: count(wire.file_size, 'file_size'),
        numChunks: count(wire.num_chunks, 'num_chunks', 1),
        chunkSize: count(wire.chunk_size, 'chunk_size', 1),
      };
    case 'file_chunk':
      return {
        type,
        chunkNumber: count(wire.chunk_number, 'chunk_number', 1),
        totalChunks: count(wire.total_chunks, 'total_chunks', 1),
        chunkSize: count(wire.chunk_size, 'chunk_size'),
      };
    case 'file_complete':
      return { type, filename: filename(wire.filename, 'filename') };
    case 'multiple_transfer_start':
      return {
        type,
        totalFiles: count(wire.total_files, 'total_files'),
        filenames: ensureStringArray(wire.filenames, 'filenames', {
          maxEntries: MAX_BATCH_ENTRIES,
          maxLength: MAX_FILENAME_LENGTH,
        }),
      };
    case 'multiple_transfer_complete':
      return { type, totalFiles: count(wire.total_files, 'total_files') };
    case 'error':
      return { type, message: ensureString(wire.message, 'message', { allowEmpty: true }) };
    default:
      throw new Error(`Unknown response type "${type}"`);
  }
}

function fileListEntry(value: unknown, field: string): FileListEntry {
  const entry = ensureObject(value, field);
  return {
    name: filename(entry.name, `${field}.name`),
    size: count(entry.size, `${field}.size`),
    sizeMb: ensureNumber(entry.size_mb, `${field}.size_mb`, { min: 0 }),
  };
}

function filename(value: unknown, field: string): string {
  return ensureString(value, field, { maxLength: MAX_FILENAME_LENGTH });
}

function count(value: unknown, field: string, min = 0): number {
  return ensureNumber(value, field, { integer: true, min, max: Number.MAX_SAFE_INTEGER });
}

function toBytes(wire: PlainObject): Buffer {
  return Buffer.from(JSON.stringify(wire), 'utf-8');
}

function parseWire(payload: Buffer): PlainObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString('utf-8'));
  } catch (error) {
    throw new MalformedMessageError(`Message is not valid JSON: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  return guard(() => ensureObject(parsed, 'message'));
}

function guard<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw new MalformedMessageError(toErrorMessage(error), { cause: error });
  }
}
