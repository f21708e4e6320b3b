import {
  decodeCommand,
  decodeResponse,
  encodeCommand,
  encodeResponse,
} from '../../src/main/network/protocol/codec';
import type { Command, Response } from '../../src/shared/types/protocol';
import { MalformedMessageError } from '../../src/main/utils/errors';

const wire = (value: unknown): Buffer => Buffer.from(JSON.stringify(value));
const parsed = (payload: Buffer): unknown => JSON.parse(payload.toString('utf-8'));

describe('Message codec', () => {
  describe('commands', () => {
    it('encodes commands as tagged JSON', () => {
      expect(parsed(encodeCommand({ type: 'list_files' }))).toEqual({ type: 'list_files' });
      expect(parsed(encodeCommand({ type: 'download_file', filename: 'a.txt' }))).toEqual({
        type: 'download_file',
        filename: 'a.txt',
      });
      expect(
        parsed(encodeCommand({ type: 'download_multiple', filenames: ['a.txt', 'b.txt'] }))
      ).toEqual({ type: 'download_multiple', filenames: ['a.txt', 'b.txt'] });
    });

    it('decodes every command it encodes', () => {
      const commands: Command[] = [
        { type: 'list_files' },
        { type: 'download_file', filename: 'report.pdf' },
        { type: 'download_multiple', filenames: ['a.txt', 'missing.txt', 'c.txt'] },
        { type: 'disconnect' },
      ];

      commands.forEach((command) => {
        expect(decodeCommand(encodeCommand(command))).toEqual(command);
      });
    });

    it('ignores unknown fields', () => {
      expect(decodeCommand(wire({ type: 'list_files', verbose: true }))).toEqual({
        type: 'list_files',
      });
    });

    it('rejects unknown command tags', () => {
      expect(() => decodeCommand(wire({ type: 'delete_file', filename: 'a.txt' }))).toThrow(
        'Unknown command type "delete_file"'
      );
    });

    it('rejects commands missing required fields', () => {
      expect(() => decodeCommand(wire({ type: 'download_file' }))).toThrow(
        'Field "filename" must be a string.'
      );
      expect(() => decodeCommand(wire({ type: 'download_multiple', filenames: ['a', 7] }))).toThrow(
        'Field "filenames[1]" must be a string.'
      );
    });
  });

  describe('responses', () => {
    it('uses snake_case field names on the wire', () => {
      expect(
        parsed(
          encodeResponse({
            type: 'file_info',
            filename: 'big.bin',
            fileSize: 2_000_000,
            numChunks: 2,
            chunkSize: 1_048_576,
          })
        )
      ).toEqual({
        type: 'file_info',
        filename: 'big.bin',
        file_size: 2_000_000,
        num_chunks: 2,
        chunk_size: 1_048_576,
      });

      expect(
        parsed(encodeResponse({ type: 'file_list', files: [{ name: 'a.txt', size: 25, sizeMb: 0 }] }))
      ).toEqual({ type: 'file_list', files: [{ name: 'a.txt', size: 25, size_mb: 0 }] });
    });

    it('decodes every response it encodes', () => {
      const responses: Response[] = [
        { type: 'file_list', files: [{ name: 'a.txt', size: 1_572_864, sizeMb: 1.5 }] },
        { type: 'file_list', files: [] },
        { type: 'file_info', filename: 'empty.txt', fileSize: 0, numChunks: 1, chunkSize: 10 },
        { type: 'file_chunk', chunkNumber: 1, totalChunks: 1, chunkSize: 0 },
        { type: 'file_complete', filename: 'a.txt' },
        { type: 'multiple_transfer_start', totalFiles: 2, filenames: ['a.txt', 'b.txt'] },
        { type: 'multiple_transfer_complete', totalFiles: 2 },
        { type: 'error', message: "File 'nope.txt' not found" },
      ];

      responses.forEach((response) => {
        expect(decodeResponse(encodeResponse(response))).toEqual(response);
      });
    });

    it('rejects chunk headers with a zero chunk number', () => {
      expect(() =>
        decodeResponse(wire({ type: 'file_chunk', chunk_number: 0, total_chunks: 1, chunk_size: 0 }))
      ).toThrow('Field "chunk_number" must be >= 1.');
    });

    it('rejects non-integer sizes', () => {
      expect(() =>
        decodeResponse(
          wire({ type: 'file_info', filename: 'a', file_size: 1.5, num_chunks: 1, chunk_size: 10 })
        )
      ).toThrow('Field "file_size" must be an integer.');
    });

    it('rejects unknown response tags', () => {
      expect(() => decodeResponse(wire({ type: 'file_deleted' }))).toThrow(
        'Unknown response type "file_deleted"'
      );
    });
  });

  describe('malformed payloads', () => {
    it('rejects payloads that are not JSON', () => {
      const error = (() => {
        try {
          decodeCommand(Buffer.from('not json'));
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(MalformedMessageError);
      expect(error).toHaveProperty('code', 'MalformedMessage');
    });

    it('rejects JSON that is not an object', () => {
      expect(() => decodeCommand(wire(['list_files']))).toThrow(
        'Field "message" must be an object.'
      );
      expect(() => decodeResponse(wire(null))).toThrow(MalformedMessageError);
    });

    it('rejects messages without a type tag', () => {
      expect(() => decodeCommand(wire({ filename: 'a.txt' }))).toThrow(MalformedMessageError);
    });

    it('rejects an empty payload', () => {
      expect(() => decodeResponse(Buffer.alloc(0))).toThrow(MalformedMessageError);
    });
  });
});
