import {
  formatBatchSummary,
  formatBytes,
  formatFileTable,
  formatProgressLine,
  pluralize,
  toMegabytes,
} from '../../src/main/utils/formatters';

describe('Formatters', () => {
  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
  });

  it('rounds megabytes to two decimals', () => {
    expect(toMegabytes(1_572_864)).toBe(1.5);
    expect(toMegabytes(2_000_000)).toBe(1.91);
    expect(toMegabytes(25)).toBe(0);
  });

  it('prints a progress line per chunk', () => {
    expect(
      formatProgressLine({
        filename: 'a.txt',
        chunkNumber: 2,
        totalChunks: 3,
        percent: 80,
        bytesReceived: 20,
        totalBytes: 25,
      })
    ).toBe('Downloading a.txt part 2 .... 80.0%');
  });

  it('renders the file listing as a table', () => {
    const table = formatFileTable([{ name: 'a.txt', size: 1_572_864, sizeMb: 1.5 }]).split('\n');

    expect(table).toHaveLength(5);
    expect(table[0]).toBe('-'.repeat(60));
    expect(table[3]).toBe(`1   a.txt${' '.repeat(26)}1.5${' '.repeat(8)}1572864`);
  });

  it('summarises a batch', () => {
    const summary = formatBatchSummary({
      success: false,
      results: [
        { filename: 'a.txt', success: true, path: '/tmp/a.txt', bytes: 1536 },
        {
          filename: 'missing.txt',
          success: false,
          errorCode: 'RemoteError',
          error: "File 'missing.txt' not found",
        },
      ],
    });

    expect(summary.split('\n')).toEqual([
      '✓ a.txt (1.5 KB)',
      "✗ missing.txt: File 'missing.txt' not found",
      '1/2 files downloaded',
    ]);
  });

  it('pluralizes', () => {
    expect(pluralize(1, 'file')).toBe('file');
    expect(pluralize(0, 'file')).toBe('files');
    expect(pluralize(2, 'entry', 'entries')).toBe('entries');
  });
});
