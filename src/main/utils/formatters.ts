import type { FileListEntry } from '../../shared/types/protocol';
import type { BatchTransferResult, TransferProgress } from '../../shared/types/transfer';
import { BYTES_PER_MEGABYTE } from '../../shared/constants/protocol';

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';

  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/** Megabytes rounded to two decimals, as reported in file listings. */
export function toMegabytes(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MEGABYTE) * 100) / 100;
}

export function formatPercent(percent: number): string {
  return `${percent.toFixed(1)}%`;
}

export function formatProgressLine(progress: TransferProgress): string {
  return `Downloading ${progress.filename} part ${progress.chunkNumber} .... ${formatPercent(progress.percent)}`;
}

export function formatFileTable(files: FileListEntry[]): string {
  const rule = '-'.repeat(60);
  const header = `${'#'.padEnd(4)}${'Filename'.padEnd(31)}${'Size (MB)'.padEnd(11)}${'Size (bytes)'}`;
  const rows = files.map(
    (file, index) =>
      `${String(index + 1).padEnd(4)}${file.name.padEnd(31)}${String(file.sizeMb).padEnd(11)}${file.size}`
  );

  return [rule, header, rule, ...rows, rule].join('\n');
}

export function formatBatchSummary(batch: BatchTransferResult): string {
  const lines = batch.results.map((result) =>
    result.success
      ? `✓ ${result.filename} (${formatBytes(result.bytes)})`
      : `✗ ${result.filename}: ${result.error}`
  );
  const succeeded = batch.results.filter((result) => result.success).length;
  lines.push(`${succeeded}/${batch.results.length} ${pluralize(batch.results.length, 'file')} downloaded`);
  return lines.join('\n');
}

export function pluralize(count: number, singular: string, plural?: string): string {
  return count === 1 ? singular : plural || `${singular}s`;
}
