import * as path from 'path';
import { logger } from './logger';

/**
 * Path validation for names that arrive over the wire.
 */

/**
 * Resolves a file name inside the base directory.
 * @throws Error if the result escapes the base directory
 */
export function sanitizePath(filePath: string, baseDir: string): string {
  const normalizedBase = path.resolve(baseDir);
  const resolved = path.resolve(normalizedBase, path.normalize(filePath));

  if (!resolved.startsWith(normalizedBase + path.sep)) {
    logger.warn(
      `Path traversal attempt detected: ${filePath} (resolved: ${resolved}, base: ${normalizedBase})`
    );
    throw new Error(`Path traversal detected: ${filePath}`);
  }

  return resolved;
}

export function isPathSafe(filePath: string): boolean {
  const dangerousPatterns = [
    /\.\./, // ..
    /~\//, // ~/
    /\0/, // NUL
    /^[\\/]/, // absolute
    /^[a-z]:[\\/]/i, // C:\
    /^%.*%/, // %APPDATA%
    /^\$\{.*\}/, // ${VAR}
  ];

  return filePath.length > 0 && !dangerousPatterns.some((pattern) => pattern.test(filePath));
}

/**
 * Local name for a file announced by a server: only the final path segment
 * is kept, so a download never lands outside the download directory.
 */
export function resolveTransferName(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  if (!isPathSafe(base) || base === '.') {
    throw new Error(`Unsafe file name: ${filename}`);
  }
  return base;
}

export function validateTransferPath(filePath: string, baseDir: string): string {
  if (!isPathSafe(filePath)) {
    throw new Error(`Unsafe path detected: ${filePath}`);
  }
  return sanitizePath(filePath, baseDir);
}
