import fs from 'fs/promises';
import path from 'path';
import { isErrnoException } from '../utils/errors';
import { logger } from '../utils/logger';

interface SampleFile {
  name: string;
  line: string;
  repeat: number;
}

const SAMPLE_FILES: SampleFile[] = [
  { name: 'small_file.txt', line: 'This is a small test file.\n', repeat: 100 },
  { name: 'medium_file.txt', line: 'This is a medium test file.\n', repeat: 10_000 },
  { name: 'large_file.txt', line: 'This is a large test file.\n', repeat: 100_000 },
];

/**
 * Creates the demo files in `directory` unless they already exist.
 * Returns the names that were written.
 */
export async function seedSampleFiles(directory: string): Promise<string[]> {
  await fs.mkdir(directory, { recursive: true });
  const created: string[] = [];

  for (const sample of SAMPLE_FILES) {
    const filePath = path.join(directory, sample.name);
    try {
      await fs.writeFile(filePath, sample.line.repeat(sample.repeat), { flag: 'wx' });
      created.push(sample.name);
      logger.info(`Created sample file: ${sample.name}`);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
    }
  }

  return created;
}
