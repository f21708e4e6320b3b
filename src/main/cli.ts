#!/usr/bin/env node

import { Command } from 'commander';
import type { AppConfig } from '../shared/types/config';
import type { FileListEntry } from '../shared/types/protocol';
import type { TransferProgress } from '../shared/types/transfer';
import { loadConfig } from './config/config';
import { FileTransferClient } from './client/transferClient';
import { LocalOutputSink } from './client/outputSink';
import { ConnectionSupervisor } from './server/connectionSupervisor';
import { LocalFileDirectory } from './server/fileDirectory';
import { seedSampleFiles } from './server/sampleFiles';
import { configureLogger, logger } from './utils/logger';
import {
  formatBatchSummary,
  formatFileTable,
  formatProgressLine,
} from './utils/formatters';
import { toErrorMessage } from './utils/errors';

interface CommonOptions {
  config?: string;
  host?: string;
  port?: string;
  dir?: string;
}

const program = new Command();

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
}

async function resolveConfig(options: CommonOptions): Promise<AppConfig> {
  const config = await loadConfig({ configPath: options.config });
  const port = parsePort(options.port);

  const resolved: AppConfig = {
    ...config,
    server: {
      ...config.server,
      host: options.host ?? config.server.host,
      port: port ?? config.server.port,
      directory: options.dir ?? config.server.directory,
    },
    client: {
      ...config.client,
      host: options.host ?? config.client.host,
      port: port ?? config.client.port,
      downloadDirectory: options.dir ?? config.client.downloadDirectory,
    },
  };

  configureLogger(resolved.logging);
  return resolved;
}

function createClient(config: AppConfig): FileTransferClient {
  const client = new FileTransferClient(
    { ...config.client, ...config.network },
    new LocalOutputSink(config.client.downloadDirectory)
  );
  client.on('progress', (progress: TransferProgress) => {
    print(formatProgressLine(progress));
  });
  return client;
}

async function withClient<T>(
  config: AppConfig,
  action: (client: FileTransferClient) => Promise<T>
): Promise<T> {
  const client = createClient(config);
  await client.connect();
  try {
    return await action(client);
  } finally {
    await client.disconnect();
  }
}

/**
 * Arguments are file names, or 1-based positions in the server listing
 * when `byIndex` is set.
 */
export function resolveSelection(
  selection: string[],
  files: FileListEntry[],
  byIndex: boolean
): string[] {
  if (!byIndex) return selection;

  return selection
    .flatMap((item) => item.split(','))
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => {
      const index = Number(item) - 1;
      const file = Number.isInteger(index) ? files[index] : undefined;
      if (!file) {
        throw new Error(`Invalid file number ${item}`);
      }
      return file.name;
    });
}

async function handleServe(options: CommonOptions & { seed?: boolean }): Promise<void> {
  const config = await resolveConfig(options);
  const directory = new LocalFileDirectory(config.server.directory);
  await directory.ensureExists();

  if (options.seed) {
    await seedSampleFiles(directory.root);
  }

  const supervisor = new ConnectionSupervisor(
    { ...config.server, ...config.network },
    directory
  );
  supervisor.on('error', (error: Error) => {
    logger.error('Server error', { error: error.message });
  });

  const address = await supervisor.start();
  logger.info(`Serving ${directory.root} on ${address.address}:${address.port}`);

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info(`Received ${signal}, shutting down`);
      supervisor.stop().then(resolve, (error: unknown) => {
        logger.error('Shutdown failed', { error: toErrorMessage(error) });
        process.exitCode = 1;
        resolve();
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

async function handleList(options: CommonOptions): Promise<void> {
  const config = await resolveConfig(options);
  const files = await withClient(config, (client) => client.listFiles());

  if (files.length === 0) {
    print('No files available on the server');
    return;
  }
  print(formatFileTable(files));
}

async function handleGet(
  selection: string[],
  options: CommonOptions & { index?: boolean }
): Promise<void> {
  const config = await resolveConfig(options);

  const batch = await withClient(config, async (client) => {
    const files = options.index ? await client.listFiles() : [];
    const filenames = resolveSelection(selection, files, options.index ?? false);

    if (filenames.length === 1) {
      const result = await client.downloadFile(filenames[0]);
      return { success: result.success, results: [result] };
    }
    return client.downloadMultiple(filenames);
  });

  print(formatBatchSummary(batch));
  if (!batch.success) {
    process.exitCode = 1;
  }
}

async function handleConfig(options: CommonOptions): Promise<void> {
  const config = await resolveConfig(options);
  print(JSON.stringify(config, null, 2));
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to configuration JSON file')
    .option('-H, --host <host>', 'Server address')
    .option('-p, --port <port>', 'Server port');
}

program.name('filewire').description('Chunked file transfer over TCP').version('1.0.0');

withCommonOptions(program.command('serve'))
  .description('Serve the files of a directory')
  .option('-d, --dir <path>', 'Directory to serve')
  .option('--seed', 'Create sample files if they are missing')
  .action(async (options: CommonOptions & { seed?: boolean }) => {
    await handleServe(options);
  });

withCommonOptions(program.command('list'))
  .description('List the files available on the server')
  .action(async (options: CommonOptions) => {
    await handleList(options);
  });

withCommonOptions(program.command('get <files...>'))
  .description('Download one or more files')
  .option('-d, --dir <path>', 'Download directory')
  .option('-i, --index', 'Treat arguments as numbers from the file listing')
  .action(async (files: string[], options: CommonOptions & { index?: boolean }) => {
    await handleGet(files, options);
  });

withCommonOptions(program.command('config'))
  .description('Print the effective configuration')
  .action(async (options: CommonOptions) => {
    await handleConfig(options);
  });

if (require.main === module) {
  void program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error('CLI command failed', { error: toErrorMessage(error) });
    process.exit(1);
  });
}
