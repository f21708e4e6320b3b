import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AppConfig, LoggingConfig } from '../../shared/types/config';
import {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_HOST,
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MAX_FRAME_SIZE,
  DEFAULT_PORT,
  DEFAULT_SHUTDOWN_GRACE_PERIOD_MS,
  MAX_FRAME_LENGTH,
} from '../../shared/constants/protocol';
import { isErrnoException } from '../utils/errors';
import {
  ensureNumber,
  ensureObject,
  ensureString,
  parseIntegerEnv,
  PlainObject,
} from '../utils/validation';

export const defaultAppConfig: AppConfig = {
  server: {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    directory: 'server_files',
    maxChunkSize: DEFAULT_MAX_CHUNK_SIZE,
    shutdownGracePeriodMs: DEFAULT_SHUTDOWN_GRACE_PERIOD_MS,
    idleTimeoutMs: 0,
  },
  client: {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    downloadDirectory: 'downloads',
    readTimeoutMs: 0,
  },
  network: {
    bufferSize: DEFAULT_BUFFER_SIZE,
    maxFrameSize: DEFAULT_MAX_FRAME_SIZE,
  },
  logging: {
    level: 'info',
  },
};

const LOG_LEVELS: readonly LoggingConfig['level'][] = ['error', 'warn', 'info', 'debug'];
const MAX_PORT = 65_535;

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }

  const dataDir = path.join(os.homedir(), '.filewire');
  return path.join(dataDir, 'config.json');
}

/**
 * Defaults, overlaid by the JSON config file (optional unless a path is
 * given explicitly), overlaid by FILEWIRE_* environment variables.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configFile = resolveConfigPath(options.configPath);

  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(configFile, 'utf-8'));
  } catch (error) {
    const missing = isErrnoException(error) && error.code === 'ENOENT';
    if (!missing || options.configPath) {
      throw new Error(`Cannot load configuration from ${configFile}: ${String(error)}`, {
        cause: error,
      });
    }
  }

  const fromFile = sanitizeConfig(raw);
  return sanitizeConfig(applyEnvOverrides(fromFile, options.env ?? process.env));
}

export function sanitizeConfig(value: unknown): AppConfig {
  const raw = ensureObject(value, 'config');
  const server = section(raw, 'server');
  const client = section(raw, 'client');
  const network = section(raw, 'network');
  const logging = section(raw, 'logging');
  const defaults = defaultAppConfig;

  const config: AppConfig = {
    server: {
      host: field(server.host, defaults.server.host, (v) => ensureString(v, 'server.host')),
      port: field(server.port, defaults.server.port, (v) => port(v, 'server.port')),
      directory: field(server.directory, defaults.server.directory, (v) =>
        ensureString(v, 'server.directory')
      ),
      maxChunkSize: field(server.maxChunkSize, defaults.server.maxChunkSize, (v) =>
        ensureNumber(v, 'server.maxChunkSize', { integer: true, min: 1, max: MAX_FRAME_LENGTH })
      ),
      shutdownGracePeriodMs: field(
        server.shutdownGracePeriodMs,
        defaults.server.shutdownGracePeriodMs,
        (v) => millis(v, 'server.shutdownGracePeriodMs')
      ),
      idleTimeoutMs: field(server.idleTimeoutMs, defaults.server.idleTimeoutMs, (v) =>
        millis(v, 'server.idleTimeoutMs')
      ),
    },
    client: {
      host: field(client.host, defaults.client.host, (v) => ensureString(v, 'client.host')),
      port: field(client.port, defaults.client.port, (v) => port(v, 'client.port')),
      downloadDirectory: field(client.downloadDirectory, defaults.client.downloadDirectory, (v) =>
        ensureString(v, 'client.downloadDirectory')
      ),
      readTimeoutMs: field(client.readTimeoutMs, defaults.client.readTimeoutMs, (v) =>
        millis(v, 'client.readTimeoutMs')
      ),
    },
    network: {
      bufferSize: field(network.bufferSize, defaults.network.bufferSize, (v) =>
        ensureNumber(v, 'network.bufferSize', { integer: true, min: 1 })
      ),
      maxFrameSize: field(network.maxFrameSize, defaults.network.maxFrameSize, (v) =>
        ensureNumber(v, 'network.maxFrameSize', { integer: true, min: 1, max: MAX_FRAME_LENGTH })
      ),
    },
    logging: {
      level: field(logging.level, defaults.logging.level, logLevel),
      directory: field(logging.directory, defaults.logging.directory, (v) =>
        ensureString(v, 'logging.directory')
      ),
    },
  };

  if (config.network.maxFrameSize < config.server.maxChunkSize) {
    throw new Error(
      `Field "network.maxFrameSize" must be >= server.maxChunkSize (${config.server.maxChunkSize}).`
    );
  }

  return config;
}

function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const host = env.FILEWIRE_HOST;
  const envPort = parseIntegerEnv(env.FILEWIRE_PORT, 'FILEWIRE_PORT');
  const chunkSize = parseIntegerEnv(env.FILEWIRE_CHUNK_SIZE, 'FILEWIRE_CHUNK_SIZE');

  return {
    server: {
      ...config.server,
      host: host ?? config.server.host,
      port: envPort ?? config.server.port,
      directory: env.FILEWIRE_SERVER_DIR ?? config.server.directory,
      maxChunkSize: chunkSize ?? config.server.maxChunkSize,
    },
    client: {
      ...config.client,
      host: host ?? config.client.host,
      port: envPort ?? config.client.port,
      downloadDirectory: env.FILEWIRE_DOWNLOAD_DIR ?? config.client.downloadDirectory,
    },
    network: { ...config.network },
    logging: {
      level: logLevel(env.FILEWIRE_LOG_LEVEL ?? config.logging.level),
      directory: env.FILEWIRE_LOG_DIR ?? config.logging.directory,
    },
  };
}

function section(raw: PlainObject, name: string): PlainObject {
  return raw[name] === undefined ? {} : ensureObject(raw[name], name);
}

function field<T>(value: unknown, fallback: T, validate: (value: unknown) => T): T {
  return value === undefined ? fallback : validate(value);
}

function port(value: unknown, name: string): number {
  return ensureNumber(value, name, { integer: true, min: 0, max: MAX_PORT });
}

function millis(value: unknown, name: string): number {
  return ensureNumber(value, name, { integer: true, min: 0 });
}

function logLevel(value: unknown): LoggingConfig['level'] {
  const level = ensureString(value, 'logging.level');
  const match = LOG_LEVELS.find((candidate) => candidate === level);
  if (!match) {
    throw new Error(`Field "logging.level" must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return match;
}
