export interface AppConfig {
  server: ServerConfig;
  client: ClientConfig;
  network: NetworkConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  host: string;
  port: number;
  directory: string;
  maxChunkSize: number;
  shutdownGracePeriodMs: number;
  idleTimeoutMs: number; // 0 disables
}

export interface ClientConfig {
  host: string;
  port: number;
  downloadDirectory: string;
  readTimeoutMs: number; // 0 disables
}

export interface NetworkConfig {
  bufferSize: number;
  maxFrameSize: number;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  directory?: string;
}
