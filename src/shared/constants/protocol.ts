export const FRAME_HEADER_SIZE = 4;
export const MAX_FRAME_LENGTH = 0xffffffff;

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 8888;
export const DEFAULT_MAX_CHUNK_SIZE = 1024 * 1024; // 1MB chunks
export const DEFAULT_BUFFER_SIZE = 4096;
export const DEFAULT_MAX_FRAME_SIZE = 8 * 1024 * 1024;
export const DEFAULT_SHUTDOWN_GRACE_PERIOD_MS = 5000;

export const BYTES_PER_MEGABYTE = 1024 * 1024;
