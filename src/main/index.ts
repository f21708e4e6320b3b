export * from '../shared/types/protocol';
export * from '../shared/types/transfer';
export * from '../shared/types/config';
export * from '../shared/constants/protocol';
export { encodeFrame, writeFrame, FrameReader } from './network/protocol/framing';
export type { FrameReaderOptions } from './network/protocol/framing';
export { encodeCommand, encodeResponse, decodeCommand, decodeResponse } from './network/protocol/codec';
export {
  ChunkAssembler,
  chunkRange,
  countChunks,
  createTransferDescriptor,
  planChunks,
  progressPercent,
} from './transfer/chunker';
export type { ChunkSink } from './transfer/chunker';
export { FileTransferSession } from './server/session';
export type { SessionContext, SessionOutcome, SessionState } from './server/session';
export { ConnectionSupervisor } from './server/connectionSupervisor';
export type { SupervisorOptions } from './server/connectionSupervisor';
export { LocalFileDirectory } from './server/fileDirectory';
export type { FileDirectory, FileReadHandle } from './server/fileDirectory';
export { FileTransferClient } from './client/transferClient';
export type { TransferClientOptions } from './client/transferClient';
export { LocalOutputSink } from './client/outputSink';
export type { OutputHandle, OutputSink } from './client/outputSink';
export { defaultAppConfig, loadConfig, resolveConfigPath, sanitizeConfig } from './config/config';
export * from './utils/errors';
export { configureLogger, logger } from './utils/logger';
