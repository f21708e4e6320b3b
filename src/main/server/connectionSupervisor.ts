import { EventEmitter } from 'events';
import net, { AddressInfo, Server, Socket } from 'net';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../../shared/types/config';
import type { FileDirectory } from './fileDirectory';
import { FileTransferSession, SessionOutcome } from './session';
import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';

interface ActiveSession {
  session: FileTransferSession;
  socket: Socket;
  done: Promise<SessionOutcome>;
}

export type SupervisorOptions = AppConfig['server'] & AppConfig['network'];

/**
 * Accepts connections and runs one independent session per client. A
 * session failure is contained to its own socket.
 */
export class ConnectionSupervisor extends EventEmitter {
  private server: Server | null = null;
  private readonly sessions = new Map<string, ActiveSession>();

  constructor(
    private readonly options: SupervisorOptions,
    private readonly directory: FileDirectory
  ) {
    super();
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Connection supervisor already started');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.options.port, this.options.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      this.server = null;
      logger.error('Failed to start file server', { error: toErrorMessage(error) });
      throw error;
    }

    server.on('error', (error) => {
      logger.error('File server error', { error: error.message });
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('File server is not bound to a TCP port');
    }

    logger.info(`File server started on ${address.address}:${address.port}`);
    this.emit('listening', address);
    return address;
  }

  /**
   * Stops accepting connections, lets sessions drain for the grace period,
   * then destroys whatever is still open.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    const pending = [...this.sessions.values()].map((active) => active.done);
    if (pending.length > 0) {
      logger.info(`Waiting up to ${this.options.shutdownGracePeriodMs}ms for ${pending.length} sessions`);
      const drained = await this.waitFor(Promise.all(pending), this.options.shutdownGracePeriodMs);
      if (!drained) {
        for (const { socket, session } of this.sessions.values()) {
          logger.warn(`Forcing session ${session.id} closed`);
          socket.destroy();
        }
        await Promise.all([...this.sessions.values()].map((active) => active.done));
      }
    }

    await closed;
    logger.info('File server stopped');
  }

  private handleConnection(socket: Socket): void {
    const id = uuidv4();
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    logger.info(`Connection established with ${remote}`, { session: id });

    const session = new FileTransferSession(socket, {
      id,
      directory: this.directory,
      maxChunkSize: this.options.maxChunkSize,
      maxFrameSize: this.options.maxFrameSize,
      bufferSize: this.options.bufferSize,
      idleTimeoutMs: this.options.idleTimeoutMs,
    });

    const done = session
      .run()
      .catch((error): SessionOutcome => {
        logger.error(`Session ${id} crashed`, { error: toErrorMessage(error) });
        socket.destroy();
        return { state: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
      })
      .then((outcome) => {
        this.sessions.delete(id);
        logger.info(`Connection with ${remote} closed`, { session: id, state: outcome.state });
        this.emit('session-closed', id, outcome);
        return outcome;
      });

    this.sessions.set(id, { session, socket, done });
    this.emit('session-opened', id, session);
  }

  private async waitFor(task: Promise<unknown>, timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([task.then(() => true as const), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
