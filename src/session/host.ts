/**
 * Hosting side of a log sharing session
 *
 * share() loads the file, binds the listener, maps the port on the gateway and
 * returns a session code while an accept loop keeps serving in the background.
 * stop() closes the listener; the loop treats that close as its shutdown signal.
 */

import { EventEmitter } from 'events';
import { createServer } from 'net';
import type { Server, Socket } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { SHARE, LOG_TAGS } from '../constants.js';
import {
  AuthenticationMismatch,
  PortPermissionError,
  ShareError,
  ShareErrorCode,
  toError,
} from '../errors.js';
import { readPayload } from '../logs.js';
import { logger } from '../utils/logger.js';
import { encodeRendezvous, generateSecret } from './codec.js';
import type { PortMapper } from './nat.js';
import { serveConnection } from './protocol.js';
import type { PortMapping, SessionHostOptions, SessionState } from './types.js';

const TAG = LOG_TAGS.HOST;

/**
 * Map a listen() failure to the error the user can act on
 */
export function classifyListenError(err: NodeJS.ErrnoException, port: number): ShareError {
  if (err.code === 'EACCES' || err.code === 'EPERM') {
    return new PortPermissionError(port, err);
  }
  if (err.code === 'EADDRINUSE') {
    return new ShareError(`Port ${port} is already in use by another session or program`, ShareErrorCode.BindFailed, err);
  }
  return new ShareError(`Cannot listen on port ${port}: ${err.message}`, ShareErrorCode.BindFailed, err);
}

export class SessionHost extends EventEmitter {
  readonly sessionId: string = uuidv4();

  private port: number;
  private bindHost: string;
  private idleTimeoutMs: number;
  private secretBytes: number;
  private mapper: PortMapper;

  private server: Server | null = null;
  private _state: SessionState = 'idle';
  private _status: string | null = null;
  private _mapping: PortMapping | null = null;
  private _code: string | null = null;
  private secret: Buffer = Buffer.alloc(0);
  private payload: Buffer = Buffer.alloc(0);

  // Checked before every accept; set by stop() or a listener failure
  private closed = false;
  private stoppedByUser = false;

  private pending: Socket[] = [];
  private current: Socket | null = null;
  private acceptWaiter: ((socket: Socket | null) => void) | null = null;

  private listenerClosed: Promise<void> = Promise.resolve();
  private teardown: Promise<void> | null = null;
  private finished: Promise<void>;
  private resolveFinished: () => void = () => undefined;

  constructor(options: SessionHostOptions) {
    super();
    if (!Number.isInteger(options.port) || options.port < 0 || options.port > 65535) {
      throw new ShareError(`Cannot listen on port ${options.port}: not a TCP port number`, ShareErrorCode.BindFailed);
    }
    this.port = options.port;
    this.bindHost = options.bindHost ?? SHARE.DEFAULT_BIND_HOST;
    this.idleTimeoutMs = options.idleTimeoutMs ?? SHARE.IDLE_TIMEOUT_MS;
    this.secretBytes = options.secretBytes ?? SHARE.SECRET_BYTES;
    this.mapper = options.mapper;
    this.finished = new Promise((resolve) => {
      this.resolveFinished = resolve;
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Last human-readable problem, or null
   */
  get status(): string | null {
    return this._status;
  }

  get mapping(): PortMapping | null {
    return this._mapping;
  }

  get code(): string | null {
    return this._code;
  }

  /**
   * Start sharing `filePath`. Resolves with the session code once the
   * listener is up and the port is mapped.
   */
  async share(filePath: string): Promise<string> {
    if (this._state !== 'idle' || this.closed) {
      throw new ShareError('This session has already been started or stopped', ShareErrorCode.SessionClosed);
    }
    this.setState('mapping');

    const code = await this.start(filePath).catch(async (err: unknown) => {
      this.closed = true;
      await this.finish();
      throw err;
    });

    this.setState('listening');
    logger.info(TAG, `Session ${this.sessionId} listening on ${this.bindHost}:${this.boundPort()}`);

    this.run().catch((err) => this.fail(toError(err)));
    return code;
  }

  private async start(filePath: string): Promise<string> {
    // Local read errors surface before any network action
    this.payload = await readPayload(filePath);
    this.ensureOpen();
    logger.info(TAG, `Loaded ${this.payload.length} bytes from ${filePath}`);

    this.server = await this.listen();
    this.ensureOpen();

    const mapping = await this.mapper.establish(this.boundPort());
    this._mapping = mapping;
    this.ensureOpen();

    const secret = generateSecret(this.secretBytes);
    this.secret = Buffer.from(secret, 'utf-8');
    this._code = encodeRendezvous({
      address: mapping.publicAddress,
      port: mapping.externalPort,
      secret,
    });
    return this._code;
  }

  /**
   * Stop sharing. Safe to call at any time and more than once.
   */
  stop(): void {
    if (this.closed) {
      return;
    }
    this.stoppedByUser = true;
    this.closed = true;
    logger.info(TAG, `Stopping session ${this.sessionId}`);

    this.server?.close();

    for (const socket of this.pending) {
      socket.destroy();
    }
    this.pending = [];
    this.current?.destroy();
    this.wakeAcceptor(null);

    if (this._state === 'idle') {
      this.setState('closed');
      this.emit('closed');
      this.resolveFinished();
    }
  }

  /**
   * Resolves once the session is closed and its port released
   */
  wait(): Promise<void> {
    return this.finished;
  }

  private async run(): Promise<void> {
    while (!this.closed) {
      const socket = await this.nextConnection();
      if (!socket) {
        break;
      }
      await this.handle(socket);
    }
    await this.finish();
  }

  private async handle(socket: Socket): Promise<void> {
    const remote = `${socket.remoteAddress}:${socket.remotePort}`;
    this.current = socket;
    this.setState('authenticating');

    try {
      const bytes = await serveConnection(socket, {
        secret: this.secret,
        payload: this.payload,
        idleTimeoutMs: this.idleTimeoutMs,
        onAuthenticated: () => this.setState('serving'),
      });
      logger.info(TAG, `Sent ${bytes} bytes to ${remote}`);
      this.emit('served', { remoteAddress: remote, bytes });
    } catch (err) {
      const error = toError(err);
      if (this.stoppedByUser) {
        logger.debug(TAG, `Connection from ${remote} interrupted by stop`);
      } else if (error instanceof AuthenticationMismatch) {
        this._status = 'Authentication from remote peer failed.';
        logger.warn(TAG, `Rejected ${remote}: ${error.message}`);
        this.emit('rejected', remote, error);
      } else {
        this._status = `Error during transfer: ${error.message}`;
        logger.error(TAG, `Transfer to ${remote} failed:`, error);
      }
    } finally {
      this.current = null;
      if (!this.closed) {
        this.setState('listening');
      }
    }
  }

  private listen(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => this.enqueue(socket));

      const onError = (err: NodeJS.ErrnoException) => reject(classifyListenError(err, this.port));
      server.once('error', onError);

      server.listen({ port: this.port, host: this.bindHost, backlog: SHARE.BACKLOG }, () => {
        server.off('error', onError);
        server.on('error', (err) => this.fail(err));
        this.listenerClosed = new Promise((closed) => {
          server.once('close', () => {
            this.onListenerClosed();
            closed();
          });
        });
        resolve(server);
      });
    });
  }

  private boundPort(): number {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      throw new ShareError('Listener has no TCP address', ShareErrorCode.BindFailed);
    }
    return address.port;
  }

  private enqueue(socket: Socket): void {
    const remote = `${socket.remoteAddress}:${socket.remotePort}`;
    socket.on('error', (err) => logger.debug(TAG, `Socket error from ${remote}:`, err));

    if (this.closed || this._state === 'mapping') {
      socket.destroy();
      return;
    }

    if (this.acceptWaiter) {
      this.wakeAcceptor(socket);
    } else if (this.pending.length < SHARE.BACKLOG) {
      logger.debug(TAG, `Queued connection from ${remote}`);
      this.pending.push(socket);
      socket.once('close', () => {
        this.pending = this.pending.filter((queued) => queued !== socket);
      });
    } else {
      logger.warn(TAG, `Dropping connection from ${remote}: too many waiting`);
      socket.destroy();
    }
  }

  private nextConnection(): Promise<Socket | null> {
    const queued = this.pending.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.acceptWaiter = resolve;
    });
  }

  private wakeAcceptor(socket: Socket | null): void {
    const waiter = this.acceptWaiter;
    this.acceptWaiter = null;
    waiter?.(socket);
  }

  private onListenerClosed(): void {
    if (this.stoppedByUser) {
      logger.debug(TAG, 'Listener closed by stop');
      return;
    }
    if (!this.closed) {
      this.fail(new Error('Listener closed unexpectedly'));
    }
  }

  /**
   * A listener-level failure ends the session
   */
  private fail(err: Error): void {
    this._status = `Session ended: ${err.message}`;
    logger.error(TAG, `Session ${this.sessionId} failed:`, err);
    this.emit('failed', err);

    if (!this.closed) {
      this.closed = true;
      this.server?.close();
      this.current?.destroy();
      for (const socket of this.pending) {
        socket.destroy();
      }
      this.pending = [];
      this.wakeAcceptor(null);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new ShareError('Session was stopped while starting', ShareErrorCode.SessionClosed);
    }
  }

  private finish(): Promise<void> {
    if (!this.teardown) {
      this.teardown = this.release();
    }
    return this.teardown;
  }

  private async release(): Promise<void> {
    // 'close' fires once the last connection is gone
    if (this.server) {
      if (this.server.listening) {
        this.server.close();
      }
      await this.listenerClosed;
    }

    if (this._mapping) {
      await this.mapper.release();
    }

    this.setState('closed');
    logger.info(TAG, `Session ${this.sessionId} closed`);
    this.emit('closed');
    this.resolveFinished();
  }

  private setState(state: SessionState): void {
    if (state === this._state) {
      return;
    }
    const previous = this._state;
    this._state = state;
    this.emit('stateChange', state, previous);
  }
}
