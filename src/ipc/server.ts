import type net from 'net';
import { resolveConfig, type IPCDConfig } from '../config.ts';
import { createLogger, formatError, type Logger } from '../utils/logger.ts';
import { Connection, ConnectionMode } from './connection.ts';
import { ListenerSetupError, StaleConnectionError } from './errors.ts';
import {
  endOutput,
  isDisconnectError,
  isStaleWriteError,
  toBytes,
  writeAndFlush,
  type Payload,
} from './io.ts';
import type { Message } from './message.ts';
import { ConnectionPool } from './pool.ts';
import { runSession, type SessionOutcome } from './session.ts';
import type { TransportAdapter } from './transports/types.ts';

const SEND_FLUSH_TIMEOUT_MS = 5000;

export type AuthenticateHook = (connection: Connection) => boolean | Promise<boolean>;
export type MessageHandler = (message: Message) => void | Promise<void>;

/** Config fields the server itself consumes; transports read the listen backlog. */
export type ServerTunables = Pick<
  IPCDConfig,
  'readLimit' | 'chunkSize' | 'maxConnections' | 'defaultMode' | 'closeDelayMs' | 'debug'
>;

export interface IPCServerOptions extends Partial<ServerTunables> {
  transport: TransportAdapter;
  /** Decide whether a connection may proceed. Defaults to accepting everyone. */
  authenticate?: AuthenticateHook;
  /** Consume one framed message. Defaults to a debug-level diagnostic echo. */
  onMessage?: MessageHandler;
  /** Observe how each session (or rejected connection) ended. */
  onSessionEnd?: (outcome: SessionOutcome) => void;
  logger?: Logger;
}

/** Result of `sendMessage`: stale or failing targets are reported, never thrown. */
export interface SendReport {
  delivered: Connection[];
  failed: Array<{ connection: Connection; error: Error }>;
}

/**
 * IPC server core: owns the listening transport and the connection pool,
 * turns accepted sockets into Connections and runs one session task per
 * admitted connection.
 *
 * `authenticate`, `handleMessage` and `buildConnection` are template hooks;
 * override them in a subclass or pass `authenticate`/`onMessage` as options.
 */
export class IPCServer {
  readonly config: IPCDConfig;
  readonly pool: ConnectionPool;
  protected readonly transport: TransportAdapter;
  protected readonly log: Logger;
  private readonly live = new Map<string, Connection>();
  private state: 'idle' | 'starting' | 'listening' | 'closing' | 'closed' = 'idle';
  private closePromise: Promise<void> | null = null;

  constructor(private readonly options: IPCServerOptions) {
    this.config = resolveConfig(options);
    this.transport = options.transport;
    this.log = options.logger ?? createLogger('IPC', { debug: this.config.debug });
    this.pool = new ConnectionPool(this.config.maxConnections, this.log);
  }

  get isListening(): boolean {
    return this.state === 'listening';
  }

  /** Endpoint description, e.g. `unix:/run/app.sock`. */
  get address(): string {
    return this.transport.describe();
  }

  /**
   * Start accepting connections.
   *
   * @throws ListenerSetupError when the transport cannot bind.
   */
  async listen(): Promise<this> {
    if (this.state !== 'idle') {
      throw new ListenerSetupError(this.transport.describe(), `server is ${this.state}`);
    }
    // Accepting starts as soon as the adapter has bound, before it resolves
    this.state = 'starting';
    try {
      await this.transport.listen((socket) => this.onAccept(socket));
    } catch (err) {
      this.state = 'idle';
      throw err instanceof ListenerSetupError
        ? err
        : new ListenerSetupError(this.transport.describe(), err);
    }
    if (this.closePromise) {
      // close() ran while the adapter was still binding
      await this.transport.close();
      throw new ListenerSetupError(this.transport.describe(), 'server closed during startup');
    }
    this.state = 'listening';
    this.log.info(`Listening on ${this.transport.describe()}`);
    return this;
  }

  /**
   * Cancel every session, wait for them to wind down, then release the
   * transport. Idempotent.
   */
  close(): Promise<void> {
    this.closePromise ??= this.shutdown();
    return this.closePromise;
  }

  private async shutdown(): Promise<void> {
    this.state = 'closing';
    this.pool.cancelAll(new Error('Server closing'));
    await this.pool.drain();
    try {
      await this.transport.close();
    } finally {
      this.state = 'closed';
      this.log.info(`Closed ${this.transport.describe()}`);
    }
  }

  /** Snapshot of connections with a running session. */
  connections(): Connection[] {
    return [...this.live.values()];
  }

  /**
   * Write `payload` to each target, wait for the flush, then end its output.
   * PERSISTENT connections stay open for further sends.
   */
  async sendMessage(payload: Payload, target: Connection | readonly Connection[]): Promise<SendReport> {
    const bytes = toBytes(payload);
    const targets = target instanceof Connection ? [target] : target;
    const report: SendReport = { delivered: [], failed: [] };

    await Promise.all(
      targets.map(async (connection) => {
        if (!connection.isWritable) {
          report.failed.push({ connection, error: new StaleConnectionError(connection.id) });
          return;
        }
        try {
          await writeAndFlush(connection.socket, bytes);
          if (connection.mode !== ConnectionMode.PERSISTENT) {
            await endOutput(connection.socket, SEND_FLUSH_TIMEOUT_MS);
          }
          connection.touch();
          report.delivered.push(connection);
        } catch (err) {
          const error = isStaleWriteError(err)
            ? new StaleConnectionError(connection.id)
            : err instanceof Error
              ? err
              : new Error(String(err));
          this.log.debug(`Send to ${connection.id} failed: ${error.message}`);
          report.failed.push({ connection, error });
        }
      }),
    );
    return report;
  }

  protected authenticate(connection: Connection): boolean | Promise<boolean> {
    return this.options.authenticate ? this.options.authenticate(connection) : true;
  }

  protected handleMessage(message: Message): void | Promise<void> {
    if (this.options.onMessage) return this.options.onMessage(message);
    this.log.debug(
      `Message from ${message.sender.describePeer()} (${message.byteLength} bytes): ${message.text()}`,
    );
  }

  protected buildConnection(socket: net.Socket, signal: AbortSignal): Connection {
    return new Connection({
      socket,
      identity: this.transport.extractIdentity(socket),
      mode: this.config.defaultMode,
      signal,
    });
  }

  /**
   * Accept path: admit into the pool or drop the socket without a handshake,
   * then launch the session task and track it until it settles.
   */
  protected onAccept(socket: net.Socket): void {
    socket.on('error', (err: Error) => {
      if (isDisconnectError(err) || isStaleWriteError(err)) return;
      this.log.error(`Socket error: ${formatError(err)}`);
    });

    const closing = this.state === 'closing' || this.state === 'closed';
    if (closing || !this.pool.admit()) {
      this.log.warn(
        closing
          ? 'Connection rejected: server is shutting down'
          : `Connection rejected: max connections ${this.pool.capacity} reached`,
      );
      socket.destroy();
      this.notifySessionEnd({ status: 'rejected', connection: null, messages: 0 });
      return;
    }

    const controller = new AbortController();
    let connection: Connection;
    try {
      connection = this.buildConnection(socket, controller.signal);
    } catch (err) {
      this.pool.release();
      socket.destroy();
      this.log.error(`Cannot build connection: ${formatError(err)}`);
      return;
    }

    const handle = connection.id;
    const task = runSession(
      connection,
      {
        authenticate: (c) => this.authenticate(c),
        handleMessage: (m) => this.handleMessage(m),
      },
      {
        readLimit: this.config.readLimit,
        chunkSize: this.config.chunkSize,
        closeDelayMs: this.config.closeDelayMs,
        signal: controller.signal,
        logger: this.log,
      },
    )
      .then((outcome) => this.notifySessionEnd(outcome))
      .finally(() => {
        this.pool.deregister(handle);
        this.live.delete(handle);
      });

    this.pool.register(handle, { controller, task });
    this.live.set(handle, connection);
    this.log.debug(`Session ${handle} started for ${connection.describePeer()}`);
  }

  private notifySessionEnd(outcome: SessionOutcome): void {
    if (!this.options.onSessionEnd) return;
    try {
      this.options.onSessionEnd(outcome);
    } catch (err) {
      this.log.error(`onSessionEnd observer threw: ${formatError(err)}`);
    }
  }
}
