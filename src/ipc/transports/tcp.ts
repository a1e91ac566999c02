import type net from 'net';
import type { TcpPeerIdentity } from '../connection.ts';
import { getConfig } from '../../config.ts';
import { ListenerSetupError } from '../errors.ts';
import { createLogger, type Logger } from '../../utils/logger.ts';
import {
  closeServer,
  createAcceptServer,
  listenServer,
  type AcceptHandler,
  type TransportAdapter,
} from './types.ts';

export interface TcpTransportOptions {
  /** Interface to bind (default 127.0.0.1). */
  host?: string;
  /** Port to bind; 0 picks an ephemeral port (default 0). */
  port?: number;
  /** Listen backlog (default IPCD_LISTEN_BACKLOG, else 128). */
  backlog?: number;
  logger?: Logger;
}

/** TCP transport for trusted networks. Identity is the pair of socket addresses. */
export class TcpTransport implements TransportAdapter {
  readonly kind = 'tcp';
  readonly host: string;
  private server: net.Server | null = null;
  private readonly log: Logger;

  constructor(private readonly options: TcpTransportOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.log = options.logger ?? createLogger('IPC');
  }

  /** Bound port; the requested one until listening. */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return this.options.port ?? 0;
  }

  describe(): string {
    return `tcp:${this.host}:${this.port}`;
  }

  async listen(onAccept: AcceptHandler): Promise<void> {
    if (this.server) {
      throw new ListenerSetupError(this.describe(), 'already listening');
    }
    const server = createAcceptServer(onAccept);
    await listenServer(
      server,
      {
        host: this.host,
        port: this.options.port ?? 0,
        backlog: this.options.backlog ?? getConfig().listenBacklog,
      },
      this.describe(),
      this.log,
    );
    this.server = server;
    this.log.debug(`Listening on ${this.describe()}`);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    const description = this.describe();
    this.server = null;
    await closeServer(server);
    this.log.debug(`Closed ${description}`);
  }

  extractIdentity(socket: net.Socket): TcpPeerIdentity {
    return {
      transport: 'tcp',
      remoteAddress: socket.remoteAddress ?? '',
      remotePort: socket.remotePort ?? 0,
      localAddress: socket.localAddress ?? '',
      localPort: socket.localPort ?? 0,
    };
  }
}
