import fs from 'fs/promises';
import type net from 'net';
import type { UnixPeerIdentity } from '../connection.ts';
import { getConfig } from '../../config.ts';
import { ListenerSetupError } from '../errors.ts';
import { createLogger, formatError, type Logger } from '../../utils/logger.ts';
import {
  ensureSecureSocketDir,
  isNamedPipePath,
  removeStaleSocket,
  verifySocketNode,
  withUmask,
} from './socket-fs.ts';
import {
  closeServer,
  createAcceptServer,
  listenServer,
  type AcceptHandler,
  type TransportAdapter,
} from './types.ts';

export type PeerCredentials = Pick<UnixPeerIdentity, 'pid' | 'uid' | 'gid'>;

/**
 * Resolves the kernel-supplied credentials of the process on the other end
 * of a Unix domain socket.
 */
export type PeerCredentialLookup = (socket: net.Socket) => PeerCredentials;

/**
 * Node exposes no SO_PEERCRED; without a platform-specific lookup the
 * credentials are unknown.
 */
export const unknownPeerCredentials: PeerCredentialLookup = () => ({
  pid: null,
  uid: null,
  gid: null,
});

export interface UnixSocketTransportOptions {
  /** Absolute path of the socket node. */
  path: string;
  /** Mode applied to the socket node after bind (default 0600, 0 to skip). */
  chmod?: number;
  /** Mode enforced on the parent directory (default 0700). */
  secureDirMode?: number;
  /** Umask in effect while binding (default 0177). */
  umaskDuringListen?: number;
  /** Remove the socket node on close (default true). */
  unlinkOnClose?: boolean;
  /** Listen backlog (default IPCD_LISTEN_BACKLOG, else 128). */
  backlog?: number;
  /** Source of the peer's pid/uid/gid. Without one they are reported as null. */
  credentials?: PeerCredentialLookup;
  logger?: Logger;
}

/**
 * Unix domain socket transport with secure defaults: owned 0700 parent
 * directory, safe pre-bind cleanup, restrictive umask and chmod, and
 * unlink-on-close.
 */
export class UnixSocketTransport implements TransportAdapter {
  readonly kind = 'unix';
  readonly path: string;
  private server: net.Server | null = null;
  private readonly log: Logger;
  private readonly credentials: PeerCredentialLookup;

  constructor(private readonly options: UnixSocketTransportOptions) {
    if (!options.path) {
      throw new ListenerSetupError('unix socket', 'no socket path provided');
    }
    this.path = options.path;
    this.log = options.logger ?? createLogger('IPC');
    this.credentials = options.credentials ?? unknownPeerCredentials;
  }

  describe(): string {
    return `unix:${this.path}`;
  }

  async listen(onAccept: AcceptHandler): Promise<void> {
    if (this.server) {
      throw new ListenerSetupError(this.describe(), 'already listening');
    }

    // Secure parent directory BEFORE any unlink
    try {
      await ensureSecureSocketDir(this.path, this.log, this.options.secureDirMode ?? 0o700);
      await removeStaleSocket(this.path, this.log);
    } catch (err) {
      throw new ListenerSetupError(this.describe(), err);
    }

    const server = createAcceptServer(onAccept);
    await withUmask(this.options.umaskDuringListen ?? 0o177, this.log, () =>
      listenServer(
        server,
        { path: this.path, backlog: this.options.backlog ?? getConfig().listenBacklog },
        this.describe(),
        this.log,
      ),
    );
    this.server = server;

    const chmodMode = this.options.chmod ?? 0o600;
    if (!isNamedPipePath(this.path) && chmodMode > 0) {
      try {
        await fs.chmod(this.path, chmodMode);
      } catch (err) {
        this.log.warn(`Could not set socket permissions on ${this.path}: ${formatError(err)}`);
      }
    }
    await verifySocketNode(this.path, this.log);
    this.log.debug(`Listening on ${this.describe()}`);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await closeServer(server);
    if (this.options.unlinkOnClose !== false) {
      await removeStaleSocket(this.path, this.log);
    }
    this.log.debug(`Closed ${this.describe()}`);
  }

  extractIdentity(socket: net.Socket): UnixPeerIdentity {
    return { transport: 'unix', path: this.path, ...this.credentials(socket) };
  }
}
