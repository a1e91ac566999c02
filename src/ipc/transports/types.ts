import net from 'net';
import type { ConnectionIdentity } from '../connection.ts';
import { ListenerSetupError } from '../errors.ts';
import { formatError, type Logger } from '../../utils/logger.ts';
import { isDisconnectError } from '../io.ts';

export type AcceptHandler = (socket: net.Socket) => void;

/**
 * Transport capability consumed by the server core. The core only ever holds
 * this interface, never a concrete transport.
 */
export interface TransportAdapter {
  readonly kind: ConnectionIdentity['transport'];
  /** Bind and start accepting. Rejects with ListenerSetupError when the endpoint is unusable. */
  listen(onAccept: AcceptHandler): Promise<void>;
  /** Stop accepting and release transport resources. Safe to call when not listening. */
  close(): Promise<void>;
  /** Peer identity of an accepted socket. */
  extractIdentity(socket: net.Socket): ConnectionIdentity;
  /** Human-readable endpoint, e.g. for log lines. */
  describe(): string;
}

/**
 * Create a net.Server that half-closes: the session can still write replies
 * after the client ended its side.
 */
export function createAcceptServer(onAccept: AcceptHandler): net.Server {
  const server = net.createServer({ allowHalfOpen: true });
  server.on('connection', onAccept);
  return server;
}

/**
 * Listen on `target`. Errors before the bind completes reject as
 * ListenerSetupError; later server errors are logged and accepting continues.
 */
export function listenServer(
  server: net.Server,
  target: net.ListenOptions,
  description: string,
  log: Logger,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSetupError = (err: Error): void => {
      reject(new ListenerSetupError(description, err));
    };
    server.once('error', onSetupError);
    try {
      server.listen(target, () => {
        server.off('error', onSetupError);
        server.on('error', (err: Error) => {
          if (isDisconnectError(err)) return;
          log.error(`Accept error on ${description}: ${formatError(err)}`);
        });
        resolve();
      });
    } catch (err) {
      server.off('error', onSetupError);
      reject(new ListenerSetupError(description, err));
    }
  });
}

export function closeServer(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err && !('code' in err && err.code === 'ERR_SERVER_NOT_RUNNING')) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
