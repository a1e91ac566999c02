import net from 'net';
import { getConfig } from '../config.ts';
import { CommandCode, COMMAND_HEADER_BYTES, encodeCommand, parseCommand } from './command.ts';
import { IPCTimeoutError } from './errors.ts';
import { toBytes, type Payload } from './io.ts';

/** Where a server listens: a Unix socket path or a TCP host/port. */
export type Endpoint = { path: string } | { host?: string; port: number };

export interface SendOptions {
  /** Command frames written before the payload, e.g. `[CommandCode.SET_STREAM]`. */
  commands?: CommandCode[];
  /** Overall timeout for connect + exchange (default from IPCD_CONNECT_TIMEOUT_MS). */
  timeoutMs?: number;
  /** Budget for retrying ECONNREFUSED/ENOENT while the server comes up. */
  connectRetryBudgetMs?: number;
  signal?: AbortSignal;
}

export function describeEndpoint(endpoint: Endpoint): string {
  return 'path' in endpoint
    ? `unix:${endpoint.path}`
    : `tcp:${endpoint.host ?? '127.0.0.1'}:${endpoint.port}`;
}

function toConnectOptions(endpoint: Endpoint): net.NetConnectOpts {
  return 'path' in endpoint
    ? { path: endpoint.path, allowHalfOpen: true }
    : { host: endpoint.host ?? '127.0.0.1', port: endpoint.port, allowHalfOpen: true };
}

/**
 * Connect to `endpoint`, retrying transient ECONNREFUSED/ENOENT failures
 * until `budgetMs` runs out.
 */
export function connectWithRetry(endpoint: Endpoint, budgetMs: number): Promise<net.Socket> {
  const deadline = Date.now() + budgetMs;
  const attempt = (delayMs: number): Promise<net.Socket> =>
    new Promise((resolveAttempt, rejectAttempt) => {
      const socket = net.connect(toConnectOptions(endpoint));
      let settled = false;

      const onConnect = (): void => {
        if (settled) return;
        settled = true;
        cleanup();
        resolveAttempt(socket);
      };
      const onError = (err: NodeJS.ErrnoException): void => {
        if (settled) return;
        settled = true;
        cleanup();
        socket.destroy();
        // Retry only while the server may still be starting
        if (err.code === 'ECONNREFUSED' || err.code === 'ENOENT') {
          if (Date.now() >= deadline) {
            rejectAttempt(err);
            return;
          }
          const nextDelay = Math.min(100, Math.max(20, delayMs * 2));
          setTimeout(() => {
            attempt(nextDelay).then(resolveAttempt, rejectAttempt);
          }, nextDelay);
          return;
        }
        rejectAttempt(err);
      };
      const cleanup = (): void => {
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
      };

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });

  return attempt(20);
}

/**
 * Send one payload and collect the server's full reply.
 *
 * Writes the command frames and the payload, ends the write side (which
 * completes a TEXT_DATA message) and resolves with every byte the server
 * sent before closing.
 */
export async function sendPayload(
  endpoint: Endpoint,
  payload: Payload,
  opts: SendOptions = {},
): Promise<Buffer> {
  const timeoutMs = opts.timeoutMs ?? getConfig().connectTimeoutMs;
  if (opts.signal?.aborted) {
    throw new Error('Operation aborted');
  }

  const socket = await connectWithRetry(
    endpoint,
    opts.connectRetryBudgetMs ?? Math.min(1000, Math.max(100, Math.floor(timeoutMs / 4))),
  );

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (err: Error | null): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
      if (err) {
        socket.destroy();
        reject(err);
        return;
      }
      resolve(Buffer.concat(chunks));
    };
    const onAbort = (): void => finish(new Error('Operation aborted'));

    const timer = setTimeout(() => finish(new IPCTimeoutError(timeoutMs)), timeoutMs);
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    socket.on('data', (data: Buffer) => chunks.push(data));
    socket.on('end', () => {
      socket.end();
      finish(null);
    });
    socket.on('close', () => finish(null));
    socket.on('error', (err: Error) => finish(err));

    const frames = (opts.commands ?? []).map(encodeCommand);
    socket.end(Buffer.concat([...frames, toBytes(payload)]));
  });
}

/**
 * Send a PING command frame.
 *
 * @returns true when the reply starts with a PONG frame.
 */
export async function ping(endpoint: Endpoint, opts: Omit<SendOptions, 'commands'> = {}): Promise<boolean> {
  const reply = await sendPayload(endpoint, '', { ...opts, commands: [CommandCode.PING] });
  return parseCommand(reply.subarray(0, COMMAND_HEADER_BYTES)) === CommandCode.PONG;
}
