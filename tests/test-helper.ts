import path from 'path';
import fs from 'fs/promises';
import net from 'net';
import os from 'os';
import { setTimeout as delay } from 'timers/promises';
import { IPCServer, type IPCServerOptions } from '../src/ipc/server.ts';
import type { Message } from '../src/ipc/message.ts';
import type { SessionOutcome } from '../src/ipc/session.ts';
import { UnixSocketTransport } from '../src/ipc/transports/unix.ts';
import { silentLogger } from '../src/utils/logger.ts';

export interface TestContext {
  dir: string;
  socketPath: (name?: string) => string;
  cleanup: () => Promise<void>;
}

/**
 * Creates an isolated temporary directory for socket nodes.
 */
export async function createTestEnvironment(): Promise<TestContext> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ipcd-test-'));
  return {
    dir,
    socketPath: (name = 'server.sock') => path.join(dir, name),
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Poll `predicate` until it holds or `timeoutMs` elapses.
 */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 5000,
  intervalMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await delay(intervalMs);
  }
}

export interface RawClient {
  socket: net.Socket;
  /** Resolves with everything the server sent once it closes the connection. */
  reply: Promise<Buffer>;
}

/**
 * Open a half-closable client connection and start collecting the reply.
 */
export function connectRaw(target: string | { port: number; host?: string }): Promise<RawClient> {
  return new Promise((resolve, reject) => {
    const socket =
      typeof target === 'string'
        ? net.connect({ path: target, allowHalfOpen: true })
        : net.connect({ host: target.host ?? '127.0.0.1', port: target.port, allowHalfOpen: true });
    const chunks: Buffer[] = [];
    const reply = new Promise<Buffer>((resolveReply) => {
      socket.on('data', (data: Buffer) => chunks.push(data));
      socket.on('close', () => resolveReply(Buffer.concat(chunks)));
      socket.on('end', () => resolveReply(Buffer.concat(chunks)));
    });
    // Resets from a server that dropped the connection show up as a short reply
    socket.on('error', () => undefined);
    socket.once('connect', () => {
      socket.off('error', reject);
      resolve({ socket, reply });
    });
    socket.once('error', reject);
  });
}

/**
 * Write each part (pausing `gapMs` between them), end the write side and
 * return the full reply.
 */
export async function exchange(
  target: string | { port: number; host?: string },
  parts: Array<string | Buffer>,
  gapMs = 0,
): Promise<Buffer> {
  const client = await connectRaw(target);
  for (const [i, part] of parts.entries()) {
    if (i > 0 && gapMs > 0) await delay(gapMs);
    client.socket.write(part);
  }
  client.socket.end();
  return client.reply;
}

export interface RunningServer {
  server: IPCServer;
  socketPath: string;
  messages: Message[];
  outcomes: SessionOutcome[];
}

/**
 * Start an IPCServer on a Unix socket with quiet logging and no close delay,
 * recording every message and session outcome.
 */
export async function startUnixServer(
  socketPath: string,
  options: Omit<IPCServerOptions, 'transport'> = {},
): Promise<RunningServer> {
  const messages: Message[] = [];
  const outcomes: SessionOutcome[] = [];
  const server = new IPCServer({
    closeDelayMs: 0,
    logger: silentLogger,
    ...options,
    transport: new UnixSocketTransport({ path: socketPath, logger: silentLogger }),
    onMessage: async (message) => {
      messages.push(message);
      await options.onMessage?.(message);
    },
    onSessionEnd: (outcome) => {
      outcomes.push(outcome);
      options.onSessionEnd?.(outcome);
    },
  });
  await server.listen();
  return { server, socketPath, messages, outcomes };
}
