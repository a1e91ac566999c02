/**
 * Per-connection session engine.
 *
 * Drives one connection through AUTHENTICATING -> FRAMING -> CLOSING -> CLOSED:
 * runs the authentication hook, handles any leading command frames, frames
 * the inbound bytes according to `connection.mode`, then closes the socket.
 * Every failure stays inside the session and is reported as a SessionOutcome.
 */

import { setTimeout as delay } from 'timers/promises';
import { COMMAND_HEADER_BYTES, CommandCode, couldBeCommandPrefix, encodeCommand, parseCommand } from './command.ts';
import { Connection, ConnectionMode } from './connection.ts';
import {
  AuthenticationRejectedError,
  MessageLimitExceededError,
  SessionCancelledError,
} from './errors.ts';
import { abortable, endOutput, isDisconnectError, writeAndFlush } from './io.ts';
import { Message } from './message.ts';
import { formatError, type Logger } from '../utils/logger.ts';

const FLUSH_TIMEOUT_MS = 5000;

export interface SessionHooks {
  authenticate: (connection: Connection) => boolean | Promise<boolean>;
  handleMessage: (message: Message) => void | Promise<void>;
}

export interface SessionOptions {
  /** Max bytes for one TEXT_DATA message or one PERSISTENT line. */
  readLimit?: number;
  /** Max bytes per read, and per STREAM_DATA message. */
  chunkSize: number;
  /** Pause between the final flush and destroying the socket. */
  closeDelayMs: number;
  /** Cancellation for this session, owned by the connection pool. */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * How a session ended. `rejected` is only produced by the server, for
 * connections turned away because the pool was full.
 */
export type SessionStatus =
  | 'completed'
  | 'rejected'
  | 'unauthenticated'
  | 'limit-exceeded'
  | 'cancelled'
  | 'failed';

export interface SessionOutcome {
  status: SessionStatus;
  /** Null when the connection was rejected before a Connection was built. */
  connection: Connection | null;
  /** Number of messages handed to the message handler. */
  messages: number;
  error?: Error;
}

/**
 * Run the full session for `connection`. Never rejects.
 */
export async function runSession(
  connection: Connection,
  hooks: SessionHooks,
  options: SessionOptions,
): Promise<SessionOutcome> {
  const { signal, logger: log } = options;
  let messages = 0;

  const deliver = async (data: Buffer): Promise<void> => {
    if (signal.aborted) throw new SessionCancelledError(signal.reason);
    connection.touch();
    messages++;
    await abortable(Promise.resolve(hooks.handleMessage(new Message(data, connection))), signal);
  };

  let outcome: SessionOutcome = { status: 'completed', connection, messages: 0 };
  try {
    connection.setPhase('authenticating');
    const accepted = await abortable(Promise.resolve(hooks.authenticate(connection)), signal);
    if (!accepted) {
      throw new AuthenticationRejectedError(connection.id);
    }
    log.debug(`Connection ${connection.id} authenticated (${connection.describePeer()})`);

    connection.setPhase('framing');
    await negotiateCommands(connection, options);
    await frameMessages(connection, options, deliver);
  } catch (err) {
    outcome = classifyFailure(connection, err, signal);
    logOutcome(log, outcome);
  } finally {
    await closeConnection(connection, options);
  }
  return { ...outcome, messages };
}

/**
 * Consume leading command frames. Stops at the first bytes that are not a
 * complete known header, leaving them unread for payload framing.
 */
async function negotiateCommands(connection: Connection, options: SessionOptions): Promise<void> {
  for (;;) {
    const head = await connection.reader.peek(COMMAND_HEADER_BYTES, couldBeCommandPrefix);
    const code = parseCommand(head);
    if (!code) return;
    connection.reader.skip(COMMAND_HEADER_BYTES);
    connection.touch();
    await handleCommand(code, connection, options);
  }
}

async function handleCommand(
  code: CommandCode,
  connection: Connection,
  options: SessionOptions,
): Promise<void> {
  const log = options.logger;
  switch (code) {
    case CommandCode.PING:
      log.debug(`PING from ${connection.id}`);
      if (connection.isWritable) {
        await abortable(writeAndFlush(connection.socket, encodeCommand(CommandCode.PONG)), options.signal);
      }
      return;
    case CommandCode.PONG:
      log.debug(`PONG from ${connection.id}`);
      return;
    case CommandCode.SET_STREAM:
      connection.setMode(ConnectionMode.STREAM_DATA);
      log.debug(`Connection ${connection.id} switched to stream framing`);
      return;
    case CommandCode.SET_DATA:
      connection.setMode(ConnectionMode.TEXT_DATA);
      log.debug(`Connection ${connection.id} switched to discrete framing`);
      return;
  }
}

async function frameMessages(
  connection: Connection,
  options: SessionOptions,
  deliver: (data: Buffer) => Promise<void>,
): Promise<void> {
  switch (connection.mode) {
    case ConnectionMode.TEXT_DATA:
      return readDiscrete(connection, options, deliver);
    case ConnectionMode.STREAM_DATA:
      return readChunks(connection, options, deliver);
    case ConnectionMode.PERSISTENT:
      return readLines(connection, options, deliver);
  }
}

/** One message per connection: everything up to end-of-stream. */
async function readDiscrete(
  connection: Connection,
  options: SessionOptions,
  deliver: (data: Buffer) => Promise<void>,
): Promise<void> {
  const { reader } = connection;
  const parts: Buffer[] = [];
  let total = 0;
  for (;;) {
    const chunk = await reader.read(options.chunkSize);
    if (chunk.length === 0) break;
    total += chunk.length;
    if (options.readLimit !== undefined && total > options.readLimit) {
      throw new MessageLimitExceededError(options.readLimit, total);
    }
    parts.push(chunk);
  }
  reader.feedEof();
  if (total > 0) {
    await deliver(Buffer.concat(parts, total));
  }
}

/** One message per read, delivered immediately. */
async function readChunks(
  connection: Connection,
  options: SessionOptions,
  deliver: (data: Buffer) => Promise<void>,
): Promise<void> {
  for (;;) {
    const chunk = await connection.reader.read(options.chunkSize);
    if (chunk.length === 0) return;
    await deliver(chunk);
  }
}

/** Newline-delimited messages; an unterminated tail is delivered at end-of-stream. */
async function readLines(
  connection: Connection,
  options: SessionOptions,
  deliver: (data: Buffer) => Promise<void>,
): Promise<void> {
  const limit = options.readLimit;
  let pending: Buffer = Buffer.alloc(0);
  for (;;) {
    const chunk = await connection.reader.read(options.chunkSize);
    if (chunk.length === 0) break;
    pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;

    let newline = pending.indexOf(0x0a);
    while (newline !== -1) {
      const line = pending.subarray(0, newline);
      pending = pending.subarray(newline + 1);
      if (limit !== undefined && line.length > limit) {
        throw new MessageLimitExceededError(limit, line.length);
      }
      if (line.length > 0) await deliver(line);
      newline = pending.indexOf(0x0a);
    }
    if (limit !== undefined && pending.length > limit) {
      throw new MessageLimitExceededError(limit, pending.length);
    }
  }
  if (pending.length > 0) await deliver(pending);
}

/**
 * CLOSING -> CLOSED: end output, wait for the flush, give the peer
 * `closeDelayMs` to observe it, then release the socket. A cancelled session
 * skips the waits.
 */
async function closeConnection(connection: Connection, options: SessionOptions): Promise<void> {
  const { socket } = connection;
  connection.setPhase('closing');
  try {
    if (options.signal.aborted) {
      if (!socket.destroyed && !socket.writableEnded) socket.end();
    } else {
      await abortable(endOutput(socket, FLUSH_TIMEOUT_MS), options.signal);
      if (options.closeDelayMs > 0) {
        await delay(options.closeDelayMs, undefined, { signal: options.signal });
      }
    }
  } catch (err) {
    options.logger.debug(`Graceful close of ${connection.id} cut short: ${formatError(err)}`);
  } finally {
    connection.reader.dispose();
    socket.destroy();
    connection.setPhase('closed');
  }
}

function classifyFailure(connection: Connection, err: unknown, signal: AbortSignal): SessionOutcome {
  const error = err instanceof Error ? err : new Error(String(err));
  if (error instanceof AuthenticationRejectedError) {
    return { status: 'unauthenticated', connection, messages: 0, error };
  }
  if (error instanceof MessageLimitExceededError) {
    return { status: 'limit-exceeded', connection, messages: 0, error };
  }
  if (error instanceof SessionCancelledError || signal.aborted) {
    return { status: 'cancelled', connection, messages: 0, error };
  }
  return { status: 'failed', connection, messages: 0, error };
}

function logOutcome(log: Logger, outcome: SessionOutcome): void {
  const id = outcome.connection?.id ?? 'unknown';
  const reason = outcome.error ? formatError(outcome.error) : '';
  switch (outcome.status) {
    case 'unauthenticated':
    case 'cancelled':
      log.debug(`Session ${id} ${outcome.status}: ${reason}`);
      return;
    case 'limit-exceeded':
      log.warn(`Session ${id} closed: ${reason}`);
      return;
    default:
      if (isDisconnectError(outcome.error)) {
        log.debug(`Session ${id} peer disconnected: ${reason}`);
        return;
      }
      log.error(`Session ${id} failed: ${reason}`);
  }
}
