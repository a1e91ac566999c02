import type net from 'net';
import { finished } from 'stream/promises';
import { SessionCancelledError } from './errors.ts';

export type Payload = string | number | Uint8Array;

/** Serialize an outbound payload to bytes. Strings and numbers are sent as UTF-8 text. */
export function toBytes(payload: Payload): Buffer {
  if (typeof payload === 'string') return Buffer.from(payload, 'utf8');
  if (typeof payload === 'number') return Buffer.from(String(payload), 'utf8');
  return Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
}

/**
 * Reject with SessionCancelledError as soon as `signal` aborts, otherwise
 * settle like `promise`.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new SessionCancelledError(signal.reason));
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new SessionCancelledError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/** Write `data` and resolve once it has been flushed to the socket. */
export function writeAndFlush(socket: net.Socket, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Signal end-of-output and wait until all pending writes are flushed, or
 * `timeoutMs` elapses.
 */
export async function endOutput(socket: net.Socket, timeoutMs: number): Promise<void> {
  if (socket.destroyed) return;
  if (!socket.writableEnded) socket.end();
  if (socket.writableFinished) return;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Output flush did not finish within ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    await Promise.race([finished(socket, { readable: false }), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** True for errors a peer causes by simply going away. */
export function isDisconnectError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  return code === 'ECONNRESET' || code === 'EPIPE' || code === 'ERR_STREAM_PREMATURE_CLOSE';
}

/** True for write errors raised because our own side already ended or destroyed the socket. */
export function isStaleWriteError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  return code === 'ERR_STREAM_WRITE_AFTER_END' || code === 'ERR_STREAM_DESTROYED';
}
