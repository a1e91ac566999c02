import type { Readable } from 'stream';
import { SessionCancelledError } from './errors.ts';

const DEFAULT_HIGH_WATER_MARK = 256 * 1024; // 256KB

export interface SocketReaderOptions {
  /** Aborting rejects the pending read and every later one with SessionCancelledError. */
  signal?: AbortSignal;
  /** Buffered byte count above which the underlying stream is paused. */
  highWaterMark?: number;
}

/**
 * Pull-style reader over the inbound side of a socket.
 *
 * Converts the stream's push events into awaitable `read`/`peek` calls so the
 * session can be written as a sequential loop. Only one read may be pending at
 * a time.
 */
export class SocketReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private consumed = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private reading = false;
  private paused = false;
  private readonly highWaterMark: number;

  constructor(
    private readonly stream: Readable,
    private readonly options: SocketReaderOptions = {},
  ) {
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    stream.on('data', this.onData);
    stream.on('end', this.onEnd);
    // A destroyed socket emits 'close' without 'end'
    stream.on('close', this.onEnd);
    stream.on('error', this.onError);
    options.signal?.addEventListener('abort', this.notify, { once: true });
  }

  /** True once end-of-stream was seen (or forced) and nothing is left buffered. */
  get atEof(): boolean {
    return (this.ended || this.consumed) && this.buffered === 0;
  }

  /** Bytes received but not yet consumed. */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /**
   * Read up to `max` bytes. Resolves as soon as any data is available.
   *
   * @returns The bytes read; an empty buffer means end-of-stream.
   */
  async read(max: number): Promise<Buffer> {
    if (!Number.isInteger(max) || max <= 0) {
      throw new RangeError(`read size must be a positive integer, got ${max}`);
    }
    return this.exclusive(async () => {
      for (;;) {
        this.throwIfAborted();
        if (this.buffered > 0 || this.isDrained()) break;
        await this.waitForInput();
      }
      if (this.buffered === 0) {
        if (this.failure) throw this.failure;
        return Buffer.alloc(0);
      }
      return this.take(max);
    });
  }

  /**
   * Look at the next `n` bytes without consuming them. Resolves early with
   * fewer bytes at end-of-stream, or when `keepWaiting` rejects the bytes
   * buffered so far.
   */
  async peek(n: number, keepWaiting: (head: Buffer) => boolean = () => true): Promise<Buffer> {
    return this.exclusive(async () => {
      for (;;) {
        this.throwIfAborted();
        const head = this.head(n);
        if (head.length >= n || this.isDrained() || !keepWaiting(head)) return head;
        await this.waitForInput();
      }
    });
  }

  /** Discard `n` already-buffered bytes. */
  skip(n: number): void {
    this.take(Math.min(n, this.buffered));
  }

  /**
   * Mark the inbound side fully consumed. Buffered and later bytes are
   * dropped and every further read reports end-of-stream.
   */
  feedEof(): void {
    this.consumed = true;
    this.chunks = [];
    this.buffered = 0;
    if (this.paused) {
      this.paused = false;
      this.stream.resume();
    }
    this.notify();
  }

  /** Detach from the stream and the abort signal. */
  dispose(): void {
    this.stream.off('data', this.onData);
    this.stream.off('end', this.onEnd);
    this.stream.off('close', this.onEnd);
    this.stream.off('error', this.onError);
    this.options.signal?.removeEventListener('abort', this.notify);
    this.notify();
  }

  private onData = (chunk: Buffer | string): void => {
    if (this.consumed) return;
    const buf = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (buf.length === 0) return;
    this.chunks.push(buf);
    this.buffered += buf.length;
    if (!this.paused && this.buffered >= this.highWaterMark) {
      this.paused = true;
      this.stream.pause();
    }
    this.notify();
  };

  private onEnd = (): void => {
    this.ended = true;
    this.notify();
  };

  private onError = (err: Error): void => {
    this.failure ??= err;
    this.notify();
  };

  private notify = (): void => {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  };

  private isDrained(): boolean {
    return this.ended || this.consumed || this.failure !== null;
  }

  private throwIfAborted(): void {
    const signal = this.options.signal;
    if (signal?.aborted) {
      throw new SessionCancelledError(signal.reason);
    }
  }

  private waitForInput(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
    });
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.reading) {
      throw new Error('SocketReader does not support concurrent reads');
    }
    this.reading = true;
    try {
      return await fn();
    } finally {
      this.reading = false;
    }
  }

  private head(n: number): Buffer {
    if (this.chunks.length === 0) return Buffer.alloc(0);
    const first = this.chunks[0];
    if (first.length >= n) return first.subarray(0, n);
    return Buffer.concat(this.chunks, Math.min(n, this.buffered));
  }

  private take(max: number): Buffer {
    const out: Buffer[] = [];
    let remaining = max;
    while (remaining > 0 && this.chunks.length > 0) {
      const first = this.chunks[0];
      if (first.length <= remaining) {
        out.push(first);
        this.chunks.shift();
        remaining -= first.length;
      } else {
        out.push(first.subarray(0, remaining));
        this.chunks[0] = first.subarray(remaining);
        remaining = 0;
      }
    }
    const taken = max - remaining;
    this.buffered -= taken;
    if (this.paused && this.buffered < this.highWaterMark) {
      this.paused = false;
      this.stream.resume();
    }
    return out.length === 1 ? out[0] : Buffer.concat(out, taken);
  }
}
