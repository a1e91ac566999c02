import { createLogger, type Logger } from '../utils/logger.ts';

/** A running session as tracked by the pool. */
export interface TrackedSession {
  controller: AbortController;
  task: Promise<unknown>;
}

/**
 * Bounded registry of concurrently running sessions.
 *
 * Admission is a synchronous check-and-reserve, so no suspension point can
 * separate the capacity check from taking the slot. A reservation becomes a
 * tracked session via `register`, or is handed back with `release`.
 */
export class ConnectionPool {
  readonly capacity: number;
  private readonly sessions = new Map<string, TrackedSession>();
  private reserved = 0;
  private readonly log: Logger;

  constructor(maxConnections?: number, logger: Logger = createLogger('POOL')) {
    if (maxConnections !== undefined && (!Number.isInteger(maxConnections) || maxConnections < 0)) {
      throw new RangeError(`maxConnections must be a non-negative integer, got ${maxConnections}`);
    }
    this.capacity = maxConnections ?? Number.POSITIVE_INFINITY;
    this.log = logger;
  }

  /**
   * Reserve a slot for a new session.
   *
   * @returns false, without side effects, when the pool is full.
   */
  admit(): boolean {
    if (this.isFull()) return false;
    this.reserved++;
    return true;
  }

  /** Give back a reservation that never became a session. */
  release(): void {
    this.reserved = Math.max(0, this.reserved - 1);
  }

  /** Track a running session under `handle`, consuming one reservation. */
  register(handle: string, session: TrackedSession): void {
    if (this.sessions.has(handle)) {
      throw new Error(`Session ${handle} is already registered`);
    }
    if (this.reserved > 0) {
      this.reserved--;
    } else if (this.isFull()) {
      throw new Error(`Cannot register session ${handle}: pool is at capacity ${this.capacity}`);
    }
    this.sessions.set(handle, session);
    this.log.debug(`Registered session ${handle} (${this.size()}/${this.capacity})`);
  }

  /** Stop tracking `handle`. Safe to call more than once. */
  deregister(handle: string): void {
    if (this.sessions.delete(handle)) {
      this.log.debug(`Deregistered session ${handle} (${this.size()}/${this.capacity})`);
    }
  }

  /**
   * Request cancellation of every tracked session. Returns once all aborts
   * were issued; completion shows up as deregistration.
   */
  cancelAll(reason: unknown = new Error('Connection pool shutting down')): void {
    for (const [handle, session] of this.sessions) {
      if (!session.controller.signal.aborted) {
        this.log.debug(`Cancelling session ${handle}`);
        session.controller.abort(reason);
      }
    }
  }

  /** Resolve once every currently tracked session task has settled. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.sessions.values()].map((s) => s.task));
  }

  has(handle: string): boolean {
    return this.sessions.has(handle);
  }

  handles(): string[] {
    return [...this.sessions.keys()];
  }

  isFull(): boolean {
    return this.size() >= this.capacity;
  }

  size(): number {
    return this.sessions.size + this.reserved;
  }
}
