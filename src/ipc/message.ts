import type { Connection } from './connection.ts';

/**
 * A payload received from a client, together with the connection it came
 * from. `sender` is for replies and state inspection only; the session owns
 * the connection's lifetime.
 */
export class Message {
  readonly receivedAt: number;

  constructor(
    readonly data: Buffer,
    readonly sender: Connection,
  ) {
    this.receivedAt = Date.now();
    Object.freeze(this);
  }

  get byteLength(): number {
    return this.data.length;
  }

  text(encoding: BufferEncoding = 'utf8'): string {
    return this.data.toString(encoding);
  }
}
