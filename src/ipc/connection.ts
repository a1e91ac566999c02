import type net from 'net';
import { randomUUID } from 'crypto';
import { SocketReader } from './reader.ts';

/**
 * Framing discipline applied to a connection's inbound bytes.
 * - TEXT_DATA: one message per connection, everything up to end-of-stream.
 * - STREAM_DATA: one message per read, no assembly across reads.
 * - PERSISTENT: newline-delimited messages on a long-lived connection.
 */
export const ConnectionMode = {
  TEXT_DATA: 'text-data',
  STREAM_DATA: 'stream-data',
  PERSISTENT: 'persistent',
} as const;

export type ConnectionMode = (typeof ConnectionMode)[keyof typeof ConnectionMode];

export type SessionPhase = 'authenticating' | 'framing' | 'closing' | 'closed';

/**
 * Peer identity of a Unix domain socket client.
 *
 * Node has no API for the kernel's peer credentials (SO_PEERCRED). `pid`,
 * `uid` and `gid` stay null unless the transport is given a
 * `PeerCredentialLookup` that can read them, e.g. from a native addon.
 */
export interface UnixPeerIdentity {
  transport: 'unix';
  /** Filesystem path of the listening socket. */
  path: string;
  pid: number | null;
  uid: number | null;
  gid: number | null;
}

/** Peer identity of a TCP client. */
export interface TcpPeerIdentity {
  transport: 'tcp';
  remoteAddress: string;
  remotePort: number;
  localAddress: string;
  localPort: number;
}

export type ConnectionIdentity = UnixPeerIdentity | TcpPeerIdentity;

export interface ConnectionInit {
  socket: net.Socket;
  identity: ConnectionIdentity;
  mode: ConnectionMode;
  /** Session cancellation signal, threaded into the reader. */
  signal?: AbortSignal;
}

/**
 * One accepted client: transport identity, exclusively-owned I/O handles and
 * the mutable session record.
 */
export class Connection {
  readonly id: string;
  readonly identity: Readonly<ConnectionIdentity>;
  readonly socket: net.Socket;
  readonly reader: SocketReader;
  readonly createdAt: number;

  private _mode: ConnectionMode;
  private _phase: SessionPhase = 'authenticating';
  private _updatedAt: number;

  constructor(init: ConnectionInit) {
    this.id = randomUUID();
    this.identity = Object.freeze({ ...init.identity });
    this.socket = init.socket;
    this.reader = new SocketReader(init.socket, { signal: init.signal });
    this._mode = init.mode;
    this.createdAt = Date.now();
    this._updatedAt = this.createdAt;
  }

  get mode(): ConnectionMode {
    return this._mode;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  /** False once the session is closing, or the socket can no longer take writes. */
  get isWritable(): boolean {
    if (this._phase === 'closing' || this._phase === 'closed') return false;
    return !this.socket.destroyed && this.socket.writable && !this.socket.writableEnded;
  }

  setMode(mode: ConnectionMode): void {
    this._mode = mode;
    this.touch();
  }

  setPhase(phase: SessionPhase): void {
    this._phase = phase;
    this.touch();
  }

  touch(): void {
    this._updatedAt = Date.now();
  }

  /** Short human-readable peer description for log lines. */
  describePeer(): string {
    const id = this.identity;
    switch (id.transport) {
      case 'unix':
        return `unix:${id.path} pid=${id.pid ?? '?'} uid=${id.uid ?? '?'} gid=${id.gid ?? '?'}`;
      case 'tcp':
        return `tcp:${id.remoteAddress}:${id.remotePort}`;
    }
  }
}
