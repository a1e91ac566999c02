/**
 * Error taxonomy for the IPC server.
 *
 * Only `ListenerSetupError` reaches the caller of `IPCServer#listen()`. The
 * per-session errors are contained in the session task and surface as a
 * `SessionOutcome`; `StaleConnectionError` is reported by `sendMessage`.
 */

export type IPCErrorKind =
  | 'listener-setup'
  | 'authentication-rejected'
  | 'message-limit-exceeded'
  | 'stale-connection'
  | 'cancelled'
  | 'timeout';

export class IPCError extends Error {
  constructor(
    public readonly kind: IPCErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IPCError';
  }
}

export class ListenerSetupError extends IPCError {
  constructor(target: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : 'unknown';
    super('listener-setup', `Cannot listen on ${target} (${reason})`, { cause });
    this.name = 'ListenerSetupError';
  }
}

export class AuthenticationRejectedError extends IPCError {
  constructor(connectionId: string) {
    super('authentication-rejected', `Connection ${connectionId} failed authentication`);
    this.name = 'AuthenticationRejectedError';
  }
}

export class MessageLimitExceededError extends IPCError {
  constructor(
    public readonly limit: number,
    public readonly received: number,
  ) {
    super(
      'message-limit-exceeded',
      `Message length ${received} bytes exceeds set limit of ${limit} bytes`,
    );
    this.name = 'MessageLimitExceededError';
  }
}

export class StaleConnectionError extends IPCError {
  constructor(connectionId: string) {
    super('stale-connection', `Connection ${connectionId} is closing or closed`);
    this.name = 'StaleConnectionError';
  }
}

export class SessionCancelledError extends IPCError {
  constructor(reason?: unknown) {
    super('cancelled', `Session cancelled${reason ? ` (${describeReason(reason)})` : ''}`);
    this.name = 'SessionCancelledError';
  }
}

export class IPCTimeoutError extends IPCError {
  constructor(timeoutMs: number) {
    super('timeout', `IPC request timeout after ${timeoutMs}ms`);
    this.name = 'IPCTimeoutError';
  }
}

function describeReason(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

export function isIPCError(err: unknown): err is IPCError {
  return err instanceof IPCError;
}
