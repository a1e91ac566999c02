import fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import { formatError, type Logger } from '../../utils/logger.ts';

/** Windows named pipes (`\\.\pipe\...`) have no filesystem node to manage. */
export function isNamedPipePath(socketPath: string): boolean {
  return process.platform === 'win32' || socketPath.startsWith('\\\\.\\');
}

function currentUid(): number | undefined {
  return typeof process.getuid === 'function' ? process.getuid() : undefined;
}

/**
 * Ensure the socket's parent directory exists, is a real directory owned by
 * the current user, and carries `mode` (default 0700).
 *
 * Throws on any security issue. No-op for named pipes.
 */
export async function ensureSecureSocketDir(
  socketPath: string,
  log: Logger,
  mode = 0o700,
): Promise<void> {
  if (isNamedPipePath(socketPath)) return;

  const dir = path.dirname(socketPath);
  try {
    await fs.mkdir(dir, { recursive: true, mode });
  } catch (err) {
    throw new Error(`Failed to create socket directory '${dir}': ${formatError(err)}`);
  }

  // lstat to inspect the path without following symlinks
  let st: Stats;
  try {
    st = await fs.lstat(dir);
  } catch (err) {
    throw new Error(`Failed to stat socket directory '${dir}': ${formatError(err)}`);
  }
  if (st.isSymbolicLink()) {
    throw new Error(`Socket directory must not be a symlink: ${dir}`);
  }
  if (!st.isDirectory()) {
    throw new Error(`Socket parent is not a directory: ${dir}`);
  }

  const uid = currentUid();
  if (uid !== undefined && st.uid !== uid) {
    throw new Error(`Socket directory '${dir}' is owned by uid ${st.uid}, expected ${uid}`);
  }

  const currentMode = st.mode & 0o777;
  if (currentMode !== mode) {
    await fs.chmod(dir, mode);
    log.debug(
      `Tightened socket directory permissions: ${dir} (${currentMode.toString(8)} -> ${mode.toString(8)})`,
    );
  }
}

/**
 * Remove a stale socket node. Only sockets and symlinks are removed; any
 * other file at `socketPath` is an error so startup fails rather than
 * deleting arbitrary files.
 */
export async function removeStaleSocket(socketPath: string, log: Logger): Promise<void> {
  if (isNamedPipePath(socketPath)) return;

  let st: Stats;
  try {
    st = await fs.lstat(socketPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
    throw err;
  }
  if (!st.isSocket() && !st.isSymbolicLink()) {
    throw new Error(`Refusing to remove non-socket file at: ${socketPath}`);
  }
  await fs.unlink(socketPath);
  log.debug(`Removed stale socket path: ${socketPath}`);
}

/**
 * Post-bind check that the node is a socket owned by the current user.
 * Logs warnings only.
 */
export async function verifySocketNode(socketPath: string, log: Logger): Promise<void> {
  if (isNamedPipePath(socketPath)) return;
  try {
    const st = await fs.lstat(socketPath);
    if (!st.isSocket()) {
      log.warn(`Post-bind check: ${socketPath} is not a socket`);
    }
    const uid = currentUid();
    if (uid !== undefined && st.uid !== uid) {
      log.warn(`Post-bind ownership mismatch: ${socketPath} owned by uid ${st.uid}, expected ${uid}`);
    }
  } catch (err) {
    log.warn(`Post-bind verification failed for ${socketPath}: ${formatError(err)}`);
  }
}

/**
 * Run `fn` with a temporary process umask so the socket node is created with
 * restrictive permissions. Worker threads cannot change the umask; there the
 * post-bind chmod is the only enforcement.
 */
export async function withUmask<T>(mask: number, log: Logger, fn: () => Promise<T>): Promise<T> {
  let previous: number | undefined;
  try {
    previous = process.umask(mask);
  } catch (err) {
    log.debug(`Cannot set umask ${mask.toString(8)}: ${formatError(err)}`);
  }
  try {
    return await fn();
  } finally {
    if (previous !== undefined) process.umask(previous);
  }
}
