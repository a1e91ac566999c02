import { describe, it, expect } from 'vitest';
import { abortable, isDisconnectError, isStaleWriteError, toBytes } from '../../src/ipc/io.ts';
import {
  IPCError,
  ListenerSetupError,
  MessageLimitExceededError,
  SessionCancelledError,
  isIPCError,
} from '../../src/ipc/errors.ts';

describe('payload serialization', () => {
  it('sends strings and numbers as UTF-8 text', () => {
    expect(toBytes('héllo').toString('hex')).toBe('68c3a96c6c6f');
    expect(toBytes(42).toString()).toBe('42');
  });

  it('passes bytes through', () => {
    const buf = Buffer.from([1, 2, 3]);
    expect(toBytes(buf)).toBe(buf);
    expect([...toBytes(new Uint8Array([4, 5]))]).toEqual([4, 5]);
  });
});

describe('abortable', () => {
  it('settles like the wrapped promise', async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.resolve('ok'), controller.signal)).resolves.toBe('ok');
    await expect(abortable(Promise.reject(new Error('nope')), controller.signal)).rejects.toThrow('nope');
  });

  it('rejects as cancelled when the signal fires first', async () => {
    const controller = new AbortController();
    const never = new Promise<void>(() => {});
    const wrapped = abortable(never, controller.signal);
    controller.abort('stop');
    await expect(wrapped).rejects.toBeInstanceOf(SessionCancelledError);
  });

  it('rejects immediately for an already aborted signal', async () => {
    await expect(abortable(Promise.resolve(1), AbortSignal.abort())).rejects.toThrow(/Session cancelled/);
  });
});

describe('error taxonomy', () => {
  it('classifies peer disconnects by code', () => {
    const reset = Object.assign(new Error('reset'), { code: 'ECONNRESET' });
    const refused = Object.assign(new Error('refused'), { code: 'ECONNREFUSED' });
    expect(isDisconnectError(reset)).toBe(true);
    expect(isDisconnectError(refused)).toBe(false);
    expect(isDisconnectError('ECONNRESET')).toBe(false);
  });

  it('classifies writes to our own ended socket separately from peer disconnects', () => {
    const afterEnd = Object.assign(new Error('write after end'), { code: 'ERR_STREAM_WRITE_AFTER_END' });
    const destroyed = Object.assign(new Error('destroyed'), { code: 'ERR_STREAM_DESTROYED' });
    expect(isStaleWriteError(afterEnd)).toBe(true);
    expect(isStaleWriteError(destroyed)).toBe(true);
    expect(isDisconnectError(afterEnd)).toBe(false);
    expect(isStaleWriteError(Object.assign(new Error('pipe'), { code: 'EPIPE' }))).toBe(false);
  });

  it('describes limit violations with both sizes', () => {
    const err = new MessageLimitExceededError(10, 11);
    expect(err.message).toBe('Message length 11 bytes exceeds set limit of 10 bytes');
    expect(err.kind).toBe('message-limit-exceeded');
    expect(isIPCError(err)).toBe(true);
  });

  it('keeps the cause of a listener setup failure', () => {
    const cause = new Error('EADDRINUSE');
    const err = new ListenerSetupError('tcp:127.0.0.1:1', cause);
    expect(err).toBeInstanceOf(IPCError);
    expect(err.message).toBe('Cannot listen on tcp:127.0.0.1:1 (EADDRINUSE)');
    expect(err.cause).toBe(cause);
  });
});
