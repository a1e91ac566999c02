import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { SocketReader } from '../../src/ipc/reader.ts';
import { SessionCancelledError } from '../../src/ipc/errors.ts';

describe('SocketReader', () => {
  it('returns buffered bytes up to the requested size', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.write('hello world');

    expect((await reader.read(5)).toString()).toBe('hello');
    expect(reader.bufferedBytes).toBe(6);
    expect((await reader.read(100)).toString()).toBe(' world');
  });

  it('waits for data that has not arrived yet', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    const pending = reader.read(10);
    stream.write('late');
    expect((await pending).toString()).toBe('late');
  });

  it('reports end-of-stream as an empty buffer', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.end('tail');

    expect((await reader.read(10)).toString()).toBe('tail');
    expect((await reader.read(10)).length).toBe(0);
    expect(reader.atEof).toBe(true);
  });

  it('peeks without consuming and skips explicitly', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.write('abcdef');

    expect((await reader.peek(3)).toString()).toBe('abc');
    expect(reader.bufferedBytes).toBe(6);
    reader.skip(3);
    expect((await reader.read(10)).toString()).toBe('def');
  });

  it('peek waits for more bytes until keepWaiting says stop', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.write('ab');

    const peeked = reader.peek(4, (head) => head.length < 3);
    stream.write('c');
    expect((await peeked).toString()).toBe('abc');
  });

  it('peek returns short at end-of-stream', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.end('xy');
    expect((await reader.peek(8)).toString()).toBe('xy');
  });

  it('feedEof drops buffered and later bytes', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.write('discard me');
    await reader.peek(1);

    reader.feedEof();
    stream.write('and me');
    expect(reader.atEof).toBe(true);
    expect((await reader.read(10)).length).toBe(0);
  });

  it('rejects a pending read when the signal aborts', async () => {
    const stream = new PassThrough();
    const controller = new AbortController();
    const reader = new SocketReader(stream, { signal: controller.signal });

    const pending = reader.read(10);
    controller.abort(new Error('shutdown'));
    await expect(pending).rejects.toBeInstanceOf(SessionCancelledError);
    await expect(reader.read(10)).rejects.toThrow('Session cancelled (shutdown)');
  });

  it('refuses concurrent reads', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    const first = reader.read(10);
    await expect(reader.read(10)).rejects.toThrow(/concurrent reads/);
    stream.end();
    expect((await first).length).toBe(0);
  });

  it('rejects a non-positive read size', async () => {
    const reader = new SocketReader(new PassThrough());
    await expect(reader.read(0)).rejects.toBeInstanceOf(RangeError);
  });

  it('surfaces a stream error once the buffer is drained', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    stream.write('ok');
    await reader.peek(2);
    stream.destroy(new Error('boom'));

    expect((await reader.read(10)).toString()).toBe('ok');
    await expect(reader.read(10)).rejects.toThrow('boom');
  });

  it('pauses the stream above the high-water mark and resumes when drained', async () => {
    const stream = new PassThrough();
    const reader = new SocketReader(stream, { highWaterMark: 4 });
    stream.write('12345');
    await reader.peek(5);
    expect(stream.isPaused()).toBe(true);

    await reader.read(5);
    expect(stream.isPaused()).toBe(false);
  });
});
