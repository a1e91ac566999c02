import { describe, it, expect, afterEach } from 'vitest';
import type { ConnectionIdentity } from '../../src/ipc/connection.ts';
import { IPCServer } from '../../src/ipc/server.ts';
import { ping, sendPayload } from '../../src/ipc/client.ts';
import { TcpTransport } from '../../src/ipc/transports/tcp.ts';
import { silentLogger } from '../../src/utils/logger.ts';
import { exchange } from '../test-helper.ts';

describe('TCP transport', () => {
  let server: IPCServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  async function startEchoServer(identities: ConnectionIdentity[] = []): Promise<TcpTransport> {
    const transport = new TcpTransport({ port: 0, logger: silentLogger });
    const instance: IPCServer = new IPCServer({
      transport,
      closeDelayMs: 0,
      logger: silentLogger,
      authenticate: (connection) => {
        identities.push(connection.identity);
        return true;
      },
      onMessage: async (message) => {
        await instance.sendMessage(message.data, message.sender);
      },
    });
    server = await instance.listen();
    return transport;
  }

  it('binds an ephemeral loopback port', async () => {
    const transport = await startEchoServer();
    expect(transport.port).toBeGreaterThan(0);
    expect(server?.address).toBe(`tcp:127.0.0.1:${transport.port}`);
  });

  it('echoes a payload and records the remote address', async () => {
    const identities: ConnectionIdentity[] = [];
    const transport = await startEchoServer(identities);
    const reply = await exchange({ port: transport.port }, ['over tcp']);

    expect(reply.toString()).toBe('over tcp');
    expect(identities).toHaveLength(1);
    expect(identities[0]).toMatchObject({
      transport: 'tcp',
      remoteAddress: '127.0.0.1',
      localAddress: '127.0.0.1',
      localPort: transport.port,
    });
  });

  it('works with the client helpers', async () => {
    const transport = await startEchoServer();
    const endpoint = { port: transport.port };

    expect((await sendPayload(endpoint, 'via client')).toString()).toBe('via client');
    expect(await ping(endpoint)).toBe(true);
  });
});
