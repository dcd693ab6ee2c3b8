import { describe, it, expect, vi, afterEach } from 'vitest';
import Fastify from 'fastify';
import { AddressInfo } from 'net';
import { serve, shutdownOnSignals, RunningServers } from '../src/supervisor';
import { RPC_PATH } from '../src/admin/server';
import { ServerConfig } from '../src/config/server';

function createCollaborators() {
  return {
    lookupCertificates: vi.fn(async (_keyname: string) => [{ raw: Buffer.from('leaf') }]),
    activeKeyName: vi.fn(async () => 'active-7'),
    checkSecret: vi.fn(async (_payload: Buffer) => true),
    rotateSecret: vi.fn(async (_payload: Buffer) => Buffer.from('{}')),
    reportBlacklist: vi.fn(async (_keyname: string) => true),
    triggerGeneration: vi.fn((): void => undefined),
  };
}

const config: ServerConfig = {
  listenAddr: { host: '127.0.0.1', port: 0 },
  localAddr: { host: '127.0.0.1', port: 0 },
  readTimeoutMs: 5_000,
  writeTimeoutMs: 5_000,
  bodyLimit: 1024,
  logLevel: 'info',
};

function portOf(address: AddressInfo | string | null): number {
  if (address === null || typeof address === 'string') {
    throw new Error(`Expected a TCP address, got ${String(address)}`);
  }
  return address.port;
}

describe('serve', () => {
  const running: RunningServers[] = [];

  afterEach(async () => {
    await Promise.all(running.splice(0).map((s) => s.close()));
  });

  it('starts both listeners on separate addresses', async () => {
    const servers = await serve({ collaborators: createCollaborators(), config, logger: false });
    running.push(servers);

    const publicPort = portOf(servers.publicApp.server.address());
    const adminPort = portOf(servers.admin.app.server.address());
    expect(publicPort).not.toBe(adminPort);

    const health = await servers.publicApp.inject({ method: 'GET', url: '/healthz' });
    expect(health.body).toBe('ok\n');

    const rpc = await servers.admin.app.inject({
      method: 'POST',
      url: RPC_PATH,
      payload: { jsonrpc: '2.0', id: 1, method: 'trigger.Trigger', params: [] },
    });
    expect(rpc.json()).toEqual({ jsonrpc: '2.0', id: 1, result: {} });
  });

  it('does not serve admin procedures on the public listener', async () => {
    const servers = await serve({ collaborators: createCollaborators(), config, logger: false });
    running.push(servers);

    const res = await servers.publicApp.inject({
      method: 'POST',
      url: RPC_PATH,
      payload: { jsonrpc: '2.0', id: 1, method: 'trigger.Trigger', params: [] },
    });
    expect(res.statusCode).toBe(404);
  });

  it('resolves done once the public listener closes', async () => {
    const servers = await serve({ collaborators: createCollaborators(), config, logger: false });

    await servers.close();
    await expect(servers.done).resolves.toBeUndefined();
  });

  it('closes the admin listener independently', async () => {
    const servers = await serve({ collaborators: createCollaborators(), config, logger: false });
    running.push(servers);

    await servers.closeAdmin();

    expect(servers.admin.app.server.listening).toBe(false);
    expect(servers.publicApp.server.listening).toBe(true);
  });

  it('fails when the admin address is taken', async () => {
    const first = await serve({ collaborators: createCollaborators(), config, logger: false });
    running.push(first);

    const taken = { host: '127.0.0.1', port: portOf(first.admin.app.server.address()) };

    await expect(
      serve({ collaborators: createCollaborators(), config: { ...config, localAddr: taken }, logger: false })
    ).rejects.toThrow();
  });

  it('fails when the public address is taken', async () => {
    const first = await serve({ collaborators: createCollaborators(), config, logger: false });
    running.push(first);

    const taken = { host: '127.0.0.1', port: portOf(first.publicApp.server.address()) };

    await expect(
      serve({ collaborators: createCollaborators(), config: { ...config, listenAddr: taken }, logger: false })
    ).rejects.toThrow();
  });
});

describe('shutdownOnSignals', () => {
  it('registers and removes SIGINT/SIGTERM handlers', () => {
    const log = Fastify({ logger: false }).log;
    const before = {
      int: process.listenerCount('SIGINT'),
      term: process.listenerCount('SIGTERM'),
    };

    const remove = shutdownOnSignals({ close: vi.fn(async () => undefined) }, log);
    expect(process.listenerCount('SIGINT')).toBe(before.int + 1);
    expect(process.listenerCount('SIGTERM')).toBe(before.term + 1);

    remove();
    expect(process.listenerCount('SIGINT')).toBe(before.int);
    expect(process.listenerCount('SIGTERM')).toBe(before.term);
  });
});
