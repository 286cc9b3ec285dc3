import { Headers, MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { LogEntry, ProviderConfig } from '../../types.js';

import { signParams } from '../../auth/hmac-signer.js';
import { A2AProvider } from '../../tools/a2a-provider.js';
import { MCPProvider } from '../../tools/mcp-provider.js';
import { createProviderClient, createProviderClients } from '../../tools/provider-factory.js';
import { prepareTools } from '../../tools/tool-preparer.js';
import { createMemoryServer } from '../fixtures/mcp-memory-server.js';

const ORIGIN = 'http://agent.test';

const streaming = (overrides: Partial<ProviderConfig> = {}): ProviderConfig => ({
  name: 'kube',
  url: 'http://tools.invalid/mcp',
  transport: 'streaming',
  headers: {},
  retryDelayMs: 0,
  ...overrides,
});

const stateless = (overrides: Partial<ProviderConfig> = {}): ProviderConfig => ({
  name: 'helper',
  url: ORIGIN,
  transport: 'stateless',
  headers: { Authorization: 'Bearer leftover', 'X-Team': 'core' },
  retryDelayMs: 0,
  ...overrides,
});

const headerValue = (headers: Headers | Record<string, string> | undefined, name: string): string | undefined => {
  if (headers === undefined) return undefined;
  if (headers instanceof Headers) return headers.get(name) ?? undefined;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  return key !== undefined ? headers[key] : undefined;
};

const completedReply = {
  jsonrpc: '2.0',
  id: 'x',
  result: { status: { state: 'completed' }, artifacts: [{ parts: [{ kind: 'text', text: 'done' }] }] },
};

describe('createProviderClient', () => {
  const opened: MCPProvider[] = [];
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await Promise.all(opened.splice(0).map((p) => p.cleanup()));
    await agent.close();
  });

  it('signs streaming calls with the secret from the environment', async () => {
    const harness = createMemoryServer();
    const client = createProviderClient(
      streaming({ auth: { type: 'hmac', envVar: 'KUBE_SECRET' } }),
      { env: { KUBE_SECRET: 'test-secret' }, transportFactory: harness.factory }
    );
    expect(client).toBeInstanceOf(MCPProvider);
    if (client instanceof MCPProvider) opened.push(client);
    const text = await client.invoke('echo', { pod: 'web-1' });
    expect(JSON.parse(text)).toEqual(signParams('test-secret', { pod: 'web-1' }));
  });

  it('connects unsigned and warns when the secret is empty', async () => {
    const harness = createMemoryServer();
    const logs: LogEntry[] = [];
    const client = createProviderClient(
      streaming({ auth: { envVar: 'KUBE_SECRET' } }),
      { env: {}, transportFactory: harness.factory, onLog: (e) => { logs.push(e); } }
    );
    if (client instanceof MCPProvider) opened.push(client);
    const text = await client.invoke('echo', { pod: 'web-1' });
    expect(JSON.parse(text)).toEqual({ pod: 'web-1' });
    expect(logs[0]).toMatchObject({ severity: 'WRN', remoteIdentifier: 'mcp:kube', message: "KUBE_SECRET not set, authentication will not be used for 'kube'" });
  });

  it('caches streaming tool lists unless the config turns it off', async () => {
    const harness = createMemoryServer();
    const cached = createProviderClient(streaming(), { transportFactory: harness.factory });
    const uncached = createProviderClient(streaming({ cacheTools: false }), { transportFactory: harness.factory });
    if (!(cached instanceof MCPProvider) || !(uncached instanceof MCPProvider)) throw new Error('expected streaming clients');
    opened.push(cached, uncached);
    await cached.connect();
    await uncached.connect();
    const first = await cached.listTools();
    expect(await cached.listTools()).toBe(first);
    const again = await uncached.listTools();
    expect(await uncached.listTools()).not.toBe(again);
  });

  it('sends a bearer token to stateless providers', async () => {
    let auth: string | undefined;
    agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply((opts) => {
      auth = headerValue(opts.headers, 'authorization');
      return { statusCode: 200, data: JSON.stringify(completedReply) };
    });
    const client = createProviderClient(
      stateless({ auth: { envVar: 'HELPER_TOKEN' } }),
      { env: { HELPER_TOKEN: 'test-token' }, dispatcher: agent }
    );
    expect(client).toBeInstanceOf(A2AProvider);
    await expect(client.invoke('any', { prompt: 'hello' })).resolves.toBe('done');
    expect(auth).toBe('Bearer test-token');
  });

  it('drops a configured Authorization header when no auth is set', async () => {
    let auth: string | undefined = 'unset';
    let team: string | undefined;
    agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply((opts) => {
      auth = headerValue(opts.headers, 'authorization');
      team = headerValue(opts.headers, 'x-team');
      return { statusCode: 200, data: JSON.stringify(completedReply) };
    });
    const client = createProviderClient(stateless(), { dispatcher: agent });
    await client.invoke('any', { prompt: 'hello' });
    expect(auth).toBeUndefined();
    expect(team).toBe('core');
  });
});

describe('createProviderClients', () => {
  it('keeps config order and feeds the preparer', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent.get(ORIGIN).intercept({ path: '/.well-known/agent.json', method: 'GET' }).reply(200, {
      skills: [{ id: 'summarize', name: 'summarize text' }],
    });
    const harness = createMemoryServer();
    const clients = createProviderClients([streaming(), stateless()], { transportFactory: harness.factory, dispatcher: agent });
    expect(clients.map((c) => `${c.kind}:${c.name}`)).toEqual(['mcp:kube', 'a2a:helper']);
    try {
      const tools = await prepareTools(clients, new Map([['kube', ['echo', 'weather']]]));
      expect(tools.map((t) => `${t.providerName}/${t.name}`)).toEqual(['kube/echo', 'kube/weather', 'helper/summarize_text']);
      await expect(tools[1].invoke({ city: 'Lima' })).resolves.toBe('Sunny in Lima');
    } finally {
      await Promise.all(clients.map((c) => c.close()));
      await agent.close();
    }
  });
});
