import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { A2AProvider, PROMPT_SCHEMA, UNKNOWN_SKILL_NAME, buildSendMessageRequest } from '../../tools/a2a-provider.js';
import { ConnectionError, InvalidParametersError, MalformedResponseError, TaskError } from '../../tools/tool-errors.js';

const ORIGIN = 'http://agent.test';

const completed = (text: string): Record<string, unknown> => ({
  jsonrpc: '2.0',
  id: 'x',
  result: { status: { state: 'completed' }, artifacts: [{ parts: [{ kind: 'text', text }] }] },
});

describe('A2AProvider', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const makeProvider = (maxRetries?: number): A2AProvider => new A2AProvider({
    name: 'helper',
    baseUrl: `${ORIGIN}//`,
    headers: { 'X-Team': 'core' },
    backoffBaseMs: 0,
    maxRetries,
    dispatcher: agent,
  });

  it('builds the message/send envelope', () => {
    expect(buildSendMessageRequest('id-1', 'hello')).toEqual({
      jsonrpc: '2.0',
      id: 'id-1',
      method: 'message/send',
      params: { message: { role: 'user', parts: [{ kind: 'text', text: 'hello' }] } },
    });
    expect(buildSendMessageRequest('id-2', 'hello', 'ctx-9')).toHaveProperty('params.message.contextId', 'ctx-9');
  });

  it('strips trailing slashes from the base url', () => {
    expect(makeProvider().baseUrl).toBe(ORIGIN);
  });

  describe('sendTask', () => {
    it('posts the envelope to the base url and returns the completed result', async () => {
      let sent: unknown;
      agent.get(ORIGIN)
        .intercept({ path: '/', method: 'POST', body: (body: string) => { sent = JSON.parse(body); return true; } })
        .reply(200, completed('hi'));
      const result = await makeProvider().sendTask('what time is it');
      expect(result).toEqual({ state: 'completed', text: 'hi', source: 'artifact' });
      expect(sent).toMatchObject({
        jsonrpc: '2.0',
        method: 'message/send',
        params: { message: { role: 'user', parts: [{ kind: 'text', text: 'what time is it' }] } },
      });
      expect(sent).toHaveProperty('id', expect.stringMatching(/^[0-9a-f-]{36}$/));
    });

    it('retries transport failures and succeeds within the budget', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/', method: 'POST' }).replyWithError(new Error('read timeout'));
      pool.intercept({ path: '/', method: 'POST' }).replyWithError(new Error('read timeout'));
      pool.intercept({ path: '/', method: 'POST' }).reply(200, completed('third time'));
      const result = await makeProvider(2).sendTask('ping');
      expect(result).toEqual({ state: 'completed', text: 'third time', source: 'artifact' });
    });

    it('fails with ConnectionError once the retries run out', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/', method: 'POST' }).replyWithError(new Error('read timeout'));
      pool.intercept({ path: '/', method: 'POST' }).replyWithError(new Error('read timeout'));
      pool.intercept({ path: '/', method: 'POST' }).reply(200, completed('too late'));
      const err = await makeProvider(1).sendTask('ping').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err).toHaveProperty('message', expect.stringContaining("Failed to send task to A2A agent 'helper' after 2 attempts"));
    });

    it('does not retry JSON-RPC errors', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/', method: 'POST' }).reply(200, { jsonrpc: '2.0', id: 'x', error: { code: -32601, message: 'Method not found' } });
      pool.intercept({ path: '/', method: 'POST' }).reply(200, completed('unreachable'));
      const err = await makeProvider(2).sendTask('ping').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TaskError);
      expect(err).toHaveProperty('message', 'JSON-RPC error: Method not found');
      expect(err).toHaveProperty('kind', 'protocol_error');
      expect(err).toHaveProperty('code', -32601);
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });

    it('throws TaskError carrying the failure text', async () => {
      agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply(200, {
        jsonrpc: '2.0',
        id: 'x',
        result: { status: { state: 'failed', message: { parts: [{ kind: 'text', text: 'boom' }] } } },
      });
      await expect(makeProvider().sendTask('ping')).rejects.toThrow('Task failed: boom');
    });

    it('returns incomplete results instead of throwing', async () => {
      agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply(200, { jsonrpc: '2.0', id: 'x', result: { status: { state: 'working' } } });
      await expect(makeProvider().sendTask('ping')).resolves.toEqual({ state: 'incomplete', status: { state: 'working' } });
    });

    it('fails fast on non-200 responses', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/', method: 'POST' }).reply(503, 'overloaded');
      pool.intercept({ path: '/', method: 'POST' }).reply(200, completed('unreachable'));
      await expect(makeProvider(2).sendTask('ping')).rejects.toThrow('Task request failed: 503 - overloaded');
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });

    it('fails fast on malformed JSON', async () => {
      const pool = agent.get(ORIGIN);
      pool.intercept({ path: '/', method: 'POST' }).reply(200, '{not json');
      pool.intercept({ path: '/', method: 'POST' }).reply(200, completed('unreachable'));
      await expect(makeProvider(2).sendTask('ping')).rejects.toBeInstanceOf(MalformedResponseError);
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });
  });

  describe('skills', () => {
    it('lists skills from the agent card', async () => {
      agent.get(ORIGIN).intercept({ path: '/.well-known/agent.json', method: 'GET' }).reply(200, {
        name: 'Helper',
        skills: [
          { id: 'sum', name: 'summarize text', description: 'Summaries' },
          { id: 'translate' },
          { description: 'nameless' },
          'junk',
        ],
      });
      const tools = await makeProvider().listCallables();
      expect(tools.map((t) => t.name)).toEqual(['summarize text', 'translate', UNKNOWN_SKILL_NAME]);
      expect(tools[0].description).toBe('Summaries');
      expect(tools[1].description).toBe('');
      expect(tools[0].inputSchema).toEqual(PROMPT_SCHEMA);
    });

    it('raises ConnectionError when the card cannot be fetched', async () => {
      agent.get(ORIGIN).intercept({ path: '/.well-known/agent.json', method: 'GET' }).reply(404, 'missing');
      const err = await makeProvider().listSkills().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err).toHaveProperty('message', 'Failed to get agent card: 404 - missing');
    });

    it('raises ConnectionError on network errors', async () => {
      agent.get(ORIGIN).intercept({ path: '/.well-known/agent.json', method: 'GET' }).replyWithError(new Error('refused'));
      await expect(makeProvider().listSkills()).rejects.toBeInstanceOf(ConnectionError);
    });

    it('invokes a skill with its prompt and renders the reply', async () => {
      agent.get(ORIGIN).intercept({ path: '/', method: 'POST' }).reply(200, {
        jsonrpc: '2.0',
        id: 'x',
        result: { status: { state: 'completed' }, artifacts: [] },
      });
      await expect(makeProvider().invoke('sum', { prompt: 'text' })).resolves.toBe('Task completed but no response found');
    });

    it('rejects invocations without a string prompt', async () => {
      await expect(makeProvider().invoke('sum', { prompt: 3 })).rejects.toBeInstanceOf(InvalidParametersError);
    });
  });

  it('close is safe to call repeatedly', async () => {
    const provider = new A2AProvider({ name: 'idle', baseUrl: ORIGIN });
    await provider.close();
    await provider.close();
  });
});
