import crypto from 'node:crypto';

import { Agent, fetch } from 'undici';

import type { JsonSchema, ToolDescriptor, ToolInvokeOptions } from '../types.js';
import type { TaskResult } from './a2a-envelope.js';
import type { LogSink } from './types.js';
import type { Dispatcher } from 'undici';

import { delay, errorMessage, isPlainObject, warn } from '../utils.js';

import { parseTaskEnvelope, renderTaskResult } from './a2a-envelope.js';
import { ConnectionError, InvalidParametersError, MalformedResponseError, TaskError } from './tool-errors.js';
import { ToolProvider } from './types.js';

export interface A2ATimeouts {
  connectMs: number;
  readMs: number;
}

export interface A2AProviderOptions {
  name: string;
  baseUrl: string;
  headers?: Readonly<Record<string, string>>;
  timeouts?: Partial<A2ATimeouts>;
  // delay before retry n (0-based) is backoffBaseMs * 2^n
  backoffBaseMs?: number;
  maxRetries?: number;
  dispatcher?: Dispatcher;
  onLog?: LogSink;
}

export interface AgentSkill {
  id?: string;
  name?: string;
  description?: string;
}

export const DEFAULT_A2A_TIMEOUTS: A2ATimeouts = { connectMs: 10_000, readMs: 60_000 };
export const DEFAULT_TASK_RETRIES = 2;
export const DEFAULT_BACKOFF_BASE_MS = 1000;
export const UNKNOWN_SKILL_NAME = 'unknown_skill';
export const AGENT_CARD_PATH = '/.well-known/agent.json';

export const PROMPT_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    prompt: { type: 'string', description: 'Prompt for the A2A skill' },
  },
  required: ['prompt'],
};

const stripTrailingSlashes = (url: string): string => url.replace(/\/+$/, '');

const optionalString = (value: unknown): string | undefined => (typeof value === 'string' && value.length > 0 ? value : undefined);

export function skillName(skill: AgentSkill): string {
  return skill.name ?? skill.id ?? UNKNOWN_SKILL_NAME;
}

/**
 * JSON-RPC `message/send` envelope carrying one user text part.
 */
export function buildSendMessageRequest(id: string, userText: string, sessionId?: string): Record<string, unknown> {
  const message: Record<string, unknown> = {
    role: 'user',
    parts: [{ kind: 'text', text: userText }],
  };
  if (sessionId !== undefined) message.contextId = sessionId;
  return { jsonrpc: '2.0', id, method: 'message/send', params: { message } };
}

class TransientFailure extends Error {
  constructor(readonly underlying: unknown) {
    super(errorMessage(underlying));
    this.name = 'TransientFailure';
  }
}

/**
 * Client for one A2A agent. Every operation is an independent HTTP exchange;
 * the only state kept between calls is the connection pool.
 */
export class A2AProvider extends ToolProvider {
  readonly kind = 'a2a' as const;
  readonly name: string;
  readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeouts: A2ATimeouts;
  private readonly backoffBaseMs: number;
  private readonly maxRetries: number;
  private readonly injectedDispatcher?: Dispatcher;
  private ownedAgent?: Agent;

  constructor(opts: A2AProviderOptions) {
    super();
    this.name = opts.name;
    this.baseUrl = stripTrailingSlashes(opts.baseUrl);
    this.headers = { ...(opts.headers ?? {}) };
    this.timeouts = { ...DEFAULT_A2A_TIMEOUTS, ...(opts.timeouts ?? {}) };
    this.backoffBaseMs = opts.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.maxRetries = opts.maxRetries ?? DEFAULT_TASK_RETRIES;
    this.injectedDispatcher = opts.dispatcher;
    this.onLog = opts.onLog;
  }

  private dispatcher(): Dispatcher {
    if (this.injectedDispatcher !== undefined) return this.injectedDispatcher;
    this.ownedAgent ??= new Agent({
      connect: { timeout: this.timeouts.connectMs },
      headersTimeout: this.timeouts.readMs,
      bodyTimeout: this.timeouts.readMs,
    });
    return this.ownedAgent;
  }

  /**
   * Fetch the agent card and return its skills.
   */
  async listSkills(): Promise<AgentSkill[]> {
    const url = `${this.baseUrl}${AGENT_CARD_PATH}`;
    let status: number;
    let text: string;
    try {
      const res = await fetch(url, { method: 'GET', headers: this.headers, dispatcher: this.dispatcher() });
      status = res.status;
      text = await res.text();
    } catch (e) {
      this.log('ERR', `agent card request failed: ${errorMessage(e)}`, { error: e });
      throw new ConnectionError(`Network error connecting to A2A agent '${this.name}': ${errorMessage(e)}`, { provider: this.name, cause: e });
    }
    if (status !== 200) {
      throw new ConnectionError(`Failed to get agent card: ${String(status)} - ${text}`, { provider: this.name, code: status });
    }
    let card: unknown;
    try {
      card = JSON.parse(text);
    } catch (e) {
      throw new MalformedResponseError(`Invalid JSON response from agent card: ${errorMessage(e)}`, { provider: this.name, cause: e });
    }
    const rawSkills = isPlainObject(card) && Array.isArray(card.skills) ? card.skills : [];
    const skills: AgentSkill[] = [];
    rawSkills.forEach((raw: unknown) => {
      if (!isPlainObject(raw)) return;
      skills.push({ id: optionalString(raw.id), name: optionalString(raw.name), description: optionalString(raw.description) });
    });
    this.log('VRB', `retrieved ${String(skills.length)} skills from A2A agent ${this.name}`);
    return skills;
  }

  // One POST. Transport-level failures come back as TransientFailure; everything else is final.
  private async postOnce(payload: Record<string, unknown>, opts?: ToolInvokeOptions): Promise<unknown> {
    const controller = new AbortController();
    const callerSignal = opts?.signal;
    const onCallerAbort = (): void => { controller.abort(callerSignal?.reason); };
    if (callerSignal !== undefined) {
      if (callerSignal.aborted) onCallerAbort();
      else callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutMs = opts?.timeoutMs;
    if (typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => { controller.abort(new Error(`request timed out after ${String(timeoutMs)}ms`)); }, Math.trunc(timeoutMs));
    }
    let status: number;
    let text: string;
    try {
      const res = await fetch(`${this.baseUrl}/`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: JSON.stringify(payload),
        signal: controller.signal,
        dispatcher: this.dispatcher(),
      });
      status = res.status;
      text = await res.text();
    } catch (e) {
      if (callerSignal?.aborted === true) throw e;
      throw new TransientFailure(e);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
    if (status !== 200) {
      throw new TaskError(`Task request failed: ${String(status)} - ${text}`, { provider: this.name, code: status });
    }
    try {
      return JSON.parse(text);
    } catch (e) {
      throw new MalformedResponseError(`Invalid JSON response from task endpoint: ${errorMessage(e)}`, { provider: this.name, cause: e });
    }
  }

  /**
   * Send one `message/send` request and parse the reply.
   *
   * Transport failures are retried `maxRetries` more times with exponential
   * backoff. HTTP errors, JSON-RPC errors, malformed bodies and failed tasks are
   * final. A failed task throws TaskError; completed and incomplete results are
   * returned.
   */
  async sendTask(userText: string, sessionId?: string, maxRetries: number = this.maxRetries, opts?: ToolInvokeOptions): Promise<TaskResult> {
    const taskId = crypto.randomUUID();
    const payload = buildSendMessageRequest(taskId, userText, sessionId);
    const attempts = Math.max(0, Math.trunc(maxRetries)) + 1;
    let lastError: unknown;
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      this.log('VRB', `sending A2A message to ${this.baseUrl}/ (attempt ${String(attempt + 1)}/${String(attempts)})`, { direction: 'request' });
      let response: unknown;
      try {
        response = await this.postOnce(payload, opts);
      } catch (e) {
        if (!(e instanceof TransientFailure)) throw e;
        lastError = e.underlying;
        this.log('WRN', `A2A request error (attempt ${String(attempt + 1)}): ${e.message}`);
        if (attempt + 1 < attempts) {
          await delay(this.backoffBaseMs * 2 ** attempt);
        }
        continue;
      }
      if (isPlainObject(response) && response.error !== undefined) {
        const rpcError = isPlainObject(response.error) ? response.error : {};
        const message = typeof rpcError.message === 'string' ? rpcError.message : 'Unknown error';
        const code = typeof rpcError.code === 'number' ? rpcError.code : undefined;
        throw new TaskError(`JSON-RPC error: ${message}`, { provider: this.name, code }, 'protocol_error');
      }
      const result = parseTaskEnvelope(isPlainObject(response) ? response.result : undefined);
      if (result.state === 'failed') {
        throw new TaskError(`Task failed: ${result.text}`, { provider: this.name, details: { status: result.status } });
      }
      this.log('VRB', `A2A task ${taskId} ${result.state}`);
      return result;
    }
    this.log('ERR', `A2A request failed after ${String(attempts)} attempts`, { fatal: true, error: lastError });
    throw new ConnectionError(
      `Failed to send task to A2A agent '${this.name}' after ${String(attempts)} attempts: ${errorMessage(lastError)}`,
      { provider: this.name, cause: lastError }
    );
  }

  async listCallables(): Promise<ToolDescriptor[]> {
    const skills = await this.listSkills();
    return skills.map((skill) => ({
      name: skillName(skill),
      description: skill.description ?? '',
      inputSchema: PROMPT_SCHEMA,
      provider: this,
    }));
  }

  async invoke(name: string, args: Record<string, unknown>, opts?: ToolInvokeOptions): Promise<string> {
    const prompt = args.prompt;
    if (typeof prompt !== 'string') {
      throw new InvalidParametersError(`Skill '${name}' requires a string 'prompt'`, { provider: this.name });
    }
    this.log('TRC', `invoking skill ${name}`, { remoteIdentifier: `a2a:${this.name}:${name}`, direction: 'request' });
    const result = await this.sendTask(prompt, undefined, this.maxRetries, opts);
    return renderTaskResult(result);
  }

  async close(): Promise<void> {
    const agent = this.ownedAgent;
    this.ownedAgent = undefined;
    if (agent === undefined) return;
    try {
      await agent.close();
    } catch (e) {
      warn(`a2a dispatcher close failed: ${errorMessage(e)}`);
    }
  }
}

/**
 * Send one task to an agent and return its reply as text. Creates and closes
 * its own client.
 */
export async function sendA2ATask(baseUrl: string, userText: string, headers?: Record<string, string>, opts?: Omit<A2AProviderOptions, 'name' | 'baseUrl' | 'headers'>): Promise<string> {
  const provider = new A2AProvider({ ...opts, name: 'one-shot', baseUrl, headers });
  try {
    return renderTaskResult(await provider.sendTask(userText));
  } finally {
    await provider.close();
  }
}
