import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { Mutex } from 'async-mutex';

import type { JsonSchema, ToolDescriptor, ToolInvokeOptions, ToolMiddleware } from '../types.js';
import type { StreamTransportParams, TransportFactory } from './mcp-transport.js';
import type { LogSink } from './types.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { delay, errorMessage, isPlainObject } from '../utils.js';

import { createStreamTransport, DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS } from './mcp-transport.js';
import { ConnectionError, MiddlewareError, NotInitializedError, TaskError } from './tool-errors.js';
import { ToolProvider } from './types.js';

export type StreamingState = 'disconnected' | 'connecting' | 'connected';

export type CallToolResponse = Awaited<ReturnType<Client['callTool']>>;

export interface MCPProviderOptions {
  name: string;
  url: string;
  headers?: Readonly<Record<string, string>>;
  timeoutMs?: number;
  readTimeoutMs?: number;
  transportFactory?: TransportFactory;
  // When true the tool list is fetched once and reused until invalidated or reconnected
  cacheToolsList?: boolean;
  middleware?: readonly ToolMiddleware[];
  maxRetries?: number;
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  onLog?: LogSink;
}

const CLIENT_INFO = { name: 'tool-relay', version: '0.1.0' } as const;

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 2000;

// Codes the SDK raises locally when the stream dies; everything else came from the server
const TRANSPORT_ERROR_CODES = new Set<number>([ErrorCode.ConnectionClosed, ErrorCode.RequestTimeout]);

const isProtocolError = (error: unknown): error is McpError =>
  error instanceof McpError && !TRANSPORT_ERROR_CODES.has(error.code);

const positiveInt = (value: number | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 1 ? Math.trunc(value) : fallback;

// Attempt counts below one still make a single attempt
const attemptCount = (value: number | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? Math.max(1, Math.trunc(value)) : fallback;

const nonNegative = (value: number | undefined, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;

/**
 * Format transport parameters for logging. Header values are never printed.
 */
function formatTransportForLog(name: string, params: StreamTransportParams): string {
  const parts: string[] = [`server='${name}'`, `url='${params.url}'`];
  const headerKeys = Object.keys(params.headers);
  if (headerKeys.length > 0) {
    parts.push(`header_keys=[${headerKeys.join(', ')}]`);
  }
  parts.push(`timeoutMs=${String(params.timeoutMs)}`);
  return parts.join(', ');
}

/**
 * Render a tools/call result as text: text content parts joined together,
 * the JSON of the whole result otherwise.
 */
export function renderToolResult(res: unknown): { text: string; isError: boolean } {
  const isError = isPlainObject(res) && res.isError === true;
  const text = (() => {
    const content = isPlainObject(res) ? res.content : undefined;
    if (typeof content === 'string') return content;
    if (Array.isArray(content)) {
      const parts: unknown[] = content;
      const texts = parts
        .map((p) => (isPlainObject(p) && typeof p.text === 'string' ? p.text : undefined))
        .filter((t): t is string => typeof t === 'string');
      if (texts.length > 0) return texts.join('');
    }
    try { return JSON.stringify(res); } catch { return ''; }
  })();
  return { text, isError };
}

/**
 * One persistent MCP session to one provider.
 *
 * disconnected → connecting → connected → disconnected (cleanup or fatal failure).
 * At most one client/transport pair is alive at a time; connect() tears down
 * any previous pair before opening a new one.
 */
export class MCPProvider extends ToolProvider {
  readonly kind = 'mcp' as const;
  readonly name: string;
  private readonly transportParams: StreamTransportParams;
  private readonly transportFactory: TransportFactory;
  private readonly cacheToolsList: boolean;
  private readonly middleware: readonly ToolMiddleware[];
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs?: number;
  private readonly cleanupLock = new Mutex();
  // Serializes session setup so concurrent callers never open two sessions
  private readonly connectLock = new Mutex();
  private client?: Client;
  private transport?: Transport;
  private stateValue: StreamingState = 'disconnected';
  // Always dirty at startup so the first listTools() fetches
  private cacheDirty = true;
  private toolsList?: ToolDescriptor[];

  constructor(opts: MCPProviderOptions) {
    super();
    this.name = opts.name;
    this.transportParams = {
      url: opts.url,
      headers: { ...(opts.headers ?? {}) },
      timeoutMs: positiveInt(opts.timeoutMs, DEFAULT_CONNECT_TIMEOUT_MS),
      readTimeoutMs: positiveInt(opts.readTimeoutMs, DEFAULT_READ_TIMEOUT_MS),
    };
    this.transportFactory = opts.transportFactory ?? createStreamTransport;
    this.cacheToolsList = opts.cacheToolsList === true;
    this.middleware = [...(opts.middleware ?? [])];
    this.maxRetries = attemptCount(opts.maxRetries, DEFAULT_MAX_RETRIES);
    this.retryDelayMs = nonNegative(opts.retryDelayMs, DEFAULT_RETRY_DELAY_MS);
    this.requestTimeoutMs = opts.requestTimeoutMs !== undefined ? positiveInt(opts.requestTimeoutMs, DEFAULT_READ_TIMEOUT_MS) : undefined;
    this.onLog = opts.onLog;
  }

  get state(): StreamingState {
    return this.stateValue;
  }

  get connected(): boolean {
    return this.stateValue === 'connected' && this.client !== undefined;
  }

  invalidateCache(): void {
    this.cacheDirty = true;
  }

  /**
   * Open a transport, run the MCP handshake and keep the session.
   * Each failed attempt releases whatever it opened before the next one starts.
   * A live session is replaced.
   */
  async connect(): Promise<void> {
    await this.connectLock.runExclusive(async () => { await this.openWithRetries(); });
  }

  // Connect unless a session is already up; callers racing here share one session
  private async ensureConnected(): Promise<void> {
    await this.connectLock.runExclusive(async () => {
      if (!this.connected) await this.openWithRetries();
    });
  }

  private async openWithRetries(): Promise<void> {
    if (this.client !== undefined || this.transport !== undefined) {
      await this.cleanup();
    }
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      this.stateValue = 'connecting';
      try {
        await this.openSession();
        this.stateValue = 'connected';
        this.cacheDirty = true;
        this.log('VRB', `connected to MCP server '${this.name}' (attempt ${String(attempt)}/${String(this.maxRetries)})`);
        return;
      } catch (e) {
        lastError = e;
        const details = formatTransportForLog(this.name, this.transportParams);
        this.log('ERR', `error initializing MCP server (attempt ${String(attempt)}/${String(this.maxRetries)}): ${errorMessage(e)} [${details}]`, { error: e });
        await this.cleanup();
        if (attempt < this.maxRetries) {
          this.log('VRB', `retrying connection in ${String(this.retryDelayMs)}ms`);
          await delay(this.retryDelayMs);
        }
      }
    }
    this.log('ERR', `failed to connect to MCP server '${this.name}' after ${String(this.maxRetries)} attempts`, { fatal: true, error: lastError });
    throw new ConnectionError(
      `Failed to connect to MCP server '${this.name}' after ${String(this.maxRetries)} attempts: ${errorMessage(lastError)}`,
      { provider: this.name, cause: lastError }
    );
  }

  private async openSession(): Promise<void> {
    const transport = await this.transportFactory(this.transportParams);
    this.transport = transport;
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    this.client = client;
    await client.connect(transport, { timeout: this.transportParams.timeoutMs });
  }

  private requireSession(): Client {
    if (this.stateValue !== 'connected' || this.client === undefined) {
      throw new NotInitializedError(this.name);
    }
    return this.client;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const client = this.requireSession();
    if (this.cacheToolsList && !this.cacheDirty && this.toolsList !== undefined && this.toolsList.length > 0) {
      return [...this.toolsList];
    }
    try {
      const tools = await this.fetchTools(client);
      this.toolsList = tools;
      // Only a confirmed fetch makes the cache trustworthy again
      this.cacheDirty = false;
      this.log('TRC', `listTools('${this.name}') -> ${String(tools.length)} tools [${tools.map((t) => t.name).join(', ')}]`);
      return [...tools];
    } catch (e) {
      this.log('ERR', `error listing tools: ${errorMessage(e)}`, { error: e });
      throw e;
    }
  }

  private async fetchTools(client: Client): Promise<ToolDescriptor[]> {
    const out: ToolDescriptor[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor !== undefined ? { cursor } : undefined, { timeout: this.transportParams.readTimeoutMs });
      page.tools.forEach((t) => {
        const inputSchema: JsonSchema = isPlainObject(t.inputSchema) ? { ...t.inputSchema } : { type: 'object' };
        out.push({ name: t.name, description: t.description ?? '', inputSchema, provider: this });
      });
      cursor = typeof page.nextCursor === 'string' && page.nextCursor.length > 0 && !seenCursors.has(page.nextCursor)
        ? page.nextCursor
        : undefined;
      if (cursor !== undefined) seenCursors.add(cursor);
    } while (cursor !== undefined);
    return out;
  }

  private requestOptions(opts?: ToolInvokeOptions): RequestOptions {
    return {
      signal: opts?.signal,
      timeout: opts?.timeoutMs ?? this.requestTimeoutMs ?? this.transportParams.readTimeoutMs,
    };
  }

  private async applyMiddleware(toolName: string, args: Record<string, unknown>): Promise<Record<string, unknown>> {
    let processed = args;
    for (const step of this.middleware) {
      try {
        processed = await step(toolName, processed);
      } catch (e) {
        this.log('ERR', `error in middleware for tool ${toolName}: ${errorMessage(e)}`, { remoteIdentifier: `mcp:${this.name}:${toolName}`, error: e });
        throw new MiddlewareError(`Middleware failed for tool '${toolName}': ${errorMessage(e)}`, { provider: this.name, cause: e });
      }
    }
    return processed;
  }

  /**
   * Invoke a tool with reconnect-and-retry. Middleware runs once; every attempt
   * sends the same transformed arguments. Errors returned by the server itself
   * and caller aborts are not retried.
   */
  async callTool(toolName: string, args: Record<string, unknown> = {}, opts?: ToolInvokeOptions): Promise<CallToolResponse> {
    const processed = await this.applyMiddleware(toolName, args);
    const remoteIdentifier = `mcp:${this.name}:${toolName}`;
    await this.ensureConnected();
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        const client = this.requireSession();
        this.log('TRC', `calling tool ${toolName} (attempt ${String(attempt)}/${String(this.maxRetries)})`, { remoteIdentifier, direction: 'request' });
        return await client.callTool({ name: toolName, arguments: processed }, undefined, this.requestOptions(opts));
      } catch (e) {
        if (opts?.signal?.aborted === true) throw e;
        if (isProtocolError(e)) {
          this.log('WRN', `tool ${toolName} rejected by server: ${e.message}`, { remoteIdentifier });
          throw new TaskError(`Tool '${toolName}' rejected by '${this.name}': ${e.message}`, { provider: this.name, code: e.code, cause: e }, 'protocol_error');
        }
        lastError = e;
        this.log('ERR', `error calling tool ${toolName} (attempt ${String(attempt)}/${String(this.maxRetries)}): ${errorMessage(e)}`, { remoteIdentifier, error: e });
        await this.cleanup();
        if (attempt < this.maxRetries) {
          this.log('VRB', `reconnecting and retrying tool call in ${String(this.retryDelayMs)}ms`, { remoteIdentifier });
          await delay(this.retryDelayMs);
          await this.ensureConnected();
        }
      }
    }
    this.log('ERR', `max retries reached for tool ${toolName}`, { remoteIdentifier, fatal: true, error: lastError });
    throw new ConnectionError(
      `Tool '${toolName}' on '${this.name}' failed after ${String(this.maxRetries)} attempts: ${errorMessage(lastError)}`,
      { provider: this.name, cause: lastError }
    );
  }

  /**
   * Release the client and transport. Serialized, so concurrent callers never
   * close the same handles twice; safe to call when already disconnected.
   */
  async cleanup(): Promise<void> {
    await this.cleanupLock.runExclusive(async () => {
      const client = this.client;
      const transport = this.transport;
      this.client = undefined;
      this.transport = undefined;
      this.stateValue = 'disconnected';
      if (client === undefined && transport === undefined) return;
      if (client !== undefined) {
        try { await client.close(); } catch (e) { this.log('ERR', `error closing MCP client: ${errorMessage(e)}`, { error: e }); }
      }
      if (transport !== undefined) {
        try { await transport.close(); } catch (e) { this.log('ERR', `error closing MCP transport: ${errorMessage(e)}`, { error: e }); }
      }
      this.log('VRB', `cleaned up MCP server '${this.name}'`);
    });
  }

  override async warmup(): Promise<void> {
    await this.ensureConnected();
  }

  async listCallables(): Promise<ToolDescriptor[]> {
    return await this.listTools();
  }

  async invoke(name: string, args: Record<string, unknown>, opts?: ToolInvokeOptions): Promise<string> {
    const res = await this.callTool(name, args, opts);
    const rendered = renderToolResult(res);
    if (rendered.isError) {
      throw new TaskError(`Tool '${name}' failed: ${rendered.text}`, { provider: this.name });
    }
    return rendered.text;
  }

  async close(): Promise<void> {
    await this.cleanup();
  }
}

/**
 * Connect, run `fn`, and release the session whatever happens inside.
 */
export async function withSession<T>(provider: MCPProvider, fn: (provider: MCPProvider) => Promise<T>): Promise<T> {
  await provider.connect();
  try {
    return await fn(provider);
  } finally {
    await provider.cleanup();
  }
}
