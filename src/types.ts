import type { ToolProvider } from './tools/types.js';

export type ProviderTransport = 'streaming' | 'stateless';

export type ProviderKind = 'mcp' | 'a2a';

export type AuthType = 'hmac' | 'bearer';

export interface ProviderAuthConfig {
  type?: AuthType;
  // Name of the environment variable holding the secret; the secret itself is never stored here
  envVar: string;
}

export interface ProviderConfig {
  readonly name: string;
  readonly url: string;
  readonly transport: ProviderTransport;
  readonly headers: Readonly<Record<string, string>>;
  // Glob patterns; undefined means every tool is allowed
  readonly allowedTools?: readonly string[];
  readonly auth?: ProviderAuthConfig;
  readonly timeoutMs?: number;
  readonly readTimeoutMs?: number;
  readonly maxRetries?: number;
  readonly retryDelayMs?: number;
  readonly cacheTools?: boolean;
}

export type JsonSchema = Record<string, unknown>;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  provider: ToolProvider;
}

export interface ToolInvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface PreparedTool {
  readonly name: string;
  readonly originalName: string;
  readonly providerName: string;
  readonly kind: ProviderKind;
  readonly description: string;
  readonly schema: JsonSchema;
  invoke: (args: Record<string, unknown>, opts?: ToolInvokeOptions) => Promise<string>;
}

// Structured logging interface
export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC';
  direction: 'request' | 'response';
  type: 'tool';
  toolKind?: ProviderKind;
  remoteIdentifier: string;             // 'mcp:<provider>' or 'a2a:<provider>:<skill>'
  fatal: boolean;                       // True when the operation gave up
  message: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSeverity = LogEntry['severity'];

export type ToolMiddleware = (
  toolName: string,
  args: Record<string, unknown>
) => Record<string, unknown> | Promise<Record<string, unknown>>;
