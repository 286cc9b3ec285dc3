// Main library exports for programmatic use
export { ToolProvider } from './tools/types.js';
export { MCPProvider, withSession, renderToolResult, DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY_MS } from './tools/mcp-provider.js';
export { createStreamTransport, isSseUrl, DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS } from './tools/mcp-transport.js';
export {
  A2AProvider,
  sendA2ATask,
  buildSendMessageRequest,
  skillName,
  PROMPT_SCHEMA,
  UNKNOWN_SKILL_NAME,
  DEFAULT_A2A_TIMEOUTS,
  DEFAULT_TASK_RETRIES,
  DEFAULT_BACKOFF_BASE_MS,
} from './tools/a2a-provider.js';
export { parseTaskEnvelope, extractText, renderTaskResult, EMPTY_COMPLETION_TEXT } from './tools/a2a-envelope.js';
export { prepareTools } from './tools/tool-preparer.js';
export { globToRegex, filterByPatterns } from './tools/tool-filter.js';
export { createProviderClient, createProviderClients } from './tools/provider-factory.js';
export {
  ToolRelayError,
  ConnectionError,
  MalformedResponseError,
  TaskError,
  NotInitializedError,
  InvalidParametersError,
  MiddlewareError,
  TOOL_ERROR_KIND_MEANINGS,
  isToolRelayError,
  isRetryableError,
  toToolRelayError,
} from './tools/tool-errors.js';
export { HmacSigner, signParams, decodeSecretKey, createSigningMiddleware } from './auth/hmac-signer.js';
export { canonicalJson } from './auth/canonical-json.js';
export { loadProvidersConfig, parseProvidersConfig } from './config.js';
export { StructuredLogger, createStructuredLogger, createLogSink } from './logging/structured-logger.js';
export { sanitizeToolName, expandEnv, setWarningSink } from './utils.js';

// Type exports
export type {
  ProviderConfig,
  ProviderAuthConfig,
  ProviderTransport,
  ProviderKind,
  AuthType,
  JsonSchema,
  ToolDescriptor,
  ToolInvokeOptions,
  PreparedTool,
  LogEntry,
  LogSeverity,
  ToolMiddleware,
} from './types.js';
export type { LogSink } from './tools/types.js';
export type { MCPProviderOptions, StreamingState, CallToolResponse } from './tools/mcp-provider.js';
export type { StreamTransportParams, TransportFactory } from './tools/mcp-transport.js';
export type { A2AProviderOptions, A2ATimeouts, AgentSkill } from './tools/a2a-provider.js';
export type { TaskResult } from './tools/a2a-envelope.js';
export type { PrepareToolsOptions, AllowedToolsByProvider } from './tools/tool-preparer.js';
export type { ProviderFactoryOptions } from './tools/provider-factory.js';
export type { ToolErrorKind } from './tools/tool-errors.js';
export type { LoadedProvidersConfig } from './config.js';
export type { LogFormat, StructuredLoggerOptions } from './logging/structured-logger.js';
