import type { LogEntry, ProviderConfig, ToolMiddleware } from '../types.js';
import type { TransportFactory } from './mcp-transport.js';
import type { LogSink, ToolProvider } from './types.js';
import type { Dispatcher } from 'undici';

import { createSigningMiddleware } from '../auth/hmac-signer.js';
import { errorMessage, warn } from '../utils.js';

import { A2AProvider } from './a2a-provider.js';
import { MCPProvider } from './mcp-provider.js';

export interface ProviderFactoryOptions {
  env?: NodeJS.ProcessEnv;
  onLog?: LogSink;
  transportFactory?: TransportFactory;
  // Shared HTTP dispatcher for stateless providers; each creates its own pool otherwise
  dispatcher?: Dispatcher;
}

const AUTHORIZATION = 'authorization';

function report(opts: ProviderFactoryOptions, config: ProviderConfig, severity: LogEntry['severity'], message: string): void {
  if (opts.onLog === undefined) return;
  const entry: LogEntry = {
    timestamp: Date.now(),
    severity,
    direction: 'request',
    type: 'tool',
    toolKind: config.transport === 'stateless' ? 'a2a' : 'mcp',
    remoteIdentifier: `${config.transport === 'stateless' ? 'a2a' : 'mcp'}:${config.name}`,
    fatal: false,
    message,
  };
  try { opts.onLog(entry); } catch (e) { warn(`provider factory onLog failed: ${errorMessage(e)}`); }
}

const withoutAuthorization = (headers: Readonly<Record<string, string>>): Record<string, string> =>
  Object.fromEntries(Object.entries(headers).filter(([k]) => k.toLowerCase() !== AUTHORIZATION));

function createStatelessClient(config: ProviderConfig, opts: ProviderFactoryOptions): A2AProvider {
  const env = opts.env ?? process.env;
  let headers = withoutAuthorization(config.headers);
  const envVar = config.auth?.envVar;
  if (config.auth?.type === 'hmac') {
    report(opts, config, 'WRN', `hmac signing is not supported for stateless provider '${config.name}'; treating ${config.auth.envVar} as a bearer token`);
  }
  if (envVar !== undefined) {
    const token = env[envVar] ?? '';
    if (token.length > 0) {
      headers = { ...headers, Authorization: `Bearer ${token}` };
      report(opts, config, 'VRB', `using ${envVar} as bearer token`);
    } else {
      // a configured but empty variable keeps any Authorization the headers carried
      headers = { ...config.headers };
      report(opts, config, 'WRN', `${envVar} is configured for '${config.name}' but not set; sending without bearer token`);
    }
  }
  return new A2AProvider({
    name: config.name,
    baseUrl: config.url,
    headers,
    timeouts: {
      ...(config.timeoutMs !== undefined ? { connectMs: config.timeoutMs } : {}),
      ...(config.readTimeoutMs !== undefined ? { readMs: config.readTimeoutMs } : {}),
    },
    backoffBaseMs: config.retryDelayMs,
    maxRetries: config.maxRetries,
    dispatcher: opts.dispatcher,
    onLog: opts.onLog,
  });
}

function createStreamingClient(config: ProviderConfig, opts: ProviderFactoryOptions): MCPProvider {
  const env = opts.env ?? process.env;
  const envVar = config.auth?.envVar;
  const middleware: ToolMiddleware[] = [];
  let headers: Record<string, string> = { ...config.headers };
  if (envVar !== undefined) {
    const secret = env[envVar] ?? '';
    if (secret.length > 0 && config.auth?.type === 'bearer') {
      headers = { ...withoutAuthorization(config.headers), Authorization: `Bearer ${secret}` };
      report(opts, config, 'VRB', `using ${envVar} as bearer token`);
    } else if (secret.length > 0) {
      middleware.push(createSigningMiddleware(secret));
      report(opts, config, 'VRB', `using ${envVar} for authentication`);
    } else {
      report(opts, config, 'WRN', `${envVar} not set, authentication will not be used for '${config.name}'`);
    }
  }
  return new MCPProvider({
    name: config.name,
    url: config.url,
    headers,
    timeoutMs: config.timeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    transportFactory: opts.transportFactory,
    cacheToolsList: config.cacheTools ?? true,
    middleware,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    onLog: opts.onLog,
  });
}

/**
 * Build the client for one configured provider. Secrets are read from the
 * environment variable named by `auth.envVar`: streaming providers sign every
 * call with HMAC unless `auth.type` is `bearer`; stateless providers always
 * send a bearer token.
 */
export function createProviderClient(config: ProviderConfig, opts: ProviderFactoryOptions = {}): ToolProvider {
  return config.transport === 'stateless'
    ? createStatelessClient(config, opts)
    : createStreamingClient(config, opts);
}

export function createProviderClients(configs: readonly ProviderConfig[], opts: ProviderFactoryOptions = {}): ToolProvider[] {
  return configs.map((c) => createProviderClient(c, opts));
}
