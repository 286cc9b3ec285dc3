import fs from 'node:fs';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { ProviderConfig } from './types.js';

import { expandEnv } from './utils.js';

const AuthSchema = z.object({
  type: z.enum(['hmac', 'bearer']).optional(),
  env_var: z.string().min(1),
});

const ServerEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  type: z.enum(['mcp', 'a2a']).default('mcp'),
  headers: z.record(z.string(), z.string()).optional(),
  allowed_tools: z.array(z.string()).optional(),
  auth: AuthSchema.optional(),
  timeout_ms: z.number().int().positive().optional(),
  read_timeout_ms: z.number().int().positive().optional(),
  max_retries: z.number().int().nonnegative().optional(),
  retry_delay_ms: z.number().int().nonnegative().optional(),
  cache_tools: z.boolean().default(true),
});

const ProvidersFileSchema = z.object({
  servers: z.array(ServerEntrySchema),
}).superRefine((doc, ctx) => {
  const seen = new Set<string>();
  doc.servers.forEach((s, i) => {
    if (seen.has(s.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['servers', i, 'name'], message: `duplicate server name '${s.name}'` });
    }
    seen.add(s.name);
    // mcp counts attempts, a2a counts retries after the first send
    if (s.type === 'mcp' && s.max_retries === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['servers', i, 'max_retries'], message: 'must be at least 1 for mcp servers' });
    }
  });
});

type ServerEntry = z.infer<typeof ServerEntrySchema>;

export interface LoadedProvidersConfig {
  providers: ProviderConfig[];
  // Only providers that declare allowed_tools have an entry
  allowedToolsByProvider: Map<string, string[]>;
}

function toProviderConfig(entry: ServerEntry, env: NodeJS.ProcessEnv): ProviderConfig {
  const headers = Object.fromEntries(
    Object.entries(entry.headers ?? {}).map(([k, v]) => [k, expandEnv(v, env)])
  );
  return {
    name: entry.name,
    url: entry.url,
    transport: entry.type === 'a2a' ? 'stateless' : 'streaming',
    headers,
    allowedTools: entry.allowed_tools,
    auth: entry.auth !== undefined ? { type: entry.auth.type, envVar: entry.auth.env_var } : undefined,
    timeoutMs: entry.timeout_ms,
    readTimeoutMs: entry.read_timeout_ms,
    maxRetries: entry.max_retries,
    retryDelayMs: entry.retry_delay_ms,
    cacheTools: entry.cache_tools,
  };
}

/**
 * Validate an already parsed document (the YAML root) and build provider configs.
 * `source` only labels error messages.
 */
export function parseProvidersConfig(doc: unknown, source: string, env: NodeJS.ProcessEnv = process.env): LoadedProvidersConfig {
  const parsed = ProvidersFileSchema.safeParse(doc);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  const providers = parsed.data.servers.map((entry) => toProviderConfig(entry, env));
  const allowedToolsByProvider = new Map<string, string[]>();
  parsed.data.servers.forEach((entry) => {
    if (entry.allowed_tools !== undefined) allowedToolsByProvider.set(entry.name, [...entry.allowed_tools]);
  });
  return { providers, allowedToolsByProvider };
}

export function loadProvidersConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): LoadedProvidersConfig {
  if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (e) {
    throw new Error(`Invalid YAML in configuration file ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseProvidersConfig(doc, configPath, env);
}
