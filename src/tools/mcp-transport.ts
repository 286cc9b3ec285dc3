import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export interface StreamTransportParams {
  url: string;
  headers: Readonly<Record<string, string>>;
  // Handshake budget (initialize round trip)
  timeoutMs: number;
  // Longest wait for a response on an open stream
  readTimeoutMs: number;
}

export type TransportFactory = (params: StreamTransportParams) => Transport | Promise<Transport>;

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_READ_TIMEOUT_MS = 5 * 60 * 1000;

export function isSseUrl(url: string): boolean {
  try {
    return new URL(url).pathname.includes('/sse');
  } catch {
    return url.includes('/sse');
  }
}

/**
 * Default stream factory: legacy SSE transport for `/sse` endpoints, streamable
 * HTTP otherwise. Configured headers are sent on every request, including the
 * event-stream GET.
 */
export const createStreamTransport: TransportFactory = (params) => {
  if (params.url.length === 0) {
    throw new Error('MCP server requires a \'url\'');
  }
  const resolvedHeaders: Record<string, string> = { ...params.headers };
  if (!isSseUrl(params.url)) {
    const reqInit: RequestInit = { headers: resolvedHeaders };
    return new StreamableHTTPClientTransport(new URL(params.url), { requestInit: reqInit });
  }
  const customFetch: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    Object.entries(resolvedHeaders).forEach(([k, v]) => { headers.set(k, v); });
    return fetch(input, { ...init, headers });
  };
  // eslint-disable-next-line @typescript-eslint/no-deprecated -- SSE transport kept for servers that only speak HTTP+SSE.
  return new SSEClientTransport(new URL(params.url), {
    eventSourceInit: { fetch: customFetch },
    requestInit: { headers: resolvedHeaders },
    fetch: customFetch,
  });
};
