import crypto from 'node:crypto';

import type { ToolMiddleware } from '../types.js';

import { canonicalJson } from './canonical-json.js';

export const AUTH_FIELD = 'auth';

const BASE64_STRICT = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Secrets are shared with verifiers as standard base64. Anything that is not
 * canonical base64 is used as its UTF-8 bytes instead; this never throws.
 */
export function decodeSecretKey(secret: string): Buffer {
  if (BASE64_STRICT.test(secret)) {
    return Buffer.from(secret, 'base64');
  }
  return Buffer.from(secret, 'utf8');
}

export function computeSignature(key: Buffer, params: Record<string, unknown>): string {
  const { [AUTH_FIELD]: _previous, ...unsigned } = params;
  const body = canonicalJson(unsigned);
  return crypto.createHmac('sha256', key).update(body, 'utf8').digest('base64');
}

/**
 * Return a copy of `params` with an `auth` field holding the base64 HMAC-SHA256
 * of the canonical JSON of every other field. A pre-existing `auth` value is
 * neither signed nor kept.
 */
export function signParams(secret: string | Buffer, params: Record<string, unknown>): Record<string, unknown> {
  const key = typeof secret === 'string' ? decodeSecretKey(secret) : secret;
  return { ...params, [AUTH_FIELD]: computeSignature(key, params) };
}

export class HmacSigner {
  private readonly key: Buffer;

  constructor(secret: string) {
    this.key = decodeSecretKey(secret);
  }

  sign(params: Record<string, unknown>): Record<string, unknown> {
    return signParams(this.key, params);
  }
}

export function createSigningMiddleware(secret: string): ToolMiddleware {
  const signer = new HmacSigner(secret);
  return (_toolName, args) => signer.sign(args);
}
