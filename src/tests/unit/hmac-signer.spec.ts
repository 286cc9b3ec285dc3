import crypto from 'node:crypto';

import { describe, expect, it } from 'vitest';

import { canonicalJson } from '../../auth/canonical-json.js';
import { HmacSigner, createSigningMiddleware, decodeSecretKey, signParams } from '../../auth/hmac-signer.js';

const hmac = (key: Buffer, body: string): string => crypto.createHmac('sha256', key).update(body, 'utf8').digest('base64');

describe('decodeSecretKey', () => {
  it('decodes canonical base64', () => {
    expect(decodeSecretKey('dGVzdC1rZXk=').toString('utf8')).toBe('test-key');
  });

  it('falls back to the raw bytes', () => {
    expect(decodeSecretKey('test-secret').toString('utf8')).toBe('test-secret');
    expect(decodeSecretKey('abc').toString('utf8')).toBe('abc');
    expect(decodeSecretKey('not base64!!').toString('utf8')).toBe('not base64!!');
  });
});

describe('signParams', () => {
  it('signs the canonical JSON of every field except auth', () => {
    const signed = signParams('test-secret', { b: 1, a: 'x', auth: 'stale' });
    expect(signed).toEqual({ b: 1, a: 'x', auth: hmac(Buffer.from('test-secret'), '{"a":"x","b":1}') });
  });

  it('uses the decoded key for base64 secrets', () => {
    const signed = signParams('dGVzdC1rZXk=', { q: 'pods' });
    expect(signed.auth).toBe(hmac(Buffer.from('test-key'), '{"q":"pods"}'));
  });

  it('is deterministic and independent of key order', () => {
    const one = signParams('test-secret', { namespace: 'default', limit: 10 });
    const two = signParams('test-secret', { limit: 10, namespace: 'default' });
    expect(one.auth).toBe(two.auth);
    expect(signParams('test-secret', { namespace: 'default', limit: 10 }).auth).toBe(one.auth);
  });

  it('changes when a field is removed or altered', () => {
    const base = signParams('test-secret', { namespace: 'default', limit: 10 }).auth;
    expect(signParams('test-secret', { namespace: 'default' }).auth).not.toBe(base);
    expect(signParams('test-secret', { namespace: 'default', limit: 11 }).auth).not.toBe(base);
  });

  it('does not mutate its input', () => {
    const params = { a: 1, auth: 'old' };
    signParams('test-secret', params);
    expect(params).toEqual({ a: 1, auth: 'old' });
  });
});

describe('HmacSigner', () => {
  it('matches signParams', () => {
    const signer = new HmacSigner('test-secret');
    expect(signer.sign({ x: [1, 2] })).toEqual(signParams('test-secret', { x: [1, 2] }));
  });

  it('works as a call middleware', async () => {
    const step = createSigningMiddleware('test-secret');
    const out = await step('any_tool', { city: 'Zürich' });
    expect(out.auth).toBe(hmac(Buffer.from('test-secret'), canonicalJson({ city: 'Zürich' })));
    expect(canonicalJson({ city: 'Zürich' })).toBe('{"city":"Z\\u00fcrich"}');
  });
});
