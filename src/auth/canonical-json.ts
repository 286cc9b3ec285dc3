import { isPlainObject } from '../utils.js';

const NON_ASCII = /[\u0080-\uffff]/g;

const escapeNonAscii = (json: string): string =>
  json.replace(NON_ASCII, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);

const compareKeys = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

const isOmitted = (value: unknown): boolean =>
  value === undefined || typeof value === 'function' || typeof value === 'symbol';

const hasToJson = (value: object): value is { toJSON: () => unknown } =>
  'toJSON' in value && typeof value.toJSON === 'function';

/**
 * Serialize a JSON-compatible value with keys sorted by code unit at every depth,
 * no whitespace, and non-ASCII characters escaped as lowercase `\uXXXX`.
 *
 * Object keys are emitted in sorted order even when they look like array
 * indices, which a plain `JSON.stringify` of a re-built object cannot do.
 */
export const canonicalJson = (value: unknown): string => {
  if (value === null) return 'null';
  if (typeof value === 'string') return escapeNonAscii(JSON.stringify(value));
  if (typeof value === 'number') return Number.isFinite(value) ? JSON.stringify(value) : 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'bigint') throw new TypeError('Do not know how to serialize a BigInt');
  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => (isOmitted(item) ? 'null' : canonicalJson(item)));
    return `[${items.join(',')}]`;
  }
  if (typeof value === 'object' && hasToJson(value)) return canonicalJson(value.toJSON());
  if (isPlainObject(value)) {
    const members = Object.keys(value)
      .sort(compareKeys)
      .filter((key) => !isOmitted(value[key]))
      .map((key) => `${escapeNonAscii(JSON.stringify(key))}:${canonicalJson(value[key])}`);
    return `{${members.join(',')}}`;
  }
  return 'null';
};
