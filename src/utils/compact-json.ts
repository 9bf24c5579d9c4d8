/**
 * Deterministic compact JSON encoding for audit messages
 *
 * Object keys are emitted in sorted order with no whitespace, so the same
 * value always encodes to the same bytes. Non-finite numbers have no JSON
 * form and are rejected instead of being turned into `null`.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function compactJson(value: JsonValue): string {
  return encode(value, '$');
}

export function compactJsonBytes(value: JsonValue): Buffer {
  return Buffer.from(compactJson(value), 'utf-8');
}

function encode(value: JsonValue, path: string): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot encode non-finite number ${value} at ${path}`);
    }
    return JSON.stringify(value);
  }

  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item, index) => encode(item, `${path}[${index}]`)).join(',')}]`;
  }

  const members = Object.keys(value)
    .sort()
    .map(key => `${JSON.stringify(key)}:${encode(value[key], `${path}.${key}`)}`);

  return `{${members.join(',')}}`;
}
