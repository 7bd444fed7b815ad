/**
 * Encode a message body from a string or bytes
 */
export function toBody(value: string | Uint8Array): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
}

export function encodeJson(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

/**
 * Decode a message body as JSON
 */
export function decodeJson<T = unknown>(body: Uint8Array | string): T {
  const str = typeof body === 'string' ? body : Buffer.from(body).toString('utf-8');
  return JSON.parse(str);
}

/**
 * Read a string map off a decoded wire object; non-string values are dropped
 */
export function toStringMap(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) {
    return out;
  }
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}
