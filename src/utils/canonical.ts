import crypto from 'crypto';

export function canonicalJson(obj: unknown): string {
  // Stable stringify by sorting object keys recursively
  return JSON.stringify(sortObj(obj));
}

function sortObj(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortObj);
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[key] = sortObj(inner);
    }
    return out;
  }
  return value;
}

/** sha256 over the canonical JSON form; identical payloads hash identically regardless of key order. */
export function contentHash(obj: unknown): string {
  return crypto.createHash('sha256').update(canonicalJson(obj)).digest('hex');
}

export function sameContent(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}
