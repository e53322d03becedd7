import type { IdentityAttributes } from '../core/types.js';

/** Key material value: trimmed non-empty string or a finite number, else undefined. */
export function keyValue(raw: Record<string, unknown>, name: string): string | undefined {
  const value = raw[name];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function firstString(raw: Record<string, unknown>, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = keyValue(raw, name);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function toStringList(value: unknown, separator?: string): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((v): v is string => typeof v === 'string')
      .map((v) => v.trim())
      .filter((v) => v !== '');
  }
  if (typeof value === 'string') {
    const parts = separator ? value.split(separator) : [value];
    return parts.map((v) => v.trim()).filter((v) => v !== '');
  }
  return [];
}

export function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(v)) return true;
    if (['false', '0', 'no'].includes(v)) return false;
  }
  return undefined;
}

/** Host part of an SPN (`service/host[:port][/name]`). */
export function hostFromSpn(spn: string): string | undefined {
  const slash = spn.indexOf('/');
  if (slash < 0) return undefined;
  const host = spn.slice(slash + 1).split('/')[0].split(':')[0].trim();
  return host === '' ? undefined : host;
}

/** Common name of a distinguished name, e.g. `CN=web01.corp.local,OU=Servers` → `web01.corp.local`. */
export function commonName(dn: string): string | undefined {
  for (const part of dn.split(',')) {
    const trimmed = part.trim();
    if (trimmed.toUpperCase().startsWith('CN=')) {
      const cn = trimmed.slice(3).trim();
      return cn === '' ? undefined : cn;
    }
  }
  return undefined;
}

/** Drop undefined entries so absent raw fields never overwrite stored ones. */
export function compact(attrs: Record<string, unknown>): IdentityAttributes {
  const out: IdentityAttributes = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (value !== undefined && value !== null) out[key] = value;
  }
  return out;
}
