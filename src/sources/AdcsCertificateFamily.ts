import type { RawAttributes } from '../core/types.js';
import { toIso } from '../utils/time.js';
import type { NormalizedRecord, SourceFamily } from './SourceFamily.js';
import { commonName, compact, firstString, toStringList } from './attributes.js';

const HOST_SAN_TYPES = new Set(['dnsname', 'dns', 'ipaddress', 'ip']);

interface SanEntries {
  values: string[];
  hosts: string[];
}

// SAN entries arrive as plain strings (assumed DNS), `{ type, value }` objects,
// or a single `;`-separated string from CSV exports.
function readSan(value: unknown): SanEntries {
  if (!Array.isArray(value)) {
    const values = toStringList(value, ';');
    return { values, hosts: values };
  }
  const values: string[] = [];
  const hosts: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string' && entry.trim() !== '') {
      values.push(entry.trim());
      hosts.push(entry.trim());
    } else if (entry && typeof entry === 'object' && 'value' in entry && typeof entry.value === 'string') {
      const v = entry.value.trim();
      if (v === '') continue;
      values.push(v);
      const type = 'type' in entry && typeof entry.type === 'string' ? entry.type.toLowerCase() : 'dnsname';
      if (HOST_SAN_TYPES.has(type)) hosts.push(v);
    }
  }
  return { values, hosts };
}

/**
 * ADCS-issued certificates.
 * Fingerprint: `adcs_cert:{issuer_dn}|{serial_number}`.
 */
export class AdcsCertificateFamily implements SourceFamily {
  readonly sourceType = 'adcs_cert';
  readonly identityType = 'cert';
  readonly keyAttributes = ['issuer_dn', 'serial_number'];
  readonly keySeparator = '|';

  normalize(raw: RawAttributes): NormalizedRecord {
    const subject = firstString(raw, 'subject_dn', 'subject');
    const san = raw.san === undefined ? undefined : readSan(raw.san);
    const cn = subject ? commonName(subject) : undefined;
    return {
      identityType: this.identityType,
      displayName: subject ?? firstString(raw, 'common_name') ?? 'Unknown Cert',
      attributes: compact({
        subject_dn: subject,
        issuer_dn: firstString(raw, 'issuer_dn'),
        serial_number: firstString(raw, 'serial_number'),
        not_before: toIso(raw.not_before),
        not_after: toIso(raw.not_after),
        template_name: firstString(raw, 'template_name'),
        thumbprint: firstString(raw, 'thumbprint'),
        key_usage: firstString(raw, 'key_usage'),
        san: san?.values,
        linked_system_hint: san?.hosts[0] ?? (cn && cn.includes('.') ? cn : undefined),
      }),
    };
  }
}
