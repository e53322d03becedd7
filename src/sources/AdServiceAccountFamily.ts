import type { RawAttributes } from '../core/types.js';
import { toIso } from '../utils/time.js';
import type { NormalizedRecord, SourceFamily } from './SourceFamily.js';
import { compact, firstString, hostFromSpn, toBoolean, toStringList } from './attributes.js';

// userAccountControl bit 0x0002
const ACCOUNTDISABLE = 0x2;

function accountEnabled(raw: RawAttributes): boolean | undefined {
  const explicit = toBoolean(raw.userAccountControl_enabled) ?? toBoolean(raw.enabled);
  if (explicit !== undefined) return explicit;
  const uac = Number(raw.userAccountControl);
  if (raw.userAccountControl !== undefined && Number.isInteger(uac)) {
    return (uac & ACCOUNTDISABLE) === 0;
  }
  return undefined;
}

/**
 * Active Directory service accounts.
 * Fingerprint: `ad_svc_acct:{objectSid}`.
 */
export class AdServiceAccountFamily implements SourceFamily {
  readonly sourceType = 'ad_svc_acct';
  readonly identityType = 'svc_acct';
  readonly keyAttributes = ['objectSid'];
  readonly keySeparator = '|';

  normalize(raw: RawAttributes): NormalizedRecord {
    const spn =
      raw.servicePrincipalName === undefined ? undefined : toStringList(raw.servicePrincipalName);
    const hint = spn?.map(hostFromSpn).find((h) => h !== undefined);
    return {
      identityType: this.identityType,
      displayName: firstString(raw, 'sAMAccountName', 'cn') ?? 'Unknown',
      attributes: compact({
        sam_account_name: firstString(raw, 'sAMAccountName'),
        dn: firstString(raw, 'distinguishedName'),
        object_sid: firstString(raw, 'objectSid'),
        spn,
        enabled: accountEnabled(raw),
        password_last_set: toIso(raw.pwdLastSet ?? raw.passwordLastSet),
        last_logon: toIso(raw.lastLogonTimestamp ?? raw.lastLogon),
        linked_system_hint: hint,
      }),
    };
  }
}
