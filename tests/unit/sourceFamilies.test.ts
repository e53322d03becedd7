import { describe, it, expect } from 'vitest';
import { AdServiceAccountFamily, AdcsCertificateFamily, SourceFamilyRegistry } from '../../src/sources/index.js';
import { UnsupportedSourceTypeError } from '../../src/core/errors.js';

describe('AdServiceAccountFamily', () => {
  const family = new AdServiceAccountFamily();

  it('maps directory attributes to the identity snapshot', () => {
    const result = family.normalize({
      sAMAccountName: 'svc_backup',
      distinguishedName: 'CN=svc_backup,OU=Service,DC=test,DC=local',
      objectSid: 'S-1-5-21-1-2-3-1105',
      servicePrincipalName: ['MSSQLSvc/db01.test.local:1433'],
      userAccountControl: 514,
      pwdLastSet: '2024-01-15T10:00:00Z',
    });
    expect(result.identityType).toBe('svc_acct');
    expect(result.displayName).toBe('svc_backup');
    expect(result.attributes).toEqual({
      sam_account_name: 'svc_backup',
      dn: 'CN=svc_backup,OU=Service,DC=test,DC=local',
      object_sid: 'S-1-5-21-1-2-3-1105',
      spn: ['MSSQLSvc/db01.test.local:1433'],
      enabled: false,
      password_last_set: '2024-01-15T10:00:00.000Z',
      linked_system_hint: 'db01.test.local',
    });
  });

  it('prefers the decoded enabled flag over raw userAccountControl', () => {
    const result = family.normalize({ objectSid: 'S-1-5-21-1', userAccountControl: 514, userAccountControl_enabled: 'true' });
    expect(result.attributes.enabled).toBe(true);
  });

  it('falls back to cn and then Unknown for the display name', () => {
    expect(family.normalize({ objectSid: 'S-1', cn: 'Backup Service' }).displayName).toBe('Backup Service');
    expect(family.normalize({ objectSid: 'S-1' }).displayName).toBe('Unknown');
  });
});

describe('AdcsCertificateFamily', () => {
  const family = new AdcsCertificateFamily();

  it('splits CSV style SAN strings and takes the first host as hint', () => {
    const result = family.normalize({
      issuer_dn: 'CN=Test CA,DC=test,DC=local',
      serial_number: '1A2B',
      subject_dn: 'CN=web01.test.local,OU=Servers,DC=test,DC=local',
      not_after: '2026-12-31T00:00:00Z',
      san: 'web01.test.local; 10.0.0.5',
    });
    expect(result.identityType).toBe('cert');
    expect(result.displayName).toBe('CN=web01.test.local,OU=Servers,DC=test,DC=local');
    expect(result.attributes).toEqual({
      subject_dn: 'CN=web01.test.local,OU=Servers,DC=test,DC=local',
      issuer_dn: 'CN=Test CA,DC=test,DC=local',
      serial_number: '1A2B',
      not_after: '2026-12-31T00:00:00.000Z',
      san: ['web01.test.local', '10.0.0.5'],
      linked_system_hint: 'web01.test.local',
    });
  });

  it('only takes host SAN entries as linked system hints', () => {
    const result = family.normalize({
      issuer_dn: 'CN=CA',
      serial_number: '01',
      san: [
        { type: 'rfc822Name', value: 'ops@test.local' },
        { type: 'dNSName', value: 'api.test.local' },
      ],
    });
    expect(result.attributes.san).toEqual(['ops@test.local', 'api.test.local']);
    expect(result.attributes.linked_system_hint).toBe('api.test.local');
    expect(result.displayName).toBe('Unknown Cert');
  });

  it('uses a dotted subject CN when there is no SAN', () => {
    const hinted = family.normalize({ issuer_dn: 'CN=CA', serial_number: '02', subject_dn: 'CN=app.test.local' });
    expect(hinted.attributes.linked_system_hint).toBe('app.test.local');
    const plain = family.normalize({ issuer_dn: 'CN=CA', serial_number: '03', subject_dn: 'CN=Code Signing' });
    expect(plain.attributes).not.toHaveProperty('linked_system_hint');
    expect(plain.attributes).not.toHaveProperty('san');
  });
});

describe('SourceFamilyRegistry', () => {
  it('resolves canonical names and aliases', () => {
    expect(SourceFamilyRegistry.resolve('ad_service_account')).toBe('ad_svc_acct');
    expect(SourceFamilyRegistry.resolve('adcs_cert')).toBe('adcs_cert');
    expect(SourceFamilyRegistry.resolve('gcp_sa')).toBeUndefined();
  });

  it('throws for unknown families', () => {
    expect(() => SourceFamilyRegistry.get('gcp_sa')).toThrow(UnsupportedSourceTypeError);
    expect(SourceFamilyRegistry.getAvailableTypes()).toEqual(['ad_svc_acct', 'adcs_cert']);
  });
});
