import { describe, it, expect } from 'vitest';
import {
  LDAP_ATTRIBUTES,
  LdapFetcher,
  entryToRecord,
  ldapUrl,
  type LdapClient,
  type LdapClientOptions,
  type LdapEntry,
  type LdapSearchOptions,
} from '../../src/connectors/LdapFetcher.js';
import { adLdapConfigSchema } from '../../src/connectors/configSchemas.js';
import { ConnectorFetchError } from '../../src/core/errors.js';
import { fakeFetchContext } from '../utils/fetchContext.js';

const SID_BYTES = Buffer.from([1, 5, 0, 0, 0, 0, 0, 5, 21, 0, 0, 0, 1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0, 0xf4, 1, 0, 0]);

const config = adLdapConfigSchema.parse({
  server: 'dc01.test.local',
  bind_dn: 'CN=reader,DC=test,DC=local',
  bind_password: 'test-secret',
  search_base: 'DC=test,DC=local',
  batch_size: 1,
});

class FakeLdapClient implements LdapClient {
  bindCalls: Array<[string, string]> = [];
  searches: Array<{ base: string; options: LdapSearchOptions }> = [];
  unbound = false;

  constructor(
    private readonly entries: LdapEntry[],
    private readonly bindError?: Error,
  ) {}

  async bind(dn: string, password: string) {
    this.bindCalls.push([dn, password]);
    if (this.bindError) throw this.bindError;
  }

  async search(base: string, options: LdapSearchOptions) {
    this.searches.push({ base, options });
    return { searchEntries: this.entries };
  }

  async unbind() {
    this.unbound = true;
  }
}

function fetcherWith(client: FakeLdapClient) {
  const opened: LdapClientOptions[] = [];
  const fetcher = new LdapFetcher((options) => {
    opened.push(options);
    return client;
  });
  return { fetcher, opened };
}

const entries: LdapEntry[] = [
  {
    dn: 'CN=svc_sql,OU=Service,DC=test,DC=local',
    sAMAccountName: 'svc_sql',
    objectSid: SID_BYTES,
    servicePrincipalName: 'MSSQLSvc/db01.test.local:1433',
    userAccountControl: '514',
    pwdLastSet: '133485408000000000',
    lastLogonTimestamp: '0',
  },
  { dn: 'CN=svc_web,OU=Service,DC=test,DC=local', sAMAccountName: 'svc_web', objectSid: 'S-1-5-21-1-2-3-501' },
];

describe('entryToRecord', () => {
  it('decodes SIDs, account flags and FILETIME values', () => {
    expect(entryToRecord(entries[0])).toEqual({
      distinguishedName: 'CN=svc_sql,OU=Service,DC=test,DC=local',
      sAMAccountName: 'svc_sql',
      objectSid: 'S-1-5-21-1-2-3-500',
      servicePrincipalName: ['MSSQLSvc/db01.test.local:1433'],
      userAccountControl_enabled: false,
      pwdLastSet: '2024-01-01T00:00:00.000Z',
      lastLogonTimestamp: null,
    });
  });

  it('treats accounts without flags as enabled', () => {
    expect(entryToRecord(entries[1]).userAccountControl_enabled).toBe(true);
  });
});

describe('LdapFetcher', () => {
  it('binds, searches and submits records in batches', async () => {
    const client = new FakeLdapClient(entries);
    const { fetcher, opened } = fetcherWith(client);
    const { ctx, submitted } = fakeFetchContext(config);
    await fetcher.fetch(ctx);

    expect(opened[0]).toMatchObject({ url: 'ldap://dc01.test.local:389', timeout: 30_000 });
    expect(client.bindCalls).toEqual([['CN=reader,DC=test,DC=local', 'test-secret']]);
    expect(client.searches).toEqual([
      {
        base: 'DC=test,DC=local',
        options: {
          scope: 'sub',
          filter: config.search_filter,
          attributes: LDAP_ATTRIBUTES,
          paged: { pageSize: 1 },
          explicitBufferAttributes: ['objectSid'],
        },
      },
    ]);
    expect(submitted.map((s) => s.sourceType)).toEqual(['ad_svc_acct', 'ad_svc_acct']);
    expect(submitted[1].records[0].objectSid).toBe('S-1-5-21-1-2-3-501');
    expect(client.unbound).toBe(true);
  });

  it('wraps bind failures and still unbinds', async () => {
    const client = new FakeLdapClient(entries, new Error('invalid credentials'));
    const { fetcher } = fetcherWith(client);
    const { ctx, submitted } = fakeFetchContext(config);
    const failure = fetcher.fetch(ctx);
    await expect(failure).rejects.toBeInstanceOf(ConnectorFetchError);
    await expect(failure).rejects.toThrow('ad_ldap: bind to ldap://dc01.test.local:389 failed: invalid credentials');
    expect(submitted).toEqual([]);
    expect(client.unbound).toBe(true);
  });

  it('reports connection tests', async () => {
    const ok = await fetcherWith(new FakeLdapClient([])).fetcher.testConnection(config);
    expect(ok).toEqual({ ok: true, message: 'bound to ldap://dc01.test.local:389 as CN=reader,DC=test,DC=local' });
    const bad = await fetcherWith(new FakeLdapClient([], new Error('timeout'))).fetcher.testConnection(config);
    expect(bad).toEqual({ ok: false, message: 'ad_ldap: bind to ldap://dc01.test.local:389 failed: timeout' });
  });

  it('builds URLs from server settings', () => {
    expect(ldapUrl({ ...config, use_ssl: true })).toBe('ldaps://dc01.test.local:636');
    expect(ldapUrl({ ...config, port: 3268 })).toBe('ldap://dc01.test.local:3268');
    expect(ldapUrl({ ...config, url: 'ldaps://gc.test.local:3269' })).toBe('ldaps://gc.test.local:3269');
  });
});
