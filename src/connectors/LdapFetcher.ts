import { Client } from 'ldapts';
import type { RawAttributes } from '../core/types.js';
import { ConnectorFetchError } from '../core/errors.js';
import { fromFiletime } from '../utils/time.js';
import { getLogger } from '../utils/logging.js';
import type { AdLdapConfig } from './configSchemas.js';
import {
  errorMessage,
  submitInBatches,
  type ConnectionTestResult,
  type ConnectorFetcher,
  type FetchContext,
} from './ConnectorFetcher.js';
import { sidToString } from './sid.js';

export const LDAP_ATTRIBUTES = [
  'sAMAccountName',
  'cn',
  'distinguishedName',
  'objectSid',
  'servicePrincipalName',
  'userAccountControl',
  'pwdLastSet',
  'lastLogonTimestamp',
];

// Attributes that stay lists even with a single value
const MULTI_VALUED = new Set(['servicePrincipalName']);
const FILETIME_ATTRIBUTES = new Set(['pwdLastSet', 'lastLogonTimestamp']);
const ACCOUNTDISABLE = 0x2;

export interface LdapEntry {
  dn: string;
  [attribute: string]: Buffer | Buffer[] | string | string[];
}

export interface LdapSearchOptions {
  scope: 'sub';
  filter: string;
  attributes: string[];
  paged: { pageSize: number };
  explicitBufferAttributes: string[];
}

/** The subset of the ldapts Client the fetcher uses. */
export interface LdapClient {
  bind(dn: string, password: string): Promise<void>;
  search(baseDN: string, options: LdapSearchOptions): Promise<{ searchEntries: LdapEntry[] }>;
  unbind(): Promise<void>;
}

export interface LdapClientOptions {
  url: string;
  timeout: number;
  connectTimeout: number;
  tlsOptions: { rejectUnauthorized: boolean };
}

export type LdapClientFactory = (options: LdapClientOptions) => LdapClient;

export function ldapUrl(config: AdLdapConfig): string {
  if (config.url) return config.url;
  const scheme = config.use_ssl ? 'ldaps' : 'ldap';
  const port = config.port ?? (config.use_ssl ? 636 : 389);
  return `${scheme}://${config.server ?? 'localhost'}:${port}`;
}

function textValue(value: Buffer | string): string {
  return Buffer.isBuffer(value) ? value.toString('hex') : value;
}

/** One directory entry to the raw record shape the AD source family reads. */
export function entryToRecord(entry: LdapEntry): RawAttributes {
  const record: RawAttributes = { distinguishedName: entry.dn };
  for (const [name, value] of Object.entries(entry)) {
    if (name === 'dn') continue;
    const values: Array<Buffer | string> = Array.isArray(value) ? value : [value];
    if (name === 'objectSid') {
      const [sid] = values;
      if (sid === undefined) continue;
      try {
        record.objectSid = Buffer.isBuffer(sid) ? sidToString(sid) : sid;
      } catch {
        record.objectSid = textValue(sid);
      }
      continue;
    }
    const strings = values.map(textValue);
    record[name] = MULTI_VALUED.has(name) || strings.length !== 1 ? strings : strings[0];
  }

  const uac = record.userAccountControl;
  delete record.userAccountControl;
  const flags = typeof uac === 'string' ? Number.parseInt(uac, 10) : Number.NaN;
  record.userAccountControl_enabled = Number.isNaN(flags) ? true : (flags & ACCOUNTDISABLE) === 0;

  for (const name of FILETIME_ATTRIBUTES) {
    const raw = record[name];
    if (typeof raw !== 'string') continue;
    const at = /^\d+$/.test(raw) ? fromFiletime(raw) : null;
    record[name] = at ? at.toISOString() : null;
  }
  return record;
}

export class LdapFetcher implements ConnectorFetcher<'ad_ldap'> {
  readonly type = 'ad_ldap';

  constructor(private readonly createClient: LdapClientFactory = (options) => new Client(options)) {}

  async fetch(ctx: FetchContext<AdLdapConfig>): Promise<void> {
    const { config } = ctx;
    const client = this.open(config);
    try {
      await this.bind(client, config);
      ctx.signal.throwIfAborted();
      let entries: LdapEntry[];
      try {
        const result = await client.search(config.search_base, {
          scope: 'sub',
          filter: config.search_filter,
          attributes: LDAP_ATTRIBUTES,
          paged: { pageSize: config.batch_size },
          explicitBufferAttributes: ['objectSid'],
        });
        entries = result.searchEntries;
      } catch (err) {
        throw new ConnectorFetchError('ad_ldap', `search under ${config.search_base} failed: ${errorMessage(err)}`, err);
      }
      ctx.logger.info({ jobId: ctx.jobId, entries: entries.length, url: ldapUrl(config) }, 'ldap-search-complete');
      await submitInBatches(ctx, 'ad_svc_acct', entries.map(entryToRecord), config.batch_size);
    } finally {
      await this.close(client);
    }
  }

  async testConnection(config: AdLdapConfig): Promise<ConnectionTestResult> {
    const client = this.open(config);
    try {
      await this.bind(client, config);
      return { ok: true, message: `bound to ${ldapUrl(config)} as ${config.bind_dn}` };
    } catch (err) {
      return { ok: false, message: errorMessage(err) };
    } finally {
      await this.close(client);
    }
  }

  private open(config: AdLdapConfig): LdapClient {
    return this.createClient({
      url: ldapUrl(config),
      timeout: config.timeout_ms,
      connectTimeout: config.timeout_ms,
      tlsOptions: { rejectUnauthorized: config.tls_reject_unauthorized },
    });
  }

  private async bind(client: LdapClient, config: AdLdapConfig): Promise<void> {
    try {
      await client.bind(config.bind_dn, config.bind_password);
    } catch (err) {
      throw new ConnectorFetchError('ad_ldap', `bind to ${ldapUrl(config)} failed: ${errorMessage(err)}`, err);
    }
  }

  private async close(client: LdapClient): Promise<void> {
    try {
      await client.unbind();
    } catch (err) {
      getLogger().debug({ err }, 'ldap-unbind-failed');
    }
  }
}
