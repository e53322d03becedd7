import type { ConnectorType } from '../core/types.js';
import type { TypedConnectorConfig } from './configSchemas.js';
import type { ConnectionTestResult, ConnectorFetcher, FetchContext } from './ConnectorFetcher.js';
import { LdapFetcher } from './LdapFetcher.js';
import { AdcsFileFetcher } from './AdcsFileFetcher.js';
import { AdcsRemoteFetcher } from './AdcsRemoteFetcher.js';

export type ConnectorFetchers = { [T in ConnectorType]: ConnectorFetcher<T> };

export type BaseFetchContext = Omit<FetchContext<unknown>, 'config'>;

export function createDefaultFetchers(overrides: Partial<ConnectorFetchers> = {}): ConnectorFetchers {
  return {
    ad_ldap: overrides.ad_ldap ?? new LdapFetcher(),
    adcs_file: overrides.adcs_file ?? new AdcsFileFetcher(),
    adcs_remote: overrides.adcs_remote ?? new AdcsRemoteFetcher(),
  };
}

/** Hands the typed config to the fetcher registered for its connector type. */
export function dispatchFetch(
  fetchers: ConnectorFetchers,
  typed: TypedConnectorConfig,
  base: BaseFetchContext,
): Promise<void> {
  switch (typed.type) {
    case 'ad_ldap':
      return fetchers.ad_ldap.fetch({ ...base, config: typed.config });
    case 'adcs_file':
      return fetchers.adcs_file.fetch({ ...base, config: typed.config });
    case 'adcs_remote':
      return fetchers.adcs_remote.fetch({ ...base, config: typed.config });
  }
}

export function dispatchTest(fetchers: ConnectorFetchers, typed: TypedConnectorConfig): Promise<ConnectionTestResult> {
  switch (typed.type) {
    case 'ad_ldap':
      return fetchers.ad_ldap.testConnection(typed.config);
    case 'adcs_file':
      return fetchers.adcs_file.testConnection(typed.config);
    case 'adcs_remote':
      return fetchers.adcs_remote.testConnection(typed.config);
  }
}
