export * from './connectorTypes.js';
export * from './configSchemas.js';
export * from './ConnectorFetcher.js';
export * from './ConnectorFetcherRegistry.js';
export { LdapFetcher, entryToRecord, type LdapClient, type LdapClientFactory, type LdapEntry } from './LdapFetcher.js';
export { AdcsFileFetcher } from './AdcsFileFetcher.js';
export { AdcsRemoteFetcher } from './AdcsRemoteFetcher.js';
export { parseCertificateCsv, parseRecordsJson } from './csv.js';
export { sidToString } from './sid.js';
