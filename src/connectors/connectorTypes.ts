import { isConnectorType, type ConnectorType, type SourceType } from '../core/types.js';

/** Alternate connector type codes accepted on input. */
const CONNECTOR_TYPE_ALIASES: Record<string, ConnectorType> = {
  ad_service_account: 'ad_ldap',
  adcs_certificate: 'adcs_remote',
};

/** Source family every record from a connector type belongs to. */
export const CONNECTOR_SOURCE_FAMILY: Record<ConnectorType, SourceType> = {
  ad_ldap: 'ad_svc_acct',
  adcs_file: 'adcs_cert',
  adcs_remote: 'adcs_cert',
};

/** Config keys never returned in public connector views. */
export const SECRET_CONFIG_KEYS: Record<ConnectorType, readonly string[]> = {
  ad_ldap: ['bind_password'],
  adcs_file: [],
  adcs_remote: ['api_token'],
};

export const REDACTED = '********';

export function resolveConnectorType(name: string): ConnectorType | undefined {
  const canonical = CONNECTOR_TYPE_ALIASES[name] ?? name;
  return isConnectorType(canonical) ? canonical : undefined;
}

export function redactConfig(type: ConnectorType, config: Record<string, unknown>): Record<string, unknown> {
  const out = { ...config };
  for (const key of SECRET_CONFIG_KEYS[type]) {
    if (out[key] !== undefined) out[key] = REDACTED;
  }
  return out;
}

/**
 * Replace redacted placeholders sent back by a client with the stored secret,
 * so a config read from the API can be edited and submitted as-is.
 */
export function restoreRedacted(
  type: ConnectorType,
  incoming: Record<string, unknown>,
  stored: Record<string, unknown>,
): Record<string, unknown> {
  const out = { ...incoming };
  for (const key of SECRET_CONFIG_KEYS[type]) {
    if (out[key] === REDACTED && stored[key] !== undefined) out[key] = stored[key];
  }
  return out;
}
