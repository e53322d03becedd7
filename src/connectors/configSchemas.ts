import { z } from 'zod';
import type { ConnectorType } from '../core/types.js';
import { ValidationError } from '../core/errors.js';

export const DEFAULT_LDAP_FILTER = '(&(objectCategory=person)(objectClass=user)(servicePrincipalName=*))';

const batchSize = z.number().int().positive().max(10_000).default(500);

export const adLdapConfigSchema = z
  .object({
    url: z.string().url().optional(),
    server: z.string().min(1).optional(),
    port: z.number().int().positive().max(65_535).optional(),
    use_ssl: z.boolean().default(false),
    bind_dn: z.string().min(1),
    bind_password: z.string().min(1),
    search_base: z.string().min(1),
    search_filter: z.string().min(1).default(DEFAULT_LDAP_FILTER),
    batch_size: batchSize,
    timeout_ms: z.number().int().positive().default(30_000),
    tls_reject_unauthorized: z.boolean().default(true),
  })
  .strict()
  .refine((c) => c.url !== undefined || c.server !== undefined, {
    message: 'either url or server is required',
    path: ['server'],
  });

export const adcsFileConfigSchema = z
  .object({
    file_path: z.string().min(1),
    format: z.enum(['auto', 'csv', 'json']).default('auto'),
    batch_size: batchSize,
  })
  .strict();

export const adcsRemoteConfigSchema = z
  .object({
    collector_url: z.string().url(),
    api_token: z.string().min(1).optional(),
    mode: z.enum(['inventory', 'inventory_san']).default('inventory'),
    since_days: z.number().int().positive().default(30),
    max_records: z.number().int().positive().default(10_000),
    max_san_fetch: z.number().int().nonnegative().default(500),
    poll_interval_ms: z.number().int().positive().default(2_000),
    batch_size: batchSize,
  })
  .strict();

export const connectorConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ad_ldap'), config: adLdapConfigSchema }),
  z.object({ type: z.literal('adcs_file'), config: adcsFileConfigSchema }),
  z.object({ type: z.literal('adcs_remote'), config: adcsRemoteConfigSchema }),
]);

export type TypedConnectorConfig = z.infer<typeof connectorConfigSchema>;
export type ConnectorConfigFor<T extends ConnectorType> = Extract<TypedConnectorConfig, { type: T }>['config'];
export type AdLdapConfig = ConnectorConfigFor<'ad_ldap'>;
export type AdcsFileConfig = ConnectorConfigFor<'adcs_file'>;
export type AdcsRemoteConfig = ConnectorConfigFor<'adcs_remote'>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path[0] === 'config' ? issue.path.slice(1) : issue.path;
      return path.length > 0 ? `${path.join('.')}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate a connector config against its type's schema, filling defaults.
 * @throws ValidationError listing every issue
 */
export function parseConnectorConfig(type: ConnectorType, config: unknown): TypedConnectorConfig {
  const parsed = connectorConfigSchema.safeParse({ type, config });
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${type} config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Recursively freezes a value in place. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) deepFreeze(inner);
  }
  return value;
}
