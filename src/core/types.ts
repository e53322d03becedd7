// Domain model interfaces, decoupled from the storage row shapes

export const SOURCE_TYPES = ['ad_svc_acct', 'adcs_cert'] as const;
export const IDENTITY_TYPES = ['svc_acct', 'cert'] as const;
export const CONNECTOR_TYPES = ['ad_ldap', 'adcs_file', 'adcs_remote'] as const;
export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed'] as const;
export const JOB_TRIGGERS = ['schedule', 'manual', 'push'] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];
export type IdentityType = (typeof IDENTITY_TYPES)[number];
export type ConnectorType = (typeof CONNECTOR_TYPES)[number];
export type JobStatus = (typeof JOB_STATUSES)[number];
export type JobTrigger = (typeof JOB_TRIGGERS)[number];

function oneOf<T extends string>(values: readonly T[]) {
  return (value: string): value is T => values.some((v) => v === value);
}

export const isSourceType = oneOf(SOURCE_TYPES);
export const isIdentityType = oneOf(IDENTITY_TYPES);
export const isConnectorType = oneOf(CONNECTOR_TYPES);
export const isJobStatus = oneOf(JOB_STATUSES);
export const isJobTrigger = oneOf(JOB_TRIGGERS);

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export type RawAttributes = Record<string, unknown>;
export type IdentityAttributes = Record<string, unknown>;

export interface Enclave {
  id: string;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Connector {
  id: string;
  enclaveId: string;
  type: ConnectorType;
  name: string;
  config: Record<string, unknown>;
  cronExpression: string | null;
  enabled: boolean;
  lastRunAt: Date | null;
  lastRunStatus: JobStatus | null;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export interface Job {
  id: string;
  connectorId: string;
  status: JobStatus;
  triggeredBy: JobTrigger;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  findingsCount: number;
  unresolvedCount: number;
  identitiesCreated: number;
  identitiesUpdated: number;
  errorMessage: string | null;
}

export interface Finding {
  id: string;
  jobId: string;
  connectorId: string;
  enclaveId: string;
  sourceType: SourceType;
  rawAttributes: RawAttributes;
  contentHash: string;
  discoveredAt: Date;
  sequence: number;
}

export interface RiskFactor {
  factor: string;
  points: number;
}

export interface Identity {
  id: string;
  enclaveId: string;
  fingerprint: string;
  identityType: IdentityType;
  sourceType: SourceType;
  displayName: string;
  owner: string | null;
  linkedSystem: string | null;
  riskScore: number;
  riskFactors: RiskFactor[];
  attributes: IdentityAttributes;
  firstSeen: Date;
  lastSeen: Date;
  attributesObservedAt: Date;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProvenanceLink {
  identityId: string;
  findingId: string;
  jobId: string;
  discoveredAt: Date;
  attributesChanged: boolean;
  linkedAt: Date;
}

export interface UnresolvedFinding {
  findingId: string;
  jobId: string;
  reason: string;
  recordedAt: Date;
}

export interface Page {
  limit?: number;
  offset?: number;
}
