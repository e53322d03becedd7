import cronParser from 'cron-parser';
import type { Connector, Enclave, Job, Page, UnresolvedFinding } from '../core/types.js';
import { EnclaveScopeError, ValidationError } from '../core/errors.js';
import { EnclaveRepository, type CreateEnclaveInput, type UpdateEnclaveInput } from '../repositories/enclaveRepository.js';
import { ConnectorRepository } from '../repositories/connectorRepository.js';
import { JobRepository } from '../repositories/jobRepository.js';
import { FindingRepository } from '../repositories/findingRepository.js';
import {
  createDefaultFetchers,
  dispatchTest,
  errorMessage,
  parseConnectorConfig,
  redactConfig,
  resolveConnectorType,
  restoreRedacted,
  type ConnectionTestResult,
  type ConnectorFetchers,
} from '../connectors/index.js';
import { getLogger } from '../utils/logging.js';

export interface CreateConnectorRequest {
  type: string;
  name: string;
  config: Record<string, unknown>;
  cronExpression?: string | null;
  enabled?: boolean;
}

export interface UpdateConnectorRequest {
  name?: string;
  config?: Record<string, unknown>;
  cronExpression?: string | null;
  enabled?: boolean;
}

/** Connector as returned to callers: secret config values replaced. */
export type ConnectorView = Omit<Connector, 'config'> & { config: Record<string, unknown> };

export function toConnectorView(connector: Connector): ConnectorView {
  return { ...connector, config: redactConfig(connector.type, connector.config) };
}

/**
 * Validates a 5-field cron expression.
 * @throws ValidationError
 */
export function validateCron(expression: string): string {
  const trimmed = expression.trim();
  if (trimmed.split(/\s+/).length !== 5) {
    throw new ValidationError(`Invalid cron expression "${expression}": expected 5 fields`);
  }
  try {
    cronParser.parseExpression(trimmed, { tz: 'UTC' });
  } catch (err) {
    throw new ValidationError(`Invalid cron expression "${expression}": ${errorMessage(err)}`);
  }
  return trimmed;
}

export class EnclaveService {
  constructor(private readonly enclaves = new EnclaveRepository()) {}

  create(data: CreateEnclaveInput): Promise<Enclave> {
    return this.enclaves.create(data);
  }

  get(id: string): Promise<Enclave> {
    return this.enclaves.get(id);
  }

  list(): Promise<Enclave[]> {
    return this.enclaves.list();
  }

  update(id: string, data: UpdateEnclaveInput): Promise<Enclave> {
    return this.enclaves.update(id, data);
  }

  async delete(id: string): Promise<void> {
    await this.enclaves.delete(id);
    getLogger().info({ enclaveId: id }, 'enclave-deleted');
  }
}

export class ConnectorService {
  private readonly fetchers: ConnectorFetchers;

  constructor(
    private readonly enclaves = new EnclaveRepository(),
    private readonly connectors = new ConnectorRepository(),
    private readonly jobs = new JobRepository(),
    fetchers: Partial<ConnectorFetchers> = {},
    private readonly findings = new FindingRepository(),
  ) {
    this.fetchers = createDefaultFetchers(fetchers);
  }

  async create(enclaveId: string, req: CreateConnectorRequest): Promise<Connector> {
    await this.enclaves.get(enclaveId);
    const type = resolveConnectorType(req.type);
    if (!type) throw new ValidationError(`Unknown connector type: ${req.type}`);
    const typed = parseConnectorConfig(type, req.config);
    const connector = await this.connectors.create({
      enclaveId,
      type,
      name: req.name,
      config: typed.config,
      cronExpression: req.cronExpression ? validateCron(req.cronExpression) : null,
      enabled: req.enabled,
    });
    getLogger().info({ connectorId: connector.id, enclaveId, type }, 'connector-created');
    return connector;
  }

  async get(enclaveId: string, id: string): Promise<Connector> {
    const connector = await this.connectors.get(id);
    if (connector.enclaveId !== enclaveId) throw new EnclaveScopeError('Connector', id);
    return connector;
  }

  async list(enclaveId: string): Promise<Connector[]> {
    await this.enclaves.get(enclaveId);
    return this.connectors.listByEnclave(enclaveId);
  }

  /** Config is re-validated against the stored type; redacted secrets keep their stored value. */
  async update(enclaveId: string, id: string, req: UpdateConnectorRequest): Promise<Connector> {
    const current = await this.get(enclaveId, id);
    const config = req.config
      ? parseConnectorConfig(current.type, restoreRedacted(current.type, req.config, current.config)).config
      : undefined;
    let cronExpression: string | null | undefined = req.cronExpression;
    if (typeof cronExpression === 'string') {
      cronExpression = cronExpression.trim() === '' ? null : validateCron(cronExpression);
    }
    const updated = await this.connectors.update(id, {
      name: req.name,
      config,
      cronExpression,
      enabled: req.enabled,
    });
    getLogger().info({ connectorId: id, enclaveId }, 'connector-updated');
    return updated;
  }

  /** Soft delete. An in-flight job is left to finish. */
  async delete(enclaveId: string, id: string): Promise<void> {
    await this.get(enclaveId, id);
    await this.connectors.softDelete(id);
    getLogger().info({ connectorId: id, enclaveId }, 'connector-deleted');
  }

  async listJobs(enclaveId: string, id: string, page: Page = {}): Promise<Job[]> {
    await this.get(enclaveId, id);
    return this.jobs.listByConnector(id, page);
  }

  async getJob(enclaveId: string, jobId: string): Promise<Job> {
    const job = await this.jobs.get(jobId);
    const connector = await this.connectors.get(job.connectorId, { includeDeleted: true });
    if (connector.enclaveId !== enclaveId) throw new EnclaveScopeError('Job', jobId);
    return job;
  }

  /** Findings of the job that could not be fingerprinted, with the reason. */
  async listUnresolved(enclaveId: string, jobId: string): Promise<UnresolvedFinding[]> {
    await this.getJob(enclaveId, jobId);
    return this.findings.listUnresolvedByJob(jobId);
  }

  async testConnection(enclaveId: string, id: string): Promise<ConnectionTestResult> {
    const connector = await this.get(enclaveId, id);
    const result = await dispatchTest(this.fetchers, parseConnectorConfig(connector.type, connector.config));
    getLogger().info({ connectorId: id, ok: result.ok }, 'connector-tested');
    return result;
  }
}
