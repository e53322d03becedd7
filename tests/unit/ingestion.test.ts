import { describe, it, expect, beforeEach } from 'vitest';
import { createTestStore, seedConnector, type TestStore } from '../utils/db.js';
import type { Connector } from '../../src/core/types.js';
import {
  DuplicateJobInProgressError,
  EnclaveScopeError,
  JobStateError,
  ValidationError,
} from '../../src/core/errors.js';
import { NotFoundError } from '../../src/repositories/errors.js';
import { JobRunner } from '../../src/services/jobRunner.js';
import { IngestionService } from '../../src/services/ingestionService.js';
import { NormalizationEngine } from '../../src/services/normalizationEngine.js';

let store: TestStore;
let connector: Connector;
let ingestion: IngestionService;

const certs = [
  { issuer_dn: 'CN=Test CA', serial_number: '01', subject_dn: 'CN=web01.test.local', san: ['web01.test.local'] },
  { issuer_dn: 'CN=Test CA', serial_number: '02', subject_dn: 'CN=web02.test.local' },
];

beforeEach(async () => {
  store = createTestStore();
  connector = await seedConnector(store, 'adcs_file');
  const runner = new JobRunner({
    jobs: store.jobs,
    connectors: store.connectors,
    findings: store.findings,
    engine: new NormalizationEngine({
      identities: store.identities,
      findings: store.findings,
      provenance: store.provenance,
      jobs: store.jobs,
      connectors: store.connectors,
    }),
  });
  ingestion = new IngestionService(runner, store.connectors, store.jobs);
});

describe('IngestionService', () => {
  it('runs a batch without a job id as a completed push job', async () => {
    const result = await ingestion.ingest(connector.enclaveId, connector.id, { records: certs });
    expect(result).toMatchObject({ findingsCreated: 2, unresolved: 0 });
    const job = await store.jobs.get(result.jobId);
    expect(job).toMatchObject({ status: 'completed', triggeredBy: 'push', findingsCount: 2, identitiesCreated: 2 });
  });

  it('counts unresolved records without failing the job', async () => {
    const result = await ingestion.ingest(connector.enclaveId, connector.id, {
      records: [...certs, { issuer_dn: 'CN=Test CA' }],
    });
    expect(result.unresolved).toBe(1);
    expect((await store.jobs.get(result.jobId)).status).toBe('completed');
  });

  it('appends batches to an open job', async () => {
    const job = await store.jobs.createIfIdle(connector.id, 'push');
    await ingestion.ingest(connector.enclaveId, connector.id, { jobId: job.id, records: [certs[0]] });
    await ingestion.ingest(connector.enclaveId, connector.id, { jobId: job.id, records: [certs[1]] });
    expect(await store.jobs.get(job.id)).toMatchObject({ status: 'running', findingsCount: 2, identitiesCreated: 2 });
  });

  it('keeps a push job open across batches until the caller closes it', async () => {
    const opened = await ingestion.ingest(connector.enclaveId, connector.id, { records: [certs[0]], complete: false });
    expect(opened).toMatchObject({ findingsCreated: 1, jobStatus: 'running' });
    const appended = await ingestion.ingest(connector.enclaveId, connector.id, {
      jobId: opened.jobId,
      records: [certs[1]],
    });
    expect(appended.jobStatus).toBe('running');
    const closed = await ingestion.ingest(connector.enclaveId, connector.id, {
      jobId: opened.jobId,
      records: [],
      complete: true,
    });
    expect(closed).toMatchObject({ jobId: opened.jobId, findingsCreated: 0, jobStatus: 'completed' });
    expect(await store.jobs.get(opened.jobId)).toMatchObject({
      status: 'completed',
      findingsCount: 2,
      identitiesCreated: 2,
    });
    expect((await store.connectors.get(connector.id)).lastRunStatus).toBe('completed');
    await expect(ingestion.ingest(connector.enclaveId, connector.id, { records: certs })).resolves.toMatchObject({
      jobStatus: 'completed',
    });
  });

  it('leaves jobs started by the runner to the runner', async () => {
    const job = await store.jobs.createIfIdle(connector.id, 'manual');
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { jobId: job.id, records: certs }),
    ).rejects.toBeInstanceOf(JobStateError);
    expect((await store.jobs.get(job.id)).status).toBe('pending');

    await store.jobs.claim(job.id);
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { jobId: job.id, records: certs, complete: true }),
    ).rejects.toThrow(`Job ${job.id} was started by manual and is completed by the runner`);
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { jobId: job.id, records: certs }),
    ).resolves.toMatchObject({ findingsCreated: 2, jobStatus: 'running' });
  });

  it('refuses to append to a finished job', async () => {
    const { jobId } = await ingestion.ingest(connector.enclaveId, connector.id, { records: certs });
    await expect(ingestion.ingest(connector.enclaveId, connector.id, { jobId, records: certs })).rejects.toThrow(
      `Cannot ingest into job ${jobId} in status completed`,
    );
    await expect(ingestion.ingest(connector.enclaveId, connector.id, { jobId, records: certs })).rejects.toBeInstanceOf(
      JobStateError,
    );
  });

  it('refuses an implicit job while another is active', async () => {
    await store.jobs.createIfIdle(connector.id, 'manual');
    await expect(ingestion.ingest(connector.enclaveId, connector.id, { records: certs })).rejects.toBeInstanceOf(
      DuplicateJobInProgressError,
    );
  });

  it('validates source type and record shape', async () => {
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { sourceType: 'ad_svc_acct', records: certs }),
    ).rejects.toThrow('Source type ad_svc_acct does not match connector type adcs_file');
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { records: [certs[0], 'not-a-record'] }),
    ).rejects.toThrow(ValidationError);
    await expect(
      ingestion.ingest(connector.enclaveId, connector.id, { sourceType: 'adcs_certificate', records: certs }),
    ).resolves.toMatchObject({ findingsCreated: 2 });
  });

  it('scopes ingestion to the connector enclave', async () => {
    const other = await store.enclaves.create({ name: 'other' });
    await expect(ingestion.ingest(other.id, connector.id, { records: certs })).rejects.toBeInstanceOf(
      EnclaveScopeError,
    );
    await store.connectors.softDelete(connector.id);
    await expect(ingestion.ingest(connector.enclaveId, connector.id, { records: certs })).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it('stamps backfilled batches with the given discovery time', async () => {
    const discoveredAt = new Date('2025-06-01T00:00:00Z');
    const { jobId } = await ingestion.ingest(connector.enclaveId, connector.id, { records: [certs[0]], discoveredAt });
    const [finding] = await store.findings.listByJob(jobId);
    expect(finding.discoveredAt.toISOString()).toBe('2025-06-01T00:00:00.000Z');
    const identity = await store.identities.findByFingerprint(connector.enclaveId, 'adcs_cert:CN=Test CA|01');
    expect(identity?.firstSeen.toISOString()).toBe('2025-06-01T00:00:00.000Z');
  });
});
