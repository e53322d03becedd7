import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { closeDb } from '../../src/db/client.js';
import { JobRunner } from '../../src/services/jobRunner.js';
import type { AdcsFileConfig, ConnectorFetcher, FetchContext } from '../../src/connectors/index.js';
import { createApp, createEnclave, createFileConnector, type TestApp } from '../utils/app.js';

class GatedFileFetcher implements ConnectorFetcher<'adcs_file'> {
  readonly type = 'adcs_file';
  private release: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async fetch(ctx: FetchContext<AdcsFileConfig>) {
    await this.gate;
    await ctx.submitBatch('adcs_cert', [{ issuer_dn: 'CN=Test CA', serial_number: '0A' }]);
  }

  async testConnection(config: AdcsFileConfig) {
    return { ok: true, message: `${config.file_path} reachable` };
  }

  open() {
    this.release();
  }
}

const fetcher = new GatedFileFetcher();
const runner = new JobRunner({ fetchers: { adcs_file: fetcher } });
let app: TestApp;
let enclaveId: string;

beforeAll(async () => {
  app = await createApp({ deps: { runner }, fetchers: { adcs_file: fetcher } });
  enclaveId = await createEnclave(app, 'corp');
});

afterAll(async () => {
  await app.close();
  closeDb();
});

describe('connector endpoints', () => {
  it('redacts secrets in responses', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/v1/enclaves/${enclaveId}/connectors`,
      payload: {
        type: 'ad_ldap',
        name: 'dc01',
        config: {
          server: 'dc01.test.local',
          bind_dn: 'CN=reader,DC=test,DC=local',
          bind_password: 'test-secret',
          search_base: 'DC=test,DC=local',
        },
        cronExpression: '0 3 * * *',
      },
    });
    expect(res.statusCode).toBe(201);
    const { connector } = res.json();
    expect(connector).toMatchObject({ type: 'ad_ldap', cronExpression: '0 3 * * *', enabled: true });
    expect(connector.config.bind_password).toBe('********');

    const read = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/connectors/${connector.id}` });
    expect(read.json().connector.config.bind_password).toBe('********');
  });

  it('rejects unknown types and bad cron expressions', async () => {
    const unknown = await app.inject({
      method: 'POST',
      url: `/v1/enclaves/${enclaveId}/connectors`,
      payload: { type: 'okta', name: 'x', config: {} },
    });
    expect(unknown.statusCode).toBe(400);
    expect(unknown.json().error).toEqual({ code: 'VALIDATION_ERROR', message: 'Unknown connector type: okta' });

    const cron = await app.inject({
      method: 'POST',
      url: `/v1/enclaves/${enclaveId}/connectors`,
      payload: { type: 'adcs_file', name: 'x', config: { file_path: '/tmp/x.csv' }, cronExpression: 'hourly' },
    });
    expect(cron.statusCode).toBe(400);
    expect(cron.json().error.message).toBe('Invalid cron expression "hourly": expected 5 fields');
  });

  it('returns 403 for a connector of another enclave', async () => {
    const connectorId = await createFileConnector(app, enclaveId, 'scoped');
    const other = await createEnclave(app, 'lab');
    const res = await app.inject({ method: 'GET', url: `/v1/enclaves/${other}/connectors/${connectorId}` });
    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('ENCLAVE_SCOPE');
  });

  it('tests a connection', async () => {
    const connectorId = await createFileConnector(app, enclaveId, 'reachability');
    const res = await app.inject({ method: 'POST', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/test` });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, message: '/tmp/nhi-test-certs.csv reachable' });
  });

  it('runs a connector once at a time and exposes the job', async () => {
    const connectorId = await createFileConnector(app, enclaveId, 'runner');
    const first = await app.inject({ method: 'POST', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/run` });
    expect(first.statusCode).toBe(202);
    const job = first.json().job;
    expect(job).toMatchObject({ connectorId, status: 'pending', triggeredBy: 'manual' });

    const second = await app.inject({ method: 'POST', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/run` });
    expect(second.statusCode).toBe(409);
    expect(second.json().error).toMatchObject({ code: 'JOB_IN_PROGRESS', activeJobId: job.id });

    fetcher.open();
    await runner.idle();

    const read = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/jobs/${job.id}` });
    expect(read.json().job).toMatchObject({ status: 'completed', findingsCount: 1, identitiesCreated: 1 });
    const jobs = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/jobs` });
    expect(jobs.json().jobs.map((j: { id: string }) => j.id)).toEqual([job.id]);
  });

  it('soft deletes a connector and keeps its jobs readable', async () => {
    const connectorId = await createFileConnector(app, enclaveId, 'retired');
    const run = await app.inject({ method: 'POST', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/run` });
    const jobId = run.json().job.id;
    await runner.idle();

    const del = await app.inject({ method: 'DELETE', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}` });
    expect(del.statusCode).toBe(204);
    const gone = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}` });
    expect(gone.statusCode).toBe(404);
    const job = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/jobs/${jobId}` });
    expect(job.statusCode).toBe(200);
    expect(job.json().job.status).toBe('completed');
  });
});
