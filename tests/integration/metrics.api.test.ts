import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { closeDb } from '../../src/db/client.js';
import { createApp, createEnclave, createFileConnector, type TestApp } from '../utils/app.js';

let app: TestApp;

beforeAll(async () => {
  app = await createApp();
});

afterAll(async () => {
  await app.close();
  closeDb();
});

describe('operational endpoints', () => {
  it('reports health with job and scheduler info', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.status).toBe('ok');
    expect(body).toHaveProperty('build.version');
    expect(body.jobs).toMatchObject({ activeJobs: 0, completed: 0, failed: 0 });
    expect(body.scheduler.running).toBe(false);
  });

  it('exposes Prometheus counters for ingested findings', async () => {
    const enclaveId = await createEnclave(app, 'corp');
    const connectorId = await createFileConnector(app, enclaveId);
    const ingest = await app.inject({
      method: 'POST',
      url: `/v1/enclaves/${enclaveId}/connectors/${connectorId}/ingest`,
      payload: {
        records: [
          { issuer_dn: 'CN=Test CA', serial_number: '01' },
          { issuer_dn: 'CN=Test CA', serial_number: '02' },
        ],
      },
    });
    expect(ingest.statusCode).toBe(201);

    const res = await app.inject({ method: 'GET', url: '/metrics' });
    expect(res.headers['content-type']).toContain('text/plain');
    const metrics = res.body;
    expect(metrics).toContain('findings_recorded_total{source_type="adcs_cert"} 2');
    expect(metrics).toContain('identities_upserted_total{action="created"} 2');
    expect(metrics).toContain('ingest_batches_total{mode="implicit"} 1');
    expect(metrics).toContain('jobs_total{status="completed"} 1');
  });
});
