import { describe, it, expect, beforeEach } from 'vitest';
import { createTestStore, seedConnector, type TestStore } from '../utils/db.js';
import type { Connector, Identity } from '../../src/core/types.js';
import { EnclaveScopeError } from '../../src/core/errors.js';
import { IdentityService } from '../../src/services/identityService.js';
import { NormalizationEngine } from '../../src/services/normalizationEngine.js';
import { IdentityRepository, type EnrichmentUpdate } from '../../src/repositories/identityRepository.js';
import { StorageConflictError } from '../../src/repositories/errors.js';

let store: TestStore;
let connector: Connector;
let engine: NormalizationEngine;
let identity: Identity;

function serviceWith(identities: IdentityRepository = store.identities) {
  return new IdentityService(identities, store.provenance, engine);
}

beforeEach(async () => {
  store = createTestStore();
  connector = await seedConnector(store);
  engine = new NormalizationEngine({
    identities: store.identities,
    findings: store.findings,
    provenance: store.provenance,
    jobs: store.jobs,
    connectors: store.connectors,
  });
  const job = await store.jobs.createIfIdle(connector.id, 'manual');
  const findings = await store.findings.recordBatch([
    {
      jobId: job.id,
      connectorId: connector.id,
      enclaveId: connector.enclaveId,
      sourceType: 'ad_svc_acct',
      rawAttributes: { objectSid: 'S-1-5-21-1-2-3-1105', sAMAccountName: 'svc_sql' },
    },
  ]);
  const [id] = (await engine.normalizeFindings(connector.enclaveId, findings)).identityIds;
  identity = await store.identities.get(id);
});

describe('IdentityService', () => {
  it('sets owner and linked system and re-scores', async () => {
    expect(identity.riskScore).toBe(60);
    const service = serviceWith();
    const updated = await service.updateIdentity(connector.enclaveId, identity.id, {
      owner: ' alice ',
      linkedSystem: 'db01',
    });
    expect(updated).toMatchObject({ owner: 'alice', linkedSystem: 'db01', riskScore: 20 });
    const cleared = await service.updateIdentity(connector.enclaveId, identity.id, { owner: '' });
    expect(cleared).toMatchObject({ owner: null, linkedSystem: 'db01', riskScore: 45 });
  });

  it('retries once when a merge lands in between', async () => {
    class RacingIdentityRepository extends IdentityRepository {
      attempts = 0;
      override async updateEnrichment(id: string, expectedVersion: number, data: EnrichmentUpdate) {
        this.attempts += 1;
        if (this.attempts === 1) throw new StorageConflictError('version moved');
        return super.updateEnrichment(id, expectedVersion, data);
      }
    }
    const racing = new RacingIdentityRepository(store.db);
    const updated = await serviceWith(racing).updateIdentity(connector.enclaveId, identity.id, { owner: 'alice' });
    expect(racing.attempts).toBe(2);
    expect(updated.owner).toBe('alice');
  });

  it('lists provenance within the enclave only', async () => {
    const service = serviceWith();
    const entries = await service.listProvenance(connector.enclaveId, identity.id);
    expect(entries).toHaveLength(1);
    expect(entries[0].finding.rawAttributes).toEqual({ objectSid: 'S-1-5-21-1-2-3-1105', sAMAccountName: 'svc_sql' });
    const other = await store.enclaves.create({ name: 'other' });
    await expect(service.listProvenance(other.id, identity.id)).rejects.toBeInstanceOf(EnclaveScopeError);
  });

  it('filters identities', async () => {
    const service = serviceWith();
    expect(await service.list(connector.enclaveId, { identityType: 'cert' })).toEqual([]);
    expect((await service.list(connector.enclaveId, { search: 'SQL' })).map((i) => i.id)).toEqual([identity.id]);
  });
});
