import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { closeDb } from '../../src/db/client.js';
import type { Identity } from '../../src/core/types.js';
import { IdentityService } from '../../src/services/identityService.js';
import { createApp, createEnclave, type TestApp } from '../utils/app.js';

class BrokenIdentityService extends IdentityService {
  override async get(): Promise<Identity> {
    throw new Error('disk on fire');
  }
}

let app: TestApp;

beforeAll(async () => {
  app = await createApp({ deps: { identities: new BrokenIdentityService() } });
});

afterAll(async () => {
  await app.close();
  closeDb();
});

describe('error mapping inside route plugins', () => {
  it('maps domain errors to their status and code', async () => {
    const missing = await app.inject({ method: 'GET', url: '/v1/enclaves/no-such-enclave' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Enclave no-such-enclave not found' } });

    await createEnclave(app, 'corp');
    const dup = await app.inject({ method: 'POST', url: '/v1/enclaves', payload: { name: 'corp' } });
    expect(dup.statusCode).toBe(409);
    expect(dup.json().error.code).toBe('CONFLICT');
  });

  it('hides unexpected errors behind a 500', async () => {
    const enclaveId = await createEnclave(app, 'ops');
    const res = await app.inject({ method: 'GET', url: `/v1/enclaves/${enclaveId}/identities/anything` });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });
});
