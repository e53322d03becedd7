import { describe, it, expect, beforeEach } from 'vitest';
import { createTestStore, seedConnector, type TestStore } from '../utils/db.js';
import type { Connector } from '../../src/core/types.js';
import { ConnectorScheduler, isDue, previousFireTime } from '../../src/scheduler/connectorScheduler.js';
import { JobRunner } from '../../src/services/jobRunner.js';
import { NormalizationEngine } from '../../src/services/normalizationEngine.js';
import type { AdLdapConfig, ConnectorFetcher, FetchContext } from '../../src/connectors/index.js';

class GatedLdapFetcher implements ConnectorFetcher<'ad_ldap'> {
  readonly type = 'ad_ldap';
  private release: () => void = () => {};
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async fetch(_ctx: FetchContext<AdLdapConfig>) {
    await this.gate;
  }

  async testConnection() {
    return { ok: true, message: 'ok' };
  }

  open() {
    this.release();
  }
}

function connectorAt(createdAt: string, cronExpression: string | null, lastRunAt: string | null = null): Connector {
  return {
    id: 'c-1',
    enclaveId: 'e-1',
    type: 'ad_ldap',
    name: 'dc01',
    config: {},
    cronExpression,
    enabled: true,
    lastRunAt: lastRunAt ? new Date(lastRunAt) : null,
    lastRunStatus: null,
    createdAt: new Date(createdAt),
    updatedAt: new Date(createdAt),
    deletedAt: null,
  };
}

describe('cron evaluation', () => {
  it('finds the most recent fire time in UTC', () => {
    expect(previousFireTime('0 * * * *', new Date('2026-01-01T10:30:00Z')).toISOString()).toBe(
      '2026-01-01T10:00:00.000Z',
    );
  });

  it('is due when the schedule fired since the last run', () => {
    const now = new Date('2026-01-01T10:30:00Z');
    expect(isDue(connectorAt('2026-01-01T09:15:00Z', '0 * * * *'), now)).toBe(true);
    expect(isDue(connectorAt('2026-01-01T09:15:00Z', '0 * * * *', '2026-01-01T10:05:00Z'), now)).toBe(false);
    expect(isDue(connectorAt('2026-01-01T10:10:00Z', '0 * * * *'), now)).toBe(false);
    expect(isDue(connectorAt('2026-01-01T09:15:00Z', null), now)).toBe(false);
  });
});

describe('ConnectorScheduler', () => {
  let store: TestStore;
  let fetcher: GatedLdapFetcher;
  let runner: JobRunner;
  let scheduler: ConnectorScheduler;

  beforeEach(() => {
    store = createTestStore();
    fetcher = new GatedLdapFetcher();
    runner = new JobRunner({
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
      fetchers: { ad_ldap: fetcher },
    });
    scheduler = new ConnectorScheduler(runner, store.connectors, { tickIntervalMs: 60_000 });
  });

  it('starts due connectors and skips busy ones', async () => {
    const connector = await seedConnector(store);
    await store.connectors.update(connector.id, { cronExpression: '*/5 * * * *' });
    const later = new Date(Date.now() + 10 * 60_000);

    const first = await scheduler.tick(later);
    expect(first.scheduled).toHaveLength(1);
    const job = await store.jobs.get(first.scheduled[0]);
    expect(job.triggeredBy).toBe('schedule');

    const second = await scheduler.tick(later);
    expect(second.scheduled).toEqual([]);

    fetcher.open();
    await runner.idle();
    expect((await store.jobs.get(job.id)).status).toBe('completed');
    expect(scheduler.info().lastTick).toBe(later.toISOString());
  });

  it('ignores disabled and unscheduled connectors', async () => {
    const disabled = await seedConnector(store);
    await store.connectors.update(disabled.id, { cronExpression: '* * * * *', enabled: false });
    await seedConnector(store, 'adcs_file', disabled.enclaveId);
    const result = await scheduler.tick(new Date(Date.now() + 10 * 60_000));
    expect(result).toEqual({ staleFailed: 0, pendingStarted: 0, scheduled: [] });
  });

  it('reports whether it is running', () => {
    expect(scheduler.info()).toEqual({ running: false, lastTick: null, tickIntervalMs: 60_000 });
    scheduler.start();
    expect(scheduler.info().running).toBe(true);
    scheduler.stop();
    expect(scheduler.info().running).toBe(false);
  });
});
