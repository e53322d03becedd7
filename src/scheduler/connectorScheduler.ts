import cronParser from 'cron-parser';
import type { Connector } from '../core/types.js';
import { DuplicateJobInProgressError } from '../core/errors.js';
import { ConnectorRepository } from '../repositories/connectorRepository.js';
import type { JobRunner } from '../services/jobRunner.js';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { schedulerLastTickSeconds } from '../metrics/index.js';

/** Most recent fire time of a cron expression at or before `now` (UTC). */
export function previousFireTime(expression: string, now: Date): Date {
  return cronParser.parseExpression(expression, { currentDate: now, tz: 'UTC' }).prev().toDate();
}

/** Due when the cron has fired since the connector last ran (or was created). */
export function isDue(connector: Connector, now: Date): boolean {
  if (!connector.cronExpression) return false;
  const since = connector.lastRunAt ?? connector.createdAt;
  return previousFireTime(connector.cronExpression, now).getTime() > since.getTime();
}

export interface TickResult {
  staleFailed: number;
  pendingStarted: number;
  scheduled: string[];
}

export class ConnectorScheduler {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private lastTick: Date | null = null;
  private readonly tickIntervalMs: number;

  constructor(
    private readonly runner: JobRunner,
    private readonly connectors = new ConnectorRepository(),
    opts: { tickIntervalMs?: number } = {},
  ) {
    this.tickIntervalMs = opts.tickIntervalMs ?? loadConfig().scheduler.tickIntervalMs;
  }

  start() {
    if (this.running) return;
    this.running = true;
    void this.safeTick();
    this.timer = setInterval(() => void this.safeTick(), this.tickIntervalMs);
  }

  stop() {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick(now: Date = new Date()): Promise<TickResult> {
    this.lastTick = now;
    schedulerLastTickSeconds.set(Math.floor(now.getTime() / 1000));
    const stale = await this.runner.failStaleJobs();
    const pendingStarted = await this.runner.runPending();
    const scheduled: string[] = [];
    for (const connector of await this.connectors.listScheduled()) {
      try {
        if (!isDue(connector, now)) continue;
        const { job } = await this.runner.requestRun(connector.enclaveId, connector.id, 'schedule');
        scheduled.push(job.id);
      } catch (err) {
        if (err instanceof DuplicateJobInProgressError) {
          getLogger().debug({ connectorId: connector.id, activeJobId: err.activeJobId }, 'schedule-skipped-busy');
          continue;
        }
        getLogger().warn({ err, connectorId: connector.id }, 'schedule-failed');
      }
    }
    return { staleFailed: stale.length, pendingStarted, scheduled };
  }

  info() {
    return {
      running: this.running,
      lastTick: this.lastTick?.toISOString() ?? null,
      tickIntervalMs: this.tickIntervalMs,
    };
  }

  private async safeTick() {
    if (!this.running) return;
    try {
      await this.tick();
    } catch (err) {
      getLogger().warn({ err }, 'scheduler-tick-failed');
    }
  }
}
