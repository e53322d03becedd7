import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { ConnectorFetchError } from '../core/errors.js';
import type { AdcsRemoteConfig } from './configSchemas.js';
import {
  errorMessage,
  submitInBatches,
  type ConnectionTestResult,
  type ConnectorFetcher,
  type FetchContext,
} from './ConnectorFetcher.js';

const runResponseSchema = z.object({ job_id: z.string().min(1), status: z.string() });
const jobStatusSchema = z.object({
  job_id: z.string(),
  status: z.string(),
  records_found: z.number().optional(),
  error: z.string().nullable().optional(),
});
const jobResultSchema = z.object({
  job_id: z.string(),
  status: z.string(),
  records: z.array(z.record(z.unknown())),
});

/**
 * Pulls certificate batches from the remote ADCS collector: start a
 * collection run, poll it to a terminal status, then download the records.
 */
export class AdcsRemoteFetcher implements ConnectorFetcher<'adcs_remote'> {
  readonly type = 'adcs_remote';

  async fetch(ctx: FetchContext<AdcsRemoteConfig>): Promise<void> {
    const { config, signal } = ctx;
    const started = await this.request(config, 'POST', '/collector/v1/adcs/run', signal, runResponseSchema, {
      mode: config.mode,
      since_days: config.since_days,
      max_records: config.max_records,
      max_san_fetch: config.max_san_fetch,
    });
    const remoteJobId = started.job_id;
    ctx.logger.info({ jobId: ctx.jobId, remoteJobId }, 'collector-run-started');

    for (;;) {
      const status = await this.request(
        config,
        'GET',
        `/collector/v1/jobs/${encodeURIComponent(remoteJobId)}`,
        signal,
        jobStatusSchema,
      );
      if (status.status === 'completed') break;
      if (status.status === 'failed') {
        throw new ConnectorFetchError('adcs_remote', `collector job ${remoteJobId} failed: ${status.error ?? 'unknown error'}`);
      }
      try {
        await sleep(config.poll_interval_ms, undefined, { signal });
      } catch (err) {
        signal.throwIfAborted();
        throw err;
      }
    }

    const result = await this.request(
      config,
      'GET',
      `/collector/v1/jobs/${encodeURIComponent(remoteJobId)}/result`,
      signal,
      jobResultSchema,
    );
    ctx.logger.info({ jobId: ctx.jobId, remoteJobId, records: result.records.length }, 'collector-result-received');
    await submitInBatches(ctx, 'adcs_cert', result.records, config.batch_size);
  }

  async testConnection(config: AdcsRemoteConfig): Promise<ConnectionTestResult> {
    try {
      const res = await fetch(this.url(config, '/health'), { headers: this.headers(config) });
      return res.ok
        ? { ok: true, message: `collector at ${config.collector_url} is healthy` }
        : { ok: false, message: `health check returned HTTP ${res.status}` };
    } catch (err) {
      return { ok: false, message: errorMessage(err) };
    }
  }

  private url(config: AdcsRemoteConfig, pathname: string): string {
    return `${config.collector_url.replace(/\/+$/, '')}${pathname}`;
  }

  private headers(config: AdcsRemoteConfig, json = false): Record<string, string> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (json) headers['content-type'] = 'application/json';
    if (config.api_token) headers.authorization = `Bearer ${config.api_token}`;
    return headers;
  }

  private async request<T>(
    config: AdcsRemoteConfig,
    method: 'GET' | 'POST',
    pathname: string,
    signal: AbortSignal,
    schema: z.ZodType<T>,
    body?: Record<string, unknown>,
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetch(this.url(config, pathname), {
        method,
        headers: this.headers(config, body !== undefined),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      signal.throwIfAborted();
      throw new ConnectorFetchError('adcs_remote', `${method} ${pathname} failed: ${errorMessage(err)}`, err);
    }
    if (!res.ok) {
      throw new ConnectorFetchError('adcs_remote', `${method} ${pathname} returned HTTP ${res.status}`);
    }
    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new ConnectorFetchError('adcs_remote', `${method} ${pathname} returned invalid JSON`, err);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ConnectorFetchError('adcs_remote', `${method} ${pathname} returned an unexpected payload`);
    }
    return parsed.data;
  }
}
