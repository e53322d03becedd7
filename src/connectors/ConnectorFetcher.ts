import type pino from 'pino';
import type { Connector, ConnectorType, RawAttributes, SourceType } from '../core/types.js';
import type { ConnectorConfigFor } from './configSchemas.js';

export interface BatchResult {
  findingsCreated: number;
  unresolved: number;
  created: number;
  updated: number;
}

export interface FetchContext<C> {
  jobId: string;
  connector: Readonly<Connector>;
  /** Frozen snapshot taken at job start; later edits to the connector do not show up here. */
  config: Readonly<C>;
  signal: AbortSignal;
  /** The only way fetched records reach storage. Rejects once the job is aborted or terminal. */
  submitBatch(sourceType: SourceType, records: RawAttributes[]): Promise<BatchResult>;
  logger: pino.Logger;
}

export interface ConnectionTestResult {
  ok: boolean;
  message: string;
}

export interface ConnectorFetcher<T extends ConnectorType> {
  readonly type: T;
  fetch(ctx: FetchContext<ConnectorConfigFor<T>>): Promise<void>;
  testConnection(config: ConnectorConfigFor<T>): Promise<ConnectionTestResult>;
}

/** Submits records in slices of batchSize, checking for abort before each slice. */
export async function submitInBatches<C>(
  ctx: FetchContext<C>,
  sourceType: SourceType,
  records: RawAttributes[],
  batchSize: number,
): Promise<void> {
  for (let i = 0; i < records.length; i += batchSize) {
    ctx.signal.throwIfAborted();
    await ctx.submitBatch(sourceType, records.slice(i, i + batchSize));
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
