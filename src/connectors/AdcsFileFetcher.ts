import fs from 'fs';
import path from 'path';
import type { RawAttributes } from '../core/types.js';
import { ConnectorFetchError } from '../core/errors.js';
import type { AdcsFileConfig } from './configSchemas.js';
import {
  errorMessage,
  submitInBatches,
  type ConnectionTestResult,
  type ConnectorFetcher,
  type FetchContext,
} from './ConnectorFetcher.js';
import { parseCertificateCsv, parseRecordsJson } from './csv.js';

function looksLikeJson(filePath: string, text: string): boolean {
  if (path.extname(filePath).toLowerCase() === '.json') return true;
  const first = text.trimStart().charAt(0);
  return first === '[' || first === '{';
}

export class AdcsFileFetcher implements ConnectorFetcher<'adcs_file'> {
  readonly type = 'adcs_file';

  async fetch(ctx: FetchContext<AdcsFileConfig>): Promise<void> {
    const records = await this.load(ctx.config);
    ctx.logger.info({ jobId: ctx.jobId, records: records.length, file: ctx.config.file_path }, 'adcs-file-loaded');
    await submitInBatches(ctx, 'adcs_cert', records, ctx.config.batch_size);
  }

  async load(config: AdcsFileConfig): Promise<RawAttributes[]> {
    let text: string;
    try {
      text = await fs.promises.readFile(config.file_path, 'utf8');
    } catch (err) {
      throw new ConnectorFetchError('adcs_file', `cannot read ${config.file_path}: ${errorMessage(err)}`, err);
    }
    const json = config.format === 'json' || (config.format === 'auto' && looksLikeJson(config.file_path, text));
    try {
      return json ? parseRecordsJson(text) : parseCertificateCsv(text);
    } catch (err) {
      throw new ConnectorFetchError('adcs_file', `cannot parse ${config.file_path}: ${errorMessage(err)}`, err);
    }
  }

  async testConnection(config: AdcsFileConfig): Promise<ConnectionTestResult> {
    try {
      await fs.promises.access(config.file_path, fs.constants.R_OK);
      return { ok: true, message: `${config.file_path} is readable` };
    } catch (err) {
      return { ok: false, message: errorMessage(err) };
    }
  }
}
