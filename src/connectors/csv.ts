import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { RawAttributes } from '../core/types.js';

const csvRowsSchema = z.array(z.record(z.string()));
const recordsSchema = z.union([
  z.array(z.record(z.unknown())),
  z.object({ records: z.array(z.record(z.unknown())) }),
]);

function headerKey(header: string): string {
  return header.trim().toLowerCase().replace(/ /g, '_');
}

/**
 * Certificate rows from CSV with a header row. Keys are lower-cased with
 * spaces turned into underscores, values trimmed, blank rows dropped and the
 * `san` column split on `;`.
 */
export function parseCertificateCsv(text: string): RawAttributes[] {
  const parsed: unknown = parse(text, {
    columns: (header: string[]) => header.map(headerKey),
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  const rows = csvRowsSchema.parse(parsed);
  const records: RawAttributes[] = [];
  for (const row of rows) {
    if (Object.values(row).every((v) => v === '')) continue;
    const record: RawAttributes = { ...row };
    if (typeof row.san === 'string') {
      record.san = row.san
        .split(';')
        .map((s) => s.trim())
        .filter((s) => s !== '');
    }
    records.push(record);
  }
  return records;
}

/** A JSON array of records, or an object carrying one under `records`. */
export function parseRecordsJson(text: string): RawAttributes[] {
  const parsed = recordsSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error('expected a JSON array of records or an object with a records array');
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.records;
}
