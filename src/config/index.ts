import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  database: z.object({
    provider: z.literal('sqlite'),
    url: z.string().min(1),
  }),
  jobs: z.object({
    timeoutMs: z.number().int().positive().default(300_000),
    staleAfterMs: z.number().int().positive().default(3_600_000),
  }),
  scheduler: z.object({
    enabled: z.boolean().default(false),
    tickIntervalMs: z.number().int().positive().default(15_000),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = fileRaw[key];
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

export function loadConfig(configPath = 'nhi.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const merged = {
    database: {
      provider: 'sqlite',
      url: process.env.DATABASE_URL || 'file:./data/nhi.db',
      ...section(fileRaw, 'database'),
    },
    jobs: {
      timeoutMs: envNumber('JOB_TIMEOUT_MS'),
      staleAfterMs: envNumber('JOB_STALE_AFTER_MS'),
      ...section(fileRaw, 'jobs'),
    },
    scheduler: {
      enabled: process.env.ENABLE_SCHEDULER === '1',
      tickIntervalMs: envNumber('SCHEDULER_TICK_MS'),
      ...section(fileRaw, 'scheduler'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: true,
      ...section(fileRaw, 'logging'),
    },
  };
  return ConfigSchema.parse(merged);
}
