import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/index.js';
import { getDb } from '../db/client.js';
import { getLogger } from '../utils/logging.js';
import { parseCertificateCsv, parseRecordsJson, type ConnectorFetchers } from '../connectors/index.js';
import { JobRunner } from '../services/jobRunner.js';
import { IngestionService } from '../services/ingestionService.js';
import { IdentityService } from '../services/identityService.js';
import { NormalizationEngine } from '../services/normalizationEngine.js';
import { toPublicJob } from '../api/schemas/adminSchemas.js';

export interface CliIo {
  /** Receives each JSON document the command prints. */
  out: (line: string) => void;
  fetchers?: Partial<ConnectorFetchers>;
}

function readRecords(file: string) {
  const text = fs.readFileSync(path.resolve(process.cwd(), file), 'utf8');
  return path.extname(file).toLowerCase() === '.csv' ? parseCertificateCsv(text) : parseRecordsJson(text);
}

export function buildProgram(io: CliIo = { out: (line) => console.log(line) }): Command {
  const print = (value: unknown) => io.out(JSON.stringify(value, null, 2));
  const program = new Command();

  program.name('nhi').description('Non-human identity inventory CLI').version('0.1.0');

  program
    .command('init')
    .description('Create the database and apply the schema')
    .action(() => {
      const cfg = loadConfig();
      getDb();
      getLogger().info({ db: cfg.database.url }, 'Database initialized');
      print({ initialized: true, database: cfg.database.url });
    });

  program
    .command('run')
    .description('Run a connector now and wait for the job to finish')
    .requiredOption('--enclave <id>', 'Enclave id')
    .requiredOption('--connector <id>', 'Connector id')
    .action(async (opts: { enclave: string; connector: string }) => {
      const runner = new JobRunner({ fetchers: io.fetchers });
      const { done } = await runner.requestRun(opts.enclave, opts.connector, 'manual');
      const job = await done;
      print({ job: toPublicJob(job) });
      if (job.status === 'failed') process.exitCode = 1;
    });

  program
    .command('ingest')
    .description('Push a CSV or JSON file of records through a connector')
    .requiredOption('--enclave <id>', 'Enclave id')
    .requiredOption('--connector <id>', 'Connector id')
    .requiredOption('--file <path>', 'CSV export or JSON array of records')
    .option('--source-type <type>', 'Source type of the records (defaults to the connector family)')
    .option('--job <id>', 'Append to an open job instead of running an implicit one')
    .action(
      async (opts: { enclave: string; connector: string; file: string; sourceType?: string; job?: string }) => {
        const ingestion = new IngestionService(new JobRunner());
        const result = await ingestion.ingest(opts.enclave, opts.connector, {
          records: readRecords(opts.file),
          sourceType: opts.sourceType,
          jobId: opts.job,
        });
        print(result);
      },
    );

  program
    .command('rescore')
    .description('Recompute risk for every identity in an enclave')
    .requiredOption('--enclave <id>', 'Enclave id')
    .action(async (opts: { enclave: string }) => {
      print(await new IdentityService().rescore(opts.enclave));
    });

  program
    .command('renormalize')
    .description('Replay the findings of a job through identity resolution')
    .requiredOption('--enclave <id>', 'Enclave id')
    .requiredOption('--job <id>', 'Job id')
    .action(async (opts: { enclave: string; job: string }) => {
      const result = await new NormalizationEngine().renormalizeJob(opts.enclave, opts.job);
      print({
        created: result.created,
        updated: result.updated,
        unresolved: result.unresolved,
        linked: result.linked,
        identities: result.identityIds.length,
      });
    });

  return program;
}
