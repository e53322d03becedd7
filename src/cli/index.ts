#!/usr/bin/env node
import { buildProgram } from './program.js';
import { closeDb, loadSqlEngine } from '../db/client.js';

loadSqlEngine()
  .then(() => buildProgram().parseAsync(process.argv))
  .then(() => closeDb())
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    closeDb();
    process.exit(1);
  });
