// Global test setup - runs before every test file.
// Each file gets its own in-memory SQLite database through the db client singleton.
import { loadSqlEngine } from '../src/db/client.js';

if (!process.env.DATABASE_URL) {
  process.env.DATABASE_URL = 'file::memory:';
}
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
delete process.env.ENABLE_SCHEDULER;

await loadSqlEngine();
