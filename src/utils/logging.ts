import pino from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorSink(): { logs: string[]; sink: Writable } {
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logs, sink };
}

export function getLogger() {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      const { sink } = collectorSink();
      loggerInstance = pino({ level: cfg.logging.level }, sink);
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing.
// Collects at debug level so tests can assert on per-record events.
export function __enableTestLogCollector() {
  const { logs, sink } = collectorSink();
  loggerInstance = pino({ level: 'debug' }, sink);
  return logs;
}
