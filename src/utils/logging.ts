import pino, { DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadConfig, type AppConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

function collectorLogger(level: string): { logger: pino.Logger; logs: string[] } {
  const logs: string[] = [];
  (globalThis as unknown as { __LOG_COLLECTOR__?: string[] }).__LOG_COLLECTOR__ = logs;
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  return { logger: pino({ level }, sink as unknown as DestinationStream), logs };
}

function buildLogger(logging: AppConfig['logging']): pino.Logger {
  if (process.env.TEST_LOG_COLLECTOR === '1') {
    return collectorLogger(logging.level).logger;
  }
  return pino(
    {
      name: 'transit-alert',
      level: logging.level,
      transport: logging.json ? undefined : { target: 'pino-pretty', options: { destination: 2 } },
    },
    // stdout stays free for command output
    logging.json ? pino.destination(2) : undefined,
  );
}

/** Replaces the process logger with one built from an already loaded config. */
export function configureLogger(logging: AppConfig['logging']): pino.Logger {
  loggerInstance = buildLogger(logging);
  return loggerInstance;
}

export function getLogger() {
  if (!loggerInstance) {
    loggerInstance = buildLogger(loadConfig().logging);
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector() {
  const cfg = loadConfig();
  const { logger, logs } = collectorLogger(cfg.logging.level);
  loggerInstance = logger;
  return logs;
}
