import pino from 'pino';
import { loadConfig } from '../config/index.js';
import type { CredentialBundle } from '../core/types.js';

declare global {
  var __LOG_COLLECTOR__: string[] | undefined;
}

let loggerInstance: pino.Logger | null = null;

function collectorLogger(level: string): pino.Logger {
  const logs: string[] = [];
  globalThis.__LOG_COLLECTOR__ = logs;
  return pino({ level }, { write: (msg: string) => void logs.push(msg) });
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = collectorLogger(cfg.logging.level);
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Log-safe view of a bundle; the password never reaches a log line
export function describeBundle(bundle: CredentialBundle) {
  return { name: bundle.name, host: bundle.host, port: bundle.port, username: bundle.username };
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(): string[] {
  const cfg = loadConfig();
  loggerInstance = collectorLogger(cfg.logging.level);
  return globalThis.__LOG_COLLECTOR__ ?? [];
}
