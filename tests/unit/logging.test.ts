import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getLogger,
  describeBundle,
  __resetLoggerForTests,
  __enableTestLogCollector,
} from '../../src/utils/logging.js';

describe('logging singleton', () => {
  const prevLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    __resetLoggerForTests();
  });

  afterEach(() => {
    if (prevLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = prevLevel;
    __resetLoggerForTests();
  });

  it('returns same instance', () => {
    const a = getLogger();
    const b = getLogger();
    expect(a).toBe(b);
  });

  it('honors LOG_LEVEL env', () => {
    process.env.LOG_LEVEL = 'debug';
    __resetLoggerForTests();
    const l = getLogger();
    expect(l.level).toBe('debug');
  });

  it('collects log lines in memory', () => {
    process.env.LOG_LEVEL = 'info';
    const logs = __enableTestLogCollector();
    getLogger().info({ channel: 'db' }, 'hello');
    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0])).toMatchObject({ channel: 'db', msg: 'hello', level: 30 });
  });

  it('drops the password from bundle descriptions', () => {
    expect(
      describeBundle({ name: 'app', host: 'h', port: '3306', username: 'u', password: 'test-secret' }),
    ).toEqual({ name: 'app', host: 'h', port: '3306', username: 'u' });
  });
});
