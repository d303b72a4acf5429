import { describe, it, expect, afterEach } from 'vitest';
import { ReconciliationWatcher } from '../../src/services/reconciliationWatcher.js';
import { InMemoryRelationSource } from '../../src/relations/inMemoryRelationSource.js';
import { InMemoryStateStore } from '../../src/repositories/stateStore.js';
import { RelationError } from '../../src/core/errors.js';
import type { LifecycleEvent } from '../../src/events/lifecycleEvents.js';
import type { EndpointData, EndpointRef, RelationSource } from '../../src/core/types.js';
import { fingerprintBundle } from '../../src/services/changeDetector.js';
import { lifecycleEventsTotal } from '../../src/metrics/index.js';
import { __enableTestLogCollector, __resetLoggerForTests } from '../../src/utils/logging.js';

const A = { database: 'app', host: '10.0.0.5', user: 'u', password: 'p' };
const BUNDLE_A = { name: 'app', host: '10.0.0.5', port: '3306', username: 'u', password: 'p' };

function setup(channel = 'db', store = new InMemoryStateStore()) {
  const source = new InMemoryRelationSource();
  const watcher = new ReconciliationWatcher({
    channel,
    source,
    store,
    clock: () => new Date('2026-01-01T00:00:00.000Z'),
  });
  const events: LifecycleEvent[] = [];
  watcher.eventBus.on('available', (e) => events.push(e));
  watcher.eventBus.on('changed', (e) => events.push(e));
  watcher.eventBus.on('unavailable', (e) => events.push(e));
  return { source, store, watcher, events };
}

describe('ReconciliationWatcher', () => {
  it('starts uninitialized and records an empty state on first observation', () => {
    const { watcher, store } = setup();
    expect(watcher.phase).toBe('uninitialized');
    const outcome = watcher.onChanged();
    expect(outcome).toEqual({
      transition: 'none',
      event: null,
      status: { severity: 'blocking', message: 'Missing relation: db' },
      bundle: null,
    });
    expect(watcher.phase).toBe('no-bundle');
    expect(store.load('db')).toEqual({ version: 1, fingerprint: null, observedAt: null });
  });

  it('stays silent while the relation is still forming', () => {
    const { watcher, source, events } = setup();
    source.relate('db', 'mysql');
    source.setAppData('db', 'mysql', { database: 'app', host: '10.0.0.5' });
    const outcome = watcher.onChanged();
    expect(outcome.status).toEqual({ severity: 'waiting', message: 'Waiting for database: db' });
    expect(watcher.lastStatus).toEqual(outcome.status);
    expect(events).toEqual([]);
  });

  it('emits available once for the same bundle', () => {
    const { watcher, source, events } = setup();
    source.setAppData('db', 'mysql', A);
    expect(watcher.onChanged().transition).toBe('available');
    expect(watcher.onChanged().transition).toBe('unchanged');
    expect(events).toEqual([{ type: 'available', channel: 'db', bundle: BUNDLE_A }]);
    expect(watcher.phase).toBe('has-bundle');
    expect(watcher.lastStatus).toBeNull();
  });

  it('does not report a change when only field order differs', () => {
    const { watcher, source, events } = setup();
    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    source.setAppData('db', 'mysql', { password: 'p', user: 'u', host: '10.0.0.5', database: 'app' });
    expect(watcher.onChanged().transition).toBe('unchanged');
    expect(events).toHaveLength(1);
  });

  it('emits available, changed, unavailable, then available again after teardown', () => {
    const { watcher, source, events, store } = setup();
    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    source.setAppData('db', 'mysql', { ...A, host: '10.0.0.6' });
    watcher.onChanged();
    source.unrelate('db');
    const broken = watcher.onBroken();
    expect(broken.transition).toBe('broken');
    expect(watcher.phase).toBe('torn-down');
    expect(store.load('db')).toBeUndefined();

    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    expect(events).toEqual([
      { type: 'available', channel: 'db', bundle: BUNDLE_A },
      { type: 'changed', channel: 'db', bundle: { ...BUNDLE_A, host: '10.0.0.6' } },
      {
        type: 'unavailable',
        channel: 'db',
        status: { severity: 'blocking', message: 'Missing relation: db' },
      },
      { type: 'available', channel: 'db', bundle: BUNDLE_A },
    ]);
  });

  it('emits unavailable when a known bundle becomes incomplete', () => {
    const { watcher, source, events, store } = setup();
    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    source.setAppData('db', 'mysql', { ...A, password: '' });
    const outcome = watcher.onChanged();
    expect(outcome.transition).toBe('lost');
    expect(events[1]).toEqual({
      type: 'unavailable',
      channel: 'db',
      status: { severity: 'waiting', message: 'Waiting for database: db' },
    });
    expect(store.load('db')?.fingerprint).toBeNull();
    expect(watcher.phase).toBe('no-bundle');
  });

  it('emits unavailable when a second application joins', () => {
    const { watcher, source, events } = setup();
    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    source.setAppData('db', 'mariadb', A);
    watcher.onChanged();
    expect(events.map((e) => e.type)).toEqual(['available', 'unavailable']);
    expect(watcher.lastStatus).toEqual({
      severity: 'blocking',
      message: 'Too many related applications: db',
    });
  });

  it('reports broken relations even without a prior bundle', () => {
    const { watcher, events } = setup();
    watcher.onBroken();
    expect(events).toEqual([
      {
        type: 'unavailable',
        channel: 'db',
        status: { severity: 'blocking', message: 'Missing relation: db' },
      },
    ]);
  });

  it('does not re-emit available after a restart', () => {
    const store = new InMemoryStateStore();
    const first = setup('db', store);
    first.source.setAppData('db', 'mysql', A);
    first.watcher.onChanged();

    const second = setup('db', store);
    second.source.setAppData('db', 'mysql', A);
    expect(second.watcher.phase).toBe('has-bundle');
    expect(second.watcher.onStart().transition).toBe('unchanged');
    expect(second.events).toEqual([]);
  });

  it('records an empty state on start without emitting', () => {
    const { watcher, store, events } = setup();
    const outcome = watcher.onStart();
    expect(outcome.transition).toBe('none');
    expect(store.load('db')).toEqual({ version: 1, fingerprint: null, observedAt: null });
    expect(events).toEqual([]);
  });

  it('persists the new state before listeners run', () => {
    const { watcher, source, store } = setup();
    const seen: (string | null | undefined)[] = [];
    watcher.eventBus.on('available', () => seen.push(store.load('db')?.fingerprint));
    source.setAppData('db', 'mysql', A);
    watcher.onChanged();
    expect(seen).toEqual([fingerprintBundle(BUNDLE_A)]);
  });

  it('completes the pass when a listener throws', () => {
    const { watcher, source, events } = setup();
    watcher.eventBus.on('available', () => {
      throw new Error('host failed');
    });
    source.setAppData('db', 'mysql', A);
    expect(watcher.onChanged().event?.type).toBe('available');
    expect(events).toHaveLength(1);
  });

  it('falls back to unit data published by older servers', () => {
    const { watcher, source } = setup();
    source.relate('db', 'mysql');
    source.setUnitData('db', 'mysql', 'mysql/0', { ...A, port: '3307' });
    expect(watcher.requireBundle()).toEqual({ ...BUNDLE_A, port: '3307' });
  });

  it('stops reading endpoint data at the first complete candidate', () => {
    const backing = new InMemoryRelationSource();
    backing.setAppData('db', 'mysql', A);
    backing.setUnitData('db', 'mysql', 'mysql/0', { ...A, host: '10.0.0.9' });
    const reads: EndpointRef[] = [];
    const source: RelationSource = {
      listRemoteApplications: (channel) => backing.listRemoteApplications(channel),
      readEndpointData: (channel: string, ref: EndpointRef): EndpointData => {
        reads.push(ref);
        return backing.readEndpointData(channel, ref);
      },
    };
    const watcher = new ReconciliationWatcher({ channel: 'db', source, store: new InMemoryStateStore() });

    expect(watcher.currentBundle().ok).toBe(true);
    expect(reads).toEqual([{ kind: 'app', id: 'mysql' }]);

    reads.length = 0;
    watcher.allAvailableBundles();
    expect(reads).toEqual([
      { kind: 'app', id: 'mysql' },
      { kind: 'unit', id: 'mysql/0' },
    ]);
  });

  it('lists every complete endpoint bundle', () => {
    const { watcher, source } = setup();
    source.setAppData('db', 'mysql', A);
    source.setUnitData('db', 'mysql', 'mysql/0', { host: '10.0.0.8' });
    source.setUnitData('db', 'mysql', 'mysql/1', { ...A, host: '10.0.0.9' });
    const result = watcher.allAvailableBundles();
    expect(result.ok && result.value.map((b) => b.host)).toEqual(['10.0.0.5', '10.0.0.9']);
  });

  it('surfaces query failures directly', () => {
    const { watcher, source } = setup();
    expect(() => watcher.requireBundle()).toThrow(RelationError);
    source.relate('db', 'a');
    source.relate('db', 'b');
    const result = watcher.allAvailableBundles();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.relatedApps).toBe(2);
  });

  it('counts emitted lifecycle events', async () => {
    const { watcher, source } = setup('metrics-db');
    source.setAppData('metrics-db', 'mysql', A);
    watcher.onChanged();
    watcher.onBroken();
    const metric = await lifecycleEventsTotal.get();
    const count = (event: string) =>
      metric.values.find((v) => v.labels.channel === 'metrics-db' && v.labels.event === event)?.value;
    expect(count('available')).toBe(1);
    expect(count('unavailable')).toBe(1);
  });

  describe('logging', () => {
    const prevLevel = process.env.LOG_LEVEL;

    afterEach(() => {
      if (prevLevel === undefined) delete process.env.LOG_LEVEL;
      else process.env.LOG_LEVEL = prevLevel;
      __resetLoggerForTests();
    });

    it('logs bundles without their password', () => {
      process.env.LOG_LEVEL = 'debug';
      const logs = __enableTestLogCollector();
      const { watcher, source } = setup('logged-db');
      source.setAppData('logged-db', 'mysql', { ...A, password: 'test-secret' });
      watcher.onChanged();
      const lines = logs.map((l) => JSON.parse(l));
      const available = lines.find((l) => l.msg === 'database available');
      expect(available.bundle).toEqual({ name: 'app', host: '10.0.0.5', port: '3306', username: 'u' });
      expect(logs.some((l) => l.includes('test-secret'))).toBe(false);
    });
  });
});
