import { Counter, Gauge, Registry } from 'prom-client';

export const registry = new Registry();

export const reconciliationsTotal = new Counter({
  name: 'relation_reconciliations_total',
  help: 'Reconciliation passes by channel and transition',
  labelNames: ['channel', 'outcome'] as const, // outcome: transition name, or 'broken'
  registers: [registry],
});

export const lifecycleEventsTotal = new Counter({
  name: 'relation_lifecycle_events_total',
  help: 'Lifecycle events emitted to the host',
  labelNames: ['channel', 'event'] as const,
  registers: [registry],
});

export const bundlePresent = new Gauge({
  name: 'relation_bundle_present',
  help: '1 when a complete credential bundle is tracked for the channel',
  labelNames: ['channel'] as const,
  registers: [registry],
});
