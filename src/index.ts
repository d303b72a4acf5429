import { loadConfig, type AppConfig } from './config/index.js';
import type { RelationSource, StateStore } from './core/types.js';
import { JsonFileStateStore } from './repositories/stateStore.js';
import { ReconciliationWatcher } from './services/reconciliationWatcher.js';

export * from './core/types.js';
export * from './core/errors.js';
export { EventBus } from './events/eventBus.js';
export * from './events/lifecycleEvents.js';
export * from './services/bundleExtractor.js';
export * from './services/cardinalityGuard.js';
export * from './services/changeDetector.js';
export * from './services/statusMapper.js';
export * from './services/reconciliationWatcher.js';
export * from './repositories/stateStore.js';
export * from './relations/inMemoryRelationSource.js';
export { loadConfig, type AppConfig } from './config/index.js';
export { getLogger } from './utils/logging.js';
export { registry } from './metrics/index.js';

// Wires a watcher from configuration; the host still supplies the relation data
export function createWatcher(
  source: RelationSource,
  opts: { config?: AppConfig; store?: StateStore; channel?: string } = {},
): ReconciliationWatcher {
  const cfg = opts.config ?? loadConfig();
  return new ReconciliationWatcher({
    channel: opts.channel ?? cfg.relation.name,
    source,
    store: opts.store ?? new JsonFileStateStore(cfg.state.path),
    defaultPort: cfg.relation.defaultPort,
  });
}
