import { Command } from 'commander';
import path from 'path';
import { loadConfig } from '../config/index.js';
import type { CredentialBundle, RelationFailure } from '../core/types.js';
import { snapshotEvent } from '../events/lifecycleEvents.js';
import { InMemoryRelationSource } from '../relations/inMemoryRelationSource.js';
import { InMemoryStateStore, JsonFileStateStore } from '../repositories/stateStore.js';
import { ReconciliationWatcher } from '../services/reconciliationWatcher.js';
import { statusName } from '../services/statusMapper.js';
import { getLogger } from '../utils/logging.js';

const EXIT_BLOCKED = 2;
const EXIT_WAITING = 3;

function show(bundle: CredentialBundle, showSecrets: boolean) {
  return { ...bundle, password: showSecrets ? bundle.password : '***' };
}

function reportFailure(relation: string, failure: RelationFailure) {
  console.log(
    JSON.stringify(
      {
        relation,
        failure: failure.kind,
        status: { name: statusName(failure.status), message: failure.status.message },
      },
      null,
      2,
    ),
  );
  process.exitCode = failure.status.severity === 'blocking' ? EXIT_BLOCKED : EXIT_WAITING;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('relation-credentials')
    .description('Inspect and reconcile database credentials published over a relation')
    .version('0.1.0');

  program
    .command('inspect')
    .requiredOption('--snapshot <file>', 'JSON relation snapshot to read')
    .option('--relation <name>', 'Relation name (defaults to config relation.name)')
    .option('--all', 'List every complete endpoint bundle instead of the preferred one', false)
    .option('--show-secrets', 'Print passwords instead of masking them', false)
    .description('Print the credential bundle the relation currently yields')
    .action((opts: { snapshot: string; relation?: string; all?: boolean; showSecrets?: boolean }) => {
      const cfg = loadConfig();
      const relation = opts.relation || cfg.relation.name;
      const watcher = new ReconciliationWatcher({
        channel: relation,
        source: InMemoryRelationSource.fromFile(path.resolve(process.cwd(), opts.snapshot)),
        store: new InMemoryStateStore(),
        defaultPort: cfg.relation.defaultPort,
      });
      const secrets = !!opts.showSecrets;
      if (opts.all) {
        const result = watcher.allAvailableBundles();
        if (!result.ok) return reportFailure(relation, result.error);
        const bundles = result.value.map((b) => show(b, secrets));
        console.log(JSON.stringify({ relation, bundles }, null, 2));
        return;
      }
      const result = watcher.currentBundle();
      if (!result.ok) return reportFailure(relation, result.error);
      console.log(JSON.stringify({ relation, bundle: show(result.value, secrets) }, null, 2));
    });

  program
    .command('reconcile')
    .requiredOption('--snapshot <file>', 'JSON relation snapshot to read')
    .option('--relation <name>', 'Relation name (defaults to config relation.name)')
    .option('--state <file>', 'State file (defaults to config state.path)')
    .option('--broken', 'Deliver a relation-broken notification instead of relation-changed', false)
    .option('--show-secrets', 'Print passwords instead of masking them', false)
    .description('Run one reconciliation pass against persisted state and print the outcome')
    .action(
      (opts: {
        snapshot: string;
        relation?: string;
        state?: string;
        broken?: boolean;
        showSecrets?: boolean;
      }) => {
        const cfg = loadConfig();
        const relation = opts.relation || cfg.relation.name;
        const statePath = path.resolve(process.cwd(), opts.state || cfg.state.path);
        const watcher = new ReconciliationWatcher({
          channel: relation,
          source: InMemoryRelationSource.fromFile(path.resolve(process.cwd(), opts.snapshot)),
          store: new JsonFileStateStore(statePath),
          defaultPort: cfg.relation.defaultPort,
        });
        getLogger().debug({ relation, statePath }, 'reconcile');
        const outcome = opts.broken ? watcher.onBroken() : watcher.onStart();
        const secrets = !!opts.showSecrets;
        let event = outcome.event ? snapshotEvent(outcome.event) : null;
        if (event && event.type !== 'unavailable') {
          event = { ...event, bundle: show(event.bundle, secrets) };
        }
        console.log(
          JSON.stringify(
            {
              relation,
              transition: outcome.transition,
              phase: watcher.phase,
              event,
              status: outcome.status
                ? { name: statusName(outcome.status), message: outcome.status.message }
                : null,
            },
            null,
            2,
          ),
        );
      },
    );

  return program;
}
