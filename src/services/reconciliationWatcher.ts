import { EventBus } from '../events/eventBus.js';
import type { LifecycleEvent, LifecycleEvents } from '../events/lifecycleEvents.js';
import type {
  CredentialBundle,
  Endpoint,
  PersistedState,
  RelationSource,
  RemoteApplication,
  Result,
  StateStore,
  Status,
} from '../core/types.js';
import { RelationError } from '../core/errors.js';
import { selectApplication } from './cardinalityGuard.js';
import { endpointRefs, extractAllBundles, extractBundle } from './bundleExtractor.js';
import { detectChange, emptyState, type Transition } from './changeDetector.js';
import { brokenStatus } from './statusMapper.js';
import { getLogger, describeBundle } from '../utils/logging.js';
import { bundlePresent, lifecycleEventsTotal, reconciliationsTotal } from '../metrics/index.js';

export type WatcherPhase = 'uninitialized' | 'no-bundle' | 'has-bundle' | 'torn-down';

export interface ReconcileOutcome {
  transition: Transition | 'broken';
  event: LifecycleEvent | null;
  status: Status | null; // null when the relation currently yields a bundle
  bundle: CredentialBundle | null;
}

export interface WatcherOptions {
  channel: string;
  source: RelationSource;
  store: StateStore;
  bus?: EventBus<LifecycleEvents>;
  defaultPort?: string;
  clock?: () => Date;
}

function phaseOf(state: PersistedState | undefined): WatcherPhase {
  if (!state) return 'uninitialized';
  return state.fingerprint === null ? 'no-bundle' : 'has-bundle';
}

/**
 * Tracks the credential bundle published on one relation. The host delivers
 * notifications one at a time; each pass persists the new state before the
 * resulting lifecycle event (at most one) reaches subscribers.
 */
export class ReconciliationWatcher {
  readonly channel: string;
  private readonly source: RelationSource;
  private readonly store: StateStore;
  private readonly bus: EventBus<LifecycleEvents>;
  private readonly defaultPort?: string;
  private readonly clock: () => Date;
  private state: PersistedState | undefined;
  private currentPhase: WatcherPhase;
  private status: Status | null = null;

  constructor(opts: WatcherOptions) {
    this.channel = opts.channel;
    this.source = opts.source;
    this.store = opts.store;
    this.bus = opts.bus || new EventBus<LifecycleEvents>();
    this.defaultPort = opts.defaultPort;
    this.clock = opts.clock || (() => new Date());
    this.state = this.store.load(this.channel);
    this.currentPhase = phaseOf(this.state);
  }

  get eventBus() {
    return this.bus;
  }

  get phase(): WatcherPhase {
    return this.currentPhase;
  }

  get lastStatus(): Status | null {
    return this.status;
  }

  get fingerprint(): string | null {
    return this.state?.fingerprint ?? null;
  }

  // Host start-up: make sure a record exists, then report what the relation holds
  onStart(): ReconcileOutcome {
    if (!this.state) {
      this.state = emptyState();
      this.store.save(this.channel, this.state);
      this.currentPhase = 'no-bundle';
    }
    return this.onChanged();
  }

  onChanged(): ReconcileOutcome {
    const log = getLogger();
    if (this.currentPhase === 'torn-down') {
      log.debug({ channel: this.channel }, 'relation re-established after teardown');
    }
    const prev = this.state ?? emptyState();
    const result = this.currentBundle();
    const detection = detectChange(result.ok ? result.value : null, prev, this.clock());

    let event: LifecycleEvent | null = null;
    if (result.ok) {
      if (detection.transition === 'available' || detection.transition === 'changed') {
        event = { type: detection.transition, channel: this.channel, bundle: result.value };
      }
    } else if (detection.transition === 'lost') {
      event = { type: 'unavailable', channel: this.channel, status: result.error.status };
    }

    if (!this.state || detection.state !== prev) {
      this.store.save(this.channel, detection.state);
    }
    this.state = detection.state;
    this.currentPhase = phaseOf(this.state);
    this.status = result.ok ? null : result.error.status;

    reconciliationsTotal.inc({ channel: this.channel, outcome: detection.transition });
    bundlePresent.set({ channel: this.channel }, this.state.fingerprint === null ? 0 : 1);
    if (result.ok) {
      log.debug(
        { channel: this.channel, transition: detection.transition, bundle: describeBundle(result.value) },
        'relation reconciled',
      );
    } else {
      log.debug(
        { channel: this.channel, transition: detection.transition, failure: result.error.kind },
        result.error.status.message,
      );
    }

    if (event) this.publish(event);
    return {
      transition: detection.transition,
      event,
      status: this.status,
      bundle: result.ok ? result.value : null,
    };
  }

  onBroken(): ReconcileOutcome {
    const status = brokenStatus(this.channel);
    this.store.clear(this.channel);
    this.state = undefined;
    this.currentPhase = 'torn-down';
    this.status = status;
    reconciliationsTotal.inc({ channel: this.channel, outcome: 'broken' });
    bundlePresent.set({ channel: this.channel }, 0);

    const event: LifecycleEvent = { type: 'unavailable', channel: this.channel, status };
    this.publish(event);
    return { transition: 'broken', event, status, bundle: null };
  }

  currentBundle(): Result<CredentialBundle> {
    const app = selectApplication(this.channel, this.source.listRemoteApplications(this.channel));
    if (!app.ok) return app;
    return extractBundle(this.channel, this.endpoints(app.value), { defaultPort: this.defaultPort });
  }

  allAvailableBundles(): Result<CredentialBundle[]> {
    const app = selectApplication(this.channel, this.source.listRemoteApplications(this.channel));
    if (!app.ok) return app;
    return extractAllBundles(this.channel, this.endpoints(app.value), {
      defaultPort: this.defaultPort,
    });
  }

  requireBundle(): CredentialBundle {
    const result = this.currentBundle();
    if (!result.ok) throw new RelationError(result.error);
    return result.value;
  }

  // Reads each endpoint only when the extractor asks for it
  private *endpoints(app: RemoteApplication): Generator<Endpoint> {
    for (const ref of endpointRefs(app)) {
      yield { ref, data: this.source.readEndpointData(this.channel, ref) };
    }
  }

  private publish(event: LifecycleEvent): void {
    lifecycleEventsTotal.inc({ channel: this.channel, event: event.type });
    const log = getLogger();
    if (event.type === 'unavailable') {
      log.warn({ channel: this.channel, severity: event.status.severity }, event.status.message);
      this.bus.emit('unavailable', event);
    } else {
      log.info({ channel: this.channel, bundle: describeBundle(event.bundle) }, `database ${event.type}`);
      if (event.type === 'available') this.bus.emit('available', event);
      else this.bus.emit('changed', event);
    }
  }
}
