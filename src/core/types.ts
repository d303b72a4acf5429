// Domain model for the relation watcher, decoupled from any host framework

export type Severity = 'blocking' | 'waiting';

export interface Status {
  severity: Severity;
  message: string;
}

export type EndpointKind = 'app' | 'unit';

export interface EndpointRef {
  kind: EndpointKind;
  id: string;
}

export type EndpointData = Readonly<Record<string, string>>;

export interface Endpoint {
  ref: EndpointRef;
  data: EndpointData;
}

export interface RemoteApplication {
  name: string;
  units: readonly string[]; // enumeration order is the fallback order
}

export interface CredentialBundle {
  readonly name: string;
  readonly host: string;
  readonly port: string;
  readonly username: string;
  readonly password: string;
}

export interface PersistedState {
  version: 1;
  fingerprint: string | null; // null: no bundle observed on this channel instance
  observedAt: string | null;
}

export type FailureKind = 'NoRelatedApps' | 'TooManyRelatedApps' | 'IncompleteRelation';

export interface RelationFailure {
  kind: FailureKind;
  channel: string;
  status: Status;
  relatedApps?: number;
}

export type Result<T, E = RelationFailure> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// Host capabilities consumed by the watcher

export interface RelationSource {
  listRemoteApplications(channel: string): readonly RemoteApplication[];
  readEndpointData(channel: string, endpoint: EndpointRef): EndpointData;
}

export interface StateStore {
  load(channel: string): PersistedState | undefined;
  save(channel: string, state: PersistedState): void;
  clear(channel: string): void;
}
