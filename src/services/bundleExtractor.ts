import type {
  CredentialBundle,
  Endpoint,
  EndpointData,
  EndpointRef,
  RemoteApplication,
  Result,
} from '../core/types.js';
import { err, ok } from '../core/types.js';
import { failure } from './statusMapper.js';

export const DEFAULT_PORT = '3306';

const REQUIRED_FIELDS = ['database', 'host', 'user', 'password'] as const;

export interface ExtractOptions {
  defaultPort?: string;
}

export function createBundle(fields: CredentialBundle): CredentialBundle {
  return Object.freeze({
    name: fields.name,
    host: fields.host,
    port: fields.port,
    username: fields.username,
    password: fields.password,
  });
}

// Application data first (source of truth), then unit data for older publishers
export function endpointRefs(app: RemoteApplication): EndpointRef[] {
  return [
    { kind: 'app', id: app.name },
    ...app.units.map((unit): EndpointRef => ({ kind: 'unit', id: unit })),
  ];
}

export function isComplete(data: EndpointData): boolean {
  return REQUIRED_FIELDS.every((field) => Boolean(data[field]));
}

function toBundle(data: EndpointData, defaultPort: string): CredentialBundle {
  return createBundle({
    name: data.database,
    host: data.host,
    port: data.port ?? defaultPort,
    username: data.user,
    password: data.password,
  });
}

// Endpoints may be produced lazily; iteration stops at the first complete one
export function extractBundle(
  channel: string,
  endpoints: Iterable<Endpoint>,
  opts: ExtractOptions = {},
): Result<CredentialBundle> {
  for (const candidate of endpoints) {
    if (isComplete(candidate.data)) {
      return ok(toBundle(candidate.data, opts.defaultPort ?? DEFAULT_PORT));
    }
  }
  return err(failure('IncompleteRelation', channel));
}

export function extractAllBundles(
  channel: string,
  endpoints: Iterable<Endpoint>,
  opts: ExtractOptions = {},
): Result<CredentialBundle[]> {
  const bundles = [...endpoints]
    .filter((e) => isComplete(e.data))
    .map((e) => toBundle(e.data, opts.defaultPort ?? DEFAULT_PORT));
  if (bundles.length === 0) return err(failure('IncompleteRelation', channel));
  return ok(bundles);
}
