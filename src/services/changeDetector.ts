import crypto from 'crypto';
import { canonicalize } from 'json-canonicalize';
import type { CredentialBundle, PersistedState } from '../core/types.js';

export type Transition = 'none' | 'available' | 'changed' | 'unchanged' | 'lost';

export interface Detection {
  transition: Transition;
  state: PersistedState;
}

export function emptyState(): PersistedState {
  return { version: 1, fingerprint: null, observedAt: null };
}

// Canonical JSON sorts keys, so field insertion order never changes the value
export function fingerprintBundle(bundle: CredentialBundle): string {
  const canonical = canonicalize({ ...bundle });
  return crypto.createHash('sha256').update(canonical).digest('hex');
}

export function detectChange(
  bundle: CredentialBundle | null,
  prev: PersistedState,
  now: Date = new Date(),
): Detection {
  const hadBundle = prev.fingerprint !== null;
  if (!bundle) {
    return hadBundle ? { transition: 'lost', state: emptyState() } : { transition: 'none', state: prev };
  }
  const fingerprint = fingerprintBundle(bundle);
  if (!hadBundle) {
    return { transition: 'available', state: { version: 1, fingerprint, observedAt: now.toISOString() } };
  }
  if (fingerprint === prev.fingerprint) return { transition: 'unchanged', state: prev };
  return { transition: 'changed', state: { version: 1, fingerprint, observedAt: now.toISOString() } };
}
