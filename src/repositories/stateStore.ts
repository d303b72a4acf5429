import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { PersistedState, StateStore } from '../core/types.js';
import { StateStoreError } from '../core/errors.js';

export const persistedStateSchema = z.object({
  version: z.literal(1),
  fingerprint: z.string().nullable(),
  observedAt: z.string().nullable(),
});

const stateFileSchema = z.object({
  version: z.literal(1),
  channels: z.unknown(),
});

// Channels live in a Map: relation names such as "constructor" are plain keys here
interface StateFile {
  version: 1;
  channels: Map<string, PersistedState>;
}

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class InMemoryStateStore implements StateStore {
  private readonly states = new Map<string, PersistedState>();

  load(channel: string): PersistedState | undefined {
    const state = this.states.get(channel);
    return state ? { ...state } : undefined;
  }

  save(channel: string, state: PersistedState): void {
    this.states.set(channel, { ...state });
  }

  clear(channel: string): void {
    this.states.delete(channel);
  }
}

/**
 * Keeps every channel's state in one JSON document. Writes go to a sibling
 * temp file first and are renamed into place, so a crash leaves either the
 * old or the new document on disk.
 */
export class JsonFileStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  load(channel: string): PersistedState | undefined {
    return this.read().channels.get(channel);
  }

  save(channel: string, state: PersistedState): void {
    const doc = this.read();
    doc.channels.set(channel, persistedStateSchema.parse(state));
    this.write(doc);
  }

  clear(channel: string): void {
    const doc = this.read();
    if (!doc.channels.delete(channel)) return;
    this.write(doc);
  }

  private read(): StateFile {
    if (!fs.existsSync(this.filePath)) return { version: 1, channels: new Map() };
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      throw new StateStoreError(`Failed to read state file ${this.filePath}`, err);
    }
    const header = stateFileSchema.safeParse(raw);
    if (!header.success) {
      throw new StateStoreError(`Invalid state file ${this.filePath}: ${header.error.message}`);
    }
    if (!isRecord(header.data.channels)) {
      throw new StateStoreError(`Invalid state file ${this.filePath}: channels must be an object`);
    }
    // Own entries of the parsed JSON only; nothing resolves through a prototype
    const channels = new Map<string, PersistedState>();
    for (const [name, value] of Object.entries(header.data.channels)) {
      const state = persistedStateSchema.safeParse(value);
      if (!state.success) {
        throw new StateStoreError(
          `Invalid state file ${this.filePath}: channel ${name}: ${state.error.message}`,
        );
      }
      channels.set(name, state.data);
    }
    return { version: 1, channels };
  }

  private write(doc: StateFile): void {
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const body = { version: doc.version, channels: Object.fromEntries(doc.channels) };
      fs.writeFileSync(tmp, JSON.stringify(body, null, 2) + '\n');
      fs.renameSync(tmp, this.filePath);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw new StateStoreError(`Failed to write state file ${this.filePath}`, err);
    }
  }
}
