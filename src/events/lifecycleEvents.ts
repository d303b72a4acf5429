import { z } from 'zod';
import type { CredentialBundle, Status } from '../core/types.js';
import { createBundle } from '../services/bundleExtractor.js';
import { statusFromName, statusName } from '../services/statusMapper.js';

export type LifecycleEvent =
  | { type: 'available'; channel: string; bundle: CredentialBundle }
  | { type: 'changed'; channel: string; bundle: CredentialBundle }
  | { type: 'unavailable'; channel: string; status: Status };

export type LifecycleEventType = LifecycleEvent['type'];

export type LifecycleEvents = {
  [K in LifecycleEventType]: Extract<LifecycleEvent, { type: K }>;
};

const bundleSnapshotSchema = z.object({
  name: z.string(),
  host: z.string(),
  port: z.string(),
  username: z.string(),
  password: z.string(),
});

const eventSnapshotSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('available'), channel: z.string(), bundle: bundleSnapshotSchema }),
  z.object({ type: z.literal('changed'), channel: z.string(), bundle: bundleSnapshotSchema }),
  z.object({
    type: z.literal('unavailable'),
    channel: z.string(),
    status: z.object({ name: z.enum(['blocked', 'waiting']), message: z.string() }),
  }),
]);

export type EventSnapshot = z.infer<typeof eventSnapshotSchema>;

// Plain JSON form for hosts that defer or queue events across restarts
export function snapshotEvent(event: LifecycleEvent): EventSnapshot {
  if (event.type === 'unavailable') {
    return {
      type: 'unavailable',
      channel: event.channel,
      status: { name: statusName(event.status), message: event.status.message },
    };
  }
  return { type: event.type, channel: event.channel, bundle: { ...event.bundle } };
}

export function restoreEvent(raw: unknown): LifecycleEvent {
  const snap = eventSnapshotSchema.parse(raw);
  if (snap.type === 'unavailable') {
    return {
      type: 'unavailable',
      channel: snap.channel,
      status: statusFromName(snap.status.name, snap.status.message),
    };
  }
  return { type: snap.type, channel: snap.channel, bundle: createBundle(snap.bundle) };
}
