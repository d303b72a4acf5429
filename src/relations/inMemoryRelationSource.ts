import fs from 'fs';
import { z } from 'zod';
import type { EndpointData, EndpointRef, RelationSource, RemoteApplication } from '../core/types.js';

const dataSchema = z.record(z.string());

export const relationSnapshotSchema = z.object({
  relations: z.record(
    z.array(
      z.object({
        app: z.string().min(1),
        data: dataSchema.default({}),
        units: z.array(z.object({ name: z.string().min(1), data: dataSchema.default({}) })).default([]),
      }),
    ),
  ),
});

export type RelationSnapshot = z.input<typeof relationSnapshotSchema>;

interface AppRecord {
  name: string;
  data: Record<string, string>;
  units: Map<string, Record<string, string>>;
}

/**
 * Relation data held in process. Backs the CLI (loaded from a JSON snapshot)
 * and stands in for the host's relation store in tests.
 */
export class InMemoryRelationSource implements RelationSource {
  private readonly channels = new Map<string, AppRecord[]>();

  static fromSnapshot(raw: unknown): InMemoryRelationSource {
    const snap = relationSnapshotSchema.parse(raw);
    const source = new InMemoryRelationSource();
    for (const [channel, apps] of Object.entries(snap.relations)) {
      for (const app of apps) {
        source.relate(channel, app.app);
        source.setAppData(channel, app.app, app.data);
        for (const unit of app.units) source.setUnitData(channel, app.app, unit.name, unit.data);
      }
    }
    return source;
  }

  static fromFile(filePath: string): InMemoryRelationSource {
    return InMemoryRelationSource.fromSnapshot(JSON.parse(fs.readFileSync(filePath, 'utf8')));
  }

  relate(channel: string, app: string): void {
    const apps = this.channels.get(channel) ?? [];
    if (!apps.some((a) => a.name === app)) apps.push({ name: app, data: {}, units: new Map() });
    this.channels.set(channel, apps);
  }

  unrelate(channel: string, app?: string): void {
    if (app === undefined) {
      this.channels.delete(channel);
      return;
    }
    const apps = (this.channels.get(channel) ?? []).filter((a) => a.name !== app);
    this.channels.set(channel, apps);
  }

  setAppData(channel: string, app: string, data: Record<string, string>): void {
    this.record(channel, app).data = { ...data };
  }

  setUnitData(channel: string, app: string, unit: string, data: Record<string, string>): void {
    this.record(channel, app).units.set(unit, { ...data });
  }

  listRemoteApplications(channel: string): readonly RemoteApplication[] {
    return (this.channels.get(channel) ?? []).map((a) => ({ name: a.name, units: [...a.units.keys()] }));
  }

  readEndpointData(channel: string, endpoint: EndpointRef): EndpointData {
    for (const app of this.channels.get(channel) ?? []) {
      if (endpoint.kind === 'app' && app.name === endpoint.id) return { ...app.data };
      if (endpoint.kind === 'unit') {
        const data = app.units.get(endpoint.id);
        if (data) return { ...data };
      }
    }
    return {};
  }

  private record(channel: string, app: string): AppRecord {
    this.relate(channel, app);
    const apps = this.channels.get(channel) ?? [];
    const found = apps.find((a) => a.name === app);
    if (!found) throw new Error(`Application ${app} is not related on ${channel}`);
    return found;
  }
}
