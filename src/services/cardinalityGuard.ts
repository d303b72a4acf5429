import type { RemoteApplication, Result } from '../core/types.js';
import { err, ok } from '../core/types.js';
import { failure } from './statusMapper.js';

export function selectApplication(
  channel: string,
  apps: readonly RemoteApplication[],
): Result<RemoteApplication> {
  if (apps.length === 0) return err(failure('NoRelatedApps', channel));
  if (apps.length > 1) {
    return err(failure('TooManyRelatedApps', channel, { relatedApps: apps.length }));
  }
  return ok(apps[0]);
}
