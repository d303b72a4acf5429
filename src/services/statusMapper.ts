import type { FailureKind, RelationFailure, Severity, Status } from '../core/types.js';

export function blocked(message: string): Status {
  return { severity: 'blocking', message };
}

export function waiting(message: string): Status {
  return { severity: 'waiting', message };
}

export function statusFor(kind: FailureKind, channel: string): Status {
  switch (kind) {
    case 'NoRelatedApps':
      return blocked(`Missing relation: ${channel}`);
    case 'TooManyRelatedApps':
      return blocked(`Too many related applications: ${channel}`);
    case 'IncompleteRelation':
      return waiting(`Waiting for database: ${channel}`);
  }
}

export function brokenStatus(channel: string): Status {
  return blocked(`Missing relation: ${channel}`);
}

export function failure(
  kind: FailureKind,
  channel: string,
  extra: { relatedApps?: number } = {},
): RelationFailure {
  return { kind, channel, status: statusFor(kind, channel), ...extra };
}

// Status names as hosts usually label them ("blocked" / "waiting")
export function statusName(status: Status): 'blocked' | 'waiting' {
  return status.severity === 'blocking' ? 'blocked' : 'waiting';
}

export function statusFromName(name: string, message: string): Status {
  let severity: Severity;
  switch (name) {
    case 'blocked':
      severity = 'blocking';
      break;
    case 'waiting':
      severity = 'waiting';
      break;
    default:
      throw new Error(`Unknown status name: ${name}`);
  }
  return { severity, message };
}
