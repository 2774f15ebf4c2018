/**
 * Typed errors for the power scheduler.
 *
 * Per-instance errors are carried as values by the reconciler; only
 * InstanceListingError and ConfigError are expected to escape a cycle.
 */

export type SchedulerErrorCode =
  | 'INVALID_TIME_FORMAT'
  | 'UNKNOWN_REGION'
  | 'ACTUATION_FAILED'
  | 'NOTIFICATION_FAILED'
  | 'INSTANCE_LISTING_FAILED'
  | 'INVALID_CONFIG';

export class SchedulerError extends Error {
  constructor(
    message: string,
    public readonly code: SchedulerErrorCode
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidTimeFormatError extends SchedulerError {
  constructor(public readonly raw: string) {
    super(`Invalid time format: '${raw}'`, 'INVALID_TIME_FORMAT');
  }
}

export class UnknownRegionError extends SchedulerError {
  constructor(public readonly region: string) {
    super(`No timezone mapping for region ${region}`, 'UNKNOWN_REGION');
  }
}

export class ActuationError extends SchedulerError {
  constructor(
    public readonly instanceId: string,
    public readonly action: 'start' | 'stop',
    reason: string
  ) {
    super(`Failed to ${action} instance ${instanceId}: ${reason}`, 'ACTUATION_FAILED');
  }
}

export class NotificationError extends SchedulerError {
  constructor(
    public readonly recipient: string,
    reason: string
  ) {
    super(`Failed to notify ${recipient}: ${reason}`, 'NOTIFICATION_FAILED');
  }
}

export class InstanceListingError extends SchedulerError {
  constructor(
    public readonly region: string,
    reason: string
  ) {
    super(`Unable to list instances in ${region}: ${reason}`, 'INSTANCE_LISTING_FAILED');
  }
}

export class ConfigError extends SchedulerError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'INVALID_CONFIG');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
