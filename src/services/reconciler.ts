import type { InvalidTimeFormatError } from '../types/errors';
import type {
  ActionDecision,
  DesiredState,
  InstanceSnapshot,
  ObservedState,
  PowerAction,
  ScheduleTagPair,
  TimeOfDay,
} from '../types';
import { componentLogger, type Logger } from '../utils/logger';
import { evaluateSchedule, formatTimeOfDay } from './scheduleEvaluator';
import { ScheduleParser } from './scheduleParser';
import { localTimeOfDay, TimezoneResolver } from './timezoneResolver';

export interface EvaluationContext {
  schedule: ScheduleTagPair;
  timezone: string;
  usedFallbackTimezone: boolean;
  localTime: TimeOfDay;
}

export type SkipReason = 'no-schedule' | 'disabled';

export type ReconcileResult =
  | { kind: 'decided'; decision: ActionDecision; context: EvaluationContext }
  | { kind: 'skipped'; instance: InstanceSnapshot; reason: SkipReason; disabledUntil?: Date }
  | { kind: 'failed'; instance: InstanceSnapshot; error: InvalidTimeFormatError; tag: string };

export interface ReconcilerOptions {
  resolver?: TimezoneResolver;
  parser?: ScheduleParser;
  /** When false, instances whose region fell back to the default timezone are left alone. */
  actOnFallbackTimezone?: boolean;
  log?: Logger;
}

/**
 * Minimal action that moves an instance from its observed state to the desired one.
 * Transitional states are left for the next cycle.
 */
export function decideAction(currentState: ObservedState, desiredState: DesiredState): PowerAction {
  if (currentState === 'stopped' && desiredState === 'running') {
    return 'start';
  }
  if (currentState === 'running' && desiredState === 'stopped') {
    return 'stop';
  }
  return 'none';
}

export class Reconciler {
  private readonly resolver: TimezoneResolver;
  private readonly parser: ScheduleParser;
  private readonly actOnFallbackTimezone: boolean;
  private readonly log: Logger;

  constructor(options: ReconcilerOptions = {}) {
    this.resolver = options.resolver ?? new TimezoneResolver();
    this.parser = options.parser ?? new ScheduleParser();
    this.actOnFallbackTimezone = options.actOnFallbackTimezone ?? true;
    this.log = options.log ?? componentLogger('instance_processing');
  }

  reconcile(instance: InstanceSnapshot, nowUtc: Date): ReconcileResult {
    const fields = {
      instanceName: instance.name,
      instanceId: instance.id,
      currentState: instance.currentState,
      region: instance.region,
    };

    const parsed = this.parser.parseSchedule(instance.schedule);

    if (parsed.status === 'missing') {
      this.log.debug(
        { ...fields, scheduleFound: false, reason: 'no power schedule tags found' },
        `Found instance ${instance.name} (${instance.id}) - no power schedule tags found, skipping`
      );
      return { kind: 'skipped', instance, reason: 'no-schedule' };
    }

    if (parsed.status === 'invalid') {
      this.log.error(
        { ...fields, tag: parsed.tag, timeString: parsed.raw, error: parsed.error.message },
        `Skipping instance ${instance.name} (${instance.id}) - ${parsed.tag} has invalid value '${parsed.raw}'`
      );
      return { kind: 'failed', instance, error: parsed.error, tag: parsed.tag };
    }

    if (parsed.disabledUntil && nowUtc < parsed.disabledUntil) {
      const disabledUntil = parsed.disabledUntil.toISOString();
      this.log.info(
        { ...fields, disabledUntil, reason: 'scheduling disabled until specified time' },
        `Skipping instance ${instance.name} (${instance.id}) - scheduling disabled until ${disabledUntil}`
      );
      return { kind: 'skipped', instance, reason: 'disabled', disabledUntil: parsed.disabledUntil };
    }

    const { timezone, usedFallback } = this.resolver.resolveWithFallback(instance.region);
    if (usedFallback) {
      this.log.warn(
        { ...fields, timezone },
        `No timezone mapping for region ${instance.region}, using fallback ${timezone}`
      );
    }

    const { schedule } = parsed;
    const localTime = localTimeOfDay(nowUtc, timezone);
    const desiredState = evaluateSchedule(schedule.onTime, schedule.offTime, localTime);

    let action = decideAction(instance.currentState, desiredState);
    if (usedFallback && !this.actOnFallbackTimezone && action !== 'none') {
      this.log.warn(
        { ...fields, timezone, action: 'none', reason: 'fallback timezone actuation disabled' },
        `Not acting on ${instance.name} (${instance.id}) - schedule evaluated on fallback timezone`
      );
      action = 'none';
    }

    this.log.info(
      {
        ...fields,
        startTime: formatTimeOfDay(schedule.onTime),
        stopTime: formatTimeOfDay(schedule.offTime),
        currentTime: formatTimeOfDay(localTime),
        timezone,
        desiredState,
        action,
        scheduleFound: true,
      },
      `Processing instance ${instance.name} (${instance.id}) - schedule: ON at ${formatTimeOfDay(
        schedule.onTime
      )}, OFF at ${formatTimeOfDay(schedule.offTime)}, current time: ${formatTimeOfDay(localTime)}`
    );

    return {
      kind: 'decided',
      decision: { instance, desiredState, action },
      context: { schedule, timezone, usedFallbackTimezone: usedFallback, localTime },
    };
  }
}
