import defaultRegionTimezones from '../config/regionTimezones.json';
import { UnknownRegionError } from '../types/errors';
import type { TimeOfDay } from '../types';

export const DEFAULT_REGION_TIMEZONES: Readonly<Record<string, string>> = Object.freeze({
  ...defaultRegionTimezones,
});

export interface ResolvedTimezone {
  timezone: string;
  usedFallback: boolean;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/** Wall-clock hour and minute of `now` in the given IANA timezone. */
export function localTimeOfDay(now: Date, timezone: string): TimeOfDay {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const hour = parts.find((part) => part.type === 'hour');
  const minute = parts.find((part) => part.type === 'minute');
  if (!hour || !minute) {
    throw new Error(`Unable to read local time for timezone ${timezone}`);
  }
  // Some ICU builds still render midnight as 24 under h23
  return { hour: Number(hour.value) % 24, minute: Number(minute.value) };
}

export class TimezoneResolver {
  private readonly timezones: ReadonlyMap<string, string>;

  constructor(
    public readonly fallbackTimezone: string = 'UTC',
    overrides: Record<string, string> = {}
  ) {
    this.timezones = new Map(Object.entries({ ...DEFAULT_REGION_TIMEZONES, ...overrides }));
  }

  /** @throws UnknownRegionError when the region has no mapping */
  resolve(region: string): string {
    const timezone = this.timezones.get(region);
    if (timezone === undefined) {
      throw new UnknownRegionError(region);
    }
    return timezone;
  }

  resolveWithFallback(region: string): ResolvedTimezone {
    const timezone = this.timezones.get(region);
    if (timezone === undefined) {
      return { timezone: this.fallbackTimezone, usedFallback: true };
    }
    return { timezone, usedFallback: false };
  }
}
