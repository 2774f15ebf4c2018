import { z } from 'zod';
import { InvalidTimeFormatError } from '../types/errors';
import type { RawScheduleTags, ScheduleTagPair, TimeOfDay } from '../types';
import { componentLogger, type Logger } from '../utils/logger';

export const TAG_KEYS = {
  name: 'Name',
  onTime: 'PowerScheduleOnTime',
  offTime: 'PowerScheduleOffTime',
  disabledUntil: 'PowerScheduleDisabledUntil',
  stakeholders: 'Stakeholders',
} as const;

const MERIDIEM_TIME = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)$/;
const TWENTY_FOUR_HOUR_TIME = /^(\d{1,2}):(\d{2})$/;

export type SafeParseTimeResult =
  | { success: true; data: TimeOfDay }
  | { success: false; error: InvalidTimeFormatError };

/**
 * Parses a human-entered time of day.
 *
 * Accepts `9am`, `9 PM`, `5:30pm`, `09:00 AM` (hour 1-12 with a meridiem) and
 * `17:30`, `06:30` (24-hour, no meridiem). `12am` is midnight and `12pm` is noon.
 *
 * @throws InvalidTimeFormatError when none of the grammars match
 */
export function parseTime(raw: string): TimeOfDay {
  const value = raw.trim().toLowerCase();

  const meridiem = MERIDIEM_TIME.exec(value);
  if (meridiem) {
    const hour = Number(meridiem[1]);
    const minute = meridiem[2] === undefined ? 0 : Number(meridiem[2]);
    if (hour < 1 || hour > 12 || minute > 59) {
      throw new InvalidTimeFormatError(raw);
    }
    const base = hour === 12 ? 0 : hour;
    return { hour: meridiem[3] === 'pm' ? base + 12 : base, minute };
  }

  const clock = TWENTY_FOUR_HOUR_TIME.exec(value);
  if (clock) {
    const hour = Number(clock[1]);
    const minute = Number(clock[2]);
    if (hour > 23 || minute > 59) {
      throw new InvalidTimeFormatError(raw);
    }
    return { hour, minute };
  }

  throw new InvalidTimeFormatError(raw);
}

export function safeParseTime(raw: string): SafeParseTimeResult {
  try {
    return { success: true, data: parseTime(raw) };
  } catch (error) {
    if (error instanceof InvalidTimeFormatError) {
      return { success: false, error };
    }
    throw error;
  }
}

const isoDateTime = z.string().datetime({ offset: true, local: true });
const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parses an ISO-8601 date-time such as `2025-07-10T23:51:39.472Z`.
 * Values without an offset are read as UTC. Returns undefined for anything else,
 * including impossible calendar dates.
 */
export function parseDisabledUntil(raw: string): Date | undefined {
  const parsed = isoDateTime.safeParse(raw.trim());
  if (!parsed.success) {
    return undefined;
  }

  const normalized = parsed.data.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const instant = new Date(HAS_OFFSET.test(normalized) ? normalized : `${normalized}Z`);
  return Number.isNaN(instant.getTime()) ? undefined : instant;
}

/** Splits a comma-separated Stakeholders tag, dropping blank entries. */
export function parseStakeholders(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export type ScheduleParseResult =
  | { status: 'missing' }
  | { status: 'invalid'; tag: string; raw: string; error: InvalidTimeFormatError }
  | { status: 'valid'; schedule: ScheduleTagPair; disabledUntil?: Date };

export class ScheduleParser {
  private readonly log: Logger;

  constructor(log: Logger = componentLogger('schedule_parser')) {
    this.log = log;
  }

  parseSchedule(tags: RawScheduleTags): ScheduleParseResult {
    const { onTime: rawOn, offTime: rawOff } = tags;
    if (!rawOn?.trim() || !rawOff?.trim()) {
      return { status: 'missing' };
    }

    const onTime = safeParseTime(rawOn);
    if (!onTime.success) {
      return { status: 'invalid', tag: TAG_KEYS.onTime, raw: rawOn, error: onTime.error };
    }
    const offTime = safeParseTime(rawOff);
    if (!offTime.success) {
      return { status: 'invalid', tag: TAG_KEYS.offTime, raw: rawOff, error: offTime.error };
    }

    const schedule = { onTime: onTime.data, offTime: offTime.data };
    if (tags.disabledUntil === undefined || tags.disabledUntil.trim() === '') {
      return { status: 'valid', schedule };
    }

    const disabledUntil = parseDisabledUntil(tags.disabledUntil);
    if (!disabledUntil) {
      this.log.warn(
        { tag: TAG_KEYS.disabledUntil, timeString: tags.disabledUntil },
        `Ignoring unparsable ${TAG_KEYS.disabledUntil} value '${tags.disabledUntil}'`
      );
      return { status: 'valid', schedule };
    }
    return { status: 'valid', schedule, disabledUntil };
  }
}
