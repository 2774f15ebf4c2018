import { describe, it, expect, vi } from 'vitest';
import {
  parseDisabledUntil,
  parseStakeholders,
  parseTime,
  safeParseTime,
  ScheduleParser,
} from '../../../src/services/scheduleParser';
import { InvalidTimeFormatError } from '../../../src/types/errors';
import { makeLogger } from '../../../src/utils/logger';

describe('parseTime', () => {
  it.each([
    ['9am', 9, 0],
    ['5pm', 17, 0],
    ['12am', 0, 0],
    ['12pm', 12, 0],
    ['12:30am', 0, 30],
    ['9:00am', 9, 0],
    ['5:30pm', 17, 30],
    ['09:00 AM', 9, 0],
    ['05:30 PM', 17, 30],
    ['  11 pm  ', 23, 0],
  ])('parses meridiem time %s', (raw, hour, minute) => {
    expect(parseTime(raw)).toEqual({ hour, minute });
  });

  it.each([
    ['17:30', 17, 30],
    ['06:30', 6, 30],
    ['9:15', 9, 15],
    ['00:00', 0, 0],
    ['23:59', 23, 59],
  ])('parses 24-hour time %s unchanged', (raw, hour, minute) => {
    expect(parseTime(raw)).toEqual({ hour, minute });
  });

  it.each(['invalid', '', '   ', '25:00', '12:60', 'abc:def', '9', '13pm', '0am', '17:30pm', '00:30am', '9:5am', '1:000'])(
    'rejects %j',
    (raw) => {
      expect(() => parseTime(raw)).toThrow(InvalidTimeFormatError);
    }
  );

  it('keeps the raw value on the error', () => {
    const result = safeParseTime('half past nine');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.raw).toBe('half past nine');
      expect(result.error.code).toBe('INVALID_TIME_FORMAT');
    }
  });

  it('returns the same value for repeated calls', () => {
    expect(safeParseTime('7:45pm')).toEqual({ success: true, data: { hour: 19, minute: 45 } });
    expect(safeParseTime('7:45pm')).toEqual({ success: true, data: { hour: 19, minute: 45 } });
  });
});

describe('parseDisabledUntil', () => {
  it.each([
    ['2025-07-10T23:51:39.472237+00:00', '2025-07-10T23:51:39.472Z'],
    ['2025-01-01T00:00:00Z', '2025-01-01T00:00:00.000Z'],
    ['2025-12-31T23:59:59-05:00', '2026-01-01T04:59:59.000Z'],
    ['2025-06-15T12:30:00', '2025-06-15T12:30:00.000Z'],
    ['2025-01-01T05:30:00+0530', '2025-01-01T00:00:00.000Z'],
    ['0099-06-01T00:00:00Z', '0099-06-01T00:00:00.000Z'],
    ['0001-01-01T12:00:00', '0001-01-01T12:00:00.000Z'],
    ['2024-02-29T08:00:00+02:30', '2024-02-29T05:30:00.000Z'],
  ])('parses %s', (raw, expected) => {
    expect(parseDisabledUntil(raw)?.toISOString()).toBe(expected);
  });

  it.each([
    'invalid',
    '2025-13-01T00:00:00Z',
    '2025-01-32T00:00:00Z',
    '2025-02-29T00:00:00Z',
    '2025-01-01T25:00:00Z',
    '',
    'not-a-date',
  ])('rejects %j', (raw) => {
    expect(parseDisabledUntil(raw)).toBeUndefined();
  });
});

describe('parseStakeholders', () => {
  it('splits and trims a comma-separated list', () => {
    expect(parseStakeholders('U111, U222 ,U333')).toEqual(['U111', 'U222', 'U333']);
  });

  it('drops empty entries', () => {
    expect(parseStakeholders('U111,, ,U222,')).toEqual(['U111', 'U222']);
  });

  it('returns an empty list for a missing or blank tag', () => {
    expect(parseStakeholders(undefined)).toEqual([]);
    expect(parseStakeholders('')).toEqual([]);
    expect(parseStakeholders(' , ')).toEqual([]);
  });
});

describe('ScheduleParser', () => {
  const parser = new ScheduleParser(makeLogger());

  it('returns a valid schedule when both tags parse', () => {
    expect(parser.parseSchedule({ onTime: '09:00', offTime: '5pm' })).toEqual({
      status: 'valid',
      schedule: { onTime: { hour: 9, minute: 0 }, offTime: { hour: 17, minute: 0 } },
    });
  });

  it('reports a missing schedule when either tag is absent or blank', () => {
    expect(parser.parseSchedule({})).toEqual({ status: 'missing' });
    expect(parser.parseSchedule({ onTime: '09:00' })).toEqual({ status: 'missing' });
    expect(parser.parseSchedule({ onTime: '09:00', offTime: '  ' })).toEqual({ status: 'missing' });
    expect(parser.parseSchedule({ disabledUntil: '2025-07-10T23:51:39Z' })).toEqual({ status: 'missing' });
  });

  it('names the tag that failed to parse', () => {
    const result = parser.parseSchedule({ onTime: '09:00', offTime: '25:00' });
    expect(result.status).toBe('invalid');
    if (result.status === 'invalid') {
      expect(result.tag).toBe('PowerScheduleOffTime');
      expect(result.raw).toBe('25:00');
    }
  });

  it('attaches a parsed disabled-until instant', () => {
    const result = parser.parseSchedule({
      onTime: '09:00',
      offTime: '17:00',
      disabledUntil: '2025-07-10T23:51:39Z',
    });
    expect(result.status).toBe('valid');
    if (result.status === 'valid') {
      expect(result.disabledUntil?.toISOString()).toBe('2025-07-10T23:51:39.000Z');
    }
  });

  it('ignores an unparsable disabled-until value with a warning', () => {
    const log = makeLogger();
    const warn = vi.spyOn(log, 'warn');
    const result = new ScheduleParser(log).parseSchedule({
      onTime: '09:00',
      offTime: '17:00',
      disabledUntil: 'next tuesday',
    });

    expect(result).toEqual({
      status: 'valid',
      schedule: { onTime: { hour: 9, minute: 0 }, offTime: { hour: 17, minute: 0 } },
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
