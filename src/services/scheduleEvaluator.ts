import type { DesiredState, TimeOfDay } from '../types';

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  return a.hour - b.hour || a.minute - b.minute;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

/**
 * Desired power state for a daily on/off window.
 *
 * The window is half-open: running from `onTime` (inclusive) until `offTime`
 * (exclusive). When `onTime` is later than `offTime` the window spans midnight.
 * Equal on and off times describe an empty window, so the instance stays stopped.
 */
export function evaluateSchedule(
  onTime: TimeOfDay,
  offTime: TimeOfDay,
  nowLocal: TimeOfDay
): DesiredState {
  const order = compareTimeOfDay(onTime, offTime);
  if (order === 0) {
    return 'stopped';
  }

  const afterOn = compareTimeOfDay(nowLocal, onTime) >= 0;
  const beforeOff = compareTimeOfDay(nowLocal, offTime) < 0;

  if (order < 0) {
    return afterOn && beforeOff ? 'running' : 'stopped';
  }
  // Overnight
  return afterOn || beforeOff ? 'running' : 'stopped';
}
