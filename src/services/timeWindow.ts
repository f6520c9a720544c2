import { format } from 'date-fns';
import { DateTime } from 'luxon';
import { TimeWindowError } from '../errors.js';
import type { TimeWindow } from '../types/zoho.js';

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

const pad = (value: number): string => String(value).padStart(2, '0');

/** Parses a 24-hour "HH:MM" clock into minutes after midnight. */
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) {
    throw new TimeWindowError(`Invalid clock time "${value}", expected HH:MM`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new TimeWindowError(`Invalid clock time "${value}", expected HH:MM`);
  }
  return hour * 60 + minute;
}

export function formatDuration(totalMinutes: number): string {
  return `${pad(Math.floor(totalMinutes / 60))}:${pad(totalMinutes % 60)}`;
}

/**
 * Yesterday's date in `timeZone` and the span between the two clock times.
 *
 * "Yesterday" is one calendar day back from the zone's current date, so a
 * daylight-saving change never moves it onto the wrong day. The span is the
 * wall-clock difference, matching what a person would write on a timesheet.
 */
export function computeWindow(
  timeZone: string,
  startClock: string,
  endClock: string,
  now: DateTime = DateTime.now()
): TimeWindow {
  const zoned = now.setZone(timeZone);
  if (!zoned.isValid) {
    throw new TimeWindowError(`Unknown time zone "${timeZone}"`);
  }
  const yesterday = zoned.minus({ days: 1 });

  const start = parseClock(startClock);
  const end = parseClock(endClock);
  if (end <= start) {
    throw new TimeWindowError(`End time must be after start time (start=${startClock}, end=${endClock})`);
  }

  return {
    date: format(new Date(yesterday.year, yesterday.month - 1, yesterday.day), 'MM-dd-yyyy'),
    hours: formatDuration(end - start),
  };
}
