import type { ClockTime } from './types';

const SEGMENT_PATTERN = /^\d+$/;

/**
 * Parse GTFS time format (H:MM:SS) to seconds since midnight
 * Hours past midnight (e.g. 25:10:00) wrap around modulo 24
 * @throws Error when the value is not a valid time
 */
export function parseGTFSTime(timeStr: string): ClockTime {
  const segments = timeStr.split(':');
  if (segments.length !== 3) {
    throw new Error(`invalid time '${timeStr}': expected three segments`);
  }

  const [hourSegment, minuteSegment, secondSegment] = segments;
  const hours = parseSegment(hourSegment, 'hour', timeStr) % 24;
  const minutes = parseSegment(minuteSegment, 'minute', timeStr);
  const seconds = parseSegment(secondSegment, 'second', timeStr);

  if (minutes > 59 || seconds > 59) {
    throw new Error(`invalid time '${timeStr}'`);
  }

  return hours * 3600 + minutes * 60 + seconds;
}

function parseSegment(segment: string, label: string, timeStr: string): number {
  if (!SEGMENT_PATTERN.test(segment)) {
    throw new Error(`invalid ${label} segment in time '${timeStr}'`);
  }
  return parseInt(segment, 10);
}

/**
 * Check that a name is an IANA time zone known to the runtime
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}
