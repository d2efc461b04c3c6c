/**
 * Delay-adjusted clock times for next-to-arrive predictions.
 *
 * Upstream times are 12-hour strings with a meridiem ("3:15PM") and delays
 * are free text ("On time", "7 min"). Nothing here throws: a value that
 * cannot be parsed becomes an empty display string.
 */

const CLOCK_TIME_REGEX = /^\s*(\d{1,2}):(\d{2})\s*(AM|PM)\s*$/i;
const MINUTES_PER_DAY = 24 * 60;

export const ON_TIME_TEXT = 'On time';

function isOnTime(delayText: string): boolean {
  return delayText.trim().toLowerCase() === ON_TIME_TEXT.toLowerCase();
}

/**
 * Minutes since midnight for "h:mmAM" / "h:mmPM", or null.
 */
export function parseClockTime(time: string): number | null {
  const match = time.match(CLOCK_TIME_REGEX);
  if (!match) return null;

  let hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const period = match[3].toUpperCase();
  if (hours < 1 || hours > 12 || minutes > 59) return null;

  if (period === 'PM' && hours !== 12) hours += 12;
  if (period === 'AM' && hours === 12) hours = 0;

  return hours * 60 + minutes;
}

export function formatClockTime(minutesSinceMidnight: number): string {
  const normalized = ((minutesSinceMidnight % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(normalized / 60);
  const minutes = normalized % 60;
  const period = hours >= 12 ? 'PM' : 'AM';
  const displayHour = hours % 12 === 0 ? 12 : hours % 12;
  return `${displayHour}:${String(minutes).padStart(2, '0')}${period}`;
}

/**
 * "On time" -> 0, "7 min" -> 7, "-2 min" -> -2, anything else -> null.
 */
export function parseDelayMinutes(delayText: string): number | null {
  if (isOnTime(delayText)) return 0;
  const token = delayText.trim().split(/\s+/)[0];
  if (!token || !/^[+-]?\d+$/.test(token)) return null;
  return parseInt(token, 10);
}

function shiftClockTime(scheduledTime: string, delayMinutes: number): string {
  const scheduled = parseClockTime(scheduledTime);
  if (scheduled === null) {
    console.warn(`⚠️ [TIME] Could not parse scheduled time "${scheduledTime}"`);
    return '';
  }
  return `${scheduledTime} (Now: ${formatClockTime(scheduled + delayMinutes)})`;
}

export function adjustTime(scheduledTime: string, delayText: string): string {
  if (isOnTime(delayText)) return scheduledTime;

  const delayMinutes = parseDelayMinutes(delayText);
  if (delayMinutes === null) {
    console.warn(`⚠️ [TIME] Could not parse delay "${delayText}"`);
    return '';
  }
  return shiftClockTime(scheduledTime, delayMinutes);
}

/**
 * Same as adjustTime, for delays already parsed at the decode boundary.
 */
export function adjustLegTime(scheduledTime: string, delayMinutes: number | null): string {
  if (delayMinutes === null) return '';
  if (delayMinutes === 0) return scheduledTime;
  return shiftClockTime(scheduledTime, delayMinutes);
}
