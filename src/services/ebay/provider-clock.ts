/**
 * eBay's daily call quota follows its own day, which starts at midnight US Pacific.
 * These helpers compute that day and its boundaries from any instant, with DST
 * handled by the runtime's time zone data.
 */

export const DEFAULT_PROVIDER_TIME_ZONE = 'America/Los_Angeles';

const HOUR_MS = 60 * 60 * 1000;

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') parts[part.type] = Number(part.value);
  }
  return {
    year: parts.year ?? 0,
    month: parts.month ?? 0,
    day: parts.day ?? 0,
    hour: parts.hour ?? 0,
    minute: parts.minute ?? 0,
    second: parts.second ?? 0,
  };
}

/** Offset of `timeZone` from UTC at `instant`, in ms (PDT → -7h). */
function offsetMs(instant: Date, timeZone: string): number {
  const p = zonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(instant.getTime() / 1000) * 1000;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Provider day of `instant` as `YYYY-MM-DD`. */
export function providerDate(instant: Date, timeZone = DEFAULT_PROVIDER_TIME_ZONE): string {
  const p = zonedParts(instant, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}

/** The most recent provider midnight at or before `instant`. */
export function lastResetAt(instant: Date, timeZone = DEFAULT_PROVIDER_TIME_ZONE): Date {
  const p = zonedParts(instant, timeZone);
  const midnightAsUtc = Date.UTC(p.year, p.month - 1, p.day);
  // The offset at midnight can differ from the offset now on a DST switch day.
  const guess = midnightAsUtc - offsetMs(instant, timeZone);
  return new Date(midnightAsUtc - offsetMs(new Date(guess), timeZone));
}

/** The first provider midnight strictly after `instant`. */
export function nextResetAt(instant: Date, timeZone = DEFAULT_PROVIDER_TIME_ZONE): Date {
  const last = lastResetAt(instant, timeZone);
  return lastResetAt(new Date(last.getTime() + 25 * HOUR_MS), timeZone);
}

export function minutesSinceReset(instant: Date, timeZone = DEFAULT_PROVIDER_TIME_ZONE): number {
  return (instant.getTime() - lastResetAt(instant, timeZone).getTime()) / 60_000;
}
