// backend/src/sleepWindow.ts
// Quiet hours: no fetching or evaluation while the local clock is inside the window.

const QUARTER_HOUR_MS = 15 * 60_000;
const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let f = formatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-GB', { timeZone, hour: '2-digit', minute: '2-digit', hourCycle: 'h23' });
    formatters.set(timeZone, f);
  }
  return f;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function localTime(now: number, timeZone: string): { hour: number; minute: number } {
  let hour = 0;
  let minute = 0;
  for (const part of formatterFor(timeZone).formatToParts(new Date(now))) {
    if (part.type === 'hour') hour = Number(part.value) % 24;
    else if (part.type === 'minute') minute = Number(part.value);
  }
  return { hour, minute };
}

export function localHour(now: number, timeZone: string): number {
  return localTime(now, timeZone).hour;
}

/**
 * Local hour in [startHour, endHour). A window with start > end wraps
 * midnight (e.g. 22..3); start === end is empty.
 */
export function inWindow(now: number, startHour: number, endHour: number, timeZone: string): boolean {
  const h = localHour(now, timeZone);
  if (startHour <= endHour) return h >= startHour && h < endHour;
  return h >= startHour || h < endHour;
}

/** Next instant after `now` whose local time reads endHour:00. */
export function nextWakeAt(now: number, endHour: number, timeZone: string): number {
  // every zone offset in use is a multiple of 15 minutes
  let t = Math.floor(now / QUARTER_HOUR_MS) * QUARTER_HOUR_MS + QUARTER_HOUR_MS;
  const limit = now + 48 * 60 * 60_000;
  for (; t <= limit; t += QUARTER_HOUR_MS) {
    const { hour, minute } = localTime(t, timeZone);
    if (hour === endHour && minute === 0) return t;
  }
  return t;
}
