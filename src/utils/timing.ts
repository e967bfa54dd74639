const pad = (value: number): string => value.toString().padStart(2, '0');

/**
 * `HH:MM:SS` from the local fields, which hold the feed's wall-clock time for
 * decoded trades. Trade updates are deduplicated by it.
 */
export function timeOfDay(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Downstream trade timestamp format: `YYYY/MM/DD HH:MM:SS`. */
export function formatTradeDateTime(date: Date): string {
  return `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ${timeOfDay(date)}`;
}

function parseTimeOfDay(value: string): { hours: number; minutes: number; seconds: number } {
  const [hours = 0, minutes = 0, seconds = 0] = value.split(':').map(Number);
  return { hours, minutes, seconds };
}

/** Combines a `HH:MM[:SS]` time of day with the calendar date of `day`. */
export function combineDateAndTime(day: Date, time: string): Date {
  const { hours, minutes, seconds } = parseTimeOfDay(time);
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), hours, minutes, seconds);
}

/** Milliseconds from `now` until `time` on the same day; zero once it has passed. */
export function millisecondsUntil(time: string, now: Date = new Date()): number {
  return Math.max(0, combineDateAndTime(now, time).getTime() - now.getTime());
}
