const pad = (value: number): string => String(value).padStart(2, '0');

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Local calendar day as `YYYY-MM-DD`. */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall time as `HH:MM:SS`. */
export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Normalizes a stored date value to a local `YYYY-MM-DD` key. Bare day
 * strings are kept as-is; anything else must parse as a date.
 */
export function dayKey(value: string | Date | undefined): string | null {
  if (value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatDay(value);
  }
  const trimmed = value.trim();
  if (DAY_PATTERN.test(trimmed)) return trimmed;
  if (!trimmed) return null;
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : formatDay(parsed);
}
