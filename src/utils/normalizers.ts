// Input normalizers for function arguments emitted by the model

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Resolves the relative keywords "today" and "tomorrow" (UTC) to YYYY-MM-DD.
 * Any other input is returned trimmed and unchanged.
 */
export function resolveRelativeDate(input: string, now: Date): string {
  const trimmed = input.trim();
  const lower = trimmed.toLowerCase();

  if (lower === 'today') return toIsoDate(now);
  if (lower === 'tomorrow') return toIsoDate(new Date(now.getTime() + DAY_MS));

  return trimmed;
}

export function isIsoCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

// "new york city" -> "New York"
export function normalizeCity(city: string): string {
  return city
    .replace(/\bcity\b/gi, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function normalizeCurrency(code: string): string {
  return code.trim().toUpperCase();
}
