// Calendar-day arithmetic on ISO dates (YYYY-MM-DD), always in UTC.

const DAY_MS = 86_400_000;

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return toIsoDate(new Date(Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS));
}

/** Inclusive count of calendar days, e.g. 2025-06-01..2025-06-03 is 3. */
export function tripDays(startDate: string, endDate: string): number {
  const diff = Date.parse(`${endDate}T00:00:00Z`) - Date.parse(`${startDate}T00:00:00Z`);
  return Math.round(diff / DAY_MS) + 1;
}

export function nights(startDate: string, endDate: string): number {
  return Math.max(0, tripDays(startDate, endDate) - 1);
}

export function datesInRange(startDate: string, endDate: string): string[] {
  const count = tripDays(startDate, endDate);
  return Array.from({ length: Math.max(0, count) }, (_, i) => addDays(startDate, i));
}
