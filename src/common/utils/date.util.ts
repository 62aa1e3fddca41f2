const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** UTC calendar day, e.g. "2024-03-01" */
export function utcDayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * ISO-8601 week of the UTC date, e.g. "2024-W09".
 * Weeks start on Monday; week 1 holds the year's first Thursday.
 */
export function isoWeekKey(date: Date): string {
  const thursday = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const weekday = thursday.getUTCDay() || 7;
  thursday.setUTCDate(thursday.getUTCDate() + 4 - weekday);

  const year = thursday.getUTCFullYear();
  const week = Math.ceil(((thursday.getTime() - Date.UTC(year, 0, 1)) / MS_PER_DAY + 1) / 7);
  return `${year}-W${String(week).padStart(2, '0')}`;
}

export function hoursBefore(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * 60 * 60 * 1000);
}
