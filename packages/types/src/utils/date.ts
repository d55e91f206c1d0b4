export function isValidISODate(dateStr: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(dateStr);
}

/** YYYY-MM-DD in UTC. */
export function toISODate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function daysAgo(days: number, now: Date = new Date()): string {
  const start = new Date(now.getTime());
  start.setUTCDate(start.getUTCDate() - days);
  return toISODate(start);
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}
