const DAY_MS = 24 * 60 * 60 * 1000;

const RELEASE_DATE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

/**
 * Parses catalog release dates of year, month or day precision
 * ("2024", "2024-05", "2024-05-17") to UTC midnight of the first day
 * they denote. Returns null for anything else.
 */
export function parseReleaseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const match = RELEASE_DATE.exec(value.trim());
  if (!match) return null;

  const year = Number.parseInt(match[1] ?? "", 10);
  const month = match[2] ? Number.parseInt(match[2], 10) : 1;
  const day = match[3] ? Number.parseInt(match[3], 10) : 1;
  if (month < 1 || month > 12 || day < 1) return null;

  const date = new Date(Date.UTC(year, month - 1, day));
  // Rejects overflow such as 2023-02-30
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date;
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function formatShortDate(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  const yy = String(date.getFullYear() % 100).padStart(2, "0");
  return `${mm}/${dd}/${yy}`;
}
