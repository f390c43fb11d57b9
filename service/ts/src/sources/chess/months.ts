import { isMonth } from '@gamedata/clients';

const DAY_MS = 24 * 60 * 60 * 1000;

export const formatMonth = (date: Date) =>
  `${date.getUTCFullYear()}/${String(date.getUTCMonth() + 1).padStart(2, '0')}`;

export const monthRangeEndingAt = (end: Date, lookbackDays: number) => ({
  startMonth: formatMonth(new Date(end.getTime() - lookbackDays * DAY_MS)),
  endMonth: formatMonth(end),
});

export const previousMonth = (now: Date) =>
  formatMonth(new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 0)));

/** Archive URLs end with `/YYYY/MM`. */
export const monthOfArchiveUrl = (url: string): string | null => {
  const month = url.replace(/\/+$/, '').slice(-7);
  return isMonth(month) ? month : null;
};

// YYYY/MM strings order lexicographically
export const isMonthInRange = (month: string, startMonth: string, endMonth: string) =>
  month >= startMonth && month <= endMonth;
