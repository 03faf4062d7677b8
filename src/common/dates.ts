import dayjs from 'dayjs';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DD` naming a real day (no 2024-02-30). */
export function isCalendarDate(value: unknown): value is string {
  return typeof value === 'string' && CALENDAR_DATE.test(value) && dayjs(value).format('YYYY-MM-DD') === value;
}

/** True when calendar date `a` falls strictly before `b`. */
export function isBeforeDate(a: string, b: string): boolean {
  return dayjs(a).isBefore(dayjs(b), 'day');
}
