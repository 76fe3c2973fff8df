import { format, isBefore, isValid, parse, parseISO } from 'date-fns';

export const DATE_FORMAT = 'yyyy-MM-dd';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE.test(value)) return false;
  // parse() rejects 2024-02-30 where parseISO would roll it over
  return isValid(parse(value, DATE_FORMAT, new Date()));
}

export function toCalendarDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function today(): string {
  return toCalendarDate(new Date());
}

/** Strictly before `reference`; an absent due date is never overdue. */
export function isOverdue(dueDate: string | undefined, reference: string): boolean {
  if (!dueDate) return false;
  return isBefore(parseISO(dueDate), parseISO(reference));
}

export function formatDueDate(dueDate: string): string {
  return format(parseISO(dueDate), 'MMM d, yyyy');
}
