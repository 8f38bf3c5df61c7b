import * as O from 'fp-ts/lib/Option';

import { pipe } from 'fp-ts/lib/function';

export const DATE_FORMAT_PATTERN = 'yyyy-MM-dd';

const ISO_LOCAL_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

// setUTCFullYear keeps years below 100 as they are, unlike Date.UTC
function toUtcMidnight(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function isSameCalendarDay(year: number, month: number, day: number) {
  return (date: Date) =>
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day;
}

export function parseIsoDate(rawValue: string): O.Option<Date> {
  return pipe(
    O.fromNullable(ISO_LOCAL_DATE_REGEX.exec(rawValue.trim())),
    O.chain(([, yearStr, monthStr, dayStr]) => {
      const [year, month, day] = [Number(yearStr), Number(monthStr), Number(dayStr)];

      return pipe(
        toUtcMidnight(year, month, day),
        O.fromPredicate(isSameCalendarDay(year, month, day))
      );
    })
  );
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
