import { addDays, format, isSameDay, isSaturday, isSunday, parseISO } from 'date-fns';

// Dates are handled as local calendar days and leave as `YYYY-MM-DD`.

/** Easter Sunday of `year` (anonymous Gregorian computus). */
export function easterSunday(year: number): Date {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const month = Math.floor((h + l - 7 * m + 114) / 31);
  const day = ((h + l - 7 * m + 114) % 31) + 1;
  return new Date(year, month - 1, day);
}

function skipWeekend(date: Date): Date {
  if (isSaturday(date)) return addDays(date, 2);
  if (isSunday(date)) return addDays(date, 1);
  return date;
}

function skipFixedHolidays(date: Date): Date {
  const month = date.getMonth() + 1;
  const day = date.getDate();
  if (day === 1 && (month === 1 || month === 5)) return addDays(date, 1);
  if (month === 12 && day === 25) return addDays(date, 2);
  if (month === 12 && day === 26) return addDays(date, 1);
  return date;
}

/**
 * First collection date at least `offsetDays` after `today` that is a
 * TARGET2 business day.
 */
export function calculatePaymentDate(today: string, offsetDays: number): string {
  let date = addDays(parseISO(today), offsetDays);

  const easter = easterSunday(date.getFullYear());
  if (isSameDay(date, addDays(easter, -2)) || isSameDay(date, addDays(easter, 1))) {
    date = addDays(easter, 2);
  }

  date = skipWeekend(date);
  date = skipFixedHolidays(date);
  date = skipWeekend(date);
  return format(date, 'yyyy-MM-dd');
}
