//calendar-date helpers, all dates are UTC `YYYY-MM-DD` strings so they compare lexically

const pad = (n: number): string => String(n).padStart(2, '0');

export function toIsoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function buildDate(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return toIsoDate(d);
}

//accepts YYYY-MM-DD (optionally with a time part), MM/DD/YYYY and MM/DD/YY
export function parseAwardDate(value: string | Date): string | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : toIsoDate(value);

  const iso = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/);
  if (iso) {
    const [, y = '', m = '', d = ''] = iso;
    return buildDate(+y, +m, +d);
  }

  const us = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/);
  if (us) {
    const [, m = '', d = '', y = ''] = us;
    const year = y.length === 2 ? (+y < 69 ? 2000 + +y : 1900 + +y) : +y;
    return buildDate(year, +m, +d);
  }
  return null;
}

//shift by calendar months, clamping the day to the target month's length (Mar 31 - 1 → Feb 28)
export function shiftMonths(isoDate: string, months: number): string {
  const [y = 0, m = 1, d = 1] = isoDate.split('-').map(Number);
  const total = y * 12 + (m - 1) + months;
  const year = Math.floor(total / 12), month = total - year * 12;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return toIsoDate(new Date(Date.UTC(year, month, Math.min(d, lastDay))));
}

//true when the date is no more than `months` calendar months before `today`
export function isWithinMonths(isoDate: string, months: number, today: string): boolean {
  return isoDate >= shiftMonths(today, -months);
}
