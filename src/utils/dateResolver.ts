import {
  parseISO,
  addDays,
  subDays,
  format,
  getDay,
  isValid,
  isAfter
} from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';

const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Calendar date (yyyy-MM-dd) in the shop's time zone.
 */
export function todayInZone(timezone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timezone, ISO_DATE_FORMAT);
}

/**
 * ISO 8601 timestamp with the shop's UTC offset, used for audit rows.
 */
export function timestampInZone(timezone: string, now: Date = new Date()): string {
  return formatInTimeZone(now, timezone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

/**
 * Resolve the date argument of a closure request to yyyy-MM-dd.
 *
 * Examples (today = 2024-05-15, a Wednesday):
 * - "hoy" → 2024-05-15
 * - "ayer" → 2024-05-14
 * - "anteayer" → 2024-05-13
 * - "hace 3 dias" → 2024-05-12
 * - "lunes" / "el lunes" → 2024-05-13
 * - "2024-05-01" or "01/05/2024" → 2024-05-01
 *
 * Returns null when the expression is not understood or lies in the future.
 */
export function resolveReportDate(expression: string, today: string): string | null {
  const todayDate = parseISO(today);
  if (!isValid(todayDate)) {
    console.warn(`Invalid reference date: ${today}`);
    return null;
  }

  const normalizedExpr = stripAccents(expression.toLowerCase().trim());

  const resolvers: Array<{
    pattern: RegExp;
    resolve: (match: RegExpMatchArray) => Date | null;
  }> = [
    {
      pattern: /^hoy$/,
      resolve: () => todayDate
    },
    {
      pattern: /^ayer$/,
      resolve: () => subDays(todayDate, 1)
    },
    {
      pattern: /^anteayer$/,
      resolve: () => subDays(todayDate, 2)
    },
    // hace N dias
    {
      pattern: /^hace\s+(\d+)\s+dias?$/,
      resolve: (match) => subDays(todayDate, parseInt(match[1], 10))
    },
    // Most recent weekday, today included
    {
      pattern: /^(?:el\s+)?(lunes|martes|miercoles|jueves|viernes|sabado|domingo)$/,
      resolve: (match) => getLastDayOfWeek(todayDate, match[1])
    },
    {
      pattern: /^\d{4}-\d{2}-\d{2}$/,
      resolve: (match) => parseISO(match[0])
    },
    // dd/mm/yyyy or dd-mm-yyyy
    {
      pattern: /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/,
      resolve: (match) => parseDayMonthYear(match[1], match[2], match[3])
    }
  ];

  for (const { pattern, resolve } of resolvers) {
    const match = normalizedExpr.match(pattern);
    if (match) {
      const resolvedDate = resolve(match);
      if (!resolvedDate || !isValid(resolvedDate) || isAfter(resolvedDate, todayDate)) {
        return null;
      }
      return format(resolvedDate, ISO_DATE_FORMAT);
    }
  }

  return null;
}

function stripAccents(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
}

/**
 * Get the day of week index (0 = domingo, 1 = lunes, etc.)
 */
function getDayIndex(dayName: string): number {
  const days: Record<string, number> = {
    domingo: 0,
    lunes: 1,
    martes: 2,
    miercoles: 3,
    jueves: 4,
    viernes: 5,
    sabado: 6
  };
  return days[dayName] ?? 0;
}

/**
 * Get the latest occurrence of a day of week on or before the given date.
 */
function getLastDayOfWeek(fromDate: Date, dayName: string): Date {
  const targetDay = getDayIndex(dayName);
  const currentDay = getDay(fromDate);
  const daysBack = (currentDay - targetDay + 7) % 7;
  return addDays(fromDate, -daysBack);
}

function parseDayMonthYear(day: string, month: string, year: string): Date | null {
  const candidate = parseISO(`${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`);
  return isValid(candidate) ? candidate : null;
}
