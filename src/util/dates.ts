/**
 * Calendar date parsing and arithmetic
 */

import { format, isValid, parse, parseISO, subMonths } from 'date-fns';

/**
 * Accepted opening-date layouts, most to least specific. Order matters:
 * the first layout that parses the whole value wins.
 */
export const DATE_PATTERNS = [
  'yyyy-MM-dd',
  'yyyy/MM/dd',
  'yyyy.MM.dd',
  'yyyy-MM',
  'yyyy/MM',
  'yyyy.MM',
  'yyyy',
] as const;

export type DatePattern = (typeof DATE_PATTERNS)[number];

export interface DateParserStrategy {
  pattern: DatePattern;
  parse(value: string): Date | undefined;
}

// Fields a layout leaves out are reset by date-fns, so any fixed reference works
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * date-fns reads `yyyy` as one to four digits; the shape pins the year to
 * exactly four and the separator to the layout's own
 */
function patternShape(pattern: DatePattern): RegExp {
  const source = pattern
    .replace(/[./-]/g, separator => `\\${separator}`)
    .replace('yyyy', '\\d{4}')
    .replace('MM', '\\d{1,2}')
    .replace('dd', '\\d{1,2}');
  return new RegExp(`^${source}$`);
}

function patternParser(pattern: DatePattern): DateParserStrategy {
  const shape = patternShape(pattern);
  return {
    pattern,
    parse(value: string): Date | undefined {
      if (!shape.test(value)) {
        return undefined;
      }
      const parsed = parse(value, pattern, REFERENCE_DATE);
      return isValid(parsed) ? parsed : undefined;
    },
  };
}

export const DATE_PARSERS: readonly DateParserStrategy[] = DATE_PATTERNS.map(patternParser);

/**
 * Try each strategy in order and report which one matched
 */
export function matchDate(
  value: string,
  parsers: readonly DateParserStrategy[] = DATE_PARSERS
): { date: Date; pattern: DatePattern } | undefined {
  for (const parser of parsers) {
    const date = parser.parse(value);
    if (date) {
      return { date, pattern: parser.pattern };
    }
  }
  return undefined;
}

/**
 * Parse a free-form opening date into an ISO calendar date (YYYY-MM-DD).
 * Time components are dropped; for a range like "2025-06-01/2025-06-30"
 * only the start is used.
 */
export function parseOpeningDate(raw: string | null | undefined): string | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    return undefined;
  }

  const value = trimmed.replace(/T/g, ' ').split(' ')[0] ?? '';

  const direct = matchDate(value);
  if (direct) {
    return formatDateISO(direct.date);
  }

  if (value.includes('/')) {
    const start = (value.split('/')[0] ?? '').trim();
    const ranged = matchDate(start);
    if (ranged) {
      return formatDateISO(ranged.date);
    }
  }

  return undefined;
}

/**
 * Format date as ISO calendar date (YYYY-MM-DD)
 */
export function formatDateISO(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Subtract whole months from an ISO calendar date, clamping the day to the
 * end of the target month
 */
export function subtractMonths(isoDate: string, months: number): string {
  const date = parseISO(isoDate);
  if (!isValid(date)) {
    throw new RangeError(`Invalid ISO date: ${isoDate}`);
  }
  return formatDateISO(subMonths(date, months));
}

/**
 * ISO calendar dates compare correctly as strings
 */
export function isBeforeDate(isoDate: string, cutoff: string): boolean {
  return isoDate < cutoff;
}

export function todayISO(now: Date = new Date()): string {
  return formatDateISO(now);
}
