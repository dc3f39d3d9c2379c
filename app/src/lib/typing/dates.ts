const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const NUMERIC_DATE_SHAPE = /^\d{1,4}[/-]\d{1,2}[/-]\d{1,4}(?!\d)/;
const MONTH_NAME_SHAPE =
  /\b(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\b/i;

const YEAR_FIRST = /^(\d{4})[/-](\d{1,2})[/-](\d{1,2})(?:[T\s].*)?$/;
const YEAR_LAST = /^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})(?:\s.*)?$/;
const MONTH_DAY_YEAR = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i;
const DAY_MONTH_YEAR = /^(\d{1,2})(?:st|nd|rd|th)?[\s-]+([a-z]+)\.?,?[\s-]+(\d{2}|\d{4})$/i;

export const looksLikeDate = (value: string): boolean =>
  NUMERIC_DATE_SHAPE.test(value) || MONTH_NAME_SHAPE.test(value);

const expandYear = (raw: string): number => {
  const year = Number(raw);
  if (raw.length > 2) {
    return year;
  }
  return year < 70 ? 2000 + year : 1900 + year;
};

const monthFromName = (raw: string): number | null => {
  const lower = raw.toLowerCase();
  if (lower.length < 3) {
    return null;
  }
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(lower));
  return index >= 0 ? index + 1 : null;
};

const buildDate = (year: number, month: number, day: number): Date | null => {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
};

/**
 * Calendar parse for the date shapes the sampler accepts. Slash and dash
 * dates are read month-first, falling back to day-first when the first group
 * cannot be a month.
 */
export const parseCalendarDate = (value: string): Date | null => {
  const trimmed = value.trim();

  const yearFirst = YEAR_FIRST.exec(trimmed);
  if (yearFirst) {
    return buildDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]));
  }

  const yearLast = YEAR_LAST.exec(trimmed);
  if (yearLast) {
    const year = expandYear(yearLast[3]);
    const first = Number(yearLast[1]);
    const second = Number(yearLast[2]);
    return buildDate(year, first, second) ?? buildDate(year, second, first);
  }

  const monthDayYear = MONTH_DAY_YEAR.exec(trimmed);
  if (monthDayYear) {
    const month = monthFromName(monthDayYear[1]);
    return month === null
      ? null
      : buildDate(Number(monthDayYear[3]), month, Number(monthDayYear[2]));
  }

  const dayMonthYear = DAY_MONTH_YEAR.exec(trimmed);
  if (dayMonthYear) {
    const month = monthFromName(dayMonthYear[2]);
    return month === null
      ? null
      : buildDate(expandYear(dayMonthYear[3]), month, Number(dayMonthYear[1]));
  }

  return null;
};
