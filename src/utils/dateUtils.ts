export const DATE_KEY_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

export const WEEKDAY_SHORT = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

const pad = (value: number) => String(value).padStart(2, '0');

export const getStartOfDay = (date: Date): Date => {
  const result = new Date(date);
  result.setHours(0, 0, 0, 0);
  return result;
};

export const addDays = (date: Date, days: number): Date => {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
};

/**
 * Ключ даты YYYY-MM-DD по локальному времени
 */
export const getDateKey = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/**
 * Разбирает ключ YYYY-MM-DD в локальную полночь. null для несуществующих дат (2025-02-30).
 */
export const parseDateKey = (key: string): Date | null => {
  const match = DATE_KEY_REGEX.exec(key);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  return getDateKey(date) === key ? date : null;
};

export const isValidDateKey = (key: string): boolean => parseDateKey(key) !== null;

/**
 * Индекс дня недели с понедельника (пн = 0, вс = 6)
 */
export const getWeekdayIndex = (date: Date): number => (date.getDay() + 6) % 7;

export const getWeekStart = (date: Date): Date => addDays(getStartOfDay(date), -getWeekdayIndex(date));

export const getWeekDays = (date: Date): Date[] => {
  const start = getWeekStart(date);
  return Array.from({ length: 7 }, (_, index) => addDays(start, index));
};

export const formatDayMonth = (date: Date): string => `${pad(date.getDate())}/${pad(date.getMonth() + 1)}`;

export const formatFullDate = (date: Date): string => `${formatDayMonth(date)}/${date.getFullYear()}`;

export const formatColumnLabel = (date: Date): string =>
  `${WEEKDAY_SHORT[getWeekdayIndex(date)]} ${formatDayMonth(date)}`;
