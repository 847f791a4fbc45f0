const INTEGER_REGEX = /^\s*[+-]?\d+\s*$/;

const DURATION_HOURS_REGEX = /^(\d+)h(?:(\d+)(?:min)?)?$/;
const DURATION_MINUTES_REGEX = /^(\d+)min$/;

const toInteger = (part: string): number | null => (INTEGER_REGEX.test(part) ? Number.parseInt(part, 10) : null);

/**
 * "08:30" или "08:30:00" -> 8.5. Всё, что не разбирается, даёт null.
 */
export const parseTimeOfDay = (text: unknown): number | null => {
  if (typeof text !== 'string' || !text) {
    return null;
  }

  const parts = text.split(':');
  if (parts.length < 2) {
    return null;
  }

  const hours = toInteger(parts[0]);
  const minutes = toInteger(parts[1]);
  if (hours === null || minutes === null) {
    return null;
  }

  return hours + minutes / 60;
};

/**
 * "7h45", "1h15min", "1h", "45min" -> часы. Пустая или мусорная строка даёт null.
 */
export const parseDuration = (text: unknown): number | null => {
  if (typeof text !== 'string') {
    return null;
  }

  const normalized = text.toLowerCase().replace(/\s+/g, '');
  if (!normalized) {
    return null;
  }

  const hoursMatch = DURATION_HOURS_REGEX.exec(normalized);
  if (hoursMatch) {
    const minutes = hoursMatch[2] ? Number(hoursMatch[2]) : 0;
    return Number(hoursMatch[1]) + minutes / 60;
  }

  const minutesMatch = DURATION_MINUTES_REGEX.exec(normalized);
  if (minutesMatch) {
    return Number(minutesMatch[1]) / 60;
  }

  return null;
};
