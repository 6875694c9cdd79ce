const EMAIL_PATTERN = /^[^\s@]+@[^\s@.]+(\.[^\s@.]+)+$/;
const PHONE_CHARS = /^\+?[\d\s().-]+$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export function isEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

export function isPhone(value: string): boolean {
  if (!PHONE_CHARS.test(value)) {
    return false;
  }
  const digits = value.replace(/\D/g, '').length;
  return digits >= 10 && digits <= 15;
}

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

export function isIsoDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export function isTime(value: string): boolean {
  return TIME_PATTERN.test(value);
}

export function isLocalDateTime(value: string): boolean {
  const [date, time, ...rest] = value.split('T');
  return rest.length === 0 && date !== undefined && time !== undefined && isIsoDate(date) && isTime(time);
}

export function isNumeric(value: string | number): boolean {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return value.trim() !== '' && Number.isFinite(Number(value));
}

/** Anchored the way the HTML `pattern` attribute is: the whole value must match. */
export function patternMatcher(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}
