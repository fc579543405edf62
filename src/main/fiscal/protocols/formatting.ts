/**
 * Locale-invariant value formatting shared by the command builders
 */

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Round half away from zero to `digits` decimals on a scaled integer.
 * The epsilon lifts binary near-halves such as 1.005 onto the half.
 */
function toScaled(value: number, digits: number): { sign: string; whole: number; fraction: string } {
  const scale = 10 ** digits;
  const scaled = Math.round(Math.abs(value) * scale + 1e-9);
  return {
    sign: value < 0 && scaled !== 0 ? '-' : '',
    whole: Math.floor(scaled / scale),
    fraction: String(scaled % scale).padStart(digits, '0'),
  };
}

/** Two fractional digits, '.' separator */
export function formatAmount(amount: number): string {
  const { sign, whole, fraction } = toScaled(amount, 2);
  return `${sign}${whole}.${fraction}`;
}

/** Integers as-is, fractions with at most three digits and no trailing zeros */
export function formatQuantity(quantity: number): string {
  if (Number.isInteger(quantity)) {
    return String(quantity);
  }
  const { sign, whole, fraction } = toScaled(quantity, 3);
  const digits = fraction.replace(/0+$/, '');
  return digits ? `${sign}${whole}.${digits}` : `${sign}${whole}`;
}

/**
 * Truncate to a maximum length. Never rejects.
 */
export function withMaxLength(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Truncate then right-pad with spaces to exactly `width` characters
 */
export function toFixedWidth(text: string, maxLength: number, width: number): string {
  return withMaxLength(text, Math.min(maxLength, width)).padEnd(width, ' ');
}

/**
 * Format a date with a small pattern language:
 * yyyy, yy, MM, dd, HH, mm, ss. Everything else is copied.
 */
export function formatDate(date: Date, pattern: string): string {
  const tokens: Record<string, string> = {
    yyyy: String(date.getFullYear()),
    yy: pad2(date.getFullYear() % 100),
    MM: pad2(date.getMonth() + 1),
    dd: pad2(date.getDate()),
    HH: pad2(date.getHours()),
    mm: pad2(date.getMinutes()),
    ss: pad2(date.getSeconds()),
  };
  return pattern.replace(/yyyy|yy|MM|dd|HH|mm|ss/g, (token) => tokens[token] ?? token);
}

/**
 * Parse text against the same pattern language. Returns null unless the whole
 * text matches and names a real calendar date.
 */
export function parseDate(text: string, pattern: string): Date | null {
  const fields: string[] = [];
  const source = pattern
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/yyyy|yy|MM|dd|HH|mm|ss/g, (token) => {
      fields.push(token);
      return token === 'yyyy' ? '(\\d{4})' : '(\\d{2})';
    });

  const match = new RegExp(`^${source}$`).exec(text.trim());
  if (!match) {
    return null;
  }

  const values: Record<string, number> = {};
  fields.forEach((field, index) => {
    values[field] = Number(match[index + 1]);
  });

  const year = values.yyyy ?? (values.yy !== undefined ? 2000 + values.yy : new Date().getFullYear());
  const month = values.MM ?? 1;
  const day = values.dd ?? 1;
  const hours = values.HH ?? 0;
  const minutes = values.mm ?? 0;
  const seconds = values.ss ?? 0;

  if (month < 1 || month > 12 || day < 1 || day > 31 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  if (date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Strict decimal parse, null for anything that is not a plain number
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[-+]?\d+(\.\d+)?$/.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}
