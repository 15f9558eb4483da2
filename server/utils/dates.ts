const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** Returns the UTC midnight timestamp of a real `YYYY-MM-DD` day, or null. */
const toUtcMs = (day: string): number | null => {
  const match = ISO_DAY.exec(day);
  if (!match) return null;
  const [year, month, date] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const ms = Date.UTC(year, month - 1, date);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== date) {
    return null;
  }
  return ms;
};

const fromUtcMs = (ms: number): string => {
  const d = new Date(ms);
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
};

export const isIsoDay = (value: string): boolean => toUtcMs(value) !== null;

export const assertIsoDay = (value: string): string => {
  if (!isIsoDay(value)) {
    throw new Error(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return value;
};

export const addDays = (day: string, days: number): string => {
  const ms = toUtcMs(assertIsoDay(day));
  return fromUtcMs((ms ?? 0) + days * DAY_MS);
};

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export const daysBetween = (from: string, to: string): number => {
  const a = toUtcMs(assertIsoDay(from)) ?? 0;
  const b = toUtcMs(assertIsoDay(to)) ?? 0;
  return Math.round((b - a) / DAY_MS);
};

export const compareDays = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** `2024-01-05` → `20240105`. */
export const compactDay = (day: string): string => assertIsoDay(day).replace(/-/g, '');

/** Calendar day of `now` on the local clock. */
export const localDay = (now: Date = new Date()): string =>
  `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;

/** Inclusive ascending list of days. Empty when `start` is after `end`. */
export const enumerateDays = (start: string, end: string): string[] => {
  const count = daysBetween(start, end);
  const out: string[] = [];
  for (let i = 0; i <= count; i += 1) {
    out.push(addDays(start, i));
  }
  return out;
};

/** Middle day of an inclusive range, rounded toward `low`. */
export const midpointDay = (low: string, high: string): string => addDays(low, Math.floor(daysBetween(low, high) / 2));

/** `15/12/2024` anywhere in `text` → `2024-12-15`. */
export const parseSlashDate = (text: string): string | null => {
  const match = /(\d{2})\/(\d{2})\/(\d{4})/.exec(text);
  if (!match) return null;
  return `${match[3]}-${match[2]}-${match[1]}`;
};
