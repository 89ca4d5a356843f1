import { ValidationError } from "./errors";

const DATE_TIME = /^(\d{4})-(\d{1,2})-(\d{1,2})[ T](\d{1,2}):(\d{1,2}):(\d{1,2})$/;

/**
 * Parse "YYYY-MM-DD HH:MM:SS" as UTC. Single-digit fields are accepted
 * ("2024-12-19 1:06:50").
 */
export function parseUtc(text: string): Date {
  const match = DATE_TIME.exec(text.trim());
  if (!match) throw new ValidationError(`Expected "YYYY-MM-DD HH:MM:SS", got "${text}"`);

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  const sameDay = date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
  if (!sameDay || hour > 23 || minute > 59 || second > 59) {
    throw new ValidationError(`Invalid date "${text}"`);
  }
  return date;
}

/** Unix seconds. */
export function toTimestamp(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function fromTimestamp(seconds: number): Date {
  return new Date(seconds * 1000);
}

const pad = (n: number): string => String(n).padStart(2, "0");

/** Wall-clock rendering at a fixed UTC offset, e.g. "2024-12-19 09:06:50+08:00". */
export function formatWithOffset(date: Date, offsetHours: number): string {
  const shifted = new Date(date.getTime() + offsetHours * 3_600_000);
  const sign = offsetHours < 0 ? "-" : "+";
  const abs = Math.abs(offsetHours);
  const offset = `${sign}${pad(Math.floor(abs))}:${pad(Math.round((abs % 1) * 60))}`;
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())} ` +
    `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}${offset}`
  );
}
