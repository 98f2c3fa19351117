/**
 * Date parsing for --after / --before.
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DD HH:MM` and `YYYY-MM-DD HH:MM:SS`, each
 * also with `/` as the date separator. Values are local time.
 */

import { UsageError } from './errors';

const DATE_TIME_PATTERN = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse a human-entered date/time into a local-time Date.
 * @throws UsageError when the string matches none of the accepted formats
 */
export function parseWhen(input: string): Date {
  const value = (input ?? '').trim();
  if (!value) {
    throw new UsageError('empty date string');
  }

  const match = DATE_TIME_PATTERN.exec(value);
  if (!match) {
    throw new UsageError(`Could not parse date/time: ${value}. Try 'YYYY-MM-DD HH:MM[:SS]'.`);
  }

  const year = Number(match[1]);
  const month = Number(match[3]);
  const day = Number(match[4]);
  const hours = match[5] === undefined ? 0 : Number(match[5]);
  const minutes = match[6] === undefined ? 0 : Number(match[6]);
  const seconds = match[7] === undefined ? 0 : Number(match[7]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new UsageError(`Could not parse date/time: ${value}. Try 'YYYY-MM-DD HH:MM[:SS]'.`);
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds, 0);

  // Reject calendar rollover such as 2024-02-30
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new UsageError(`Could not parse date/time: ${value}. Try 'YYYY-MM-DD HH:MM[:SS]'.`);
  }

  return date;
}

/**
 * Parse a bound into epoch milliseconds; undefined stays undefined.
 */
export function parseBoundMs(input: string | undefined): number | undefined {
  if (input === undefined || input === '') {
    return undefined;
  }
  return parseWhen(input).getTime();
}

/**
 * Render epoch milliseconds as local `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(ms: number): string {
  const date = new Date(ms);
  const pad = (n: number) => n.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
