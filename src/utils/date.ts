import * as chrono from 'chrono-node';

const MS_IN_DAY = 24 * 60 * 60 * 1000;

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): string {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a natural language input into YYYY-MM-DD (UTC) using chrono-node.
 * Examples: "yesterday", "3 months ago", "2025-02-11"
 */
export function parseDateNL(input: string, now: Date = new Date()): string {
  if (/^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])$/.test(input)) {
    return input;
  }
  const parsed = chrono.parseDate(input, now, { forwardDate: false });
  if (!parsed) {
    throw new Error(
      'Could not understand the date input. Try "6 months ago", "last January", or a specific date like 2025-02-11.'
    );
  }
  return normalizeDate(parsed);
}

/**
 * Lenient timestamp parsing for article publish dates. ISO and RFC 2822
 * strings go through Date; anything else is handed to chrono-node.
 * Returns null when neither understands the input.
 */
export function parseTimestamp(input: string, reference: Date = new Date()): Date | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  const direct = new Date(trimmed);
  if (!Number.isNaN(direct.getTime())) return direct;
  return chrono.parseDate(trimmed, reference, { forwardDate: false }) ?? null;
}

/**
 * Month bucket key (YYYY-MM, UTC) for an ISO timestamp.
 */
export function monthKey(iso: string): string {
  const d = new Date(iso);
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  return `${d.getUTCFullYear()}-${month}`;
}

/**
 * True when no more than windowDays whole days have elapsed since the
 * timestamp. Future-dated articles count as recent.
 */
export function isWithinDays(iso: string, now: Date, windowDays: number): boolean {
  const published = new Date(iso).getTime();
  if (Number.isNaN(published)) return false;
  return Math.floor((now.getTime() - published) / MS_IN_DAY) <= windowDays;
}

/**
 * Default retrieval window: the calendar year containing `now`, up to today.
 */
export function yearToDate(now: Date = new Date()): { start: string; end: string } {
  return {
    start: `${now.getUTCFullYear()}-01-01`,
    end: normalizeDate(now),
  };
}
