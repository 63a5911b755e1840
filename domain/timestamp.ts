/**
 * domain/timestamp.ts
 * Timestamp codec: "yyyy-mm-ddThh:mm:ssZ" <-> unsigned 32-bit seconds since epoch.
 *
 * - Parsing inspects fixed character offsets; no regex, no locale-aware date parsing.
 * - Always UTC ("Z"), whole seconds.
 * - Years before 1900 are rejected.
 * - Values outside 1970-01-01T00:00:00Z .. 2106-02-07T06:28:15Z wrap modulo 2^32.
 */

import { asTimestamp, UINT32_MAX, type Timestamp } from "./core.js";
import { TimestampParseError } from "./errors.js";
import { invariant } from "./validation.js";

/** Length of "yyyy-mm-ddThh:mm:ssZ". */
export const TIMESTAMP_LENGTH = 20;

/** The unset timestamp. Formats to "". */
export const INVALID_TIMESTAMP: Timestamp = asTimestamp(0);

/**
 * Upper bound of the day field per month (0-based). February is always 29:
 * the check only bounds what is syntactically acceptable, the calendar
 * conversion below normalizes 29 Feb of a common year into 1 Mar.
 */
const MONTH_LENGTHS: readonly number[] = [31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/** Earliest accepted year. */
const MIN_YEAR = 1900;

const CODE_0 = 0x30;
const CODE_9 = 0x39;
const CODE_DASH = 0x2d;
const CODE_COLON = 0x3a;
const CODE_T = 0x54;
const CODE_Z = 0x5a;

const DIGIT_OFFSETS: readonly number[] = [0, 1, 2, 3, 5, 6, 8, 9, 11, 12, 14, 15, 17, 18];

const SEPARATORS: ReadonlyArray<readonly [offset: number, code: number]> = [
  [4, CODE_DASH],
  [7, CODE_DASH],
  [10, CODE_T],
  [13, CODE_COLON],
  [16, CODE_COLON],
  [19, CODE_Z],
];

/** Text or ASCII bytes holding a timestamp. */
export type TimestampSource = string | Uint8Array;

function codeAt(source: TimestampSource, index: number): number {
  if (typeof source === "string") return source.charCodeAt(index);
  return source[index] ?? -1;
}

function excerpt(source: TimestampSource, offset: number): string {
  if (typeof source === "string") return source.slice(offset, offset + TIMESTAMP_LENGTH);
  return String.fromCharCode(...source.subarray(offset, offset + TIMESTAMP_LENGTH));
}

function digitAt(source: TimestampSource, index: number): number {
  return codeAt(source, index) - CODE_0;
}

function twoDigits(source: TimestampSource, index: number): number {
  return digitAt(source, index) * 10 + digitAt(source, index + 1);
}

function hasShape(source: TimestampSource, offset: number): boolean {
  for (const i of DIGIT_OFFSETS) {
    const c = codeAt(source, offset + i);
    if (c < CODE_0 || c > CODE_9) return false;
  }
  for (const [i, expected] of SEPARATORS) {
    if (codeAt(source, offset + i) !== expected) return false;
  }
  return true;
}

/** UTC calendar fields -> seconds since epoch (like timegm: out-of-range fields carry over). */
function epochSecondsUTC(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): number {
  // setUTCFullYear, unlike Date.UTC, does not map years 0..99 onto 1900..1999
  const dt = new Date(0);
  dt.setUTCFullYear(year, month, day);
  dt.setUTCHours(hour, minute, second, 0);
  return Math.floor(dt.getTime() / 1000);
}

/**
 * Parse the 20 positions of `source` starting at `offset`.
 * Content after those positions is not inspected.
 *
 * @throws TimestampParseError on any structural or range violation.
 */
export function parseTimestampAt(source: TimestampSource, offset = 0): Timestamp {
  if (
    !Number.isInteger(offset) ||
    offset < 0 ||
    source.length - offset < TIMESTAMP_LENGTH ||
    !hasShape(source, offset)
  ) {
    throw new TimestampParseError(excerpt(source, Math.max(Math.trunc(offset), 0)));
  }

  const year =
    digitAt(source, offset) * 1000 +
    digitAt(source, offset + 1) * 100 +
    digitAt(source, offset + 2) * 10 +
    digitAt(source, offset + 3);
  const month = twoDigits(source, offset + 5) - 1;
  const day = twoDigits(source, offset + 8);
  const hour = twoDigits(source, offset + 11);
  const minute = twoDigits(source, offset + 14);
  const second = twoDigits(source, offset + 17);

  const monthLength = MONTH_LENGTHS[month];
  if (
    year < MIN_YEAR ||
    monthLength === undefined ||
    day < 1 ||
    day > monthLength ||
    hour > 23 ||
    minute > 59 ||
    second > 60
  ) {
    throw new TimestampParseError(excerpt(source, offset));
  }

  return asTimestamp(epochSecondsUTC(year, month, day, hour, minute, second));
}

/**
 * Parse exactly "yyyy-mm-ddThh:mm:ssZ".
 *
 * @throws TimestampParseError if the text has another length or does not parse.
 */
export function parseTimestamp(text: string): Timestamp {
  if (text.length !== TIMESTAMP_LENGTH) throw new TimestampParseError(text);
  return parseTimestampAt(text, 0);
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/** "yyyy-mm-ddThh:mm:ssZ", or "" for the unset timestamp. */
export function formatTimestamp(ts: Timestamp): string {
  if (ts === INVALID_TIMESTAMP) return "";

  const dt = new Date(ts * 1000);
  const text =
    `${pad(dt.getUTCFullYear(), 4)}-${pad(dt.getUTCMonth() + 1, 2)}-${pad(dt.getUTCDate(), 2)}` +
    `T${pad(dt.getUTCHours(), 2)}:${pad(dt.getUTCMinutes(), 2)}:${pad(dt.getUTCSeconds(), 2)}Z`;

  invariant(text.length === TIMESTAMP_LENGTH, "formatted timestamp has unexpected length", {
    seconds: ts,
    text,
  });
  return text;
}

/* -------------------------
 * Sentinels
 * ------------------------- */

/** Ordered before every other valid timestamp. */
export function startOfTime(): Timestamp {
  return asTimestamp(1);
}

/** Ordered after every other valid timestamp. */
export function endOfTime(): Timestamp {
  return asTimestamp(UINT32_MAX);
}

/** True unless the timestamp is the unset value 0. */
export function isValidTimestamp(ts: Timestamp): boolean {
  return ts !== INVALID_TIMESTAMP;
}

/* -------------------------
 * Ordering
 * ------------------------- */

/** Compare two timestamps. Returns < 0 if a < b, 0 if equal, > 0 if a > b. */
export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return a - b;
}

export function timestampsEqual(a: Timestamp, b: Timestamp): boolean {
  return a === b;
}

export function timestampsDiffer(a: Timestamp, b: Timestamp): boolean {
  return a !== b;
}

export function isBefore(a: Timestamp, b: Timestamp): boolean {
  return a < b;
}

export function isAfter(a: Timestamp, b: Timestamp): boolean {
  return b < a;
}

export function isAtOrBefore(a: Timestamp, b: Timestamp): boolean {
  return !(b < a);
}

export function isAtOrAfter(a: Timestamp, b: Timestamp): boolean {
  return !(a < b);
}

/* -------------------------
 * Explicit conversions + arithmetic
 * ------------------------- */

export function toSecondsSinceEpoch(ts: Timestamp): number {
  return ts;
}

export function toUint32(ts: Timestamp): number {
  return ts >>> 0;
}

export function toUint64(ts: Timestamp): bigint {
  return BigInt(ts);
}

/** Shift by whole seconds. Wraps modulo 2^32, no overflow check. */
export function addSeconds(ts: Timestamp, seconds: number): Timestamp {
  return asTimestamp(ts + Math.trunc(seconds));
}

/** Shift back by whole seconds. Wraps modulo 2^32, no underflow check. */
export function subtractSeconds(ts: Timestamp, seconds: number): Timestamp {
  return asTimestamp(ts - Math.trunc(seconds));
}

/** Milliseconds are dropped. An invalid Date yields the unset timestamp. */
export function timestampFromDate(date: Date): Timestamp {
  const ms = date.getTime();
  if (Number.isNaN(ms)) return INVALID_TIMESTAMP;
  return asTimestamp(Math.floor(ms / 1000));
}

/** null for the unset timestamp. */
export function timestampToDate(ts: Timestamp): Date | null {
  return isValidTimestamp(ts) ? new Date(ts * 1000) : null;
}
