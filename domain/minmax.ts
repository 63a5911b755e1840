/**
 * Min/max reduction over any ordered type that can name its own seeds.
 * Pure domain.
 */

import type { Timestamp } from "./core.js";
import { compareTimestamps, endOfTime, isValidTimestamp, startOfTime } from "./timestamp.js";

/**
 * Ordering plus the two extreme seeds of a type.
 * minStart() must compare >= every real value, maxStart() <= every real value.
 */
export interface Bounded<T> {
  readonly compare: (a: T, b: T) => number;
  readonly minStart: () => T;
  readonly maxStart: () => T;
}

export const timestampBounds: Bounded<Timestamp> = {
  compare: compareTimestamps,
  minStart: endOfTime,
  maxStart: startOfTime,
};

/** Running minimum, seeded with bounds.minStart(). */
export class MinOp<T> {
  private readonly bounds: Bounded<T>;
  private current: T;

  constructor(bounds: Bounded<T>) {
    this.bounds = bounds;
    this.current = bounds.minStart();
  }

  update(value: T): void {
    if (this.bounds.compare(value, this.current) < 0) this.current = value;
  }

  get value(): T {
    return this.current;
  }
}

/** Running maximum, seeded with bounds.maxStart(). */
export class MaxOp<T> {
  private readonly bounds: Bounded<T>;
  private current: T;

  constructor(bounds: Bounded<T>) {
    this.bounds = bounds;
    this.current = bounds.maxStart();
  }

  update(value: T): void {
    if (this.bounds.compare(value, this.current) > 0) this.current = value;
  }

  get value(): T {
    return this.current;
  }
}

export function minOf<T>(values: Iterable<T>, bounds: Bounded<T>): T {
  const op = new MinOp(bounds);
  for (const v of values) op.update(v);
  return op.value;
}

export function maxOf<T>(values: Iterable<T>, bounds: Bounded<T>): T {
  const op = new MaxOp(bounds);
  for (const v of values) op.update(v);
  return op.value;
}

export interface TimestampSpan {
  readonly first: Timestamp;
  readonly last: Timestamp;
  /** Number of valid timestamps folded in. */
  readonly count: number;
}

/**
 * Earliest and latest valid timestamp. Unset (0) values are skipped since 0
 * sorts before startOfTime() without being a real instant.
 * With nothing to fold, first/last stay at their seeds (endOfTime/startOfTime).
 */
export function timestampSpan(values: Iterable<Timestamp>): TimestampSpan {
  const first = new MinOp(timestampBounds);
  const last = new MaxOp(timestampBounds);
  let count = 0;
  for (const ts of values) {
    if (!isValidTimestamp(ts)) continue;
    first.update(ts);
    last.update(ts);
    count++;
  }
  return { first: first.value, last: last.value, count };
}
