import { describe, expect, it } from "vitest";
import { asTimestamp } from "./core.js";
import { maxOf, MaxOp, minOf, MinOp, timestampBounds, timestampSpan, type Bounded } from "./minmax.js";
import { endOfTime, INVALID_TIMESTAMP, parseTimestamp, startOfTime } from "./timestamp.js";

const T1 = parseTimestamp("2008-01-10T08:00:00Z");
const T2 = parseTimestamp("2011-05-03T17:45:12Z");
const T3 = parseTimestamp("2019-11-30T23:59:59Z");

describe("timestampBounds", () => {
  it("seeds are the sentinels", () => {
    expect(timestampBounds.minStart()).toBe(endOfTime());
    expect(timestampBounds.maxStart()).toBe(startOfTime());
  });
});

describe("MinOp / MaxOp", () => {
  it("start at the seeds", () => {
    expect(new MinOp(timestampBounds).value).toBe(0xffff_ffff);
    expect(new MaxOp(timestampBounds).value).toBe(1);
  });

  it("fold values", () => {
    const min = new MinOp(timestampBounds);
    const max = new MaxOp(timestampBounds);
    for (const ts of [T2, T3, T1]) {
      min.update(ts);
      max.update(ts);
    }
    expect(min.value).toBe(T1);
    expect(max.value).toBe(T3);
  });

  it("a single real value dominates both seeds", () => {
    expect(minOf([T2], timestampBounds)).toBe(T2);
    expect(maxOf([T2], timestampBounds)).toBe(T2);
  });

  it("works for any type with bounds", () => {
    const letters: Bounded<string> = {
      compare: (a, b) => a.localeCompare(b),
      minStart: () => "z",
      maxStart: () => "a",
    };
    expect(minOf(["q", "c", "x"], letters)).toBe("c");
    expect(maxOf(["q", "c", "x"], letters)).toBe("x");
    expect(minOf([], letters)).toBe("z");
  });
});

describe("timestampSpan()", () => {
  it("first/last/count over valid timestamps", () => {
    expect(timestampSpan([T3, T1, T2])).toEqual({ first: T1, last: T3, count: 3 });
  });

  it("skips unset timestamps", () => {
    expect(timestampSpan([INVALID_TIMESTAMP, T2, INVALID_TIMESTAMP])).toEqual({
      first: T2,
      last: T2,
      count: 1,
    });
  });

  it("empty input leaves the seeds", () => {
    expect(timestampSpan([])).toEqual({ first: endOfTime(), last: startOfTime(), count: 0 });
  });

  it("sentinel values themselves are valid members", () => {
    expect(timestampSpan([asTimestamp(1), asTimestamp(0xffff_ffff)])).toEqual({
      first: 1,
      last: 0xffff_ffff,
      count: 2,
    });
  });
});
