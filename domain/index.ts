export { asTimestamp, UINT32_MAX, type Brand, type Timestamp } from "./core.js";
export {
  DomainError,
  InvariantViolation,
  TimestampParseError,
  ValidationError,
  type ErrorMetadata,
} from "./errors.js";
export {
  addSeconds,
  compareTimestamps,
  endOfTime,
  formatTimestamp,
  INVALID_TIMESTAMP,
  isAfter,
  isAtOrAfter,
  isAtOrBefore,
  isBefore,
  isValidTimestamp,
  parseTimestamp,
  parseTimestampAt,
  startOfTime,
  subtractSeconds,
  timestampFromDate,
  timestampsDiffer,
  timestampsEqual,
  timestampToDate,
  TIMESTAMP_LENGTH,
  toSecondsSinceEpoch,
  toUint32,
  toUint64,
  type TimestampSource,
} from "./timestamp.js";
export {
  maxOf,
  MaxOp,
  minOf,
  MinOp,
  timestampBounds,
  timestampSpan,
  type Bounded,
  type TimestampSpan,
} from "./minmax.js";
