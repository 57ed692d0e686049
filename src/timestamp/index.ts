/**
 * Timestamp axis and date conversions.
 */

export {
  type Timestamp,
  type TimestampFormat,
  InvalidTimestampError,
  isTimestamp,
  compareTimestamps,
  fromDate,
  toDate,
  fromYymmdd,
  toYymmdd,
  toSnapshot,
  fromSnapshot,
  fromExcelDate,
  toExcelDate,
  fromExcelInt,
  toExcelInt,
  today,
  formatTimestamp,
  parseTimestamp,
  timestampPattern,
} from "./timestamp.js";
