// Pure helpers for timestamps and revision intervals

export {
  parseTimestamp,
  toMillis,
  compareTimestamps,
  minTimestamp,
  type TimestampParseResult,
} from './timestamps.js';

export {
  compareRevisions,
  precedes,
  isActiveAt,
  intervalsOverlap,
  sortByTimeline,
} from './intervals.js';
