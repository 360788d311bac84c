/**
 * Tournament Time Window Utilities
 *
 * All timestamps are Unix seconds; calendar months are UTC, matching the
 * archive endpoint's month buckets.
 */

/**
 * Closed interval [start, end]
 */
export interface TimeWindow {
  start: number;
  end: number;
}

export interface YearMonth {
  year: number;
  month: number;                     // 1-12
}

/**
 * Effective scan window of a tournament
 *
 * The end is `max(endDate, startDate) + bufferSeconds`: upstream end times
 * can equal the start, and final-round games finish after the scheduled
 * close.
 */
export function tournamentWindow(
  startDate: number,
  endDate: number,
  bufferSeconds: number
): TimeWindow {
  return {
    start: startDate,
    end: Math.max(endDate, startDate) + bufferSeconds,
  };
}

export function isWithinWindow(timestamp: number, window: TimeWindow): boolean {
  return window.start <= timestamp && timestamp <= window.end;
}

/**
 * Every UTC calendar month overlapping [startTs, endTs], in order
 *
 * @example
 * ```typescript
 * monthsInRange(Date.UTC(2023, 11, 31, 22) / 1000, Date.UTC(2024, 0, 1, 4) / 1000);
 * // [{ year: 2023, month: 12 }, { year: 2024, month: 1 }]
 * ```
 */
export function monthsInRange(startTs: number, endTs: number): YearMonth[] {
  const start = new Date(startTs * 1000);
  const end = new Date(endTs * 1000);
  const months: YearMonth[] = [];

  let year = start.getUTCFullYear();
  let month = start.getUTCMonth() + 1;
  const endYear = end.getUTCFullYear();
  const endMonth = end.getUTCMonth() + 1;

  while (year < endYear || (year === endYear && month <= endMonth)) {
    months.push({ year, month });
    month += 1;
    if (month > 12) {
      month = 1;
      year += 1;
    }
  }

  return months;
}
