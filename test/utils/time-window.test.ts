/**
 * Time Window Tests
 */

import { describe, it, expect } from '@jest/globals';
import { isWithinWindow, monthsInRange, tournamentWindow } from '../../src/utils/time-window';

const HOUR = 3600;

describe('tournamentWindow', () => {
  it('should extend the end by the buffer', () => {
    expect(tournamentWindow(1000, 5000, 6 * HOUR)).toEqual({ start: 1000, end: 5000 + 6 * HOUR });
  });

  it('should measure the buffer from the start when the end precedes it', () => {
    expect(tournamentWindow(5000, 1000, HOUR)).toEqual({ start: 5000, end: 5000 + HOUR });
  });
});

describe('isWithinWindow', () => {
  const window = { start: 100, end: 200 };

  it('should include both bounds', () => {
    expect(isWithinWindow(100, window)).toBe(true);
    expect(isWithinWindow(200, window)).toBe(true);
    expect(isWithinWindow(150, window)).toBe(true);
  });

  it('should exclude timestamps outside the window', () => {
    expect(isWithinWindow(99, window)).toBe(false);
    expect(isWithinWindow(201, window)).toBe(false);
  });
});

describe('monthsInRange', () => {
  it('should return a single month for a window inside it', () => {
    const start = Date.UTC(2024, 2, 10, 18) / 1000;
    expect(monthsInRange(start, start + 8 * HOUR)).toEqual([{ year: 2024, month: 3 }]);
  });

  it('should span the year boundary in UTC', () => {
    const start = Date.UTC(2023, 11, 31, 22) / 1000;
    const end = Date.UTC(2024, 0, 1, 4) / 1000;
    expect(monthsInRange(start, end)).toEqual([
      { year: 2023, month: 12 },
      { year: 2024, month: 1 },
    ]);
  });

  it('should list every month of a long window', () => {
    const start = Date.UTC(2024, 0, 31) / 1000;
    const end = Date.UTC(2024, 3, 1) / 1000;
    expect(monthsInRange(start, end).map((m) => m.month)).toEqual([1, 2, 3, 4]);
  });
});
