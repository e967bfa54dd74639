import { describe, it, expect } from 'vitest';
import {
  combineDateAndTime,
  formatTradeDateTime,
  millisecondsUntil,
  timeOfDay,
} from '../timing.js';

describe('timing', () => {
  it('should format the time of day with padding', () => {
    expect(timeOfDay(new Date(2024, 0, 2, 9, 5, 7))).toBe('09:05:07');
  });

  it('should format trade timestamps with slashes', () => {
    expect(formatTradeDateTime(new Date(2024, 0, 2, 9, 5, 7))).toBe('2024/01/02 09:05:07');
  });

  it('should combine a day with a time without seconds', () => {
    expect(combineDateAndTime(new Date(2024, 0, 2, 23, 0, 0), '12:30')).toEqual(
      new Date(2024, 0, 2, 12, 30, 0),
    );
  });

  it('should count down to a later time of day', () => {
    expect(millisecondsUntil('12:30:00', new Date(2024, 0, 2, 12, 29, 30))).toBe(30000);
  });

  it('should return zero once the time has passed', () => {
    expect(millisecondsUntil('12:30:00', new Date(2024, 0, 2, 13, 0, 0))).toBe(0);
  });
});
