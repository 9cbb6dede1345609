import { describe, expect, it } from 'vitest';
import { addDays, isIsoDate, monthOf, monthWindow, rangeBounds, startOfDay, today } from './dates.js';

describe('dates', () => {
  it('accepts only real YYYY-MM-DD dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-1-01')).toBe(false);
    expect(isIsoDate('2024-13-01')).toBe(false);
    expect(isIsoDate('2024-01-15T00:00:00')).toBe(false);
  });

  it('stores dates at midnight', () => {
    expect(startOfDay('2024-01-15')).toBe('2024-01-15T00:00:00');
  });

  it('adds days across month and year ends', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
  });

  it('bounds the calendar month of a reference date', () => {
    expect(monthWindow('2024-03-17')).toEqual({
      start: '2024-03-01T00:00:00',
      end: '2024-04-01T00:00:00',
    });
    expect(monthWindow('2024-12-31')).toEqual({
      start: '2024-12-01T00:00:00',
      end: '2025-01-01T00:00:00',
    });
  });

  it('makes the end of a range inclusive through midnight of the next day', () => {
    expect(rangeBounds({ start: '2024-01-01', end: '2024-01-31' })).toEqual({
      start: '2024-01-01T00:00:00',
      end: '2024-02-01T00:00:00',
    });
    expect(rangeBounds({ end: '2024-01-31' })).toEqual({ start: undefined, end: '2024-02-01T00:00:00' });
    expect(rangeBounds(undefined)).toEqual({ start: undefined, end: undefined });
  });

  it('derives month keys and local dates', () => {
    expect(monthOf('2024-07-04T00:00:00')).toBe('2024-07');
    expect(today(new Date(2025, 0, 5))).toBe('2025-01-05');
  });
});
