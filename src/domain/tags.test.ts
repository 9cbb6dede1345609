import { describe, expect, it } from 'vitest';
import { normalizeTags, sortTagNames, tagKey } from './tags.js';

describe('tags', () => {
  it('keeps one tag per spelling, first casing wins', () => {
    expect(normalizeTags(['Costco', 'costco', ' COSTCO '])).toEqual(['Costco']);
  });

  it('trims and drops blanks', () => {
    expect(normalizeTags(['  travel ', '', '   ', 'Work'])).toEqual(['travel', 'Work']);
  });

  it('treats a missing list as empty', () => {
    expect(normalizeTags(undefined)).toEqual([]);
  });

  it('keys tags by their lower-cased trimmed name', () => {
    expect(tagKey('  Coffee-Shop ')).toBe('coffee-shop');
  });

  it('folds sharp s so both spellings share a key', () => {
    expect(tagKey('Straße')).toBe('strasse');
    expect(tagKey('STRAẞE')).toBe('strasse');
    expect(normalizeTags(['Straße', 'STRASSE'])).toEqual(['Straße']);
  });

  it('sorts alphabetically ignoring case', () => {
    expect(sortTagNames(['banana', 'Apple', 'cherry', 'apricot'])).toEqual([
      'Apple',
      'apricot',
      'banana',
      'cherry',
    ]);
  });
});
