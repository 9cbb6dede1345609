import type { TagName } from './types.js';

export const MAX_TAG_LENGTH = 64;

/**
 * Lookup key used for case-insensitive uniqueness. ß folds to "ss" so that
 * "Straße" and "STRASSE" share a key.
 */
export function tagKey(name: string): string {
  return name.trim().toLowerCase().replace(/ß/g, 'ss');
}

/**
 * Trim, drop blanks and dedupe case-insensitively.
 * The first spelling seen wins: ["Costco", "costco", " COSTCO "] → ["Costco"].
 */
export function normalizeTags(values: readonly string[] | undefined): TagName[] {
  if (!values) return [];
  const out: TagName[] = [];
  const seen = new Set<string>();
  for (const value of values) {
    const name = value.trim();
    if (!name) continue;
    const key = tagKey(name);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(asTagName(name));
  }
  return out;
}

function asTagName(name: string): TagName {
  return name as TagName;
}

export function sortTagNames<T extends string>(names: readonly T[]): T[] {
  return [...names].sort((a, b) => {
    const ka = a.toLowerCase();
    const kb = b.toLowerCase();
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
}
