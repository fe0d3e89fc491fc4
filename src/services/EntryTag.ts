import { ENTRY_TAGS, type EntryTag } from '../types/index.js';
import type { CatalogEntry } from './Catalog.js';

export function isEntryTag(value: string): value is EntryTag {
  return ENTRY_TAGS.some((tag) => tag === value);
}

/**
 * Sets `tag` as the entry's status. Any other status tag is removed first;
 * flags outside the vocabulary (`python-format`, ...) are left alone.
 */
export function applyTag(entry: CatalogEntry, tag: EntryTag): void {
  for (const known of ENTRY_TAGS) {
    entry.removeFlag(known);
  }
  entry.addFlag(tag);
}

/** First status tag present on the entry, in vocabulary order, else `fallback`. */
export function fishTag(entry: CatalogEntry, fallback: EntryTag): EntryTag {
  return ENTRY_TAGS.find((tag) => entry.hasFlag(tag)) ?? fallback;
}
