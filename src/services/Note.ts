import { escapeControlChars, unescapeControlChars } from '../utils/escape.js';
import type { CatalogEntry } from './Catalog.js';

const NOTE_OPEN = '<note class="poweaver">';
const NOTE_CLOSE = '</note>';
const NOTE_PATTERN = /<note class="poweaver">([\s\S]*?)<\/note>/;

/** The reviewer note embedded in the entry's translator comment, or "". */
export function parseNote(entry: CatalogEntry): string {
  return unescapeControlChars(NOTE_PATTERN.exec(entry.comment)?.[1] ?? '');
}

/**
 * Replaces the embedded note, keeping the rest of the comment in front of
 * it. An empty note removes the note block.
 *
 * The note is stored escaped on a single comment line: comment lines lose
 * their surrounding whitespace when the file is read back.
 */
export function updateNote(entry: CatalogEntry, note: string): void {
  if (note.includes(NOTE_CLOSE)) {
    throw new Error(`A note cannot contain "${NOTE_CLOSE}".`);
  }
  const rest = entry.comment.replace(new RegExp(NOTE_PATTERN.source, 'g'), '').trim();
  if (note === '') {
    entry.comment = rest;
    return;
  }
  entry.comment = `${rest}${rest ? '\n' : ''}${NOTE_OPEN}${escapeControlChars(note)}${NOTE_CLOSE}`;
}
