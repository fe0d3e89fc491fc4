import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { Catalog } from '../src/services/Catalog.js';
import { ReviewSession } from '../src/services/ReviewService.js';
import { EntryNotFoundError } from '../src/types/errors.js';
import type { TableRow } from '../src/types/index.js';
import { copyFixture, FIXTURES, makeTempDir } from './helpers.js';

async function openFixture(onClose?: () => void): Promise<ReviewSession> {
  const text = await fs.readFile(path.join(FIXTURES, 'fr.po'), 'utf-8');
  return new ReviewSession(Catalog.parse('fr.po', text), onClose);
}

function rowAt(session: ReviewSession, rowNo: number): TableRow {
  const row = session.project()[rowNo - 1];
  if (!row) throw new Error(`no row ${rowNo}`);
  return row;
}

function entryAt(catalog: Catalog, index: number) {
  const entry = catalog.entries()[index];
  if (!entry) throw new Error(`no entry ${index}`);
  return entry;
}

describe('ReviewSession', () => {
  it('projects one row per singular entry and per plural slot', async () => {
    const session = await openFixture();

    expect(session.rows).toEqual([
      { rowNo: 1, type: 'Singular', msgid: 'Hello world', msgstr: 'Bonjour le monde', tag: 'fuzzy', note: '' },
      { rowNo: 2, type: 'Plural[0]', msgid: 'One file', msgstr: '', tag: 'unknown', note: '' },
      { rowNo: 3, type: 'Plural[1]', msgid: '{count} files', msgstr: '', tag: 'unknown', note: '' },
      { rowNo: 4, type: 'Singular', msgid: 'Goodbye', msgstr: '', tag: 'unknown', note: '' },
    ]);
  });

  it('shows a single row for a plural entry without slots', () => {
    const catalog = Catalog.parse('x.po', 'msgid "day"\nmsgid_plural "days"\nmsgstr[0] ""\n');
    entryAt(catalog, 0).pluralForms = [];
    const session = new ReviewSession(catalog);

    expect(session.rows.map((row) => `${row.type} ${row.msgid}`)).toEqual(['Plural[0] day']);
  });

  it('escapes control characters in cells', () => {
    const catalog = Catalog.parse('x.po', 'msgid "a\\tb"\nmsgstr "line\\nbreak"\n');
    const session = new ReviewSession(catalog);

    expect(session.rows[0]).toMatchObject({ msgid: 'a\\tb', msgstr: 'line\\nbreak' });
  });

  it('filters by column and resets to the full projection', async () => {
    const session = await openFixture();

    expect(session.filter('Hello*', 'msgid').map((row) => row.rowNo)).toEqual([1]);
    expect(session.filterState).toEqual({ pattern: 'Hello*', column: 'msgid' });
    expect(session.filter('unknown', 'tag').map((row) => row.rowNo)).toEqual([2, 3, 4]);
    expect(session.filter('Plural[[]?]', 'type').map((row) => row.rowNo)).toEqual([2, 3]);

    expect(session.resetFilter()).toHaveLength(4);
    expect(session.filterState).toBeUndefined();
  });

  it('never loses rows to a filter', () => {
    const catalog = Catalog.parse(
      'x.po',
      'msgid "Hello world"\nmsgstr ""\n\nmsgid "Goodbye"\nmsgstr ""\n\nmsgid "Thanks"\nmsgstr ""\n',
    );
    const session = new ReviewSession(catalog);

    expect(session.filter('Hello*', 'msgid')).toHaveLength(1);
    expect(session.project()).toHaveLength(3);
    expect(session.rows).toHaveLength(1);
  });

  it('resolves the edit target of a plural slot', async () => {
    const session = await openFixture();

    expect(session.edit(rowAt(session, 3))).toEqual({
      row: rowAt(session, 3),
      pluralIndex: 1,
      msgid: '{count} files',
      value: '',
    });
  });

  it('commits unescaped text and marks the session dirty', async () => {
    const session = await openFixture();

    const row = session.commitEdit(rowAt(session, 4), 'Au\\nrevoir');

    expect(row.msgstr).toBe('Au\\nrevoir');
    expect(entryAt(session.catalog, 2).msgstr).toBe('Au\nrevoir');
    expect(session.hasChanges).toBe(true);
  });

  it('writes plural slots', async () => {
    const session = await openFixture();

    session.commitEdit(rowAt(session, 3), '{count} fichiers');

    expect(entryAt(session.catalog, 1).pluralForms).toEqual(['', '{count} fichiers']);
  });

  it('leaves the session clean when the text does not change', async () => {
    const session = await openFixture();

    session.commitEdit(rowAt(session, 1), 'Bonjour le monde');

    expect(session.hasChanges).toBe(false);
  });

  it('refreshes the displayed rows under a filter', async () => {
    const session = await openFixture();
    const [goodbye] = session.filter('Good*', 'msgid');
    if (!goodbye) throw new Error('row missing');

    session.commitEdit(goodbye, 'Au revoir');

    expect(session.rows).toEqual([{ ...goodbye, msgstr: 'Au revoir' }]);
  });

  it('fails for a row that no longer matches an entry', async () => {
    const session = await openFixture();
    const stale = { ...rowAt(session, 4), msgid: 'Missing' };

    expect(() => session.commitEdit(stale, 'x')).toThrow(EntryNotFoundError);
    expect(() => session.edit(stale)).toThrow('No entry found for the selected row (Singular "Missing"). Restart the review.');
  });

  it('tags every row of an entry', async () => {
    const session = await openFixture();

    session.setTag(rowAt(session, 2), 'reviewed');

    expect(session.rows.map((row) => row.tag)).toEqual(['fuzzy', 'reviewed', 'reviewed', 'unknown']);
    expect(session.hasChanges).toBe(true);
  });

  it('keeps the session clean when the tag is already set', async () => {
    const session = await openFixture();

    session.setTag(rowAt(session, 1), 'fuzzy');

    expect(session.hasChanges).toBe(false);
    expect(entryAt(session.catalog, 0).flags).toEqual(['fuzzy', 'python-format']);
  });

  it('stores notes in the translator comment', async () => {
    const session = await openFixture();

    const row = session.setNote(rowAt(session, 1), 'check\\nthis');

    expect(row.note).toBe('check\\nthis');
    expect(entryAt(session.catalog, 0).comment).toBe(
      'Shown on the start page\n<note class="poweaver">check\\nthis</note>',
    );
    expect(session.hasChanges).toBe(true);
  });

  it('reports position and tag counts', async () => {
    const session = await openFixture();

    expect(session.status(0)).toBe('1 / 4 | unknown: 2 (67%) | fuzzy: 1 (33%) | unconfirmed: 0 (0%) | reviewed: 0 (0%)');
    expect(session.status(99)).toMatch(/^4 \/ 4 \| /);
    session.filter('nothing', 'msgid');
    expect(session.status(0)).toMatch(/^0 \/ 0 \| /);
  });

  it('asks before discarding unsaved changes', async () => {
    const onClose = vi.fn();
    const session = await openFixture(onClose);
    session.commitEdit(rowAt(session, 4), 'Au revoir');

    await expect(session.confirmClose(async () => false)).resolves.toBe(false);
    expect(session.isClosed).toBe(false);

    await expect(session.confirmClose(async () => true)).resolves.toBe(true);
    expect(session.isClosed).toBe(true);

    session.close();
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('closes a clean session without asking', async () => {
    const session = await openFixture();
    const confirm = vi.fn(async () => false);

    await expect(session.confirmClose(confirm)).resolves.toBe(true);
    expect(confirm).not.toHaveBeenCalled();
  });

  it('saves the catalog and clears the dirty flag', async () => {
    const dir = await makeTempDir();
    const poPath = await copyFixture(dir);
    const session = new ReviewSession(await Catalog.load(poPath));
    session.commitEdit(rowAt(session, 4), 'Au revoir');

    await session.save();

    expect(session.hasChanges).toBe(false);
    expect(entryAt(await Catalog.load(poPath), 2).msgstr).toBe('Au revoir');
  });

  it('saves and closes in one step', async () => {
    const dir = await makeTempDir();
    const poPath = await copyFixture(dir);
    const onClose = vi.fn();
    const session = new ReviewSession(await Catalog.load(poPath), onClose);
    session.commitEdit(rowAt(session, 4), 'Au revoir');

    await session.saveAndClose();

    expect(session.hasChanges).toBe(false);
    expect(session.isClosed).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(entryAt(await Catalog.load(poPath), 2).msgstr).toBe('Au revoir');
  });
});
