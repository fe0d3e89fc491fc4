import { EntryNotFoundError } from '../types/errors.js';
import { ENTRY_TAGS, type EditTarget, type EntryTag, type TableColumn, type TableRow } from '../types/index.js';
import { escapeControlChars, unescapeControlChars } from '../utils/escape.js';
import { globToRegExp } from '../utils/pattern.js';
import type { Catalog, CatalogEntry } from './Catalog.js';
import { applyTag, fishTag } from './EntryTag.js';
import { parseNote, updateNote } from './Note.js';

export interface ActiveFilter {
  pattern: string;
  column: TableColumn;
}

interface ResolvedRow {
  entry: CatalogEntry;
  pluralIndex: number | null;
}

/** Slots shown for a plural entry; one even when the catalog holds none yet. */
function pluralSlotCount(entry: CatalogEntry): number {
  return Math.max(entry.pluralForms.length, 1);
}

function rowType(pluralIndex: number | null): string {
  return pluralIndex === null ? 'Singular' : `Plural[${pluralIndex}]`;
}

function sourceText(entry: CatalogEntry, pluralIndex: number | null): string {
  return pluralIndex === null || pluralIndex === 0 ? entry.msgid : entry.msgidPlural;
}

function currentText(entry: CatalogEntry, pluralIndex: number | null): string {
  return pluralIndex === null ? entry.msgstr : entry.getPluralForm(pluralIndex);
}

/**
 * Table state for reviewing one catalog: the full row projection, the rows
 * currently displayed and whether anything changed since the last save.
 *
 * Rows hold escaped display text only. Every mutation re-resolves the row to
 * its live entry by type and displayed msgid.
 */
export class ReviewSession {
  private displayed: TableRow[];
  private activeFilter: ActiveFilter | undefined;
  private dirty = false;
  private closed = false;

  constructor(
    public readonly catalog: Catalog,
    private readonly onClose?: () => void,
  ) {
    this.displayed = this.project();
  }

  public get rows(): readonly TableRow[] {
    return this.displayed;
  }

  public get filterState(): ActiveFilter | undefined {
    return this.activeFilter;
  }

  public get hasChanges(): boolean {
    return this.dirty;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Every row of the catalog, ignoring the active filter. */
  public project(): TableRow[] {
    const rows: TableRow[] = [];
    for (const entry of this.catalog.entries()) {
      if (entry.isPlural) {
        const count = pluralSlotCount(entry);
        for (let index = 0; index < count; index++) {
          rows.push(this.buildRow(rows.length + 1, entry, index));
        }
      } else {
        rows.push(this.buildRow(rows.length + 1, entry, null));
      }
    }
    return rows;
  }

  /** Shows the rows whose `column` matches the glob, starting from the full projection. */
  public filter(pattern: string, column: TableColumn): readonly TableRow[] {
    const matcher = globToRegExp(pattern);
    this.displayed = this.project().filter((row) => matcher.test(row[column]));
    this.activeFilter = { pattern, column };
    return this.displayed;
  }

  public resetFilter(): readonly TableRow[] {
    this.displayed = this.project();
    this.activeFilter = undefined;
    return this.displayed;
  }

  public edit(row: TableRow): EditTarget {
    const { entry, pluralIndex } = this.resolve(row);
    return {
      row,
      pluralIndex,
      msgid: row.msgid,
      value: escapeControlChars(currentText(entry, pluralIndex)),
    };
  }

  /** Writes the unescaped value into the resolved slot and returns the refreshed row. */
  public commitEdit(row: TableRow, newText: string): TableRow {
    const { entry, pluralIndex } = this.resolve(row);
    const value = unescapeControlChars(newText);
    if (value !== currentText(entry, pluralIndex)) {
      if (pluralIndex === null) {
        entry.msgstr = value;
      } else {
        entry.setPluralForm(pluralIndex, value);
      }
      this.dirty = true;
    }
    return this.refresh(row);
  }

  public setTag(row: TableRow, tag: EntryTag): TableRow {
    const { entry } = this.resolve(row);
    const present = ENTRY_TAGS.filter((known) => entry.hasFlag(known));
    if (present.length !== 1 || present[0] !== tag) {
      applyTag(entry, tag);
      this.dirty = true;
    }
    return this.refresh(row);
  }

  public setNote(row: TableRow, note: string): TableRow {
    const { entry } = this.resolve(row);
    const value = unescapeControlChars(note);
    if (value !== parseNote(entry)) {
      updateNote(entry, value);
      this.dirty = true;
    }
    return this.refresh(row);
  }

  public async save(): Promise<void> {
    await this.catalog.save();
    this.dirty = false;
  }

  public async saveAndClose(): Promise<void> {
    await this.save();
    this.close();
  }

  /**
   * Closes the session unless there are unsaved changes the `confirm`
   * callback refuses to discard. Resolves whether the session closed.
   */
  public async confirmClose(confirm: () => Promise<boolean>): Promise<boolean> {
    if (this.dirty && !(await confirm())) {
      return false;
    }
    this.close();
    return true;
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose?.();
  }

  /** `row / total | tag: n (p%) | ...` for the row under the cursor. */
  public status(cursor: number): string {
    const total = this.displayed.length;
    const position = total === 0 ? 0 : Math.min(Math.max(cursor, 0), total - 1) + 1;
    const stats = this.catalog.stats();
    const parts = ENTRY_TAGS.map((tag) => {
      const count = stats.tags[tag];
      const percent = stats.total === 0 ? 0 : Math.round((count / stats.total) * 100);
      return `${tag}: ${count} (${percent}%)`;
    });
    return [`${position} / ${total}`, ...parts].join(' | ');
  }

  private buildRow(rowNo: number, entry: CatalogEntry, pluralIndex: number | null): TableRow {
    return {
      rowNo,
      type: rowType(pluralIndex),
      msgid: escapeControlChars(sourceText(entry, pluralIndex)),
      msgstr: escapeControlChars(currentText(entry, pluralIndex)),
      tag: fishTag(entry, 'unknown'),
      note: escapeControlChars(parseNote(entry)),
    };
  }

  private resolve(row: TableRow): ResolvedRow {
    for (const entry of this.catalog.entries()) {
      if (!entry.isPlural) {
        if (row.type === 'Singular' && escapeControlChars(entry.msgid) === row.msgid) {
          return { entry, pluralIndex: null };
        }
        continue;
      }
      const count = pluralSlotCount(entry);
      for (let index = 0; index < count; index++) {
        if (row.type === rowType(index) && escapeControlChars(sourceText(entry, index)) === row.msgid) {
          return { entry, pluralIndex: index };
        }
      }
    }
    throw new EntryNotFoundError(row.type, row.msgid);
  }

  /** Re-renders the displayed rows (tag and note cells span all rows of an entry). */
  private refresh(row: TableRow): TableRow {
    const fresh = this.project();
    this.displayed = this.displayed.map((shown) => fresh[shown.rowNo - 1] ?? shown);
    return fresh[row.rowNo - 1] ?? row;
  }
}
