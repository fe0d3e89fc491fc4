import chalk from 'chalk';
import type { ReviewSession } from '../services/ReviewService.js';
import { ENTRY_TAGS, TABLE_COLUMNS, type TableColumn, type TableRow } from '../types/index.js';
import { guard } from '../utils/guard.js';
import type { Logger } from '../utils/logger.js';
import type { Choice, Terminal } from './Terminal.js';

const PAGE_SIZE = 15;

type ReviewAction = 'next' | 'previous' | 'edit' | 'tag' | 'note' | 'filter' | 'reset' | 'save' | 'save_close' | 'close';

const ACTIONS: ReadonlyArray<Choice<ReviewAction>> = [
  { value: 'next', name: 'Next page' },
  { value: 'previous', name: 'Previous page' },
  { value: 'edit', name: 'Edit a translation' },
  { value: 'tag', name: 'Set a tag' },
  { value: 'note', name: 'Set a note' },
  { value: 'filter', name: 'Filter rows' },
  { value: 'reset', name: 'Reset filter' },
  { value: 'save', name: 'Save' },
  { value: 'save_close', name: 'Save and close' },
  { value: 'close', name: 'Close review' },
];

const COLUMN_WIDTHS: Record<TableColumn, number> = {
  type: 10,
  msgid: 34,
  msgstr: 34,
  tag: 11,
  note: 18,
};

export function truncate(text: string, width: number): string {
  return text.length <= width ? text.padEnd(width) : `${text.slice(0, width - 1)}…`;
}

export function renderRow(row: TableRow): string {
  const cells = TABLE_COLUMNS.map((column) => truncate(row[column], COLUMN_WIDTHS[column]));
  return [String(row.rowNo).padStart(5), ...cells].join(' │ ');
}

export class ReviewScreen {
  private page = 0;

  constructor(
    private readonly terminal: Terminal,
    private readonly logger: Logger,
  ) {}

  public async run(session: ReviewSession): Promise<void> {
    for (;;) {
      this.render(session);
      const action = await this.terminal.choose('Review', ACTIONS, 'next');
      const closed = await guard(this.terminal, this.logger, `ReviewScreen.${action}`, () => this.perform(session, action));
      if (closed === true) {
        return;
      }
    }
  }

  /** Resolves true once the session is closed. */
  private async perform(session: ReviewSession, action: ReviewAction): Promise<boolean> {
    switch (action) {
      case 'next':
        if ((this.page + 1) * PAGE_SIZE < session.rows.length) this.page++;
        return false;
      case 'previous':
        if (this.page > 0) this.page--;
        return false;
      case 'edit': {
        const row = await this.pickRow(session);
        if (!row) return false;
        const target = session.edit(row);
        this.terminal.print(`${chalk.dim('msgid:')} ${target.msgid}`);
        const value = await this.terminal.ask('Translation', target.value);
        session.commitEdit(row, value);
        return false;
      }
      case 'tag': {
        const row = await this.pickRow(session);
        if (!row) return false;
        const tag = await this.terminal.choose(
          'Tag',
          ENTRY_TAGS.map((value) => ({ value, name: value })),
          ENTRY_TAGS.find((known) => known === row.tag),
        );
        session.setTag(row, tag);
        return false;
      }
      case 'note': {
        const row = await this.pickRow(session);
        if (!row) return false;
        session.setNote(row, await this.terminal.ask('Note (empty removes it)', row.note));
        return false;
      }
      case 'filter': {
        const column = await this.terminal.choose(
          'Column',
          TABLE_COLUMNS.map((value) => ({ value, name: value })),
          'msgid',
        );
        const pattern = await this.terminal.ask('Pattern (*, ?, [...])', '*');
        const rows = session.filter(pattern, column);
        this.page = 0;
        if (rows.length === 0) {
          this.terminal.notify(`No rows match ${column} = ${pattern}.`, { severity: 'warning' });
        }
        return false;
      }
      case 'reset':
        session.resetFilter();
        this.page = 0;
        return false;
      case 'save':
        await session.save();
        this.terminal.notify(`Saved ${session.catalog.filePath}`, { title: '💾 Saved' });
        return false;
      case 'save_close':
        await session.saveAndClose();
        this.terminal.notify(`Saved ${session.catalog.filePath}`, { title: '💾 Saved' });
        return true;
      case 'close':
        return session.confirmClose(() => this.terminal.confirmInevitable('Discard unsaved changes?'));
    }
  }

  private async pickRow(session: ReviewSession): Promise<TableRow | undefined> {
    const rows = this.pageRows(session);
    if (rows.length === 0) {
      this.terminal.notify('No rows on this page.', { severity: 'warning' });
      return undefined;
    }
    const rowNo = await this.terminal.choose(
      'Row',
      rows.map((row) => ({ value: String(row.rowNo), name: `${row.rowNo} ${row.type} ${truncate(row.msgid, 50).trimEnd()}` })),
    );
    return rows.find((row) => String(row.rowNo) === rowNo);
  }

  private pageRows(session: ReviewSession): readonly TableRow[] {
    const start = this.page * PAGE_SIZE;
    return session.rows.slice(start, start + PAGE_SIZE);
  }

  private render(session: ReviewSession): void {
    const filter = session.filterState;
    this.terminal.heading(`Review ${session.catalog.filePath}${filter ? ` (${filter.column} = ${filter.pattern})` : ''}`);
    const header = ['No.'.padStart(5), ...TABLE_COLUMNS.map((column) => truncate(column, COLUMN_WIDTHS[column]))].join(' │ ');
    this.terminal.print(chalk.bold(header));
    for (const row of this.pageRows(session)) {
      this.terminal.print(renderRow(row));
    }
    const marker = session.hasChanges ? chalk.yellow(' (unsaved changes)') : '';
    this.terminal.print(chalk.dim(session.status(this.page * PAGE_SIZE)) + marker);
  }
}
