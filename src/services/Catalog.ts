import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import PO from 'pofile';
import { CatalogParseError, CatalogWriteError } from '../types/errors.js';
import type { EntryTag, TranslationStats } from '../types/index.js';
import { fishTag } from './EntryTag.js';

const KEYWORD_LINE = /^(?:msgctxt|msgid|msgid_plural|msgstr|msgstr\[\d+\])\s+"(?:[^"\\]|\\.)*"$/;
const CONTINUATION_LINE = /^"(?:[^"\\]|\\.)*"$/;

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Rejects text `pofile` would silently accept: stray lines that are neither a
 * comment, a keyword with a quoted string nor a string continuation.
 */
function validatePOText(filePath: string, content: string): void {
  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? '').trim();
    if (line === '' || line.startsWith('#')) continue;
    if (KEYWORD_LINE.test(line) || CONTINUATION_LINE.test(line)) continue;
    throw new CatalogParseError(filePath, `unexpected content on line ${i + 1}: ${line.slice(0, 60)}`);
  }
}

type POItem = InstanceType<typeof PO.Item>;

/** `#, fuzzy, python-format` parses with a leading space on every flag after the first. */
function normalizeFlags(item: POItem): void {
  const flags: POItem['flags'] = {};
  for (const [name, set] of Object.entries(item.flags)) {
    const flag = name.trim();
    if (set && flag !== '') flags[flag] = true;
  }
  item.flags = flags;
}

/** One message of a catalog, backed by the parsed `pofile` item. */
export class CatalogEntry {
  constructor(public readonly item: POItem) {
    normalizeFlags(item);
  }

  public get msgid(): string {
    return this.item.msgid;
  }

  public get msgidPlural(): string {
    return this.item.msgid_plural ?? '';
  }

  public get isPlural(): boolean {
    return this.msgidPlural !== '';
  }

  public get msgstr(): string {
    return this.item.msgstr[0] ?? '';
  }

  public set msgstr(value: string) {
    this.item.msgstr = [value];
  }

  /** Plural slots in index order; empty for a singular entry. */
  public get pluralForms(): string[] {
    return this.isPlural ? [...this.item.msgstr] : [];
  }

  public set pluralForms(forms: readonly string[]) {
    this.item.msgstr = [...forms];
  }

  public getPluralForm(index: number): string {
    return this.item.msgstr[index] ?? '';
  }

  public setPluralForm(index: number, value: string): void {
    const forms = [...this.item.msgstr];
    while (forms.length <= index) forms.push('');
    forms[index] = value;
    this.item.msgstr = forms;
  }

  public get flags(): string[] {
    return Object.keys(this.item.flags).filter((flag) => this.item.flags[flag]);
  }

  public hasFlag(flag: string): boolean {
    return Boolean(this.item.flags[flag]);
  }

  public addFlag(flag: string): void {
    this.item.flags[flag] = true;
  }

  public removeFlag(flag: string): void {
    delete this.item.flags[flag];
  }

  /** Translator comment as one string, lines joined with "\n". */
  public get comment(): string {
    return this.item.comments.join('\n');
  }

  public set comment(value: string) {
    this.item.comments = value === '' ? [] : value.split('\n');
  }

  public get isTranslated(): boolean {
    return this.isPlural ? this.pluralForms.length > 0 && this.pluralForms.every(Boolean) : this.msgstr !== '';
  }
}

export class Catalog {
  private readonly wrapped: CatalogEntry[];

  private constructor(
    public readonly filePath: string,
    private readonly po: PO,
  ) {
    this.wrapped = po.items.filter((item) => !item.obsolete).map((item) => new CatalogEntry(item));
  }

  public static async load(filePath: string): Promise<Catalog> {
    const absolutePath = path.resolve(filePath);
    let content: string;
    try {
      content = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new CatalogParseError(absolutePath, 'file not found', { cause: error });
      }
      throw new CatalogParseError(absolutePath, error instanceof Error ? error.message : 'unreadable', {
        cause: error,
      });
    }
    return Catalog.parse(absolutePath, content);
  }

  public static parse(filePath: string, content: string): Catalog {
    const text = content.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n');
    validatePOText(filePath, text);
    try {
      return new Catalog(filePath, PO.parse(text));
    } catch (error) {
      throw new CatalogParseError(filePath, error instanceof Error ? error.message : 'Unknown error', {
        cause: error,
      });
    }
  }

  public get headers(): PO['headers'] {
    return this.po.headers;
  }

  /** Active (non-obsolete) entries in file order. */
  public entries(): readonly CatalogEntry[] {
    return this.wrapped;
  }

  /**
   * Rewrites the whole file. The text goes to a sibling temp file first and
   * is renamed over the target.
   */
  public async save(filePath: string = this.filePath): Promise<void> {
    const target = path.resolve(filePath);
    const tempPath = `${target}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, `${this.po.toString()}\n`, 'utf-8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new CatalogWriteError(target, { cause: error });
    }
  }

  public stats(): TranslationStats {
    const tags: Record<EntryTag, number> = { unknown: 0, fuzzy: 0, unconfirmed: 0, reviewed: 0 };
    let translated = 0;
    for (const entry of this.wrapped) {
      if (entry.isTranslated) translated++;
      tags[fishTag(entry, 'unknown')]++;
    }
    return {
      total: this.wrapped.length,
      translated,
      untranslated: this.wrapped.length - translated,
      tags,
    };
  }
}
