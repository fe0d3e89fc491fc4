import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { TranslationJobBusyError } from '../types/errors.js';
import type { JobOutcome, JobProgress, JobState, TranslationServiceConfig } from '../types/index.js';
import { correctTranslation } from '../utils/correctTranslation.js';
import type { Logger } from '../utils/logger.js';
import { findBackend, type BackendDefinition, type TranslationBackend } from './backends/index.js';
import { withLocaleNegotiation } from './backends/negotiation.js';
import type { Catalog, CatalogEntry } from './Catalog.js';
import { applyTag } from './EntryTag.js';

export interface TranslateOptions {
  /** Backend id or display name. */
  service: string;
  config: TranslationServiceConfig;
}

export interface TranslationListener {
  onProgress?(progress: JobProgress): void;
}

export interface TranslationServiceDeps {
  createBackend?: (definition: BackendDefinition, config: TranslationServiceConfig) => TranslationBackend;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function provenanceLine(displayName: string, date: Date): string {
  return `[Translated with ${displayName} on ${formatTimestamp(date)}]`;
}

/** Progress units for a catalog: two per plural entry, one per singular entry. */
export function progressTotal(catalog: Catalog): number {
  return catalog.entries().reduce((total, entry) => total + (entry.isPlural ? 2 : 1), 0);
}

/**
 * Runs one auto-translation job at a time over a catalog. The job walks the
 * entries in order, fills what is missing (or everything, with
 * `overrideExisting`), tags and annotates what it wrote and saves the catalog
 * once at the end. Cancelled and failed jobs leave the file untouched.
 */
export class TranslationService {
  private state: JobState = 'idle';
  private controller: AbortController | undefined;
  private current: JobProgress = { completed: 0, total: 0 };
  private readonly createBackend: NonNullable<TranslationServiceDeps['createBackend']>;
  private readonly now: () => Date;

  constructor(
    private readonly logger: Logger,
    deps: TranslationServiceDeps = {},
  ) {
    this.createBackend =
      deps.createBackend ?? ((definition, config) => withLocaleNegotiation(definition, config, undefined, logger));
    this.now = deps.now ?? (() => new Date());
  }

  public get jobState(): JobState {
    return this.state;
  }

  public get isRunning(): boolean {
    return this.state === 'running';
  }

  public get progress(): JobProgress {
    return { ...this.current };
  }

  /**
   * Starts a job and resolves with its outcome; the promise never rejects.
   * Throws {@link TranslationJobBusyError} right away while a job is running.
   */
  public start(catalog: Catalog, options: TranslateOptions, listener: TranslationListener = {}): Promise<JobOutcome> {
    if (this.state === 'running') {
      throw new TranslationJobBusyError();
    }
    const controller = new AbortController();
    this.controller = controller;
    this.state = 'running';
    this.current = { completed: 0, total: progressTotal(catalog) };

    return this.run(catalog, options, controller.signal, listener).then((outcome) => {
      this.state = outcome.state;
      this.controller = undefined;
      return outcome;
    });
  }

  /** Asks the running job to stop at its next suspension point. */
  public cancel(): boolean {
    if (this.state !== 'running' || !this.controller) {
      return false;
    }
    this.controller.abort();
    return true;
  }

  private async run(
    catalog: Catalog,
    options: TranslateOptions,
    signal: AbortSignal,
    listener: TranslationListener,
  ): Promise<JobOutcome> {
    const { overrideExisting, markFuzzy } = options.config.presets;
    let translated = 0;

    this.logger.info('Translation started', {
      path: catalog.filePath,
      service: options.service,
      source: options.config.source,
      target: options.config.target,
      total: this.current.total,
    });

    try {
      const definition = findBackend(options.service);
      const backend = this.createBackend(definition, options.config);

      for (const entry of catalog.entries()) {
        await yieldToEventLoop();
        signal.throwIfAborted();

        let changed = false;
        if (entry.isPlural) {
          const forms = entry.pluralForms;
          if (overrideExisting || forms.length === 0 || forms.some((form) => form === '')) {
            const singular = await this.translateText(backend, entry.msgid, signal);
            const plural = await this.translateText(backend, entry.msgidPlural, signal);
            const slots = Math.max(forms.length, 2);
            entry.pluralForms = Array.from({ length: slots }, (_, index) => (index === 0 ? singular : plural));
            this.logger.debug('Translated plural entry', { msgid: entry.msgid, msgidPlural: entry.msgidPlural });
            changed = true;
          }
          this.current.completed += 2;
        } else {
          if (entry.msgid !== '' && (overrideExisting || entry.msgstr === '')) {
            entry.msgstr = await this.translateText(backend, entry.msgid, signal);
            this.logger.debug('Translated singular entry', { msgid: entry.msgid, msgstr: entry.msgstr });
            changed = true;
          }
          this.current.completed += 1;
        }

        if (changed) {
          this.annotate(entry, definition.displayName, markFuzzy);
          translated++;
        }
        listener.onProgress?.(this.progress);
      }

      this.logger.info('Translation completed, saving PO file', { path: catalog.filePath, translated });
      await catalog.save();
      return { state: 'completed', translated, progress: this.progress };
    } catch (error) {
      if (signal.aborted) {
        this.logger.info('Translation cancelled', { path: catalog.filePath, translated, progress: this.progress });
        return { state: 'cancelled', translated, progress: this.progress };
      }
      this.logger.error('Translation failed', { path: catalog.filePath, error });
      return { state: 'failed', translated, progress: this.progress, error };
    }
  }

  private async translateText(backend: TranslationBackend, msgid: string, signal: AbortSignal): Promise<string> {
    signal.throwIfAborted();
    const raw = await backend.translate(msgid, signal);
    return correctTranslation(msgid, raw);
  }

  private annotate(entry: CatalogEntry, displayName: string, markFuzzy: boolean): void {
    const line = provenanceLine(displayName, this.now());
    entry.comment = entry.comment === '' ? line : `${entry.comment}\n${line}`;
    applyTag(entry, markFuzzy ? 'fuzzy' : 'unconfirmed');
  }
}

/**
 * A catalog opened for translation under the workflow lock. Closing it
 * cancels a running job and gives the lock back.
 */
export class TranslationSession {
  private closed = false;

  constructor(
    public readonly language: string,
    public readonly catalog: Catalog,
    public readonly service: TranslationService,
    private readonly onClose?: () => void,
  ) {}

  public get isClosed(): boolean {
    return this.closed;
  }

  public start(options: TranslateOptions, listener?: TranslationListener): Promise<JobOutcome> {
    return this.service.start(this.catalog, options, listener);
  }

  public cancel(): boolean {
    return this.service.cancel();
  }

  public close(): void {
    if (this.closed) return;
    this.closed = true;
    this.service.cancel();
    this.onClose?.();
  }
}
