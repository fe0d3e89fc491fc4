import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { WORKFLOW_ACTIONS, type ProjectConfig, type WorkflowAction } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { Mutex, type Release } from '../utils/mutex.js';
import { Catalog } from './Catalog.js';
import { GettextService } from './GettextService.js';
import { ReviewSession } from './ReviewService.js';
import { TranslationService, TranslationSession } from './TranslationService.js';

/**
 * `wait` queues behind the running operation (the terminal); `fail` throws
 * `WorkflowBusyError` instead (the MCP server).
 */
export type LockMode = 'wait' | 'fail';

export interface WorkflowDeps {
  gettext?: GettextService;
  translation?: TranslationService;
  lockMode?: LockMode;
}

export interface WorkflowHooks {
  /** Drives an opened translation session; the session is closed afterwards. */
  translate?(session: TranslationSession): Promise<void>;
  /** Drives an opened review session; the session is closed afterwards. */
  review?(session: ReviewSession): Promise<void>;
  onProgress?(percent: number, action: WorkflowAction): void;
}

/** Orders the selected actions the way the workflow runs them. */
export function orderActions(actions: Iterable<WorkflowAction>): WorkflowAction[] {
  const selected = new Set(actions);
  return WORKFLOW_ACTIONS.filter((action) => selected.has(action));
}

export class WorkflowService {
  public readonly gettext: GettextService;
  public readonly translation: TranslationService;
  private readonly mutex = new Mutex();
  private readonly lockMode: LockMode;

  constructor(
    config: ProjectConfig,
    private readonly logger: Logger,
    deps: WorkflowDeps = {},
  ) {
    this.gettext = deps.gettext ?? new GettextService(config, logger);
    this.translation = deps.translation ?? new TranslationService(logger);
    this.lockMode = deps.lockMode ?? 'wait';
  }

  public get busyWith(): string | undefined {
    return this.mutex.currentHolder;
  }

  public async extractAndUpdate(lang: string): Promise<string> {
    return this.exclusive(`extract/update ${lang}`, async () => {
      await this.gettext.extract();
      return this.gettext.update(lang);
    });
  }

  public async compile(): Promise<string[]> {
    return this.exclusive('compile', () => this.gettext.compile());
  }

  /** Loads the language's catalog and keeps the lock until the session closes. */
  public async openTranslation(lang: string): Promise<TranslationSession> {
    const release = await this.lock(`translate ${lang}`);
    try {
      const catalog = await Catalog.load(this.gettext.poPath(lang));
      return new TranslationSession(lang, catalog, this.translation, release);
    } catch (error) {
      release();
      throw error;
    }
  }

  public async openReview(lang: string): Promise<ReviewSession> {
    const release = await this.lock(`review ${lang}`);
    try {
      const catalog = await Catalog.load(this.gettext.poPath(lang));
      return new ReviewSession(catalog, release);
    } catch (error) {
      release();
      throw error;
    }
  }

  /** Deletes everything under the locale directory, keeping the directory itself. */
  public async clear(): Promise<number> {
    return this.exclusive('clear', async () => {
      const localeDir = this.gettext.localeDir;
      let names: string[];
      try {
        names = await fs.readdir(localeDir);
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          return 0;
        }
        throw error;
      }
      for (const name of names) {
        await fs.rm(path.join(localeDir, name), { recursive: true, force: true });
      }
      this.logger.info('Locale directory cleared', { localeDir, removed: names.length });
      return names.length;
    });
  }

  public async runWorkflow(lang: string, actions: Iterable<WorkflowAction>, hooks: WorkflowHooks = {}): Promise<void> {
    const ordered = orderActions(actions);
    let done = 0;

    for (const action of ordered) {
      this.logger.info('Workflow step', { action, lang });
      switch (action) {
        case 'extract_update':
          await this.extractAndUpdate(lang);
          break;
        case 'compile':
          await this.compile();
          break;
        case 'translate': {
          const drive = hooks.translate;
          if (drive) {
            const session = await this.openTranslation(lang);
            try {
              await drive(session);
            } finally {
              session.close();
            }
          }
          break;
        }
        case 'review': {
          const drive = hooks.review;
          if (drive) {
            const session = await this.openReview(lang);
            try {
              await drive(session);
            } finally {
              session.close();
            }
          }
          break;
        }
      }
      done++;
      hooks.onProgress?.(Math.round((done / ordered.length) * 100), action);
    }
  }

  private async lock(label: string): Promise<Release> {
    if (this.lockMode === 'fail') {
      return this.mutex.tryAcquire(label);
    }
    return this.mutex.acquire(label);
  }

  private async exclusive<T>(label: string, task: () => Promise<T>): Promise<T> {
    const release = await this.lock(label);
    try {
      return await task();
    } finally {
      release();
    }
  }
}
