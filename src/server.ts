import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { buildTranslationConfig, isApiKeyType } from './config.js';
import { listBackends } from './services/backends/index.js';
import { Catalog } from './services/Catalog.js';
import { isEntryTag } from './services/EntryTag.js';
import type { ReviewSession } from './services/ReviewService.js';
import type { TranslationSession } from './services/TranslationService.js';
import { WorkflowService } from './services/WorkflowService.js';
import { describeError } from './types/errors.js';
import {
  TABLE_COLUMNS,
  type JobOutcome,
  type ProjectConfig,
  type TableColumn,
  type TableRow,
  type TranslationServiceConfig,
} from './types/index.js';
import type { Logger } from './utils/logger.js';

type ToolArgs = Record<string, unknown>;

class ToolArgumentError extends Error {}

function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value === '') {
    throw new ToolArgumentError(`Missing or invalid argument "${key}": expected a non-empty string`);
  }
  return value;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ToolArgumentError(`Invalid argument "${key}": expected a string`);
  }
  return value;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ToolArgumentError(`Invalid argument "${key}": expected a non-negative integer`);
  }
  return value;
}

function requireNumber(args: ToolArgs, key: string): number {
  const value = optionalNumber(args, key);
  if (value === undefined) {
    throw new ToolArgumentError(`Missing argument "${key}"`);
  }
  return value;
}

function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new ToolArgumentError(`Invalid argument "${key}": expected true or false`);
  }
  return value;
}

function isTableColumn(value: string): value is TableColumn {
  return TABLE_COLUMNS.some((column) => column === value);
}

function text(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }] };
}

function formatRows(rows: readonly TableRow[]): string {
  return JSON.stringify(rows, null, 2);
}

const languageProperty = {
  language: { type: 'string', description: 'Target language code, e.g. "fr" or "pt_BR"' },
};

const rowNoProperty = {
  rowNo: { type: 'number', description: 'Row number as reported by get_rows' },
};

export const TOOLS: Tool[] = [
  {
    name: 'list_services',
    description: 'List the translation services and the settings each one needs',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'extract_update',
    description: 'Extract messages from the sources into the template and merge it into a language catalog',
    inputSchema: { type: 'object', properties: languageProperty, required: ['language'] },
  },
  {
    name: 'compile',
    description: 'Compile every language catalog into its .mo file',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'translate',
    description: 'Auto-translate a language catalog with a translation service',
    inputSchema: {
      type: 'object',
      properties: {
        ...languageProperty,
        service: { type: 'string', description: 'Service id or display name; defaults to the configured one' },
        overrideExisting: { type: 'boolean', description: 'Translate entries that already have a translation' },
        markFuzzy: { type: 'boolean', description: 'Tag new translations fuzzy instead of unconfirmed' },
        apiKey: { type: 'string', description: 'API key for services that need one' },
        apiKeyType: { type: 'string', enum: ['free', 'paid'], description: 'Key tier (DeepL)' },
        model: { type: 'string', description: 'Model name (ChatGPT)' },
        region: { type: 'string', description: 'Resource region (Microsoft)' },
        wait: { type: 'boolean', description: 'Wait for the job to finish before answering' },
      },
      required: ['language'],
    },
  },
  {
    name: 'cancel_translation',
    description: 'Cancel the running translation job; nothing is saved',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'open_review',
    description: 'Open a language catalog for review',
    inputSchema: { type: 'object', properties: languageProperty, required: ['language'] },
  },
  {
    name: 'get_rows',
    description: 'Get the displayed rows of the open review',
    inputSchema: {
      type: 'object',
      properties: {
        offset: { type: 'number', description: 'Index of the first row to return' },
        limit: { type: 'number', description: 'Maximum number of rows to return' },
      },
    },
  },
  {
    name: 'filter_rows',
    description: 'Show only the rows whose column matches a shell-style glob (*, ?, [...])',
    inputSchema: {
      type: 'object',
      properties: {
        pattern: { type: 'string', description: 'Glob matched against the whole cell' },
        column: { type: 'string', enum: [...TABLE_COLUMNS], description: 'Column to match' },
      },
      required: ['pattern', 'column'],
    },
  },
  {
    name: 'reset_filter',
    description: 'Show all rows again',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'edit_row',
    description: 'Replace the translation of a row; escape sequences such as \\n are unescaped',
    inputSchema: {
      type: 'object',
      properties: { ...rowNoProperty, value: { type: 'string', description: 'New translation' } },
      required: ['rowNo', 'value'],
    },
  },
  {
    name: 'set_tag',
    description: 'Set the review tag of the entry behind a row',
    inputSchema: {
      type: 'object',
      properties: {
        ...rowNoProperty,
        tag: { type: 'string', enum: ['unknown', 'fuzzy', 'unconfirmed', 'reviewed'] },
      },
      required: ['rowNo', 'tag'],
    },
  },
  {
    name: 'set_note',
    description: 'Set the reviewer note of the entry behind a row; an empty note removes it',
    inputSchema: {
      type: 'object',
      properties: { ...rowNoProperty, note: { type: 'string' } },
      required: ['rowNo', 'note'],
    },
  },
  {
    name: 'save_review',
    description: 'Write the reviewed catalog to disk',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'close_review',
    description: 'Close the review. Unsaved changes need save or discard set to true',
    inputSchema: {
      type: 'object',
      properties: {
        save: { type: 'boolean', description: 'Save before closing' },
        discard: { type: 'boolean', description: 'Drop unsaved changes' },
      },
    },
  },
  {
    name: 'get_translation_stats',
    description: 'Get translation statistics of a language catalog and the state of the translation job',
    inputSchema: {
      type: 'object',
      properties: { language: { type: 'string', description: 'Language code; defaults to the open review' } },
    },
  },
];

interface RunningJob {
  session: TranslationSession;
  language: string;
  done: Promise<JobOutcome>;
}

/**
 * Exposes the workflow as MCP tools. Operations never wait for the workflow
 * lock: a busy lock is reported as a tool error.
 */
export class PoweaverMCPServer {
  private readonly server: Server;
  private readonly workflow: WorkflowService;
  private review: ReviewSession | undefined;
  private job: RunningJob | undefined;
  private lastOutcome: JobOutcome | undefined;

  constructor(
    private readonly config: ProjectConfig,
    private readonly logger: Logger,
    workflow?: WorkflowService,
  ) {
    this.server = new Server(
      { name: 'poweaver', version: config.version },
      { capabilities: { tools: {} } },
    );
    this.workflow = workflow ?? new WorkflowService(config, logger, { lockMode: 'fail' });
    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.handleToolCall(request.params.name, request.params.arguments ?? {}),
    );
  }

  public async handleToolCall(name: string, args: ToolArgs): Promise<CallToolResult> {
    try {
      return await this.dispatch(name, args);
    } catch (error) {
      this.logger.error('Tool call failed', { tool: name, error });
      return {
        content: [{ type: 'text', text: `Error executing tool ${name}: ${describeError(error)}` }],
        isError: true,
      };
    }
  }

  private async dispatch(name: string, args: ToolArgs): Promise<CallToolResult> {
    switch (name) {
      case 'list_services': {
        const services = listBackends().map(({ id, displayName, capabilities }) => ({ id, displayName, capabilities }));
        return text(`Available translation services:\n${JSON.stringify(services, null, 2)}`);
      }

      case 'extract_update': {
        const language = requireString(args, 'language');
        const poPath = await this.workflow.extractAndUpdate(language);
        return text(`Extracted messages and updated ${poPath}`);
      }

      case 'compile': {
        const written = await this.workflow.compile();
        return text(
          written.length === 0 ? 'No catalogs to compile.' : `Compiled ${written.length} catalog(s):\n${written.join('\n')}`,
        );
      }

      case 'translate':
        return this.startTranslation(args);

      case 'cancel_translation': {
        if (!this.job || !this.job.session.cancel()) {
          return text('No translation job is running.');
        }
        const outcome = await this.job.done;
        return text(`Translation cancelled after ${outcome.progress.completed}/${outcome.progress.total}. Nothing was saved.`);
      }

      case 'open_review': {
        const language = requireString(args, 'language');
        if (this.review) {
          throw new ToolArgumentError('A review is already open. Close it first.');
        }
        this.review = await this.workflow.openReview(language);
        return text(`Review opened for ${this.review.catalog.filePath}: ${this.review.rows.length} rows\n${this.review.status(0)}`);
      }

      case 'get_rows': {
        const review = this.requireReview();
        const offset = optionalNumber(args, 'offset') ?? 0;
        const limit = optionalNumber(args, 'limit');
        const rows = review.rows.slice(offset, limit === undefined ? undefined : offset + limit);
        return text(`${review.status(offset)}\n${formatRows(rows)}`);
      }

      case 'filter_rows': {
        const review = this.requireReview();
        const pattern = requireString(args, 'pattern');
        const column = requireString(args, 'column');
        if (!isTableColumn(column)) {
          throw new ToolArgumentError(`Invalid column "${column}": expected one of ${TABLE_COLUMNS.join(', ')}`);
        }
        const rows = review.filter(pattern, column);
        return text(`${rows.length} row(s) match ${column} = ${pattern}\n${formatRows(rows)}`);
      }

      case 'reset_filter': {
        const rows = this.requireReview().resetFilter();
        return text(`Filter cleared, ${rows.length} rows shown.`);
      }

      case 'edit_row': {
        const review = this.requireReview();
        const row = this.findRow(review, requireNumber(args, 'rowNo'));
        const value = optionalString(args, 'value');
        if (value === undefined) {
          throw new ToolArgumentError('Missing argument "value"');
        }
        return text(formatRows([review.commitEdit(row, value)]));
      }

      case 'set_tag': {
        const review = this.requireReview();
        const row = this.findRow(review, requireNumber(args, 'rowNo'));
        const tag = requireString(args, 'tag');
        if (!isEntryTag(tag)) {
          throw new ToolArgumentError(`Invalid tag "${tag}"`);
        }
        return text(formatRows([review.setTag(row, tag)]));
      }

      case 'set_note': {
        const review = this.requireReview();
        const row = this.findRow(review, requireNumber(args, 'rowNo'));
        const note = optionalString(args, 'note') ?? '';
        return text(formatRows([review.setNote(row, note)]));
      }

      case 'save_review': {
        const review = this.requireReview();
        await review.save();
        return text(`Saved ${review.catalog.filePath}`);
      }

      case 'close_review':
        return this.closeReview(args);

      case 'get_translation_stats': {
        const language = optionalString(args, 'language');
        const catalog = language
          ? await Catalog.load(this.workflow.gettext.poPath(language))
          : this.requireReview().catalog;
        return text(
          `Translation statistics for ${catalog.filePath}:\n${JSON.stringify({ ...catalog.stats(), job: this.jobSummary() }, null, 2)}`,
        );
      }

      default:
        return {
          content: [{ type: 'text', text: `Unknown tool: ${name}` }],
          isError: true,
        };
    }
  }

  /** The running job, else the last finished one with its failure reason. */
  private jobSummary(): Record<string, unknown> | null {
    if (this.job) {
      return {
        state: this.workflow.translation.jobState,
        language: this.job.language,
        progress: this.workflow.translation.progress,
      };
    }
    const outcome = this.lastOutcome;
    if (!outcome) {
      return null;
    }
    return {
      state: outcome.state,
      progress: outcome.progress,
      translated: outcome.translated,
      ...(outcome.state === 'failed' ? { error: describeError(outcome.error) } : {}),
    };
  }

  private async startTranslation(args: ToolArgs): Promise<CallToolResult> {
    const language = requireString(args, 'language');
    const service = optionalString(args, 'service') ?? this.config.presets.defaultService;
    const apiKeyType = optionalString(args, 'apiKeyType');
    if (apiKeyType !== undefined && !isApiKeyType(apiKeyType)) {
      throw new ToolArgumentError(`Invalid apiKeyType "${apiKeyType}"`);
    }

    const edits: Partial<Omit<TranslationServiceConfig, 'target'>> = {
      presets: {
        ...this.config.presets,
        overrideExisting: optionalBoolean(args, 'overrideExisting') ?? this.config.presets.overrideExisting,
        markFuzzy: optionalBoolean(args, 'markFuzzy') ?? this.config.presets.markFuzzy,
      },
      apiKey: optionalString(args, 'apiKey'),
      apiKeyType,
      model: optionalString(args, 'model'),
      region: optionalString(args, 'region'),
    };
    const config = buildTranslationConfig(this.config, language, edits);

    const session = await this.workflow.openTranslation(language);
    let done: Promise<JobOutcome>;
    try {
      done = session.start({ service, config });
    } catch (error) {
      session.close();
      throw error;
    }

    const job: RunningJob = {
      session,
      language,
      done: done.then((outcome) => {
        this.lastOutcome = outcome;
        this.job = undefined;
        session.close();
        return outcome;
      }),
    };
    this.job = job;

    if (optionalBoolean(args, 'wait')) {
      const outcome = await job.done;
      if (outcome.state === 'failed') {
        return {
          content: [{ type: 'text', text: `Translation failed: ${describeError(outcome.error)}` }],
          isError: true,
        };
      }
      return text(
        `Translation ${outcome.state}: ${outcome.translated} entries translated (${outcome.progress.completed}/${outcome.progress.total}).`,
      );
    }
    return text(`Translation of ${session.catalog.filePath} started with ${service}. Use get_translation_stats to follow it.`);
  }

  private async closeReview(args: ToolArgs): Promise<CallToolResult> {
    const review = this.requireReview();
    if (optionalBoolean(args, 'save')) {
      await review.save();
    }
    const discard = optionalBoolean(args, 'discard') ?? false;
    const closed = await review.confirmClose(async () => discard);
    if (!closed) {
      return {
        content: [{ type: 'text', text: 'The review has unsaved changes. Call close_review with save or discard set to true.' }],
        isError: true,
      };
    }
    this.review = undefined;
    return text('Review closed.');
  }

  private requireReview(): ReviewSession {
    if (!this.review) {
      throw new ToolArgumentError('No review is open. Use open_review first.');
    }
    return this.review;
  }

  private findRow(review: ReviewSession, rowNo: number): TableRow {
    const row = review.project().find((candidate) => candidate.rowNo === rowNo);
    if (!row) {
      throw new ToolArgumentError(`No row ${rowNo}`);
    }
    return row;
  }

  /** Closes open sessions and waits for a running job to stop. */
  public async shutdown(): Promise<void> {
    if (this.job) {
      this.job.session.cancel();
      await this.job.done;
    }
    this.review?.close();
    this.review = undefined;
    await this.server.close();
  }

  public async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('MCP server listening on stdio', { version: this.config.version });
  }
}
