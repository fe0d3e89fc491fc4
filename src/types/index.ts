export const ENTRY_TAGS = ['unknown', 'fuzzy', 'unconfirmed', 'reviewed'] as const;

export type EntryTag = (typeof ENTRY_TAGS)[number];

export const TABLE_COLUMNS = ['type', 'msgid', 'msgstr', 'tag', 'note'] as const;

export type TableColumn = (typeof TABLE_COLUMNS)[number];

export interface TableRow {
  rowNo: number;
  type: string; // "Singular" or "Plural[n]"
  msgid: string;
  msgstr: string;
  tag: string;
  note: string;
}

export interface EditTarget {
  row: TableRow;
  pluralIndex: number | null;
  msgid: string;
  value: string; // escaped, ready for an input field
}

export interface TranslationStats {
  total: number;
  translated: number;
  untranslated: number;
  tags: Record<EntryTag, number>;
}

export const WORKFLOW_ACTIONS = ['extract_update', 'translate', 'review', 'compile'] as const;

export type WorkflowAction = (typeof WORKFLOW_ACTIONS)[number];

export const BACKEND_IDS = ['google', 'mymemory', 'microsoft', 'yandex', 'chatgpt', 'deepl'] as const;

export type BackendId = (typeof BACKEND_IDS)[number];

export type ApiKeyType = 'free' | 'paid';

export interface Proxies {
  http?: string;
  https?: string;
}

export interface Presets {
  overrideExisting: boolean;
  markFuzzy: boolean;
  defaultService: BackendId;
  workflowActions: WorkflowAction[];
}

export interface TranslationServiceConfig {
  source: string;
  target: string;
  apiKey?: string;
  apiKeyType?: ApiKeyType;
  proxies?: Proxies;
  model?: string;
  region?: string;
  requestTimeoutMs?: number;
  presets: Presets;
}

export interface ProjectConfig {
  author: string;
  email: string;
  version: string;
  title: string;
  localeDir: string;
  inputPaths: string[];
  sourcePatterns: string[];
  excludePatterns: string[];
  srcLang: string;
  destLangs: string[];
  domain: string;
  lineWidth: number;
  keywords: string[];
  httpProxy?: string;
  httpsProxy?: string;
  apiKey?: string;
  apiKeyType?: ApiKeyType;
  model?: string;
  region?: string;
  requestTimeoutMs?: number;
  presets: Presets;
}

export type JobState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface JobProgress {
  completed: number;
  total: number;
}

export interface JobOutcome {
  state: Exclude<JobState, 'idle' | 'running'>;
  translated: number;
  progress: JobProgress;
  error?: unknown;
}

export type Severity = 'information' | 'warning' | 'error';

export interface NotifyOptions {
  title?: string;
  severity?: Severity;
}

export interface Notifier {
  notify(message: string, options?: NotifyOptions): void;
}
