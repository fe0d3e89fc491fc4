import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import dotenv from 'dotenv';
import { ConfigError } from './types/errors.js';
import {
  BACKEND_IDS,
  WORKFLOW_ACTIONS,
  type ApiKeyType,
  type BackendId,
  type Presets,
  type ProjectConfig,
  type Proxies,
  type TranslationServiceConfig,
  type WorkflowAction,
} from './types/index.js';

export const API_KEY_ENV = 'POWEAVER_API_KEY';

/** Overrides as they come from the command line; every field optional. */
export interface ConfigOverrides {
  localeDir?: string;
  inputPaths?: string[];
  srcLang?: string;
  destLangs?: string[];
  domain?: string;
  lineWidth?: number;
  keywords?: string[];
  httpProxy?: string;
  httpsProxy?: string;
  apiKey?: string;
  apiKeyType?: ApiKeyType;
  model?: string;
  region?: string;
  requestTimeoutMs?: number;
  overrideExisting?: boolean;
  markFuzzy?: boolean;
  service?: BackendId;
}

export interface LoadConfigOptions {
  cwd?: string;
  overrides?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  /** Skip the non-empty `destLangs` check (commands that touch no language). */
  requireLanguages?: boolean;
}

export const DEFAULT_PRESETS: Presets = {
  overrideExisting: false,
  markFuzzy: true,
  defaultService: 'google',
  workflowActions: ['extract_update', 'review', 'compile'],
};

function defaults(): ProjectConfig {
  return {
    author: '',
    email: '',
    version: '0.0.0',
    title: '',
    localeDir: 'locale',
    inputPaths: ['.'],
    sourcePatterns: ['**/*.{ts,tsx,js,jsx}'],
    excludePatterns: ['**/node_modules/**', '**/dist/**'],
    srcLang: 'en',
    destLangs: [],
    domain: 'messages',
    lineWidth: 120,
    keywords: [],
    presets: { ...DEFAULT_PRESETS, workflowActions: [...DEFAULT_PRESETS.workflowActions] },
  };
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(key: string, expected: string): ConfigError {
  return new ConfigError(`Invalid value for "${key}" in package.json: expected ${expected}`);
}

function readString(source: Json, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalid(key, 'a string');
  return value;
}

function readStringArray(source: Json, key: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw invalid(key, 'an array of strings');
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') throw invalid(key, 'an array of strings');
    strings.push(item);
  }
  return strings;
}

function readNumber(source: Json, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) throw invalid(key, 'a positive integer');
  return value;
}

function readBoolean(source: Json, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw invalid(key, 'true or false');
  return value;
}

export function isBackendId(value: string): value is BackendId {
  return BACKEND_IDS.some((id) => id === value);
}

export function isWorkflowAction(value: string): value is WorkflowAction {
  return WORKFLOW_ACTIONS.some((action) => action === value);
}

export function isApiKeyType(value: string): value is ApiKeyType {
  return value === 'free' || value === 'paid';
}

/** Splits an npm `author` string of the form `Name <email> (url)`. */
export function parseAuthor(author: unknown): { name: string; email: string } {
  if (typeof author === 'string') {
    const match = /^([^<(]*?)\s*(?:<([^>]*)>)?\s*(?:\(.*\))?$/.exec(author.trim());
    return { name: (match?.[1] ?? author).trim(), email: match?.[2] ?? '' };
  }
  if (isRecord(author)) {
    return {
      name: typeof author.name === 'string' ? author.name : '',
      email: typeof author.email === 'string' ? author.email : '',
    };
  }
  return { name: '', email: '' };
}

function applySection(config: ProjectConfig, section: Json): void {
  config.localeDir = readString(section, 'localeDir') ?? config.localeDir;
  config.inputPaths = readStringArray(section, 'inputPaths') ?? config.inputPaths;
  config.sourcePatterns = readStringArray(section, 'sourcePatterns') ?? config.sourcePatterns;
  config.excludePatterns = readStringArray(section, 'excludePatterns') ?? config.excludePatterns;
  config.srcLang = readString(section, 'srcLang') ?? config.srcLang;
  config.destLangs = readStringArray(section, 'destLangs') ?? config.destLangs;
  config.domain = readString(section, 'domain') ?? config.domain;
  config.lineWidth = readNumber(section, 'lineWidth') ?? config.lineWidth;
  config.keywords = readStringArray(section, 'keywords') ?? config.keywords;
  config.httpProxy = readString(section, 'httpProxy') ?? config.httpProxy;
  config.httpsProxy = readString(section, 'httpsProxy') ?? config.httpsProxy;
  config.model = readString(section, 'model') ?? config.model;
  config.region = readString(section, 'region') ?? config.region;
  config.requestTimeoutMs = readNumber(section, 'requestTimeoutMs') ?? config.requestTimeoutMs;

  const apiKeyType = readString(section, 'apiKeyType');
  if (apiKeyType !== undefined) {
    if (!isApiKeyType(apiKeyType)) throw invalid('apiKeyType', '"free" or "paid"');
    config.apiKeyType = apiKeyType;
  }

  const presets = section.presets;
  if (presets === undefined) return;
  if (!isRecord(presets)) throw invalid('presets', 'an object');

  config.presets.overrideExisting = readBoolean(presets, 'overrideExisting') ?? config.presets.overrideExisting;
  config.presets.markFuzzy = readBoolean(presets, 'markFuzzy') ?? config.presets.markFuzzy;

  const service = readString(presets, 'defaultService');
  if (service !== undefined) {
    if (!isBackendId(service)) throw invalid('presets.defaultService', `one of ${BACKEND_IDS.join(', ')}`);
    config.presets.defaultService = service;
  }

  const actions = readStringArray(presets, 'workflowActions');
  if (actions !== undefined) {
    const unknown = actions.find((action) => !isWorkflowAction(action));
    if (unknown !== undefined) {
      throw invalid('presets.workflowActions', `actions among ${WORKFLOW_ACTIONS.join(', ')}`);
    }
    config.presets.workflowActions = actions.filter(isWorkflowAction);
  }
}

async function readManifest(cwd: string): Promise<Json | undefined> {
  const manifestPath = path.join(cwd, 'package.json');
  let content: string;
  try {
    content = await fs.readFile(manifestPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigError(`Cannot read ${manifestPath}`, { cause: error });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${manifestPath} is not valid JSON`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${manifestPath} must contain a JSON object`);
  }
  return parsed;
}

/** `.env` beside the manifest, overridden by the real environment. */
async function readEnv(cwd: string, env: NodeJS.ProcessEnv): Promise<Record<string, string | undefined>> {
  let fileValues: Record<string, string> = {};
  try {
    fileValues = dotenv.parse(await fs.readFile(path.join(cwd, '.env'), 'utf-8'));
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw new ConfigError('Cannot read .env', { cause: error });
    }
  }
  return { ...fileValues, ...env };
}

function setIfDefined<K extends keyof ProjectConfig>(config: ProjectConfig, key: K, value: ProjectConfig[K] | undefined): void {
  if (value !== undefined) {
    config[key] = value;
  }
}

function applyOverrides(config: ProjectConfig, overrides: ConfigOverrides): void {
  setIfDefined(config, 'localeDir', overrides.localeDir);
  setIfDefined(config, 'inputPaths', overrides.inputPaths);
  setIfDefined(config, 'srcLang', overrides.srcLang);
  setIfDefined(config, 'destLangs', overrides.destLangs);
  setIfDefined(config, 'domain', overrides.domain);
  setIfDefined(config, 'lineWidth', overrides.lineWidth);
  setIfDefined(config, 'keywords', overrides.keywords);
  setIfDefined(config, 'httpProxy', overrides.httpProxy);
  setIfDefined(config, 'httpsProxy', overrides.httpsProxy);
  setIfDefined(config, 'apiKey', overrides.apiKey);
  setIfDefined(config, 'apiKeyType', overrides.apiKeyType);
  setIfDefined(config, 'model', overrides.model);
  setIfDefined(config, 'region', overrides.region);
  setIfDefined(config, 'requestTimeoutMs', overrides.requestTimeoutMs);
  if (overrides.overrideExisting !== undefined) config.presets.overrideExisting = overrides.overrideExisting;
  if (overrides.markFuzzy !== undefined) config.presets.markFuzzy = overrides.markFuzzy;
  if (overrides.service !== undefined) config.presets.defaultService = overrides.service;
}

function validate(config: ProjectConfig, requireLanguages: boolean): void {
  if (requireLanguages && config.destLangs.length === 0) {
    throw new ConfigError('No destination languages configured. Set "poweaver.destLangs" in package.json or pass --dest-langs.');
  }
  if (config.inputPaths.length === 0) {
    throw new ConfigError('At least one input path is required.');
  }
  if (!Number.isInteger(config.lineWidth) || config.lineWidth <= 0) {
    throw new ConfigError(`Line width must be a positive integer, got ${config.lineWidth}`);
  }
  for (const proxy of [config.httpProxy, config.httpsProxy]) {
    if (proxy !== undefined && !URL.canParse(proxy)) {
      throw new ConfigError(`Invalid proxy URL: ${proxy}`);
    }
  }
}

/**
 * Builds the project configuration: defaults, then the working directory's
 * package.json (`name`, `version`, `author` and the `poweaver` section), then
 * `.env` and the environment, then the command-line overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ProjectConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const config = defaults();

  const manifest = await readManifest(cwd);
  if (manifest) {
    config.title = readString(manifest, 'name') ?? config.title;
    config.version = readString(manifest, 'version') ?? config.version;
    const author = parseAuthor(manifest.author);
    config.author = author.name;
    config.email = author.email;

    const section = manifest.poweaver;
    if (section !== undefined) {
      if (!isRecord(section)) throw invalid('poweaver', 'an object');
      applySection(config, section);
    }
  }

  const env = await readEnv(cwd, options.env ?? process.env);
  const apiKey = env[API_KEY_ENV];
  if (apiKey) {
    config.apiKey = apiKey;
  }

  applyOverrides(config, options.overrides ?? {});
  validate(config, options.requireLanguages ?? true);
  return config;
}

/** Per-job backend configuration from the project settings and live edits. */
export function buildTranslationConfig(
  project: ProjectConfig,
  target: string,
  edits: Partial<Omit<TranslationServiceConfig, 'target'>> = {},
): TranslationServiceConfig {
  const requested: Proxies = edits.proxies ?? { http: project.httpProxy, https: project.httpsProxy };
  const proxies: Proxies = {};
  if (requested.http) proxies.http = requested.http;
  if (requested.https) proxies.https = requested.https;

  const presets = edits.presets ?? project.presets;
  const config: TranslationServiceConfig = {
    source: edits.source ?? project.srcLang,
    target,
    presets: { ...presets, workflowActions: [...presets.workflowActions] },
  };
  const apiKey = edits.apiKey ?? project.apiKey;
  const apiKeyType = edits.apiKeyType ?? project.apiKeyType;
  const model = edits.model ?? project.model;
  const region = edits.region ?? project.region;
  const requestTimeoutMs = edits.requestTimeoutMs ?? project.requestTimeoutMs;

  if (apiKey) config.apiKey = apiKey;
  if (apiKeyType) config.apiKeyType = apiKeyType;
  if (proxies.http || proxies.https) config.proxies = proxies;
  if (model) config.model = model;
  if (region) config.region = region;
  if (requestTimeoutMs !== undefined) config.requestTimeoutMs = requestTimeoutMs;
  return config;
}
