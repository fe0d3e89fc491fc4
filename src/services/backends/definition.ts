import type { AxiosInstance } from 'axios';
import languages from '../../data/languages.json' with { type: 'json' };
import { AuthenticationError, UnsupportedLanguageError } from '../../types/errors.js';
import type { BackendId, TranslationServiceConfig } from '../../types/index.js';

export interface BackendCapabilities {
  needsApiKey: boolean;
  supportsModel: boolean;
  supportsRegion: boolean;
  supportsProxies: boolean;
  /** Free and paid keys use different endpoints. */
  supportsKeyTier: boolean;
}

export interface TranslationBackend {
  translate(text: string, signal?: AbortSignal): Promise<string>;
}

/** Narrow chat interface the ChatGPT backend talks to; see chatgpt.ts. */
export interface ChatCompletionClient {
  complete(request: { model: string; system: string; user: string }, signal?: AbortSignal): Promise<string>;
}

export interface BackendDeps {
  http?: AxiosInstance;
  chat?: ChatCompletionClient;
}

export interface BackendDefinition {
  id: BackendId;
  displayName: string;
  capabilities: BackendCapabilities;
  create(config: TranslationServiceConfig, deps?: BackendDeps): TranslationBackend;
}

export type LanguageTable = Readonly<Record<string, string>>;

export const LANGUAGE_TABLES: Readonly<Record<'google' | 'mymemory' | 'microsoft' | 'yandex' | 'deepl', LanguageTable>> =
  languages;

/**
 * Maps a requested locale or language name onto the provider's code.
 * Throws {@link UnsupportedLanguageError} carrying the whole table so the
 * negotiation fallback can look for a close match.
 */
export function resolveLanguage(locale: string, table: LanguageTable, allowAuto = false): string {
  if (allowAuto && locale === 'auto') {
    return locale;
  }
  const wanted = locale.toLowerCase();
  for (const [name, code] of Object.entries(table)) {
    if (code.toLowerCase() === wanted || name === wanted) {
      return code;
    }
  }
  throw new UnsupportedLanguageError(locale, { ...table });
}

export function requireApiKey(config: TranslationServiceConfig, service: string): string {
  if (!config.apiKey) {
    throw new AuthenticationError(service, 'an API key is required');
  }
  return config.apiKey;
}
