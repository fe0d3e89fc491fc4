import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { TranslationBackend } from '../src/services/backends/index.js';
import type { Presets, ProjectConfig, TranslationServiceConfig } from '../src/types/index.js';

export const FIXTURES = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'poweaver-test-'));
}

/** Copies a fixture catalog into `dir` and returns the copy's path. */
export async function copyFixture(dir: string, name = 'fr.po', target = name): Promise<string> {
  const destination = path.join(dir, target);
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.copyFile(path.join(FIXTURES, name), destination);
  return destination;
}

export function presets(overrides: Partial<Presets> = {}): Presets {
  return {
    overrideExisting: false,
    markFuzzy: true,
    defaultService: 'google',
    workflowActions: ['extract_update', 'review', 'compile'],
    ...overrides,
  };
}

export function serviceConfig(overrides: Partial<TranslationServiceConfig> = {}): TranslationServiceConfig {
  return { source: 'en', target: 'fr', presets: presets(), ...overrides };
}

export function projectConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return {
    author: 'Jane Doe',
    email: 'jane@example.com',
    version: '1.2.0',
    title: 'demo',
    localeDir: 'locale',
    inputPaths: ['.'],
    sourcePatterns: ['**/*.{ts,tsx,js,jsx}'],
    excludePatterns: ['**/node_modules/**', '**/dist/**'],
    srcLang: 'en',
    destLangs: ['fr'],
    domain: 'messages',
    lineWidth: 120,
    keywords: [],
    presets: presets(),
    ...overrides,
  };
}

/** Backend answering `<prefix><text>` and recording every request. */
export function prefixBackend(prefix: string, calls: string[] = []): TranslationBackend {
  return {
    async translate(text) {
      calls.push(text);
      return `${prefix}${text}`;
    },
  };
}
