import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { ConfigError, SubprocessError } from '../types/errors.js';
import type { ProjectConfig } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[], cwd: string) => Promise<CommandResult>;

/** Renders a command line for logs and error messages, quoting arguments with spaces. */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export const spawnCommand: CommandRunner = (command, args, cwd) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });
    child.on('error', (error) => {
      reject(new SubprocessError(formatCommandLine(command, args), null, error.message));
    });
    child.on('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new SubprocessError(formatCommandLine(command, args), code, stderr));
      }
    });
  });

export type GettextSettings = Pick<
  ProjectConfig,
  'title' | 'version' | 'author' | 'email' | 'lineWidth' | 'keywords'
>;

export function xgettextArgs(config: GettextSettings, potPath: string, files: readonly string[]): string[] {
  return [
    '--from-code=UTF-8',
    `--package-name=${config.title}`,
    `--package-version=${config.version}`,
    `--copyright-holder=${config.author}`,
    `--msgid-bugs-address=${config.email}`,
    '--no-location',
    '--sort-output',
    `--width=${config.lineWidth}`,
    ...config.keywords.map((keyword) => `--keyword=${keyword}`),
    `--output=${potPath}`,
    ...files,
  ];
}

export function msgmergeArgs(lineWidth: number, poPath: string, potPath: string): string[] {
  return ['--update', '--backup=none', `--width=${lineWidth}`, poPath, potPath];
}

export function msginitArgs(lineWidth: number, potPath: string, poPath: string, locale: string): string[] {
  return ['--no-translator', `--input=${potPath}`, `--output-file=${poPath}`, `--locale=${locale}`, `--width=${lineWidth}`];
}

export function msgfmtArgs(moPath: string, poPath: string): string[] {
  return ['--check-format', `--output-file=${moPath}`, poPath];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Drives the GNU gettext tools over the project's locale directory:
 * `<localeDir>/<domain>.pot` and `<localeDir>/<lang>/LC_MESSAGES/<domain>.po`.
 */
export class GettextService {
  private readonly root: string;

  constructor(
    private readonly config: ProjectConfig,
    private readonly logger: Logger,
    private readonly runner: CommandRunner = spawnCommand,
    cwd: string = process.cwd(),
  ) {
    this.root = path.resolve(cwd);
  }

  public get localeDir(): string {
    return path.resolve(this.root, this.config.localeDir);
  }

  public get potPath(): string {
    return path.join(this.localeDir, `${this.config.domain}.pot`);
  }

  public poPath(lang: string): string {
    return path.join(this.localeDir, lang, 'LC_MESSAGES', `${this.config.domain}.po`);
  }

  public moPath(lang: string): string {
    return path.join(this.localeDir, lang, 'LC_MESSAGES', `${this.config.domain}.mo`);
  }

  /** Source files under every input path, minus the exclude patterns, sorted. */
  public async collectSourceFiles(): Promise<string[]> {
    const found = new Set<string>();
    for (const inputPath of this.config.inputPaths) {
      const files = await glob(this.config.sourcePatterns, {
        cwd: path.resolve(this.root, inputPath),
        ignore: this.config.excludePatterns,
        nodir: true,
        absolute: true,
      });
      for (const file of files) {
        found.add(file);
      }
    }
    return [...found].sort();
  }

  public async extract(): Promise<string> {
    const files = await this.collectSourceFiles();
    if (files.length === 0) {
      throw new ConfigError(`No source files match ${this.config.sourcePatterns.join(', ')} under ${this.config.inputPaths.join(', ')}`);
    }
    await fs.mkdir(this.localeDir, { recursive: true });
    await this.run('xgettext', xgettextArgs(this.config, this.potPath, files));
    return this.potPath;
  }

  /** Merges the template into the language's catalog, creating it when missing. */
  public async update(lang: string): Promise<string> {
    const poPath = this.poPath(lang);
    if (await exists(poPath)) {
      await this.run('msgmerge', msgmergeArgs(this.config.lineWidth, poPath, this.potPath));
    } else {
      await fs.mkdir(path.dirname(poPath), { recursive: true });
      await this.run('msginit', msginitArgs(this.config.lineWidth, this.potPath, poPath, lang));
    }
    return poPath;
  }

  /** Compiles every language catalog into its sibling `.mo`; returns the written paths. */
  public async compile(): Promise<string[]> {
    const catalogs = await glob(`*/LC_MESSAGES/${this.config.domain}.po`, { cwd: this.localeDir, absolute: true });
    const written: string[] = [];
    for (const poPath of catalogs.sort()) {
      const moPath = poPath.replace(/\.po$/, '.mo');
      await this.run('msgfmt', msgfmtArgs(moPath, poPath));
      written.push(moPath);
    }
    return written;
  }

  private async run(command: string, args: string[]): Promise<CommandResult> {
    this.logger.info('Running command', { command: formatCommandLine(command, args) });
    try {
      return await this.runner(command, args, this.root);
    } catch (error) {
      this.logger.error('Command failed', { command, error });
      throw error;
    }
  }
}
