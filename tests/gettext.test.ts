import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  formatCommandLine,
  GettextService,
  msgfmtArgs,
  msginitArgs,
  msgmergeArgs,
  xgettextArgs,
  type CommandRunner,
} from '../src/services/GettextService.js';
import { ConfigError, SubprocessError } from '../src/types/errors.js';
import { Logger } from '../src/utils/logger.js';
import { makeTempDir, projectConfig } from './helpers.js';

interface Call {
  command: string;
  args: readonly string[];
  cwd: string;
}

function recordingRunner(calls: Call[]): CommandRunner {
  return async (command, args, cwd) => {
    calls.push({ command, args, cwd });
    return { stdout: '', stderr: '' };
  };
}

async function touch(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, '');
}

describe('gettext arguments', () => {
  it('builds the xgettext call', () => {
    const config = projectConfig({ keywords: ['_t', 'ngettext:1,2'], lineWidth: 80 });

    expect(xgettextArgs(config, 'locale/messages.pot', ['a.ts', 'b.ts'])).toEqual([
      '--from-code=UTF-8',
      '--package-name=demo',
      '--package-version=1.2.0',
      '--copyright-holder=Jane Doe',
      '--msgid-bugs-address=jane@example.com',
      '--no-location',
      '--sort-output',
      '--width=80',
      '--keyword=_t',
      '--keyword=ngettext:1,2',
      '--output=locale/messages.pot',
      'a.ts',
      'b.ts',
    ]);
  });

  it('builds the msgmerge, msginit and msgfmt calls', () => {
    expect(msgmergeArgs(79, 'fr.po', 'messages.pot')).toEqual([
      '--update',
      '--backup=none',
      '--width=79',
      'fr.po',
      'messages.pot',
    ]);
    expect(msginitArgs(79, 'messages.pot', 'fr.po', 'fr')).toEqual([
      '--no-translator',
      '--input=messages.pot',
      '--output-file=fr.po',
      '--locale=fr',
      '--width=79',
    ]);
    expect(msgfmtArgs('fr.mo', 'fr.po')).toEqual(['--check-format', '--output-file=fr.mo', 'fr.po']);
  });

  it('quotes arguments with spaces for display', () => {
    expect(formatCommandLine('xgettext', ['--package-name=My App', '-o', 'x.pot'])).toBe(
      'xgettext "--package-name=My App" -o x.pot',
    );
  });
});

describe('GettextService', () => {
  let root: string;
  let calls: Call[];
  let service: GettextService;

  beforeEach(async () => {
    root = await makeTempDir();
    calls = [];
    service = new GettextService(
      projectConfig({ inputPaths: ['src'], sourcePatterns: ['**/*.{ts,tsx}'] }),
      Logger.silent(),
      recordingRunner(calls),
      root,
    );
  });

  it('lays out the locale directory', () => {
    expect(service.potPath).toBe(path.join(root, 'locale', 'messages.pot'));
    expect(service.poPath('fr')).toBe(path.join(root, 'locale', 'fr', 'LC_MESSAGES', 'messages.po'));
    expect(service.moPath('fr')).toBe(path.join(root, 'locale', 'fr', 'LC_MESSAGES', 'messages.mo'));
  });

  it('collects matching sources outside excluded directories', async () => {
    await touch(path.join(root, 'src', 'views', 'page.tsx'));
    await touch(path.join(root, 'src', 'app.ts'));
    await touch(path.join(root, 'src', 'styles.css'));
    await touch(path.join(root, 'src', 'node_modules', 'lib', 'index.ts'));

    await expect(service.collectSourceFiles()).resolves.toEqual([
      path.join(root, 'src', 'app.ts'),
      path.join(root, 'src', 'views', 'page.tsx'),
    ]);
  });

  it('extracts the template from the sources', async () => {
    await touch(path.join(root, 'src', 'app.ts'));

    await expect(service.extract()).resolves.toBe(service.potPath);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('xgettext');
    expect(calls[0]?.cwd).toBe(root);
    expect(calls[0]?.args.slice(-2)).toEqual([`--output=${service.potPath}`, path.join(root, 'src', 'app.ts')]);
    await expect(fs.stat(path.join(root, 'locale'))).resolves.toBeTruthy();
  });

  it('refuses to extract without sources', async () => {
    await expect(service.extract()).rejects.toThrow(ConfigError);
    expect(calls).toEqual([]);
  });

  it('initializes a missing catalog and merges an existing one', async () => {
    await service.update('fr');
    await touch(service.poPath('fr'));
    await service.update('fr');

    expect(calls.map((call) => call.command)).toEqual(['msginit', 'msgmerge']);
    expect(calls[0]?.args).toContain('--locale=fr');
  });

  it('compiles every catalog in language order', async () => {
    await touch(service.poPath('fr'));
    await touch(service.poPath('de'));
    await touch(path.join(service.localeDir, 'fr', 'LC_MESSAGES', 'other.po'));

    await expect(service.compile()).resolves.toEqual([service.moPath('de'), service.moPath('fr')]);
    expect(calls.map((call) => call.args)).toEqual([
      msgfmtArgs(service.moPath('de'), service.poPath('de')),
      msgfmtArgs(service.moPath('fr'), service.poPath('fr')),
    ]);
  });

  it('passes command failures through', async () => {
    const failing = new GettextService(
      projectConfig(),
      Logger.silent(),
      async () => {
        throw new SubprocessError('msgfmt x', 1, 'fatal error');
      },
      root,
    );
    await touch(failing.poPath('fr'));

    await expect(failing.compile()).rejects.toThrow('Command failed with exit code 1: msgfmt x');
  });
});
