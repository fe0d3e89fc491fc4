#!/usr/bin/env node

import { once } from 'node:events';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import manifest from '../package.json' with { type: 'json' };
import { isApiKeyType, isBackendId, loadConfig, buildTranslationConfig, type ConfigOverrides } from './config.js';
import { PoweaverMCPServer } from './server.js';
import { WorkflowService } from './services/WorkflowService.js';
import { describeError } from './types/errors.js';
import type { ApiKeyType, BackendId, ProjectConfig } from './types/index.js';
import { MainScreen } from './ui/MainScreen.js';
import { Terminal } from './ui/Terminal.js';
import { DEFAULT_LOG_DIR, Logger } from './utils/logger.js';

interface GlobalOptions {
  localeDir?: string;
  input?: string[];
  srcLang?: string;
  destLangs?: string[];
  domain?: string;
  lineWidth?: number;
  keywords?: string[];
  service?: BackendId;
  apiKeyType?: ApiKeyType;
  model?: string;
  region?: string;
  httpProxy?: string;
  httpsProxy?: string;
  timeout?: number;
  overrideExisting?: boolean;
  markFuzzy?: boolean;
  logDir?: string;
  verbose?: boolean;
}

interface Runtime {
  config: ProjectConfig;
  logger: Logger;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseService(value: string): BackendId {
  if (!isBackendId(value)) {
    throw new InvalidArgumentError('Unknown translation service.');
  }
  return value;
}

function parseKeyType(value: string): ApiKeyType {
  if (!isApiKeyType(value)) {
    throw new InvalidArgumentError('Expected "free" or "paid".');
  }
  return value;
}

function toOverrides(options: GlobalOptions): ConfigOverrides {
  return {
    localeDir: options.localeDir,
    inputPaths: options.input,
    srcLang: options.srcLang,
    destLangs: options.destLangs,
    domain: options.domain,
    lineWidth: options.lineWidth,
    keywords: options.keywords,
    service: options.service,
    apiKeyType: options.apiKeyType,
    model: options.model,
    region: options.region,
    httpProxy: options.httpProxy,
    httpsProxy: options.httpsProxy,
    requestTimeoutMs: options.timeout,
    overrideExisting: options.overrideExisting,
    markFuzzy: options.markFuzzy,
  };
}

const program = new Command();

program
  .name('poweaver')
  .description('Extract, auto-translate, review and compile gettext catalogs')
  .version(manifest.version)
  .option('--locale-dir <dir>', 'directory holding the catalogs')
  .option('--input <paths>', 'comma-separated source directories', parseList)
  .option('--src-lang <lang>', 'language of the source strings')
  .option('--dest-langs <langs>', 'comma-separated target languages', parseList)
  .option('--domain <name>', 'gettext domain')
  .option('--line-width <n>', 'wrap width of generated catalogs', parsePositiveInteger)
  .option('--keywords <names>', 'comma-separated extra xgettext keywords', parseList)
  .option('--service <id>', 'default translation service', parseService)
  .option('--api-key-type <type>', 'API key tier: free or paid', parseKeyType)
  .option('--model <name>', 'model for the ChatGPT service')
  .option('--region <name>', 'resource region for the Microsoft service')
  .option('--http-proxy <url>', 'proxy for http requests')
  .option('--https-proxy <url>', 'proxy for https requests')
  .option('--timeout <ms>', 'request timeout for translation services', parsePositiveInteger)
  .option('--override-existing', 'translate entries that already have a translation')
  .option('--mark-fuzzy', 'tag new translations fuzzy')
  .option('--no-mark-fuzzy', 'tag new translations unconfirmed instead')
  .option('--log-dir <dir>', 'directory of the log file', DEFAULT_LOG_DIR)
  .option('--verbose', 'log debug messages');

/**
 * Opens the log, loads the configuration and runs `task`. Failures are
 * logged and printed with a pointer to the log file; the exit code is 1.
 */
async function withRuntime(requireLanguages: boolean, task: (runtime: Runtime) => Promise<void>): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const logger = await Logger.open({ directory: options.logDir, level: options.verbose ? 'debug' : 'info' });
  try {
    const config = await loadConfig({ overrides: toOverrides(options), requireLanguages });
    logger.debug('Configuration loaded', { config: { ...config, apiKey: config.apiKey ? '***' : undefined } });
    await task({ config, logger });
  } catch (error) {
    logger.error('Command failed', { error });
    console.error(chalk.red(`Error: ${describeError(error)}`));
    console.error(chalk.dim(`See ${logger.filePath ?? DEFAULT_LOG_DIR} for details.`));
    process.exitCode = 1;
  } finally {
    await logger.close();
  }
}

function languagesOrAll(config: ProjectConfig, languages: string[]): string[] {
  return languages.length > 0 ? languages : config.destLangs;
}

program.action(async () => {
  await withRuntime(true, async ({ config, logger }) => {
    const terminal = new Terminal();
    const workflow = new WorkflowService(config, logger);
    await new MainScreen(config, logger, terminal, workflow).run();
  });
});

program
  .command('serve')
  .description('serve the workflow as MCP tools over stdio')
  .action(async () => {
    await withRuntime(false, async ({ config, logger }) => {
      const server = new PoweaverMCPServer(config, logger);
      await server.run();
      await once(process.stdin, 'end');
      await server.shutdown();
    });
  });

program
  .command('extract')
  .description('extract messages and update the catalogs')
  .argument('[languages...]', 'languages to update; all configured ones by default')
  .action(async (languages: string[]) => {
    await withRuntime(true, async ({ config, logger }) => {
      const workflow = new WorkflowService(config, logger);
      for (const lang of languagesOrAll(config, languages)) {
        const poPath = await workflow.extractAndUpdate(lang);
        console.log(`${chalk.green('✔')} ${poPath}`);
      }
    });
  });

program
  .command('compile')
  .description('compile every catalog into its .mo file')
  .action(async () => {
    await withRuntime(false, async ({ config, logger }) => {
      const written = await new WorkflowService(config, logger).compile();
      for (const moPath of written) {
        console.log(`${chalk.green('✔')} ${moPath}`);
      }
    });
  });

program
  .command('translate')
  .description('auto-translate the catalogs with the configured service')
  .argument('[languages...]', 'languages to translate; all configured ones by default')
  .action(async (languages: string[]) => {
    await withRuntime(true, async ({ config, logger }) => {
      const terminal = new Terminal();
      const workflow = new WorkflowService(config, logger);
      for (const lang of languagesOrAll(config, languages)) {
        const session = await workflow.openTranslation(lang);
        const spinner = terminal.spinner(`Translating ${lang}`);
        try {
          const outcome = await session.start(
            { service: config.presets.defaultService, config: buildTranslationConfig(config, lang) },
            {
              onProgress: ({ completed, total }) => {
                spinner.text = `Translating ${lang} ${completed}/${total}`;
              },
            },
          );
          if (outcome.state === 'failed') {
            spinner.fail(`Translating ${lang} failed`);
            throw outcome.error;
          }
          spinner.succeed(`${lang}: ${outcome.translated} entries translated`);
        } finally {
          if (spinner.isSpinning) spinner.stop();
          session.close();
        }
      }
    });
  });

program
  .command('clear')
  .description('delete everything under the locale directory')
  .option('--yes', 'confirm the deletion')
  .action(async (options: { yes?: boolean }) => {
    await withRuntime(false, async ({ config, logger }) => {
      if (!options.yes) {
        throw new Error('Refusing to clear the locale directory without --yes.');
      }
      const removed = await new WorkflowService(config, logger).clear();
      console.log(`Removed ${removed} item(s) from ${config.localeDir}.`);
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error)}`));
  process.exit(1);
});
