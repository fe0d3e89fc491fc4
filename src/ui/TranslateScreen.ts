import { buildTranslationConfig } from '../config.js';
import { DEFAULT_CHAT_MODEL } from '../services/backends/chatgpt.js';
import { BACKENDS, listBackends } from '../services/backends/index.js';
import type { TranslateOptions, TranslationSession } from '../services/TranslationService.js';
import type { ApiKeyType, BackendId, ProjectConfig, TranslationServiceConfig } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { pollUntil } from '../utils/poll.js';
import type { Terminal } from './Terminal.js';

/**
 * Asks for the service settings the chosen backend declares, then runs the
 * job with a progress spinner. Ctrl-C cancels the job; nothing is saved then.
 */
export class TranslateScreen {
  constructor(
    private readonly terminal: Terminal,
    private readonly logger: Logger,
    private readonly project: ProjectConfig,
  ) {}

  public async run(session: TranslationSession): Promise<void> {
    this.terminal.heading(`Translate ${session.catalog.filePath}`);
    const options = await this.collectOptions(session.language);

    const spinner = this.terminal.spinner('Translating...');
    const onInterrupt = (): void => {
      if (session.cancel()) {
        spinner.text = 'Cancelling...';
      }
    };
    process.on('SIGINT', onInterrupt);

    try {
      const outcome = await session.start(options, {
        onProgress: ({ completed, total }) => {
          spinner.text = `Translating ${completed}/${total}`;
        },
      });
      switch (outcome.state) {
        case 'completed':
          spinner.succeed(`${outcome.translated} entries translated`);
          this.terminal.notify('Translation completed and PO file saved.', { title: '⌛ Translation Completed' });
          break;
        case 'cancelled':
          spinner.warn(`Translation cancelled at ${outcome.progress.completed}/${outcome.progress.total}; nothing was saved.`);
          break;
        case 'failed':
          spinner.fail('Translation failed');
          throw outcome.error;
      }
    } finally {
      process.off('SIGINT', onInterrupt);
      if (spinner.isSpinning) spinner.stop();
      if (session.service.isRunning) {
        session.cancel();
        await pollUntil(() => (session.service.isRunning ? undefined : session.service.jobState), {
          description: 'translation job shutdown',
        });
      }
      this.logger.debug('Translate screen closed', { state: session.service.jobState });
    }
  }

  private async collectOptions(target: string): Promise<TranslateOptions> {
    const project = this.project;
    const service: BackendId = await this.terminal.choose(
      'Translation service',
      listBackends().map((backend) => ({ value: backend.id, name: backend.displayName })),
      project.presets.defaultService,
    );
    const { capabilities } = BACKENDS[service];
    const edits: Partial<Omit<TranslationServiceConfig, 'target'>> = {
      source: await this.terminal.ask('Source language', project.srcLang),
    };

    if (capabilities.needsApiKey) {
      edits.apiKey = project.apiKey ?? (await this.terminal.secret('API key'));
    }
    if (capabilities.supportsKeyTier) {
      edits.apiKeyType = await this.terminal.choose<ApiKeyType>(
        'API key tier',
        [
          { value: 'free', name: 'Free' },
          { value: 'paid', name: 'Paid' },
        ],
        project.apiKeyType ?? 'free',
      );
    }
    if (capabilities.supportsModel) {
      edits.model = await this.terminal.ask('Model', project.model ?? DEFAULT_CHAT_MODEL);
    }
    if (capabilities.supportsRegion) {
      edits.region = (await this.terminal.ask('Region (empty for global)', project.region ?? '')) || undefined;
    }
    if (capabilities.supportsProxies) {
      const http = await this.terminal.ask('HTTP proxy (empty for none)', project.httpProxy ?? '');
      const https = await this.terminal.ask('HTTPS proxy (empty for none)', project.httpsProxy ?? '');
      edits.proxies = { ...(http ? { http } : {}), ...(https ? { https } : {}) };
    }

    edits.presets = {
      ...project.presets,
      overrideExisting: await this.terminal.confirm('Translate entries that already have a translation?', project.presets.overrideExisting),
      markFuzzy: await this.terminal.confirm('Tag new translations as fuzzy?', project.presets.markFuzzy),
    };

    return { service, config: buildTranslationConfig(project, target, edits) };
  }
}
