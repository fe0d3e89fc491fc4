import chalk from 'chalk';
import type { WorkflowService } from '../services/WorkflowService.js';
import { WORKFLOW_ACTIONS, type ProjectConfig, type WorkflowAction } from '../types/index.js';
import { guard } from '../utils/guard.js';
import type { Logger } from '../utils/logger.js';
import { ReviewScreen } from './ReviewScreen.js';
import type { Choice, Terminal } from './Terminal.js';
import { TranslateScreen } from './TranslateScreen.js';

type MenuAction = 'language' | 'actions' | 'run' | 'clear' | 'quit';

const ACTION_LABELS: Record<WorkflowAction, string> = {
  extract_update: 'Extract messages and update the catalog',
  translate: 'Auto-translate',
  review: 'Review translations',
  compile: 'Compile catalogs',
};

export class MainScreen {
  private language: string;
  private actions: WorkflowAction[];

  constructor(
    private readonly config: ProjectConfig,
    private readonly logger: Logger,
    private readonly terminal: Terminal,
    private readonly workflow: WorkflowService,
  ) {
    this.language = config.destLangs[0] ?? config.srcLang;
    this.actions = [...config.presets.workflowActions];
  }

  public async run(): Promise<void> {
    for (;;) {
      this.render();
      const choice = await this.terminal.choose<MenuAction>(
        'What next?',
        [
          { value: 'run', name: 'Run workflow' },
          { value: 'language', name: 'Select language' },
          { value: 'actions', name: 'Select workflow actions' },
          { value: 'clear', name: 'Clear locale directory' },
          { value: 'quit', name: 'Quit' },
        ],
        'run',
      );

      switch (choice) {
        case 'language':
          this.language = await this.terminal.choose(
            'Language',
            this.config.destLangs.map((lang) => ({ value: lang, name: lang })),
            this.language,
          );
          break;
        case 'actions':
          this.actions = await this.terminal.chooseMany(
            'Workflow actions',
            WORKFLOW_ACTIONS.map((value): Choice<WorkflowAction> => ({ value, name: ACTION_LABELS[value] })),
            this.actions,
          );
          break;
        case 'run':
          await this.runWorkflow();
          break;
        case 'clear':
          await this.clear();
          break;
        case 'quit':
          return;
      }
    }
  }

  private render(): void {
    const title = this.config.title || 'poweaver';
    this.terminal.heading(`${title} ${chalk.dim(`v${this.config.version}`)}`);
    this.terminal.print(`${chalk.dim('Language:')} ${this.language}`);
    const steps = this.actions.length > 0 ? this.actions.map((action) => ACTION_LABELS[action]).join(' → ') : 'none';
    this.terminal.print(`${chalk.dim('Workflow:')} ${steps}`);
  }

  private async runWorkflow(): Promise<void> {
    if (this.actions.length === 0) {
      this.terminal.notify('Select at least one workflow action first.', { severity: 'warning' });
      return;
    }
    const translateScreen = new TranslateScreen(this.terminal, this.logger, this.config);
    const reviewScreen = new ReviewScreen(this.terminal, this.logger);

    await guard(this.terminal, this.logger, 'MainScreen.runWorkflow', async () => {
      await this.workflow.runWorkflow(this.language, this.actions, {
        translate: (session) => translateScreen.run(session),
        review: (session) => reviewScreen.run(session),
        onProgress: (percent, action) => {
          this.terminal.print(chalk.dim(`[${String(percent).padStart(3)}%] ${ACTION_LABELS[action]}`));
        },
      });
      this.terminal.notify('Workflow completed.', { title: '✅ Done' });
    });
  }

  private async clear(): Promise<void> {
    const confirmed = await this.terminal.confirmInevitable(
      `Delete every file under ${this.workflow.gettext.localeDir}?`,
    );
    if (!confirmed) {
      return;
    }
    await guard(this.terminal, this.logger, 'MainScreen.clear', async () => {
      const removed = await this.workflow.clear();
      this.terminal.notify(`Removed ${removed} item(s) from the locale directory.`);
    });
  }
}
