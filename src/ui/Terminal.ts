import { checkbox, confirm, input, password, select } from '@inquirer/prompts';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { Notifier, NotifyOptions, Severity } from '../types/index.js';

export interface Choice<T extends string> {
  value: T;
  name: string;
  description?: string;
}

const SEVERITY_STYLE: Record<Severity, (text: string) => string> = {
  information: chalk.cyan,
  warning: chalk.yellow,
  error: chalk.red,
};

/** Prompt and output helpers shared by the screens. */
export class Terminal implements Notifier {
  constructor(private readonly output: NodeJS.WriteStream = process.stdout) {}

  public notify(message: string, options: NotifyOptions = {}): void {
    const style = SEVERITY_STYLE[options.severity ?? 'information'];
    const title = options.title ? `${chalk.bold(style(options.title))}\n` : '';
    this.print(`${title}${style(message)}`);
  }

  public print(line = ''): void {
    this.output.write(`${line}\n`);
  }

  public heading(text: string): void {
    this.print(`\n${chalk.bold.underline(text)}`);
  }

  public ask(message: string, defaultValue?: string): Promise<string> {
    return input({ message, default: defaultValue });
  }

  public secret(message: string): Promise<string> {
    return password({ message, mask: '*' });
  }

  public confirm(message: string, defaultValue = false): Promise<boolean> {
    return confirm({ message, default: defaultValue });
  }

  /** Two confirmations for destructive actions. */
  public async confirmInevitable(message: string): Promise<boolean> {
    if (!(await this.confirm(message))) {
      return false;
    }
    return this.confirm('Are you sure? This action cannot be undone.');
  }

  public choose<T extends string>(message: string, choices: ReadonlyArray<Choice<T>>, defaultValue?: T): Promise<T> {
    return select({ message, choices: [...choices], default: defaultValue, pageSize: 12 });
  }

  public chooseMany<T extends string>(
    message: string,
    choices: ReadonlyArray<Choice<T>>,
    selected: readonly T[],
  ): Promise<T[]> {
    return checkbox({
      message,
      choices: choices.map((choice) => ({ ...choice, checked: selected.includes(choice.value) })),
    });
  }

  public spinner(text: string): Ora {
    return ora({ text, stream: this.output }).start();
  }
}
