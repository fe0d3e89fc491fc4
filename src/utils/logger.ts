import { createWriteStream, promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Writable } from 'node:stream';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const MAX_LOG_BYTES = 20 * 1024 ** 2;

export const DEFAULT_LOG_DIR = path.join(os.homedir(), '.poweaver');

function serialize(context: LogContext): string {
  return JSON.stringify(context, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (value instanceof Map) {
      return Object.fromEntries(value);
    }
    return value;
  });
}

/**
 * Line-oriented application log. Open one with {@link Logger.open} at process
 * start, hand it down to whatever needs it and {@link Logger.close} it on exit.
 * It never writes to stdout, which carries the MCP transport in server mode.
 */
export class Logger {
  private closed = false;

  constructor(
    private readonly stream: Writable,
    private readonly level: LogLevel = 'debug',
    public readonly filePath?: string,
    private readonly name: string = 'poweaver',
  ) {}

  public static async open(options: { directory?: string; level?: LogLevel } = {}): Promise<Logger> {
    const directory = options.directory ?? DEFAULT_LOG_DIR;
    await fs.mkdir(directory, { recursive: true });
    const filePath = path.join(directory, 'poweaver.log');

    try {
      const stats = await fs.stat(filePath);
      if (stats.size > MAX_LOG_BYTES) {
        await fs.rename(filePath, `${filePath}.1`);
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }

    return new Logger(createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' }), options.level, filePath);
  }

  /** A logger that drops everything; for tests and throwaway tooling. */
  public static silent(): Logger {
    return new Logger(
      new Writable({
        write(_chunk, _encoding, callback) {
          callback();
        },
      }),
      'error',
    );
  }

  public debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  public async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await new Promise<void>((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.closed || LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const suffix = context && Object.keys(context).length > 0 ? ` - ${serialize(context)}` : '';
    this.stream.write(`${new Date().toISOString()} - ${this.name} - ${level.toUpperCase()} - ${message}${suffix}\n`);
  }
}
