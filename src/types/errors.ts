export class PoweaverError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PoweaverError {}

export class CatalogParseError extends PoweaverError {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid PO file ${filePath}: ${detail}`, options);
  }
}

export class CatalogWriteError extends PoweaverError {
  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : 'Unknown error';
    super(`Failed to save PO file ${filePath}: ${reason}`, options);
  }
}

export class SubprocessError extends PoweaverError {
  constructor(
    public readonly commandLine: string,
    public readonly exitCode: number | null,
    public readonly stderr: string = '',
  ) {
    super(`Command failed with exit code ${exitCode ?? 'unknown'}: ${commandLine}`);
  }
}

/**
 * Raised by a backend that cannot handle a locale. `supportedLocales` maps a
 * language name to the locale identifier the provider expects; the locale
 * negotiation fallback reads it to pick the closest match.
 */
export class UnsupportedLanguageError extends PoweaverError {
  constructor(
    public readonly locale: string,
    public readonly supportedLocales?: Record<string, string>,
  ) {
    super(`${locale} --> No support for the provided language.`);
  }
}

export class ProviderError extends PoweaverError {
  constructor(
    public readonly service: string,
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(`${service}: ${message}`, options);
  }
}

export class AuthenticationError extends ProviderError {}

export class QuotaError extends ProviderError {}

export class NetworkError extends ProviderError {}

export class UnknownBackendError extends PoweaverError {
  constructor(public readonly requested: string) {
    super(`Unknown translation service name: ${requested}`);
  }
}

export class EntryNotFoundError extends PoweaverError {
  constructor(
    public readonly type: string,
    public readonly msgid: string,
  ) {
    super(`No entry found for the selected row (${type} "${msgid}"). Restart the review.`);
  }
}

export class ElementTimeoutError extends PoweaverError {
  constructor(what: string, waitedMs: number, options?: ErrorOptions) {
    super(`${what} not available within ${waitedMs}ms`, options);
  }
}

export class TranslationJobBusyError extends PoweaverError {
  constructor() {
    super('A translation job is already running.');
  }
}

export class WorkflowBusyError extends PoweaverError {
  constructor(public readonly holder: string) {
    super(`Another operation is in progress (${holder}). Finish it first.`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
