import { UnsupportedLanguageError } from '../../types/errors.js';
import type { TranslationServiceConfig } from '../../types/index.js';
import { mostCommonSeparator, negotiateLocale } from '../../utils/locale.js';
import type { Logger } from '../../utils/logger.js';
import type { BackendDeps, BackendDefinition, TranslationBackend } from './definition.js';

/**
 * Rewrites source and target onto the locales the provider listed in its
 * unsupported-language error. Undefined when the error is of another kind or
 * either locale has no close match.
 */
export function negotiateConfig(
  config: TranslationServiceConfig,
  error: unknown,
): TranslationServiceConfig | undefined {
  if (!(error instanceof UnsupportedLanguageError) || !error.supportedLocales) {
    return undefined;
  }
  const supported = Object.values(error.supportedLocales).filter((locale) => locale !== '');
  if (supported.length === 0) {
    return undefined;
  }
  const separator = mostCommonSeparator(supported);
  const source = config.source === 'auto' ? 'auto' : negotiateLocale(config.source, supported, separator);
  const target = negotiateLocale(config.target, supported, separator);
  if (source === undefined || target === undefined) {
    return undefined;
  }
  if (source === config.source && target === config.target) {
    return undefined;
  }
  return { ...config, source, target };
}

/**
 * Wraps a backend so that an unsupported-language failure, at construction or
 * on the first translate call that raises it, is retried once with negotiated
 * locales. The negotiated configuration sticks for later calls.
 */
export function withLocaleNegotiation(
  definition: BackendDefinition,
  config: TranslationServiceConfig,
  deps?: BackendDeps,
  logger?: Logger,
): TranslationBackend {
  let current = config;

  const renegotiate = (error: unknown): TranslationBackend => {
    const negotiated = negotiateConfig(current, error);
    if (!negotiated) {
      throw error;
    }
    logger?.info('Retrying with negotiated locales', {
      service: definition.id,
      from: { source: current.source, target: current.target },
      to: { source: negotiated.source, target: negotiated.target },
    });
    current = negotiated;
    return definition.create(current, deps);
  };

  let inner: TranslationBackend;
  try {
    inner = definition.create(current, deps);
  } catch (error) {
    inner = renegotiate(error);
  }

  return {
    async translate(text, signal) {
      try {
        return await inner.translate(text, signal);
      } catch (error) {
        inner = renegotiate(error);
        return inner.translate(text, signal);
      }
    },
  };
}
