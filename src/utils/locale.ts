import aliases from '../data/locale-aliases.json' with { type: 'json' };

export type LocaleSeparator = '-' | '_';

const LOCALE_ALIASES: Record<string, string> = aliases;

/**
 * Picks the separator most of the given locales use. A locale counts for "-"
 * when it contains one, otherwise for "_" when it contains one. A tie, or a
 * list without any separator, yields "_".
 */
export function mostCommonSeparator(locales: readonly string[]): LocaleSeparator {
  let dashes = 0;
  let underscores = 0;
  for (const locale of locales) {
    if (locale.includes('-')) {
      dashes++;
    } else if (locale.includes('_')) {
      underscores++;
    }
  }
  return dashes > underscores ? '-' : '_';
}

function withSeparator(locale: string, separator: LocaleSeparator): string {
  return locale.replace(/[-_]/g, separator);
}

/**
 * Returns the entry of `available` closest to `requested`, spelled the way
 * `available` spells it, or undefined when nothing fits.
 *
 * Tried in order: the exact locale (case-insensitive, separators
 * normalized), the default territory for a bare language (`fr` -> `fr_FR`),
 * then the bare language of a territory locale (`pt_BR` -> `pt`).
 */
export function negotiateLocale(
  requested: string,
  available: readonly string[],
  separator: LocaleSeparator = '_',
): string | undefined {
  const lookup = new Map<string, string>();
  for (const locale of available) {
    if (locale) {
      lookup.set(withSeparator(locale, separator).toLowerCase(), locale);
    }
  }

  const normalized = withSeparator(requested, separator);
  const exact = lookup.get(normalized.toLowerCase());
  if (exact !== undefined) {
    return exact;
  }

  const alias = LOCALE_ALIASES[normalized.toLowerCase()];
  if (alias !== undefined) {
    const aliased = lookup.get(withSeparator(alias, separator).toLowerCase());
    if (aliased !== undefined) {
      return aliased;
    }
  }

  const [language, ...territory] = normalized.split(separator);
  if (language && territory.length > 0) {
    return lookup.get(language.toLowerCase());
  }
  return undefined;
}
