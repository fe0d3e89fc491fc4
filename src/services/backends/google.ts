import { ProviderError } from '../../types/errors.js';
import { LANGUAGE_TABLES, resolveLanguage, type BackendDefinition } from './definition.js';
import { httpClient, requestOptions, toProviderError } from './http.js';

const SERVICE = 'Google Translate';
const GOOGLE_URL = 'https://translate.googleapis.com/translate_a/single';

/** Joins the sentence chunks of a `translate_a/single` response. */
export function parseGoogleResponse(data: unknown): string {
  if (Array.isArray(data) && Array.isArray(data[0])) {
    let translated = '';
    for (const pair of data[0]) {
      if (Array.isArray(pair) && typeof pair[0] === 'string') {
        translated += pair[0];
      }
    }
    if (translated.length > 0) {
      return translated;
    }
  }
  throw new ProviderError(SERVICE, 'Invalid response format');
}

export const googleBackend: BackendDefinition = {
  id: 'google',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: false,
    supportsModel: false,
    supportsRegion: false,
    supportsProxies: true,
    supportsKeyTier: false,
  },
  create(config, deps) {
    const source = resolveLanguage(config.source, LANGUAGE_TABLES.google, true);
    const target = resolveLanguage(config.target, LANGUAGE_TABLES.google);
    const http = httpClient(deps);

    return {
      async translate(text, signal) {
        try {
          const response = await http.get<unknown>(GOOGLE_URL, {
            ...requestOptions(GOOGLE_URL, config, true, signal),
            params: { client: 'gtx', sl: source, tl: target, dt: 't', q: text },
          });
          return parseGoogleResponse(response.data);
        } catch (error) {
          throw toProviderError(SERVICE, error);
        }
      },
    };
  },
};
