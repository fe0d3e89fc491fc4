import { ProviderError, QuotaError } from '../../types/errors.js';
import { LANGUAGE_TABLES, resolveLanguage, type BackendDefinition } from './definition.js';
import { httpClient, isRecord, requestOptions, toProviderError } from './http.js';

const SERVICE = 'MyMemory Translator';
const MYMEMORY_URL = 'https://api.mymemory.translated.net/get';

export function parseMyMemoryResponse(data: unknown): string {
  if (!isRecord(data)) {
    throw new ProviderError(SERVICE, 'Invalid response format');
  }
  const status = Number(data.responseStatus);
  const details = typeof data.responseDetails === 'string' ? data.responseDetails : '';
  if (status === 429 || details.includes('YOU USED ALL AVAILABLE FREE TRANSLATIONS')) {
    throw new QuotaError(SERVICE, details || 'daily quota exceeded', 429);
  }
  if (status !== 200) {
    throw new ProviderError(SERVICE, details || `request failed (status ${status})`, status);
  }
  const responseData = data.responseData;
  if (isRecord(responseData) && typeof responseData.translatedText === 'string') {
    return responseData.translatedText;
  }
  throw new ProviderError(SERVICE, 'Invalid response format');
}

export const myMemoryBackend: BackendDefinition = {
  id: 'mymemory',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: false,
    supportsModel: false,
    supportsRegion: false,
    supportsProxies: true,
    supportsKeyTier: false,
  },
  create(config, deps) {
    const source = resolveLanguage(config.source, LANGUAGE_TABLES.mymemory);
    const target = resolveLanguage(config.target, LANGUAGE_TABLES.mymemory);
    const http = httpClient(deps);

    return {
      async translate(text, signal) {
        try {
          const response = await http.get<unknown>(MYMEMORY_URL, {
            ...requestOptions(MYMEMORY_URL, config, true, signal),
            params: { q: text, langpair: `${source}|${target}` },
          });
          return parseMyMemoryResponse(response.data);
        } catch (error) {
          throw toProviderError(SERVICE, error);
        }
      },
    };
  },
};
