import { LANGUAGE_TABLES, requireApiKey, resolveLanguage, type BackendDefinition } from './definition.js';
import { firstTranslation, httpClient, requestOptions, toProviderError } from './http.js';

const SERVICE = 'Yandex Translate';
const YANDEX_URL = 'https://translate.api.cloud.yandex.net/translate/v2/translate';

export const yandexBackend: BackendDefinition = {
  id: 'yandex',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: true,
    supportsModel: false,
    supportsRegion: false,
    supportsProxies: true,
    supportsKeyTier: false,
  },
  create(config, deps) {
    const apiKey = requireApiKey(config, SERVICE);
    const source = resolveLanguage(config.source, LANGUAGE_TABLES.yandex);
    const target = resolveLanguage(config.target, LANGUAGE_TABLES.yandex);
    const http = httpClient(deps);

    return {
      async translate(text, signal) {
        try {
          const response = await http.post<unknown>(
            YANDEX_URL,
            { sourceLanguageCode: source, targetLanguageCode: target, format: 'PLAIN_TEXT', texts: [text] },
            {
              ...requestOptions(YANDEX_URL, config, true, signal),
              headers: { Authorization: `Api-Key ${apiKey}` },
            },
          );
          return firstTranslation(SERVICE, response.data);
        } catch (error) {
          throw toProviderError(SERVICE, error);
        }
      },
    };
  },
};
