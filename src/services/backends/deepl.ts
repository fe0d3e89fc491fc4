import { LANGUAGE_TABLES, requireApiKey, resolveLanguage, type BackendDefinition } from './definition.js';
import { firstTranslation, httpClient, requestOptions, toProviderError } from './http.js';

const SERVICE = 'DeepL Translator';
const DEEPL_FREE_URL = 'https://api-free.deepl.com/v2/translate';
const DEEPL_PAID_URL = 'https://api.deepl.com/v2/translate';

export const deeplBackend: BackendDefinition = {
  id: 'deepl',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: true,
    supportsModel: false,
    supportsRegion: false,
    supportsProxies: false,
    supportsKeyTier: true,
  },
  create(config, deps) {
    const apiKey = requireApiKey(config, SERVICE);
    const source = resolveLanguage(config.source, LANGUAGE_TABLES.deepl);
    const target = resolveLanguage(config.target, LANGUAGE_TABLES.deepl);
    const url = config.apiKeyType === 'paid' ? DEEPL_PAID_URL : DEEPL_FREE_URL;
    const http = httpClient(deps);

    return {
      async translate(text, signal) {
        try {
          const response = await http.post<unknown>(
            url,
            {
              text: [text],
              // source languages carry no variant (EN, not EN-US)
              source_lang: (source.split('-')[0] ?? source).toUpperCase(),
              target_lang: target.toUpperCase(),
            },
            {
              ...requestOptions(url, config, false, signal),
              headers: { Authorization: `DeepL-Auth-Key ${apiKey}` },
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
