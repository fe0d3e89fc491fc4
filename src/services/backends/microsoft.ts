import { ProviderError } from '../../types/errors.js';
import { LANGUAGE_TABLES, requireApiKey, resolveLanguage, type BackendDefinition } from './definition.js';
import { httpClient, isRecord, requestOptions, toProviderError } from './http.js';

const SERVICE = 'Microsoft Translator';
const MICROSOFT_URL = 'https://api.cognitive.microsofttranslator.com/translate';

export function parseMicrosoftResponse(data: unknown): string {
  const first: unknown = Array.isArray(data) ? data[0] : undefined;
  if (isRecord(first) && Array.isArray(first.translations)) {
    const translation: unknown = first.translations[0];
    if (isRecord(translation) && typeof translation.text === 'string') {
      return translation.text;
    }
  }
  throw new ProviderError(SERVICE, 'Invalid response format');
}

export const microsoftBackend: BackendDefinition = {
  id: 'microsoft',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: true,
    supportsModel: false,
    supportsRegion: true,
    supportsProxies: true,
    supportsKeyTier: false,
  },
  create(config, deps) {
    const apiKey = requireApiKey(config, SERVICE);
    const source = resolveLanguage(config.source, LANGUAGE_TABLES.microsoft);
    const target = resolveLanguage(config.target, LANGUAGE_TABLES.microsoft);
    const http = httpClient(deps);
    const headers: Record<string, string> = {
      'Ocp-Apim-Subscription-Key': apiKey,
      'Content-Type': 'application/json',
    };
    if (config.region) {
      headers['Ocp-Apim-Subscription-Region'] = config.region;
    }

    return {
      async translate(text, signal) {
        try {
          const response = await http.post<unknown>(MICROSOFT_URL, [{ Text: text }], {
            ...requestOptions(MICROSOFT_URL, config, true, signal),
            params: { 'api-version': '3.0', from: source, to: target },
            headers,
          });
          return parseMicrosoftResponse(response.data);
        } catch (error) {
          throw toProviderError(SERVICE, error);
        }
      },
    };
  },
};
