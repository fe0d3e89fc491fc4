import OpenAI from 'openai';
import { AuthenticationError, NetworkError, ProviderError, QuotaError } from '../../types/errors.js';
import type { TranslationServiceConfig } from '../../types/index.js';
import { requireApiKey, type BackendDefinition, type ChatCompletionClient } from './definition.js';

const SERVICE = 'ChatGPT Translation Service';
export const DEFAULT_CHAT_MODEL = 'gpt-4o-mini';

export function openAIChatClient(apiKey: string, timeoutMs?: number): ChatCompletionClient {
  const client = new OpenAI({ apiKey, ...(timeoutMs !== undefined && { timeout: timeoutMs }) });
  return {
    async complete(request, signal) {
      const completion = await client.chat.completions.create(
        {
          model: request.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
        },
        { signal },
      );
      return completion.choices[0]?.message.content ?? '';
    },
  };
}

export function toChatError(error: unknown): unknown {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new AuthenticationError(SERVICE, error.message, error.status, { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new QuotaError(SERVICE, error.message, error.status, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new NetworkError(SERVICE, error.message, undefined, { cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError(SERVICE, error.message, error.status, { cause: error });
  }
  return error;
}

export function systemPrompt(config: Pick<TranslationServiceConfig, 'source' | 'target'>): string {
  return [
    `Translate the user's text from the locale ${config.source} into the locale ${config.target}.`,
    'Reply with the translation only, without quotes or explanations.',
    'Keep placeholders in curly braces, such as {name}, exactly as they are.',
  ].join(' ');
}

/** Any locale is accepted; the model is told the codes verbatim. */
export const chatGptBackend: BackendDefinition = {
  id: 'chatgpt',
  displayName: SERVICE,
  capabilities: {
    needsApiKey: true,
    supportsModel: true,
    supportsRegion: false,
    supportsProxies: false,
    supportsKeyTier: false,
  },
  create(config, deps) {
    const apiKey = requireApiKey(config, SERVICE);
    const chat = deps?.chat ?? openAIChatClient(apiKey, config.requestTimeoutMs);
    const model = config.model || DEFAULT_CHAT_MODEL;
    const system = systemPrompt(config);

    return {
      async translate(text, signal) {
        let reply: string;
        try {
          reply = await chat.complete({ model, system, user: text }, signal);
        } catch (error) {
          throw toChatError(error);
        }
        const translated = reply.trim();
        if (!translated) {
          throw new ProviderError(SERVICE, 'the model returned an empty reply');
        }
        return translated;
      },
    };
  },
};
