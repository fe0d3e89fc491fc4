import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosRequestConfig } from 'axios';
import { AuthenticationError, NetworkError, ProviderError, QuotaError } from '../../types/errors.js';
import type { Proxies, TranslationServiceConfig } from '../../types/index.js';
import type { BackendDeps } from './definition.js';

export function httpClient(deps?: BackendDeps): AxiosInstance {
  return deps?.http ?? axios.create();
}

export function parseProxy(url: string): AxiosProxyConfig {
  const parsed = new URL(url);
  const protocol = parsed.protocol.replace(/:$/, '');
  const proxy: AxiosProxyConfig = {
    protocol,
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : protocol === 'https' ? 443 : 80,
  };
  if (parsed.username) {
    proxy.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxy;
}

/** The proxy configured for the URL's scheme; https falls back to the http proxy. */
export function proxyFor(url: string, proxies?: Proxies): AxiosProxyConfig | undefined {
  if (!proxies) return undefined;
  const chosen = url.startsWith('https:') ? (proxies.https ?? proxies.http) : proxies.http;
  return chosen ? parseProxy(chosen) : undefined;
}

export function requestOptions(
  url: string,
  config: TranslationServiceConfig,
  useProxies: boolean,
  signal?: AbortSignal,
): AxiosRequestConfig {
  const proxy = useProxies ? proxyFor(url, config.proxies) : undefined;
  return {
    ...(proxy && { proxy }),
    ...(config.requestTimeoutMs !== undefined && { timeout: config.requestTimeoutMs }),
    signal,
  };
}

/**
 * Translates an axios failure into the provider error taxonomy. Aborted
 * requests and non-axios errors pass through untouched.
 */
export function toProviderError(service: string, error: unknown): unknown {
  if (!axios.isAxiosError(error) || axios.isCancel(error)) {
    return error;
  }
  const status = error.response?.status;
  if (status === undefined) {
    return new NetworkError(service, error.message, undefined, { cause: error });
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(service, `request rejected (HTTP ${status})`, status, { cause: error });
  }
  if (status === 429 || status === 456) {
    return new QuotaError(service, `quota exceeded (HTTP ${status})`, status, { cause: error });
  }
  return new ProviderError(service, `request failed (HTTP ${status})`, status, { cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads `{ translations: [{ text }] }`, the shape DeepL, Yandex and Microsoft share. */
export function firstTranslation(service: string, data: unknown): string {
  if (isRecord(data) && Array.isArray(data.translations)) {
    const first: unknown = data.translations[0];
    if (isRecord(first) && typeof first.text === 'string') {
      return first.text;
    }
  }
  throw new ProviderError(service, 'Invalid response format');
}

export { isRecord };
