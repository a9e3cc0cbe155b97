import type { Logger } from './logger.js';
import { ProviderRequestError } from './errors.js';
import { providerErrorSchema } from './remoteSchemas.js';

export interface ProviderRequestOptions {
  accessToken?: string;
  signal?: AbortSignal;
}

/**
 * JSON transport for the provider's REST endpoints. Implementations resolve
 * with the decoded body and reject with ProviderRequestError on any non-2xx.
 */
export interface ProviderTransport {
  getJson(url: string, options?: ProviderRequestOptions): Promise<unknown>;
  postForm(url: string, params: URLSearchParams, options?: ProviderRequestOptions): Promise<unknown>;
}

const SENSITIVE_PARAMS = ['access_token', 'token', 'syncToken', 'pageToken'];

export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const param of SENSITIVE_PARAMS) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, 'redacted');
      }
    }
    return parsed.toString();
  } catch {
    return url.split('?')[0] ?? url;
  }
}

export function withDeadline(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

function describeProviderError(payload: unknown, fallback: string): { message: string; code?: string } {
  const parsed = providerErrorSchema.safeParse(payload);
  if (!parsed.success || parsed.data.error === undefined) {
    return { message: fallback };
  }
  const { error, error_description: description } = parsed.data;
  if (typeof error === 'string') {
    return { message: description ?? error, code: error };
  }
  return { message: error.message ?? fallback, code: error.status };
}

export function createFetchTransport(options: { logger: Logger; timeoutMs: number }): ProviderTransport {
  const { logger, timeoutMs } = options;

  async function send(
    method: string,
    url: string,
    request: { headers?: Record<string, string>; body?: string },
    requestOptions: ProviderRequestOptions
  ): Promise<unknown> {
    const safeUrl = redactUrl(url);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (requestOptions.accessToken) {
      headers.Authorization = `Bearer ${requestOptions.accessToken}`;
    }

    const response = await fetch(url, {
      method,
      headers: { ...headers, ...request.headers },
      body: request.body,
      signal: withDeadline(timeoutMs, requestOptions.signal)
    });

    if (response.status === 204) {
      logger.debug('Provider request succeeded with no content', { method, url: safeUrl });
      return null;
    }

    const payload: unknown = await response.json().catch(() => ({}));
    if (!response.ok) {
      const { message, code } = describeProviderError(payload, response.statusText);
      throw new ProviderRequestError(`Provider request failed: ${message}`, response.status, code, {
        method,
        url: safeUrl,
        status: response.status,
        payload
      });
    }

    logger.debug('Provider request succeeded', { method, url: safeUrl, status: response.status });
    return payload;
  }

  return {
    getJson: (url, requestOptions = {}) => send('GET', url, {}, requestOptions),
    postForm: (url, params, requestOptions = {}) =>
      send(
        'POST',
        url,
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          body: params.toString()
        },
        requestOptions
      )
  };
}
