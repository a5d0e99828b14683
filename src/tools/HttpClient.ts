/**
 * @fileoverview Outbound HTTP used by the weather and web tools
 *
 * Tools depend on the HttpClient interface so tests can answer requests in
 * process. FetchHttpClient is the default, built on the runtime's fetch with
 * a per-request timeout.
 */

import { HttpRequestError, ValidationError } from '../errors/AssistantErrors';
import logger from '../utils/logger';

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD';
  params?: QueryParams;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: Buffer;
  elapsedMs: number;
}

export interface HttpClient {
  /**
   * Resolves for any HTTP status; rejects with HttpRequestError when no
   * response arrives (network failure or timeout)
   */
  request(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

export function responseText(response: HttpResponse): string {
  return response.body.toString('utf8');
}

/**
 * Parse the body as JSON. Throws ValidationError when it is not JSON.
 */
export function responseJson(response: HttpResponse): unknown {
  const text = responseText(response);
  try {
    return JSON.parse(text);
  } catch {
    throw ValidationError.create(`Response from ${response.url} is not JSON`, 'http_response_parse', {
      status: response.status,
      preview: text.slice(0, 200)
    });
  }
}

export class FetchHttpClient implements HttpClient {
  constructor(private readonly defaultTimeoutMs: number) {}

  async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const target = buildUrl(url, options.params);
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const startTime = Date.now();

    let response: Response;
    try {
      response = await fetch(target, {
        method: options.method ?? 'GET',
        headers: options.headers,
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      logger.warn('HTTP request failed', { url: stripQuery(target), timedOut, timeoutMs });
      throw HttpRequestError.create(stripQuery(target), timedOut, error instanceof Error ? error : undefined);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const body = Buffer.from(await response.arrayBuffer());

    logger.debug('HTTP request completed', {
      url: stripQuery(target),
      status: response.status,
      bytes: body.length
    });

    return {
      url: target,
      status: response.status,
      ok: response.ok,
      headers,
      body,
      elapsedMs: Date.now() - startTime
    };
  }
}

// Query strings may carry API keys
function stripQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}
