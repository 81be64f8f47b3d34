/**
 * Outbound HTTP used by the source adapters, the coupon validator and
 * the Telegram channel.
 *
 * Callers depend on the `HttpClient` interface so tests can substitute an
 * in-process fake; `GotHttpClient` is the production implementation.
 */

import got, { type Got, type Response } from 'got';
import { HttpRequestError, errorMessage } from '../shared/errors.js';
import { DEFAULT_LIMITS, USER_AGENTS } from '../shared/constants.js';
import { pickRandom } from '../shared/utils.js';

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Overrides the client's default request timeout. */
  timeoutMs?: number;
  /** Query parameters appended to the URL. */
  searchParams?: Record<string, string>;
}

export interface HttpClient {
  /** GET a URL and return the body as text. Rejects with HttpRequestError. */
  getText(url: string, options?: RequestOptions): Promise<string>;
  /** GET a URL and return the parsed JSON body. Rejects with HttpRequestError. */
  getJson(url: string, options?: RequestOptions): Promise<unknown>;
  /** POST a JSON body and return the parsed JSON response. */
  postJson(url: string, body: unknown, options?: RequestOptions): Promise<unknown>;
}

export interface GotHttpClientOptions {
  timeoutMs?: number;
}

/** Builds the final URL a request goes to, used for error reporting and tests. */
export function buildRequestUrl(url: string, searchParams?: Record<string, string>): string {
  if (!searchParams || Object.keys(searchParams).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(searchParams)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

export function parseJsonBody(body: string, url: string): unknown {
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    throw new HttpRequestError(`Invalid JSON from ${url}`, 'INVALID_JSON', url);
  }
}

function errorCodeOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'REQUEST_FAILED';
}

export class GotHttpClient implements HttpClient {
  private readonly client: Got;

  constructor(options: GotHttpClientOptions = {}) {
    this.client = got.extend({
      timeout: { request: options.timeoutMs ?? DEFAULT_LIMITS.REQUEST_TIMEOUT_MS },
      retry: { limit: 0 },
      followRedirect: true,
      throwHttpErrors: false,
      headers: {
        'Accept-Language': 'en-US,en;q=0.9',
        'Cache-Control': 'no-cache',
      },
    });
  }

  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.send(url, options, (target) =>
      this.client.get(target, {
        headers: this.headers(options),
        responseType: 'text',
        ...(options.timeoutMs !== undefined ? { timeout: { request: options.timeoutMs } } : {}),
      }),
    );
    return response.body;
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.getText(url, {
      ...options,
      headers: { Accept: 'application/json', ...options.headers },
    });
    return parseJsonBody(body, url);
  }

  async postJson(url: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.send(url, options, (target) =>
      this.client.post(target, {
        headers: { Accept: 'application/json', ...this.headers(options) },
        json: body,
        responseType: 'text',
        ...(options.timeoutMs !== undefined ? { timeout: { request: options.timeoutMs } } : {}),
      }),
    );
    return parseJsonBody(response.body, url);
  }

  private headers(options: RequestOptions): Record<string, string> {
    return {
      'User-Agent': pickRandom(USER_AGENTS),
      ...options.headers,
    };
  }

  /**
   * Runs a request and converts transport failures and non-2xx statuses
   * into HttpRequestError.
   */
  private async send(
    url: string,
    options: RequestOptions,
    request: (target: string) => Promise<Response<string>>,
  ): Promise<Response<string>> {
    const target = buildRequestUrl(url, options.searchParams);

    let response: Response<string>;
    try {
      response = await request(target);
    } catch (error) {
      throw new HttpRequestError(
        `Request to ${target} failed: ${errorMessage(error)}`,
        errorCodeOf(error),
        target,
      );
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new HttpRequestError(
        `HTTP ${response.statusCode} from ${target}`,
        'HTTP_ERROR',
        target,
        response.statusCode,
      );
    }

    return response;
  }
}
