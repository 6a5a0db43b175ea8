/**
 * Outbound HTTP for search pages, APIs and organization sites.
 *
 * Failures surface as FetchError with a retryable flag: network errors,
 * timeouts, 408, 429 and 5xx can be retried; other 4xx cannot.
 */

import axios, { type AxiosInstance } from 'axios';
import { FetchError } from '../errors.js';

export interface TextResponse {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

export interface RequestOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
}

export interface HttpFetcher {
  getText(url: string, options?: RequestOptions): Promise<TextResponse>;
  getJson(url: string, options?: RequestOptions): Promise<unknown>;
}

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  maxRedirects?: number;
}

const RETRYABLE_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
]);

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function toFetchError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new FetchError(`HTTP ${status} for ${url}`, { url, status, retryable: isRetryableStatus(status) }, { cause: error });
    }
    const code = error.code ?? 'UNKNOWN';
    return new FetchError(`${code} fetching ${url}: ${error.message}`, {
      url,
      retryable: RETRYABLE_NETWORK_CODES.has(code),
    }, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(`Failed to fetch ${url}: ${message}`, { url, retryable: false }, { cause: error });
}

export class AxiosHttpClient implements HttpFetcher {
  private readonly client: AxiosInstance;

  constructor(options: HttpClientOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      maxRedirects: options.maxRedirects ?? 5,
      headers: {
        'User-Agent': options.userAgent,
        'Accept-Language': 'en-US,en;q=0.9',
      },
    });
  }

  async getText(url: string, options: RequestOptions = {}): Promise<TextResponse> {
    try {
      const response = await this.client.get<string>(url, {
        params: options.params,
        headers: {
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          ...options.headers,
        },
        responseType: 'text',
        transformResponse: (data: unknown) => data,
      });
      const contentType = response.headers['content-type'];
      return {
        url,
        status: response.status,
        contentType: typeof contentType === 'string' ? contentType : '',
        body: typeof response.data === 'string' ? response.data : '',
      };
    } catch (error) {
      throw toFetchError(error, url);
    }
  }

  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    try {
      const response = await this.client.get<unknown>(url, {
        params: options.params,
        headers: { Accept: 'application/json', ...options.headers },
      });
      return response.data;
    } catch (error) {
      throw toFetchError(error, url);
    }
  }
}
