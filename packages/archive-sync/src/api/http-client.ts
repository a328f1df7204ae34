import { Readable } from 'node:stream';
import { Agent, fetch } from 'undici';
import { CLIENT_IDENTITY, HttpError } from '../types.js';
import type { AppConfig } from '../types.js';
import { parseRetryAfter } from './middleware/retry.js';

export interface HeaderReader {
  readonly get: (name: string) => string | null;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: HeaderReader;
  readonly body: unknown;
}

export interface DownloadResponse {
  readonly status: number;
  readonly headers: HeaderReader;
  readonly body: Readable;
}

export interface HttpClient {
  readonly get: (url: string, headers?: Record<string, string>) => Promise<HttpResponse>;
  readonly post: (url: string, body: unknown, headers?: Record<string, string>) => Promise<HttpResponse>;
  readonly postForm: (url: string, form: Record<string, string>, headers?: Record<string, string>) => Promise<HttpResponse>;
  readonly download: (url: string, headers?: Record<string, string>) => Promise<DownloadResponse>;
}

type RequestBody =
  | { readonly kind: 'json'; readonly value: unknown }
  | { readonly kind: 'form'; readonly value: Record<string, string> };

const ERROR_BODY_PREVIEW = 200;

export function createHttpClient(config: AppConfig): HttpClient {
  const dispatcher = new Agent({
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 60_000,
    connections: config.fetchConcurrency + 4,
    headersTimeout: config.requestTimeoutMs,
    bodyTimeout: config.requestTimeoutMs,
  });

  function toHttpError(err: unknown, method: string, url: string): HttpError {
    if (err instanceof HttpError) return err;
    if (err instanceof Error && err.name === 'AbortError') {
      return new HttpError(`Request timeout after ${config.requestTimeoutMs}ms`, 0, method, url);
    }
    return new HttpError(
      `Network error: ${err instanceof Error ? err.message : String(err)}`,
      0,
      method,
      url,
    );
  }

  async function request(
    method: string,
    url: string,
    body: RequestBody | undefined,
    extraHeaders: Record<string, string> | undefined,
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Accept-Encoding': 'gzip, deflate',
      'User-Agent': `${CLIENT_IDENTITY.name}/${CLIENT_IDENTITY.version}`,
      ...extraHeaders,
    };

    let payload: string | undefined;
    if (body?.kind === 'json') {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body.value);
    } else if (body?.kind === 'form') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      payload = new URLSearchParams(body.value).toString();
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
        dispatcher,
      });

      let responseBody: unknown;
      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('json')) {
        responseBody = await response.json();
      } else {
        responseBody = await response.text();
      }

      if (!response.ok) {
        throw new HttpError(
          `HTTP ${response.status} ${method} ${url}`,
          response.status,
          method,
          url,
          parseRetryAfter(response.headers),
        );
      }

      return {
        status: response.status,
        headers: response.headers,
        body: responseBody,
      };
    } catch (err) {
      throw toHttpError(err, method, url);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Resolves once headers arrive; the timeout then stops applying and the
   * agent's body timeout guards the transfer.
   */
  async function download(url: string, extraHeaders?: Record<string, string>): Promise<DownloadResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': `${CLIENT_IDENTITY.name}/${CLIENT_IDENTITY.version}`,
          ...extraHeaders,
        },
        signal: controller.signal,
        dispatcher,
      });

      if (!response.ok || response.body === null) {
        const preview = (await response.text()).slice(0, ERROR_BODY_PREVIEW);
        throw new HttpError(
          `HTTP ${response.status} GET ${url}${preview ? `: ${preview}` : ''}`,
          response.status,
          'GET',
          url,
          parseRetryAfter(response.headers),
        );
      }

      return {
        status: response.status,
        headers: response.headers,
        body: Readable.fromWeb(response.body),
      };
    } catch (err) {
      throw toHttpError(err, 'GET', url);
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    get: (url, headers) => request('GET', url, undefined, headers),
    post: (url, body, headers) => request('POST', url, { kind: 'json', value: body }, headers),
    postForm: (url, form, headers) => request('POST', url, { kind: 'form', value: form }, headers),
    download,
  };
}
