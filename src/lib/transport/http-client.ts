import { request, type Dispatcher } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';

export interface ParsedResponseData {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

export interface HttpClientOptions {
  /** Per-request timeout for headers and body (default: 30s) */
  timeoutMs?: number;
  /** Custom undici dispatcher (proxy agents, connection pools) */
  dispatcher?: Dispatcher;
}

export interface PostOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * JSON-over-HTTPS transport for the provider API
 *
 * - Automatic User-Agent injection
 * - Content-type aware body parsing (JSON, text)
 * - Debug logging of timings and rate limit responses
 *
 * Request bodies are never logged: they carry the API credentials.
 */
export class HttpClient {
  private static userAgent = buildUserAgent();
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = HttpClient.userAgent;
    }
    return headers;
  }

  async postJson(url: string, body: unknown, options: PostOptions = {}): Promise<ParsedResponseData> {
    const headers = this.ensureUserAgent({
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers,
    });
    const serializedBody = JSON.stringify(body);
    debugHttp('POST %s bodyLength=%d', url, serializedBody.length);
    const start = Date.now();

    try {
      const res = await request(url, {
        method: 'POST',
        headers,
        body: serializedBody,
        signal: options.signal,
        dispatcher: this.dispatcher,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      debugHttp(
        'POST %s response status=%d durationMs=%d content-type=%s',
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      this.logRateLimit('POST', url, res.statusCode, res.headers);

      const data = await this.parseResponseBody(res.headers, res.body);
      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('POST %s network error: %s', url, err instanceof Error ? err.message : String(err));
      throw err;
    }
  }

  private async parseResponseBody(
    headers: Record<string, string | string[] | undefined>,
    body: Dispatcher.ResponseData['body'],
  ): Promise<unknown> {
    const rawCt = headers['content-type'];
    const ct = (Array.isArray(rawCt) ? rawCt[0] : rawCt)?.toLowerCase() ?? '';

    if (ct.includes('application/json') || ct.includes('+json')) {
      return body.json();
    }

    // Some deployments answer JSON with a text content type; try it before giving up
    const text = await body.text();
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  private logRateLimit(
    method: string,
    url: string,
    statusCode: number,
    headers: Record<string, string | string[] | undefined>,
  ): void {
    if (statusCode === 429 || statusCode === 503) {
      const retryAfter = headers['retry-after'];
      debugHttp(
        'RATE LIMIT DETECTED: %s %s status=%d retry-after=%s',
        method,
        url,
        statusCode,
        retryAfter || 'NOT_SET',
      );
    }
  }
}
