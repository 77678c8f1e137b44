import type { HttpConfig } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { err, ok, type FetchError, type Result } from '../types.js';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  form?: Record<string, string>;
  referer?: string;
}

export interface HttpResponse {
  status: number;
  url: string;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<Result<HttpResponse, FetchError>>;
}

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface HttpClientOptions {
  config: HttpConfig;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * fetch wrapper that never throws: every outcome is a Result.
 * Network errors, 429 and 5xx are retried with exponential backoff.
 */
export class HttpClient implements HttpTransport {
  private config: HttpConfig;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(options: HttpClientOptions) {
    this.config = options.config;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger('HTTP');
  }

  private buildHeaders(request: HttpRequest): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': this.config.acceptLanguage,
      'Cache-Control': 'no-cache',
      'Pragma': 'no-cache',
      ...request.headers,
    };
    if (request.referer) headers['Referer'] = request.referer;
    if (request.form) headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
    return headers;
  }

  private async attempt(request: HttpRequest): Promise<Result<HttpResponse, FetchError>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: this.buildHeaders(request),
        body: request.form ? new URLSearchParams(request.form).toString() : undefined,
        signal: controller.signal,
      });
      const body = await response.text();

      if (response.status >= 400) {
        return err({ kind: 'http', status: response.status, message: `HTTP ${response.status}` });
      }
      return ok({ status: response.status, url: response.url || request.url, body });
    } catch (error) {
      if (controller.signal.aborted) {
        return err({ kind: 'timeout', status: null, message: `Timed out after ${this.config.timeoutMs}ms` });
      }
      return err({
        kind: 'network',
        status: null,
        message: error instanceof Error ? error.message : String(error),
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async send(request: HttpRequest): Promise<Result<HttpResponse, FetchError>> {
    let result = await this.attempt(request);

    for (let retry = 1; retry < this.config.retries && !result.ok; retry++) {
      const error = result.error;
      const retryable = error.kind !== 'http' || (error.status !== null && RETRY_STATUSES.has(error.status));
      if (!retryable) break;

      const delay = this.config.retryDelayMs * Math.pow(2, retry - 1);
      this.logger.debug(`${request.method} ${request.url} failed (${error.message}), retry ${retry} in ${delay}ms`);
      await this.sleep(delay);
      result = await this.attempt(request);
    }

    if (result.ok) {
      this.logger.info(`${request.method} ${request.url} → ${result.value.status} (len=${result.value.body.length})`);
    } else {
      this.logger.warn(`${request.method} ${request.url} → ${result.error.message}`);
    }
    return result;
  }
}
