import type { z } from 'zod';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_SECONDS,
  HttpError,
  nullLogger,
  parseJsonObject,
  readObject,
  readString,
  withRetry,
  type Logger,
} from '@scan-harvest/shared';
import type { AccessTokenProvider } from './auth.js';

/** Any zod schema producing T, whatever input it accepts */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface AdminApiGatewayConfig {
  /** REST root, e.g. https://api.powerbi.com/v1.0/myorg */
  baseUrl: string;
  tokenProvider: AccessTokenProvider;
  /** Retries after the first attempt (default: DEFAULT_MAX_RETRIES) */
  maxRetries?: number;
  /** Fixed sleep between attempts (default: DEFAULT_RETRY_DELAY_SECONDS) */
  retryDelaySeconds?: number;
  /** Per-request timeout (default: DEFAULT_REQUEST_TIMEOUT_MS) */
  requestTimeoutMs?: number;
  logger?: Logger;
  /** Sleep between retries, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  query?: QueryParams;
  /**
   * Set false to make a single attempt. Used for scan submits, where a retry
   * after a lost response may create a duplicate job server-side.
   */
  retry?: boolean;
}

type HttpMethod = 'GET' | 'POST';

/**
 * Thin wrapper over the admin REST API.
 *
 * Every call applies the same bounded retry policy: up to `maxRetries`
 * retries with a fixed delay, except not-found (404) which is rethrown
 * immediately. No backoff growth and no circuit breaker.
 */
export class AdminApiGateway {
  private readonly baseUrl: string;
  private readonly tokenProvider: AccessTokenProvider;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(config: AdminApiGatewayConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.tokenProvider = config.tokenProvider;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = (config.retryDelaySeconds ?? DEFAULT_RETRY_DELAY_SECONDS) * 1000;
    this.timeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = (config.logger ?? nullLogger).child({ component: 'admin-api' });
    this.sleep = config.sleep;
  }

  /**
   * GET and validate the JSON body against a schema.
   */
  async get<T>(path: string, schema: ResponseSchema<T>, options: RequestOptions = {}): Promise<T> {
    const text = await this.execute('GET', path, undefined, options);
    return this.parse(text, schema, 'GET', path);
  }

  /**
   * POST a JSON body and validate the JSON response against a schema.
   */
  async post<T>(
    path: string,
    body: unknown,
    schema: ResponseSchema<T>,
    options: RequestOptions = {}
  ): Promise<T> {
    const text = await this.execute('POST', path, body, options);
    return this.parse(text, schema, 'POST', path);
  }

  /**
   * GET returning the raw response body, unparsed.
   */
  async getText(path: string, options: RequestOptions = {}): Promise<string> {
    return this.execute('GET', path, undefined, options);
  }

  buildUrl(path: string, query?: QueryParams): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!query) return url;

    const parts: string[] = [];
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) continue;
      parts.push(`${key}=${encodeURIComponent(String(value))}`);
    }
    return parts.length > 0 ? `${url}?${parts.join('&')}` : url;
  }

  private async execute(
    method: HttpMethod,
    path: string,
    body: unknown,
    options: RequestOptions
  ): Promise<string> {
    const maxRetries = options.retry === false ? 0 : this.maxRetries;

    return withRetry(() => this.send(method, path, body, options.query), {
      maxRetries,
      delayMs: this.retryDelayMs,
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn('Admin API call failed, retrying', {
          method,
          path,
          attempt,
          maxRetries,
          delayMs,
          error: error.message,
        });
      },
    });
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
    query?: QueryParams
  ): Promise<string> {
    const url = this.buildUrl(path, query);
    const token = await this.tokenProvider.getToken();
    const startTime = Date.now();

    const headers: Record<string, string> = {
      authorization: `Bearer ${token}`,
      accept: 'application/json',
    };
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timeout spans the body too; scan results can be large
    let res: Response;
    let text: string;
    try {
      res = await fetch(url, {
        method,
        signal: controller.signal,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      text = await res.text();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${this.timeoutMs}ms on ${method} ${path}`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }

    const duration = Date.now() - startTime;

    if (!res.ok) {
      this.logger.debug('Admin API call returned an error status', {
        method,
        path,
        status: res.status,
        duration,
      });
      throw new HttpError(res.status, method, path, this.extractErrorMessage(text));
    }

    this.logger.debug('Admin API call succeeded', { method, path, status: res.status, duration });
    return text;
  }

  /**
   * Prefers `error.message` / `error.code` of the platform's error envelope.
   */
  private extractErrorMessage(text: string): string {
    const parsed = parseJsonObject(text);
    const envelope = readObject(parsed, 'error');
    return readString(envelope, 'message') ?? readString(envelope, 'code') ?? text;
  }

  private parse<T>(text: string, schema: ResponseSchema<T>, method: HttpMethod, path: string): T {
    let json: unknown;
    try {
      json = text.trim() === '' ? {} : JSON.parse(text);
    } catch {
      throw new Error(`Admin API returned invalid JSON on ${method} ${path}`);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      throw new Error(
        `Unexpected response shape on ${method} ${path}: ${result.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    return result.data;
  }
}
