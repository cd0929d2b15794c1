import { getLogger, type Logger } from '@refdata/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, RateLimitError, ResponseValidationError } from './types.js';

const DEFAULT_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly retries: number;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = {
      ...config,
      defaultHeaders: {
        Accept: 'application/json',
        'User-Agent': 'refdata/1.0.0',
        ...config.defaultHeaders,
      },
    };
    this.retries = Math.max(1, config.retries ?? DEFAULT_RETRIES);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata = {}) => {
        switch (level) {
          case 'debug':
            return this.logger.debug(metadata, message);
          case 'info':
            return this.logger.info(metadata, message);
          case 'warn':
            return this.logger.warn(metadata, message);
          case 'error':
            return this.logger.error(metadata, message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.timeout}ms, Retries: ${this.retries}`
    );
  }

  /**
   * GET `endpoint` and decode the JSON body, validating it when a schema is given.
   *
   * Non-success statuses other than 429 fail immediately with HttpError.
   * Network errors and timeouts are retried with exponential backoff;
   * 429 responses are retried after the server's Retry-After delay.
   */
  async get<T>(
    endpoint: string,
    options: HttpRequestOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }
  ): Promise<Result<T, Error>>;
  async get(endpoint: string, options?: HttpRequestOptions): Promise<Result<unknown, Error>>;
  async get<T>(endpoint: string, options: HttpRequestOptions<T> = {}): Promise<Result<unknown, Error>> {
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const safeUrl = HttpUtils.sanitizeUrl(url);
    const timeout = options.timeout ?? this.timeout;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        this.effects.log('info', `making HTTP GET request: ${safeUrl}`, { attempt, retries: this.retries });

        const response = await this.effects.fetch(url, {
          headers: { ...this.config.defaultHeaders, ...options.headers },
          method: 'GET',
          signal: controller.signal,
        });

        if (!response.ok) {
          const body = await response.text().catch(() => 'Unknown error');

          if (response.status === 429) {
            const retryAfter = HttpUtils.parseRetryAfter(
              response.headers.get('retry-after') ?? '',
              this.effects.now()
            );
            lastError = new RateLimitError(`${this.config.providerName} rate limit exceeded`, retryAfter);
            if (attempt < this.retries) {
              const delay = HttpUtils.calculateExponentialBackoff(attempt, retryAfter ?? 2000, 60_000);
              this.effects.log('warn', `Rate limited, retrying in ${delay}ms`, { attempt, url: safeUrl });
              await this.effects.delay(delay);
              continue;
            }
            return err(lastError);
          }

          return err(new HttpError(`http request failed: ${response.status}`, response.status, body));
        }

        const data: unknown = await response.json();
        return this.validate(endpoint, data, options);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (lastError.name === 'AbortError') {
          lastError = new Error(`Request timeout after ${timeout}ms`);
        }

        this.effects.log('warn', `Request failed - URL: ${safeUrl}, Attempt: ${attempt}/${this.retries}`, {
          error: lastError.message,
        });

        if (attempt < this.retries) {
          await this.effects.delay(HttpUtils.calculateExponentialBackoff(attempt, 1000, 10_000));
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return err(lastError ?? new Error('Request failed with unknown error'));
  }

  /**
   * Close keep-alive connections so the process can exit on its own.
   * Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(() => {
        this.logger.debug('HTTP agent closed');
      });
    }
    return this.closePromise;
  }

  private validate<T>(endpoint: string, data: unknown, options: HttpRequestOptions<T>): Result<unknown, Error> {
    if (!options.schema) {
      return ok(data);
    }

    const parsed = options.schema.safeParse(data);
    if (parsed.success) {
      return ok(parsed.data);
    }

    const issues = parsed.error.issues.map((issue) => ({ message: issue.message, path: issue.path.join('.') }));
    const summary = issues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');

    this.effects.log('error', `Response validation failed (${issues.length} issues): ${summary}`, {
      endpoint,
      providerName: this.config.providerName,
    });

    return err(
      new ResponseValidationError(
        `Response validation failed: ${summary}`,
        this.config.providerName,
        endpoint,
        issues
      )
    );
  }
}
