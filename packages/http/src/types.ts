import type { ZodType, ZodTypeDef } from 'zod';

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  retries?: number | undefined;
  timeout?: number | undefined;
}

export interface HttpRequestOptions<T = unknown> {
  headers?: Record<string, string> | undefined;
  schema?: ZodType<T, ZodTypeDef, unknown> | undefined;
  timeout?: number | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RateLimitError extends Error {
  constructor(
    message: string,
    public readonly retryAfter?: number | undefined
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly endpoint: string,
    public readonly validationIssues: { message: string; path: string }[]
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
