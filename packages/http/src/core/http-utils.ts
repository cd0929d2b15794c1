// Pure HTTP helpers, no side effects

export const buildUrl = (baseUrl: string, endpoint: string): string => {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (!endpoint || endpoint === '/') {
    return base;
  }
  return endpoint.startsWith('/') ? `${base}${endpoint}` : `${base}/${endpoint}`;
};

/**
 * Redact credential-like query parameters before a URL is logged.
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    for (const param of ['signature', 'apikey', 'api_key', 'key', 'token', 'secret']) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, '***');
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
};

/**
 * Parse a Retry-After value (delay-seconds or HTTP-date), capped at 30s.
 */
export const parseRetryAfter = (value: string, now: number): number | undefined => {
  const seconds = Number.parseInt(value, 10);
  if (!Number.isNaN(seconds)) {
    if (seconds === 0) return 1000;
    if (seconds > 0) return Math.min(seconds * 1000, 30_000);
  }

  const date = new Date(value);
  if (!Number.isNaN(date.getTime())) {
    const delayMs = date.getTime() - now;
    if (delayMs > 0) return Math.min(delayMs, 30_000);
  }

  return undefined;
};

export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
};
