/**
 * The part of a fetch Response the client reads.
 */
export interface HttpResponseLike {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export interface HttpFetchInit {
  headers: Record<string, string>;
  method: 'GET';
  signal: AbortSignal;
}

/**
 * Side effects the client performs, injectable for tests.
 */
export interface HttpEffects {
  delay: (ms: number) => Promise<void>;
  fetch: (url: string, init: HttpFetchInit) => Promise<HttpResponseLike>;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
