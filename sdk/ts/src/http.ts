import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

export interface RetryPolicy {
  attempts?: number;
  backoffMs?: number;
  retryOnStatuses?: number[];
}

export interface JsonApiClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  retry?: RetryPolicy;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  delay?: (ms: number) => Promise<void>;
}

export const DEFAULT_USER_AGENT = 'gamedata-pipelines/0.1';

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

export class ApiPayloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly issues: ZodIssue[]
  ) {
    super(message);
    this.name = 'ApiPayloadError';
  }
}

const RETRY_AFTER_STATUSES = new Set([429, 503]);

const parseRetryAfter = (header: string | null): number | null => {
  if (!header) return null;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
};

export class JsonApiClient {
  protected readonly baseUrl: URL;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: Required<RetryPolicy>;
  private readonly defaultHeaders: Record<string, string>;
  private readonly delayImpl: (ms: number) => Promise<void>;

  constructor(options: JsonApiClientOptions) {
    // relative paths must resolve below the base path, not replace its last segment
    this.baseUrl = new URL(options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`);
    const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
    if (!fetchImpl) {
      throw new Error('Global fetch implementation not found. Pass options.fetchImpl explicitly.');
    }
    this.fetchImpl = fetchImpl;

    this.retry = {
      attempts: Math.max(1, options.retry?.attempts ?? 1),
      backoffMs: Math.max(0, options.retry?.backoffMs ?? 250),
      retryOnStatuses: options.retry?.retryOnStatuses ?? [408, 429, 500, 502, 503, 504],
    };

    this.defaultHeaders = {
      Accept: 'application/json',
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      ...options.defaultHeaders,
    };

    this.delayImpl = options.delay ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  resolve(pathOrUrl: string): URL {
    return new URL(pathOrUrl.replace(/^\/+/, ''), this.baseUrl);
  }

  async get<T>(pathOrUrl: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const url = this.resolve(pathOrUrl);
    const body = await this.request(url, { method: 'GET' });
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ApiPayloadError(`Unexpected payload from ${url.href}`, url.href, parsed.error.issues);
    }
    return parsed.data;
  }

  private async request(url: URL, init: RequestInit): Promise<unknown> {
    const headers = new Headers(this.defaultHeaders);
    if (init.headers) {
      new Headers(init.headers).forEach((value, key) => headers.set(key, value));
    }

    const attemptRequest = async (attempt: number): Promise<unknown> => {
      const response = await this.fetchImpl(url, { ...init, headers });

      if (!response.ok) {
        const body = await this.safeParseBody(response);
        const shouldRetry =
          attempt + 1 < this.retry.attempts &&
          this.retry.retryOnStatuses.includes(response.status);

        if (shouldRetry) {
          const retryAfter = RETRY_AFTER_STATUSES.has(response.status)
            ? parseRetryAfter(response.headers.get('retry-after'))
            : null;
          await this.delay(retryAfter ?? this.retry.backoffMs * Math.pow(2, attempt));
          return attemptRequest(attempt + 1);
        }

        throw new ApiRequestError(
          `Request to ${url.pathname} failed with status ${response.status}`,
          response.status,
          url.href,
          body
        );
      }

      return this.safeParseBody(response);
    };

    return attemptRequest(0);
  }

  private async safeParseBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    return response.text();
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) return;
    await this.delayImpl(ms);
  }
}
