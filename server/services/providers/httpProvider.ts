import { BaseProviderAdapter, type ProviderAdapterConfig } from "./baseProvider";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpProviderConfig extends ProviderAdapterConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
}

export interface HttpRequestOptions {
  retries?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export class HttpStatusError extends Error {
  constructor(public readonly status: number, statusText: string, public readonly url: string) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = 'HttpStatusError';
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class HttpProviderAdapter extends BaseProviderAdapter {
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeout: number;
  private readonly defaultRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(provider: string, config: HttpProviderConfig) {
    super(provider, config);
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultTimeout = config.timeoutMs ?? 15000;
    this.defaultRetries = config.retries ?? 2;
    this.retryDelayMs = config.retryDelayMs ?? 250;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /** Parsed JSON body; callers validate the shape. */
  async getJson(path: string, options?: HttpRequestOptions): Promise<unknown> {
    return this.request('GET', path, async response => {
      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText, response.url);
      }
      const body: unknown = await response.json();
      return body;
    }, options);
  }

  protected async request<T>(method: string, path: string, parser: (response: Response) => Promise<T>, options?: HttpRequestOptions): Promise<T> {
    const url = this.resolveUrl(path);
    const retries = options?.retries ?? this.defaultRetries;
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeout;
    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      ...(options?.headers ?? {}),
    };

    return this.run(`${method.toUpperCase()} ${url}`, async () => {
      let lastError: unknown;
      for (let attempt = 0; attempt <= retries; attempt++) {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);
        try {
          const response = await this.fetchImpl(url, {
            method,
            headers,
            signal: controller.signal,
          });
          return await parser(response);
        } catch (error) {
          lastError = error;
          if (attempt === retries) {
            throw error;
          }
          console.warn(`[${this.getMetadata().provider}] ${method} ${url} failed (attempt ${attempt + 1}/${retries + 1}), retrying`);
          await delay(this.retryDelayMs * (attempt + 1));
        } finally {
          clearTimeout(timeout);
        }
      }
      throw lastError ?? new Error('Unknown HTTP provider error');
    });
  }

  private resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) {
      return path;
    }
    return `${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`;
  }
}
