import {
  fplBootstrapSchema,
  fplFixturesSchema,
  type FPLBootstrap,
  type FPLFixture
} from '@shared/schema';
import { ProxyAgent, setGlobalDispatcher } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { getConfig } from '../config';
import type { ProviderCallMetadata } from './providers/baseProvider';
import { FPLProvider } from './providers/fplProvider';

interface CacheEntry {
  data: unknown;
  timestamp: number;
}

export interface FPLApiOptions {
  provider?: FPLProvider;
  cacheTtlMs?: number;
  proxyUrl?: string;
  now?: () => number;
}

let proxyInstalled = false;

function installProxy(proxyUrl: string | undefined): void {
  if (!proxyUrl || proxyInstalled) {
    return;
  }
  try {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
    proxyInstalled = true;
    console.log(`[FPLApiService] Using proxy for outbound requests: ${proxyUrl}`);
  } catch (error) {
    console.warn('[FPLApiService] Failed to initialise proxy agent:', error);
  }
}

export class FPLApiService {
  private static instance: FPLApiService;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly cacheExpiry: number;
  private readonly provider: FPLProvider;
  private readonly now: () => number;

  public static getInstance(): FPLApiService {
    if (!FPLApiService.instance) {
      FPLApiService.instance = new FPLApiService();
    }
    return FPLApiService.instance;
  }

  static create(options: FPLApiOptions): FPLApiService {
    return new FPLApiService(options);
  }

  private constructor(options: FPLApiOptions = {}) {
    const { fpl } = getConfig();
    installProxy(options.proxyUrl ?? fpl.proxyUrl);
    this.cacheExpiry = options.cacheTtlMs ?? fpl.cacheTtlMs;
    this.provider = options.provider ?? new FPLProvider();
    this.now = options.now ?? Date.now;
  }

  getProviderMetadata(): ProviderCallMetadata {
    return this.provider.getMetadata();
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Serves fresh cache hits, otherwise fetches and validates. A failed fetch
   * falls back to the last good payload when there is one.
   */
  private async fetchWithCache<T>(
    cacheKey: string,
    fetcher: () => Promise<unknown>,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: { force?: boolean } = {},
  ): Promise<T> {
    const cached = this.cache.get(cacheKey);
    const now = this.now();

    if (cached && !options.force && now - cached.timestamp < this.cacheExpiry) {
      return schema.parse(cached.data);
    }

    try {
      const data = schema.parse(await fetcher());
      this.cache.set(cacheKey, { data, timestamp: now });
      return data;
    } catch (error) {
      console.error(`[FPLApiService] Error for ${cacheKey}:`, error);
      if (cached) {
        console.warn(`[FPLApiService] Using stale cache for ${cacheKey} due to error.`);
        return schema.parse(cached.data);
      }
      throw new Error(`Failed to fetch data from FPL API: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  async getBootstrapData(options?: { force?: boolean }): Promise<FPLBootstrap> {
    return this.fetchWithCache('bootstrap', () => this.provider.getBootstrapStatic(), fplBootstrapSchema, options);
  }

  async getFixtures(options?: { force?: boolean }): Promise<FPLFixture[]> {
    return this.fetchWithCache('fixtures', () => this.provider.getFixtures(), fplFixturesSchema, options);
  }

  async getCurrentGameweek(): Promise<number> {
    const bootstrap = await this.getBootstrapData();
    const currentEvent = bootstrap.events.find(event => event.is_current);
    return currentEvent?.id ?? 1;
  }
}
