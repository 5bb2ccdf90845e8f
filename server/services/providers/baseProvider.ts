import { performance } from 'perf_hooks';
import { EngineError } from '../errors';

export type ProviderStatus = 'online' | 'degraded' | 'offline';

export interface ProviderCallMetadata {
  provider: string;
  status: ProviderStatus;
  lastOperation?: string;
  lastSuccessAt?: Date;
  lastErrorAt?: Date;
  lastError?: string;
  lastLatencyMs?: number;
  totalRequests: number;
  consecutiveFailures: number;
  circuitOpenedAt?: Date;
}

export interface ProviderAdapterConfig {
  failureThreshold?: number;
  cooldownMs?: number;
  now?: () => number;
}

export class ProviderCircuitOpenError extends EngineError {
  constructor(public readonly provider: string) {
    super(`Circuit breaker is open for provider: ${provider}`, 'PROVIDER_CIRCUIT_OPEN', 503);
  }
}

const DEFAULT_CONFIG = {
  failureThreshold: 3,
  cooldownMs: 60_000,
};

export abstract class BaseProviderAdapter {
  protected readonly metadata: ProviderCallMetadata;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(provider: string, config?: ProviderAdapterConfig) {
    this.metadata = {
      provider,
      status: 'online',
      totalRequests: 0,
      consecutiveFailures: 0,
    };
    this.failureThreshold = config?.failureThreshold ?? DEFAULT_CONFIG.failureThreshold;
    this.cooldownMs = config?.cooldownMs ?? DEFAULT_CONFIG.cooldownMs;
    this.now = config?.now ?? Date.now;
  }

  /**
   * Wraps one upstream call with the circuit breaker. After `failureThreshold`
   * consecutive failures calls are refused until `cooldownMs` has passed; the
   * next call after the cooldown is a trial.
   */
  protected async run<T>(operation: string, handler: () => Promise<T>): Promise<T> {
    if (this.metadata.circuitOpenedAt) {
      const elapsed = this.now() - this.metadata.circuitOpenedAt.getTime();
      if (elapsed < this.cooldownMs) {
        throw new ProviderCircuitOpenError(this.metadata.provider);
      }

      // Cooldown elapsed; reset breaker
      this.metadata.circuitOpenedAt = undefined;
      this.metadata.consecutiveFailures = 0;
      this.metadata.status = 'degraded';
    }

    this.metadata.lastOperation = operation;
    const start = performance.now();
    try {
      const result = await handler();
      this.metadata.lastLatencyMs = Math.round(performance.now() - start);
      this.metadata.lastSuccessAt = new Date(this.now());
      this.metadata.status = 'online';
      this.metadata.consecutiveFailures = 0;
      this.metadata.totalRequests += 1;
      return result;
    } catch (error) {
      this.metadata.lastLatencyMs = Math.round(performance.now() - start);
      this.metadata.lastErrorAt = new Date(this.now());
      this.metadata.lastError = error instanceof Error ? error.message : String(error);
      this.metadata.totalRequests += 1;
      this.metadata.consecutiveFailures += 1;

      if (this.metadata.consecutiveFailures >= this.failureThreshold) {
        this.metadata.status = 'offline';
        this.metadata.circuitOpenedAt = new Date(this.now());
        console.warn(`[${this.metadata.provider}] Circuit opened after ${this.metadata.consecutiveFailures} failures (${operation})`);
      } else {
        this.metadata.status = 'degraded';
      }

      throw error;
    }
  }

  getMetadata(): ProviderCallMetadata {
    return { ...this.metadata };
  }

  resetCircuit(): void {
    this.metadata.circuitOpenedAt = undefined;
    this.metadata.consecutiveFailures = 0;
    this.metadata.status = 'online';
  }
}
