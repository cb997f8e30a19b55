import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import {
  MalformedOracleResponseError,
  OracleUnavailableError,
} from '../matching/matching.errors';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
  /**
   * When false the breaker never opens and only enforces `timeout`;
   * every call reaches the action whatever earlier calls did.
   */
  tripOnFailure: boolean;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    fires: number;
    timeouts: number;
  };
}

type BreakerHandle = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'stats' | 'shutdown'
>;

const OPOSSUM_UNAVAILABLE_CODES = new Set(['ETIMEDOUT', 'EOPENBREAKER', 'ESHUTDOWN']);

/**
 * Translates opossum's own rejections (timeout, open circuit) into
 * OracleUnavailableError; other errors pass through untouched.
 */
export function translateBreakerError(error: unknown): unknown {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    if (typeof code === 'string' && OPOSSUM_UNAVAILABLE_CODES.has(code)) {
      return new OracleUnavailableError(error.message, { cause: error });
    }
  }
  return error;
}

@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private readonly breakers = new Map<string, BreakerHandle>();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 30000,
    errorThreshold: 50, // 50% failure rate
    resetTimeout: 30000,
    volumeThreshold: 10, // Min requests before calculating failure %
    tripOnFailure: true,
  };

  createBreaker<TI extends unknown[], TR>(
    name: string,
    action: (...args: TI) => Promise<TR>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TI, TR> {
    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TI, TR>(action, {
      name,
      timeout: mergedConfig.timeout,
      // opossum opens only when the failure rate exceeds this; 100 is never exceeded
      errorThresholdPercentage: mergedConfig.tripOnFailure ? mergedConfig.errorThreshold : 100,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,
      // A reachable oracle that answers garbage is not an outage
      errorFilter: (error: unknown) => error instanceof MalformedOracleResponseError,
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });

    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });

    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });

    breaker.on('timeout', () => {
      this.logger.warn(
        `Circuit breaker timeout for ${name} after ${mergedConfig.timeout}ms`,
      );
    });

    this.breakers.get(name)?.shutdown();
    this.breakers.set(name, breaker);
    return breaker;
  }

  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};

    this.breakers.forEach((breaker, name) => {
      const stats = breaker.stats;
      health[name] = {
        state: breaker.opened
          ? 'OPEN'
          : breaker.halfOpen
            ? 'HALF_OPEN'
            : 'CLOSED',
        stats: {
          failures: stats.failures,
          successes: stats.successes,
          rejects: stats.rejects,
          fires: stats.fires,
          timeouts: stats.timeouts,
        },
      };
    });

    return health;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
