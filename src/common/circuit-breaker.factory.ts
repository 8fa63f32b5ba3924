import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    timeouts: number;
    fires: number;
  };
}

@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private breakers: Map<string, CircuitBreaker> = new Map();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 30000,
    errorThreshold: 50, // % of failed calls that opens the circuit
    resetTimeout: 30000,
    volumeThreshold: 5, // calls before the error rate counts
  };

  createBreaker<TArgs extends unknown[], TResult>(
    name: string,
    action: (...args: TArgs) => Promise<TResult>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TArgs, TResult> {
    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker<TArgs, TResult>(action, {
      name,
      timeout: mergedConfig.timeout,
      errorThresholdPercentage: mergedConfig.errorThreshold,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,

      // 4xx answers are the caller's fault and do not trip the circuit
      errorFilter: (error: unknown) => {
        const statusCode =
          error instanceof Error && 'statusCode' in error
            ? Number(error.statusCode)
            : undefined;
        return (
          statusCode !== undefined && statusCode >= 400 && statusCode < 500
        );
      },
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
      this.logger.warn(`Circuit breaker timeout for ${name}`);
    });

    this.breakers.get(name)?.shutdown();
    this.breakers.set(name, breaker);
    return breaker;
  }

  /**
   * Get health status of all circuit breakers
   */
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
          timeouts: stats.timeouts,
          fires: stats.fires,
        },
      };
    });

    return health;
  }

  hasOpenCircuits(): boolean {
    for (const [, breaker] of this.breakers) {
      if (breaker.opened) {
        return true;
      }
    }
    return false;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
