import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  name: string;
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  /**
   * Return true for errors that should not count as failures
   */
  errorFilter?: (error: unknown) => boolean;
}

export type CircuitBreakerStateName = 'closed' | 'open' | 'halfOpen';

export interface CircuitBreakerState {
  state: CircuitBreakerStateName;
  enabled: boolean;
  failures: number;
  fires: number;
}

type TrackedBreaker = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'enabled' | 'stats' | 'shutdown'
>;

@Injectable()
export class CircuitBreakerService implements OnModuleDestroy {
  private readonly logger = logger();
  private readonly breakers = new Map<string, TrackedBreaker>();

  constructor(private readonly configService: ConfigService) {}

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const { name } = options;
    const breaker = new CircuitBreaker(fn, {
      name,
      timeout:
        options.timeout ??
        this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 150000),
      errorThresholdPercentage:
        options.errorThresholdPercentage ??
        this.configService.get<number>('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50),
      resetTimeout:
        options.resetTimeout ??
        this.configService.get<number>('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000),
      errorFilter: options.errorFilter,
    });

    breaker.on('open', () => {
      this.logger.warn({ circuitBreaker: name, state: 'open' }, 'Circuit breaker opened');
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info({ circuitBreaker: name, state: 'close' }, 'Circuit breaker closed');
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.error(
        {
          circuitBreaker: name,
          error: error instanceof Error ? error.message : String(error),
        },
        'Circuit breaker failure',
      );
    });

    this.breakers.get(name)?.shutdown();
    this.breakers.set(name, breaker);
    return breaker;
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    return breaker ? describe(breaker) : null;
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = describe(breaker);
    });
    return states;
  }

  isOpen(name: string): boolean {
    return this.getCircuitBreakerState(name)?.state === 'open';
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}

function describe(breaker: TrackedBreaker): CircuitBreakerState {
  let state: CircuitBreakerStateName = 'closed';
  if (breaker.halfOpen) {
    state = 'halfOpen';
  } else if (breaker.opened) {
    state = 'open';
  }

  return {
    state,
    enabled: breaker.enabled,
    failures: breaker.stats.failures,
    fires: breaker.stats.fires,
  };
}
