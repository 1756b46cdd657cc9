import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { MEMBERFUL_API_BREAKER } from '../memberful/api/memberful-api-client.service';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly circuitBreakerService: CircuitBreakerService) {
    super();
  }

  checkMemberfulApi(): HealthIndicatorResult {
    const state = this.circuitBreakerService.getCircuitBreakerState(MEMBERFUL_API_BREAKER);
    if (!state) {
      return this.getStatus(MEMBERFUL_API_BREAKER, true, {
        message: 'Circuit breaker not initialized',
      });
    }

    const isHealthy = state.state !== 'open';
    const result = this.getStatus(MEMBERFUL_API_BREAKER, isHealthy, { ...state });
    if (!isHealthy) {
      throw new HealthCheckError('Memberful API circuit breaker is open', result);
    }
    return result;
  }

  checkCircuitBreakers(): HealthIndicatorResult {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.keys(allBreakers).filter(
      (name) => allBreakers[name].state === 'open',
    );
    const isHealthy = openBreakers.length === 0;

    const result = this.getStatus('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers,
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
    if (!isHealthy) {
      throw new HealthCheckError('Circuit breakers open', result);
    }
    return result;
  }
}
