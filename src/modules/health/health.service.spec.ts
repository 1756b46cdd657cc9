import { ConfigService } from '@nestjs/config';
import { HealthCheckError } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { MEMBERFUL_API_BREAKER } from '../memberful/api/memberful-api-client.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let breakers: CircuitBreakerService;
  let health: HealthService;

  beforeEach(() => {
    breakers = new CircuitBreakerService(new ConfigService({}));
    health = new HealthService(breakers);
  });

  afterEach(() => {
    breakers.onModuleDestroy();
  });

  it('reports up before the API client made any request', () => {
    expect(health.checkMemberfulApi()).toEqual({
      [MEMBERFUL_API_BREAKER]: { status: 'up', message: 'Circuit breaker not initialized' },
    });
  });

  it('reports the breaker state while closed', () => {
    breakers.createCircuitBreaker(async () => 'ok', { name: MEMBERFUL_API_BREAKER });

    expect(health.checkMemberfulApi()).toEqual({
      [MEMBERFUL_API_BREAKER]: {
        status: 'up',
        state: 'closed',
        enabled: true,
        failures: 0,
        fires: 0,
      },
    });
  });

  it('fails the check when the breaker is open', async () => {
    const breaker = breakers.createCircuitBreaker(
      async () => {
        throw new Error('upstream down');
      },
      { name: MEMBERFUL_API_BREAKER },
    );
    await expect(breaker.fire()).rejects.toThrow('upstream down');

    expect(() => health.checkMemberfulApi()).toThrow(HealthCheckError);
    expect(() => health.checkCircuitBreakers()).toThrow('Circuit breakers open');
  });
});
