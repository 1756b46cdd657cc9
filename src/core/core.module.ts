import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from './limits/processing-limits.service';
import { TimeoutInterceptor } from './timeout/timeout.interceptor';

@Global()
@Module({
  imports: [
    ConfigModule,
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 5,
    }),
  ],
  providers: [CircuitBreakerService, ProcessingLimitsService, TimeoutInterceptor],
  exports: [HttpModule, CircuitBreakerService, ProcessingLimitsService, TimeoutInterceptor],
})
export class CoreModule {}
