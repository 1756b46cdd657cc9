import { Module } from '@nestjs/common';
import { RateLimiterService } from '../../../core/limits/rate-limiter.service';
import { MemberfulApiClientService } from './memberful-api-client.service';

@Module({
  providers: [MemberfulApiClientService, RateLimiterService],
  exports: [MemberfulApiClientService],
})
export class MemberfulApiModule {}
