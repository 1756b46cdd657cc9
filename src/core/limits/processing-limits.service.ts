import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface PagingLimits {
  maxPages: number;
  pageDelayMs: number;
}

@Injectable()
export class ProcessingLimitsService {
  constructor(private readonly configService: ConfigService) {}

  getPagingLimits(): PagingLimits {
    return {
      maxPages: this.configService.get<number>('MAX_PAGES', 1000),
      pageDelayMs: this.configService.get<number>('MEMBERFUL_API_PAGE_DELAY_MS', 100),
    };
  }

  getApiCallTimeout(): number {
    return this.configService.get<number>('API_CALL_TIMEOUT', 10000);
  }

  getRetryPolicy(): { maxRetries: number; backoffBaseMs: number } {
    return {
      maxRetries: this.configService.get<number>('MEMBERFUL_API_MAX_RETRIES', 3),
      backoffBaseMs: this.configService.get<number>(
        'MEMBERFUL_API_RETRY_BACKOFF_BASE_MS',
        1000,
      ),
    };
  }
}
