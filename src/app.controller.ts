import { Controller, Get } from '@nestjs/common';
import { SUPPORTED_EVENT_TYPES, WebhookEventType } from './domain/memberful';

export interface ServiceInfo {
  message: string;
  endpoints: Record<string, string>;
  supportedEvents: readonly WebhookEventType[];
}

@Controller()
export class AppController {
  @Get()
  getInfo(): ServiceInfo {
    return {
      message: 'Memberful webhook receiver',
      endpoints: {
        webhook: 'POST /api/webhooks/memberful',
        health: 'GET /api/health',
      },
      supportedEvents: SUPPORTED_EVENT_TYPES,
    };
  }
}
