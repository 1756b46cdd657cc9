import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { raw } from 'express';
import { MemberfulWebhookController } from './memberful-webhook.controller';
import { MemberfulWebhookService } from './memberful-webhook.service';
import { WebhookEventLogger } from './webhook-event-logger.service';
import { WebhookHandlerRegistry } from './webhook-handler.registry';

@Module({
  controllers: [MemberfulWebhookController],
  providers: [MemberfulWebhookService, WebhookHandlerRegistry, WebhookEventLogger],
  exports: [MemberfulWebhookService, WebhookHandlerRegistry],
})
export class MemberfulWebhooksModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    // signatures cover the exact bytes, so the body must stay unparsed
    consumer
      .apply(raw({ type: () => true, limit: '1mb' }))
      .forRoutes(MemberfulWebhookController);
  }
}
