/**
 * Public entry point: the pure Memberful webhook core plus the NestJS
 * modules for the API client and the webhook receiver
 */

export * from './domain/memberful';
export { CoreModule } from './core/core.module';
export { validate as validateEnvironment, EnvironmentVariables } from './core/config/env.validation';
export {
  CLIENT_VERSION,
  MEMBERFUL_API_BREAKER,
  MemberfulApiClientService,
} from './modules/memberful/api/memberful-api-client.service';
export { MemberfulApiModule } from './modules/memberful/api/memberful-api.module';
export * from './modules/memberful/api/memberful-api.types';
export { MemberfulWebhookService } from './modules/memberful/webhooks/memberful-webhook.service';
export { MemberfulWebhooksModule } from './modules/memberful/webhooks/memberful-webhooks.module';
export {
  AnyWebhookHandler,
  WebhookHandler,
  WebhookHandlerRegistry,
} from './modules/memberful/webhooks/webhook-handler.registry';
export { summarizeEvent } from './modules/memberful/webhooks/webhook-event-logger.service';
