import { EntityConstructor } from '../decoding/wire-field.decorator';
import {
  DownloadCreatedEvent,
  DownloadDeletedEvent,
  DownloadUpdatedEvent,
  MemberDeletedEvent,
  MemberSignupEvent,
  MemberUpdatedEvent,
  OrderCompletedEvent,
  OrderPurchasedEvent,
  OrderRefundedEvent,
  OrderSuspendedEvent,
  SubscriptionActivatedEvent,
  SubscriptionCreatedEvent,
  SubscriptionDeactivatedEvent,
  SubscriptionDeletedEvent,
  SubscriptionPlanCreatedEvent,
  SubscriptionPlanDeletedEvent,
  SubscriptionPlanUpdatedEvent,
  SubscriptionRenewedEvent,
  SubscriptionUpdatedEvent,
} from './webhook-events';

/**
 * Discriminator → event class
 */
export interface WebhookEventMap {
  member_signup: MemberSignupEvent;
  member_updated: MemberUpdatedEvent;
  'member.deleted': MemberDeletedEvent;
  'subscription.created': SubscriptionCreatedEvent;
  'subscription.updated': SubscriptionUpdatedEvent;
  'subscription.activated': SubscriptionActivatedEvent;
  'subscription.deactivated': SubscriptionDeactivatedEvent;
  'subscription.deleted': SubscriptionDeletedEvent;
  'subscription.renewed': SubscriptionRenewedEvent;
  'order.purchased': OrderPurchasedEvent;
  'order.refunded': OrderRefundedEvent;
  'order.completed': OrderCompletedEvent;
  'order.suspended': OrderSuspendedEvent;
  'subscription_plan.created': SubscriptionPlanCreatedEvent;
  'subscription_plan.updated': SubscriptionPlanUpdatedEvent;
  'subscription_plan.deleted': SubscriptionPlanDeletedEvent;
  'download.created': DownloadCreatedEvent;
  'download.updated': DownloadUpdatedEvent;
  'download.deleted': DownloadDeletedEvent;
}

export type WebhookEventType = keyof WebhookEventMap;

export type MemberfulWebhookEvent = WebhookEventMap[WebhookEventType];

export const WEBHOOK_EVENT_CLASSES: {
  readonly [K in WebhookEventType]: EntityConstructor<WebhookEventMap[K]>;
} = {
  member_signup: MemberSignupEvent,
  member_updated: MemberUpdatedEvent,
  'member.deleted': MemberDeletedEvent,
  'subscription.created': SubscriptionCreatedEvent,
  'subscription.updated': SubscriptionUpdatedEvent,
  'subscription.activated': SubscriptionActivatedEvent,
  'subscription.deactivated': SubscriptionDeactivatedEvent,
  'subscription.deleted': SubscriptionDeletedEvent,
  'subscription.renewed': SubscriptionRenewedEvent,
  'order.purchased': OrderPurchasedEvent,
  'order.refunded': OrderRefundedEvent,
  'order.completed': OrderCompletedEvent,
  'order.suspended': OrderSuspendedEvent,
  'subscription_plan.created': SubscriptionPlanCreatedEvent,
  'subscription_plan.updated': SubscriptionPlanUpdatedEvent,
  'subscription_plan.deleted': SubscriptionPlanDeletedEvent,
  'download.created': DownloadCreatedEvent,
  'download.updated': DownloadUpdatedEvent,
  'download.deleted': DownloadDeletedEvent,
};

export const SUPPORTED_EVENT_TYPES: readonly WebhookEventType[] = Object.freeze([
  'member_signup',
  'member_updated',
  'member.deleted',
  'subscription.created',
  'subscription.updated',
  'subscription.activated',
  'subscription.deactivated',
  'subscription.deleted',
  'subscription.renewed',
  'order.purchased',
  'order.refunded',
  'order.completed',
  'order.suspended',
  'subscription_plan.created',
  'subscription_plan.updated',
  'subscription_plan.deleted',
  'download.created',
  'download.updated',
  'download.deleted',
] as const);

export const isSupportedEventType = (value: unknown): value is WebhookEventType =>
  typeof value === 'string' &&
  Object.prototype.hasOwnProperty.call(WEBHOOK_EVENT_CLASSES, value);

/**
 * Compile-time exhaustiveness check for switches over `event.event`
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled webhook event: ${JSON.stringify(value)}`);
}

/**
 * Narrow a decoded event to one variant
 */
export function isEventOf<K extends WebhookEventType>(
  event: MemberfulWebhookEvent,
  eventType: K,
): event is WebhookEventMap[K] {
  return event.event === eventType;
}
