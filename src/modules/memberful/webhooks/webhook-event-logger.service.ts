import { Injectable, OnModuleInit } from '@nestjs/common';
import { logger } from '../../../core/logger/logger.config';
import {
  MemberChanges,
  MemberfulWebhookEvent,
  SubscriptionChanges,
  assertNever,
} from '../../../domain/memberful';
import { WebhookHandlerRegistry } from './webhook-handler.registry';

export type EventSummary = Record<string, string | number | boolean | string[] | null>;

/**
 * Demo handler: logs one structured line per received event
 */
@Injectable()
export class WebhookEventLogger implements OnModuleInit {
  private readonly logger = logger();

  constructor(private readonly registry: WebhookHandlerRegistry) {}

  onModuleInit(): void {
    this.registry.onAny((event) => {
      this.logger.info(summarizeEvent(event), 'Memberful webhook received');
    });
  }
}

export function summarizeEvent(event: MemberfulWebhookEvent): EventSummary {
  switch (event.event) {
    case 'member_signup':
      return { event: event.event, memberId: event.member.id, email: event.member.email };
    case 'member_updated':
      return {
        event: event.event,
        memberId: event.member.id,
        changed: changedFields(event.changed),
      };
    case 'member.deleted':
      return { event: event.event, memberId: event.member.id };
    case 'subscription.created':
    case 'subscription.activated':
    case 'subscription.deactivated':
    case 'subscription.deleted':
      return {
        event: event.event,
        subscriptionId: event.subscription.id,
        memberId: event.subscription.member.id,
        plan: event.subscription.plan.name,
        active: event.subscription.active,
      };
    case 'subscription.updated':
      return {
        event: event.event,
        subscriptionId: event.subscription.id,
        memberId: event.subscription.member.id,
        changed: changedFields(event.changed),
      };
    case 'subscription.renewed':
      return {
        event: event.event,
        subscriptionId: event.subscription.id,
        orderUuid: event.order.uuid,
        expiresAt: event.subscription.expiresAt,
      };
    case 'order.purchased':
    case 'order.refunded':
    case 'order.completed':
    case 'order.suspended':
      return {
        event: event.event,
        orderUuid: event.order.uuid,
        status: event.order.status,
        total: event.order.total,
        memberId: event.order.member?.id ?? null,
      };
    case 'subscription_plan.created':
    case 'subscription_plan.updated':
    case 'subscription_plan.deleted':
      return { event: event.event, planId: event.subscription.id, name: event.subscription.name };
    case 'download.created':
    case 'download.updated':
    case 'download.deleted':
      return { event: event.event, productId: event.product.id, name: event.product.name };
    default:
      return assertNever(event);
  }
}

function changedFields(changes: MemberChanges | SubscriptionChanges | null): string[] {
  if (!changes) {
    return [];
  }
  return Object.entries(changes)
    .filter(([key, value]) => key !== 'extras' && value !== null)
    .map(([key]) => key);
}
