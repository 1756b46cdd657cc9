import { JsonObject } from '../decoding/memberful-entity';
import { WebhookEventType } from '../events/webhook-event-map';

export const memberJson = (overrides: JsonObject = {}): JsonObject => ({
  id: 42,
  email: 'ada@example.com',
  first_name: 'Ada',
  last_name: 'Lovelace',
  full_name: 'Ada Lovelace',
  created_at: 1700000000,
  signup_method: 'checkout',
  ...overrides,
});

export const planJson = (overrides: JsonObject = {}): JsonObject => ({
  id: 7,
  name: 'Monthly',
  slug: '7-monthly',
  price: 1000,
  renewal_period: 'monthly',
  interval_unit: 'month',
  interval_count: 1,
  for_sale: true,
  ...overrides,
});

export const subscriptionJson = (overrides: JsonObject = {}): JsonObject => ({
  id: 300,
  active: true,
  autorenew: true,
  created_at: '2024-01-01T00:00:00Z',
  expires_at: '2024-02-01T00:00:00Z',
  member: memberJson(),
  subscription_plan: planJson(),
  ...overrides,
});

export const memberSubscriptionJson = (overrides: JsonObject = {}): JsonObject => ({
  id: 301,
  active: true,
  created_at: 1700000000,
  expires: true,
  expires_at: 1702592000,
  subscription: planJson(),
  ...overrides,
});

export const productJson = (overrides: JsonObject = {}): JsonObject => ({
  id: 11,
  name: 'Field guide',
  price: 500,
  slug: '11-field-guide',
  ...overrides,
});

export const orderJson = (overrides: JsonObject = {}): JsonObject => ({
  uuid: 'order-0001',
  number: 'A100',
  total: 1000,
  status: 'completed',
  receipt: 'Thanks for your order',
  created_at: 1700000000,
  member: memberJson(),
  products: [productJson()],
  subscriptions: [memberSubscriptionJson()],
  ...overrides,
});

/**
 * One minimally complete payload per event type
 */
export const eventPayloads = (): Record<WebhookEventType, JsonObject> => ({
  member_signup: { event: 'member_signup', member: memberJson() },
  member_updated: {
    event: 'member_updated',
    member: memberJson({ email: 'ada@example.org' }),
    changed: { email: ['ada@example.com', 'ada@example.org'] },
  },
  'member.deleted': { event: 'member.deleted', member: { id: 42, deleted: true } },
  'subscription.created': { event: 'subscription.created', subscription: subscriptionJson() },
  'subscription.updated': {
    event: 'subscription.updated',
    subscription: subscriptionJson({ autorenew: false }),
    changed: { autorenew: [true, false] },
  },
  'subscription.activated': {
    event: 'subscription.activated',
    subscription: subscriptionJson(),
  },
  'subscription.deactivated': {
    event: 'subscription.deactivated',
    subscription: subscriptionJson({ active: false }),
  },
  'subscription.deleted': { event: 'subscription.deleted', subscription: subscriptionJson() },
  'subscription.renewed': {
    event: 'subscription.renewed',
    subscription: subscriptionJson(),
    order: orderJson(),
  },
  'order.purchased': { event: 'order.purchased', order: orderJson() },
  'order.refunded': { event: 'order.refunded', order: orderJson() },
  'order.completed': { event: 'order.completed', order: orderJson() },
  'order.suspended': { event: 'order.suspended', order: orderJson({ status: 'suspended' }) },
  'subscription_plan.created': { event: 'subscription_plan.created', subscription: planJson() },
  'subscription_plan.updated': { event: 'subscription_plan.updated', subscription: planJson() },
  'subscription_plan.deleted': { event: 'subscription_plan.deleted', subscription: planJson() },
  'download.created': { event: 'download.created', product: productJson() },
  'download.updated': { event: 'download.updated', product: productJson() },
  'download.deleted': { event: 'download.deleted', product: productJson() },
});
