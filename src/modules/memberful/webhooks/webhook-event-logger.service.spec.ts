import { eventPayloads } from '../../../domain/memberful/__fixtures__/payloads';
import { SUPPORTED_EVENT_TYPES, parsePayload } from '../../../domain/memberful';
import { WebhookEventLogger, summarizeEvent } from './webhook-event-logger.service';
import { WebhookHandlerRegistry } from './webhook-handler.registry';

describe('summarizeEvent', () => {
  it.each(SUPPORTED_EVENT_TYPES)('summarizes %s', (eventType) => {
    const summary = summarizeEvent(parsePayload(eventPayloads()[eventType]));

    expect(summary.event).toBe(eventType);
  });

  it('lists changed member fields by property name', () => {
    const summary = summarizeEvent(parsePayload(eventPayloads().member_updated));

    expect(summary).toEqual({ event: 'member_updated', memberId: 42, changed: ['email'] });
  });

  it('summarizes orders', () => {
    const summary = summarizeEvent(parsePayload(eventPayloads()['order.suspended']));

    expect(summary).toEqual({
      event: 'order.suspended',
      orderUuid: 'order-0001',
      status: 'suspended',
      total: 1000,
      memberId: 42,
    });
  });
});

describe('WebhookEventLogger', () => {
  it('registers a catch-all handler on init', () => {
    const registry = new WebhookHandlerRegistry();
    new WebhookEventLogger(registry).onModuleInit();

    expect(registry.handlerCount('download.created')).toBe(1);
  });
});
