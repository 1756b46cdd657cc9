import { Injectable } from '@nestjs/common';
import {
  MemberfulWebhookEvent,
  WebhookEventMap,
  WebhookEventType,
  isEventOf,
} from '../../../domain/memberful';

export type WebhookHandler<K extends WebhookEventType> = (
  event: WebhookEventMap[K],
) => void | Promise<void>;

export type AnyWebhookHandler = (event: MemberfulWebhookEvent) => void | Promise<void>;

/**
 * Typed handler registrations per event variant.
 *
 * Handlers run sequentially: variant handlers in registration order, then
 * catch-all handlers. A failing handler stops the dispatch and its error
 * reaches the caller.
 */
@Injectable()
export class WebhookHandlerRegistry {
  private readonly handlers = new Map<WebhookEventType, AnyWebhookHandler[]>();
  private readonly catchAll: AnyWebhookHandler[] = [];

  on<K extends WebhookEventType>(eventType: K, handler: WebhookHandler<K>): this {
    const list = this.handlers.get(eventType) ?? [];
    list.push((event) => (isEventOf(event, eventType) ? handler(event) : undefined));
    this.handlers.set(eventType, list);
    return this;
  }

  onAny(handler: AnyWebhookHandler): this {
    this.catchAll.push(handler);
    return this;
  }

  handlerCount(eventType: WebhookEventType): number {
    return (this.handlers.get(eventType)?.length ?? 0) + this.catchAll.length;
  }

  /**
   * @returns the number of handlers invoked
   */
  async dispatch(event: MemberfulWebhookEvent): Promise<number> {
    const handlers = [...(this.handlers.get(event.event) ?? []), ...this.catchAll];

    for (const handler of handlers) {
      await handler(event);
    }

    return handlers.length;
  }
}
