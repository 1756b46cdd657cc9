import { decodeEntity } from '../decoding/entity-decoder';
import { isJsonObject } from '../decoding/memberful-entity';
import {
  UnsupportedEventTypeError,
  ValidationError,
} from '../errors/memberful.errors';
import {
  MemberfulWebhookEvent,
  WEBHOOK_EVENT_CLASSES,
  WebhookEventMap,
  WebhookEventType,
  isSupportedEventType,
} from '../events/webhook-event-map';

/**
 * Decode a parsed webhook body into its event variant.
 *
 * The `event` value is matched exactly (case-sensitive) against the known
 * discriminators. Pure: no state, no I/O.
 *
 * @throws UnsupportedEventTypeError when `event` is unknown, missing or not a string
 * @throws ValidationError when the payload does not fit the variant
 *
 * @example
 * const event = parsePayload(JSON.parse(rawBody));
 * if (event.event === 'member_signup') {
 *   console.log(event.member.email);
 * }
 */
export function parsePayload(payload: unknown): MemberfulWebhookEvent {
  if (!isJsonObject(payload)) {
    throw new ValidationError('WebhookPayload', [
      { path: '', messages: ['expected a JSON object'] },
    ]);
  }

  const eventType = payload.event;
  if (!isSupportedEventType(eventType)) {
    throw new UnsupportedEventTypeError(
      typeof eventType === 'string' ? eventType : null,
      eventType ?? null,
    );
  }

  return decodeEvent(eventType, payload);
}

/**
 * Decode a payload as one specific variant
 */
export function decodeEvent<K extends WebhookEventType>(
  eventType: K,
  payload: unknown,
): WebhookEventMap[K] {
  return decodeEntity(WEBHOOK_EVENT_CLASSES[eventType], payload);
}
