/**
 * Barrel export for the Memberful domain: entities, events and the pure
 * webhook core
 */

export * from './decoding/entity-decoder';
export * from './decoding/memberful-entity';
export * from './decoding/validators';
export * from './decoding/wire-field.decorator';
export * from './errors/memberful.errors';
export * from './events/webhook-event-map';
export * from './events/webhook-events';
export * from './models';
export * from './webhooks/parse-payload';
export * from './webhooks/process-webhook';
export * from './webhooks/signature';
