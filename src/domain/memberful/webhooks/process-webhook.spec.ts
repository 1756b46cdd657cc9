import { eventPayloads } from '../__fixtures__/payloads';
import {
  InvalidSignatureError,
  MalformedPayloadError,
  UnsupportedEventTypeError,
} from '../errors/memberful.errors';
import { processWebhook } from './process-webhook';
import { computeSignature } from './signature';

const SECRET = 'test-secret';
const BODY = JSON.stringify(eventPayloads().member_signup);

describe('processWebhook', () => {
  describe('with a secret', () => {
    it('returns the event for a valid signature', () => {
      const event = processWebhook(BODY, computeSignature(BODY, SECRET), { secret: SECRET });

      expect(event.event).toBe('member_signup');
    });

    it('accepts the raw body as a buffer', () => {
      const raw = Buffer.from(BODY, 'utf8');
      const event = processWebhook(raw, computeSignature(raw, SECRET), { secret: SECRET });

      expect(event.event).toBe('member_signup');
    });

    it('rejects a missing signature', () => {
      expect(() => processWebhook(BODY, undefined, { secret: SECRET })).toThrow(
        new InvalidSignatureError('Missing webhook signature'),
      );
    });

    it('rejects a wrong signature', () => {
      const signature = computeSignature(BODY, 'other-secret');

      expect(() => processWebhook(BODY, signature, { secret: SECRET })).toThrow(
        new InvalidSignatureError('Invalid webhook signature'),
      );
    });

    it('checks the signature before parsing the body', () => {
      expect(() => processWebhook('{not json', 'sha256=00', { secret: SECRET })).toThrow(
        InvalidSignatureError,
      );
    });
  });

  describe('without a secret', () => {
    it('accepts the body unverified', () => {
      const event = processWebhook(BODY, null);

      expect(event.event).toBe('member_signup');
    });

    it('ignores any signature header', () => {
      expect(processWebhook(BODY, 'sha256=00', { secret: null }).event).toBe('member_signup');
    });
  });

  it('reports malformed JSON', () => {
    expect.assertions(3);
    try {
      processWebhook('{"event":', null);
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedPayloadError);
      expect(error instanceof MalformedPayloadError && error.message).toMatch(
        /^Webhook body is not valid JSON: /,
      );
      expect(error instanceof MalformedPayloadError && error.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it('passes dispatch errors through', () => {
    expect(() => processWebhook('{"event":"member.created"}', null)).toThrow(
      UnsupportedEventTypeError,
    );
  });
});
