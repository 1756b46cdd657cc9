import {
  InvalidSignatureError,
  MalformedPayloadError,
} from '../errors/memberful.errors';
import { MemberfulWebhookEvent } from '../events/webhook-event-map';
import { parsePayload } from './parse-payload';
import { RawPayload, verifySignature } from './signature';

export interface ProcessWebhookOptions {
  /**
   * Shared secret; when absent the body is accepted unverified
   */
  secret?: string | null;
}

/**
 * Verify, JSON-decode and dispatch a raw webhook body.
 *
 * When a secret is given the signature is checked before the body is parsed.
 */
export function processWebhook(
  rawBody: RawPayload,
  signature: string | null | undefined,
  options: ProcessWebhookOptions = {},
): MemberfulWebhookEvent {
  const { secret } = options;

  if (secret) {
    if (!signature) {
      throw new InvalidSignatureError('Missing webhook signature');
    }
    if (!verifySignature(rawBody, signature, secret)) {
      throw new InvalidSignatureError();
    }
  }

  return parsePayload(decodeJson(rawBody));
}

function decodeJson(rawBody: RawPayload): unknown {
  const text =
    typeof rawBody === 'string' ? rawBody : Buffer.from(rawBody).toString('utf8');

  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new MalformedPayloadError(
      `Webhook body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
