/**
 * Memberful error taxonomy
 *
 * Decode and signature errors are raised by the pure webhook core. Transport
 * errors are raised by the API client only, so retry logic can tell them apart
 * from validation failures.
 */

export class MemberfulError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A single constraint failure inside an entity tree
 */
export interface ValidationIssue {
  /**
   * Wire path below the entity root, e.g. `member.email` or `products[0].price`;
   * empty when the root value itself is rejected
   */
  path: string;
  messages: string[];
}

/**
 * A JSON object did not satisfy an entity's required fields or types
 */
export class ValidationError extends MemberfulError {
  readonly entity: string;
  readonly field: string | null;
  readonly issues: readonly ValidationIssue[];

  constructor(entity: string, issues: ValidationIssue[]) {
    const summary = issues
      .map((issue) => {
        const location = issue.path ? `${entity}.${issue.path}` : entity;
        return `${location} ${issue.messages.join(', ')}`;
      })
      .join('; ');
    super(`Invalid ${entity} payload: ${summary}`);
    this.entity = entity;
    this.field = issues[0]?.path || null;
    this.issues = Object.freeze([...issues]);
  }
}

export class UnsupportedEventTypeError extends MemberfulError {
  /**
   * The offending discriminator, or null when `event` was missing or not a string
   */
  readonly eventType: string | null;

  constructor(eventType: string | null, rawValue: unknown = eventType) {
    super(`Unsupported event type: ${formatRaw(rawValue)}`);
    this.eventType = eventType;
  }
}

export class InvalidSignatureError extends MemberfulError {
  constructor(message = 'Invalid webhook signature') {
    super(message);
  }
}

export class MalformedPayloadError extends MemberfulError {
  constructor(message = 'Webhook body is not valid JSON', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TransportError extends MemberfulError {
  readonly statusCode: number | null;
  readonly endpoint: string;
  readonly details: unknown;

  constructor(
    message: string,
    statusCode: number | null,
    endpoint: string,
    options?: { cause?: unknown; details?: unknown },
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.endpoint = endpoint;
    this.details = options?.details;
  }
}

export class RetryExhaustedError extends MemberfulError {
  readonly attempts: number;
  readonly endpoint: string;

  constructor(endpoint: string, attempts: number, cause: unknown) {
    super(
      `Memberful API request to ${endpoint} failed after ${attempts} attempts`,
      { cause },
    );
    this.attempts = attempts;
    this.endpoint = endpoint;
  }
}

export class GraphQLResponseError extends MemberfulError {
  readonly messages: readonly string[];

  constructor(messages: string[]) {
    super(`GraphQL request failed: ${messages.join('; ')}`);
    this.messages = Object.freeze([...messages]);
  }
}

function formatRaw(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}
