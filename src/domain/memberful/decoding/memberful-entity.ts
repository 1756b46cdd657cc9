export type JsonObject = Record<string, unknown>;

const NO_EXTRAS: Readonly<JsonObject> = Object.freeze({});

/**
 * Base class of every decoded Memberful record
 */
export abstract class MemberfulEntity {
  /**
   * Input fields the schema does not declare, keyed by their original name
   */
  readonly extras: Readonly<JsonObject> = NO_EXTRAS;
}

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
