import 'reflect-metadata';
import { Expose, Transform, Type } from 'class-transformer';
import { IsObject } from 'class-validator';

export type EntityConstructor<T extends object = object> = new () => T;

export interface WireFieldOptions {
  /**
   * Entity class for nested objects (or arrays of objects)
   */
  type?: () => EntityConstructor;

  /**
   * The field holds an array of `type`; otherwise a single object is required
   */
  list?: boolean;

  /**
   * Keep the JSON value exactly as received (no nested instantiation)
   */
  raw?: boolean;
}

export interface WireFieldDefinition {
  property: string;
  wireName: string;
  type?: () => EntityConstructor;
  raw: boolean;
}

const OWN_FIELDS = new WeakMap<object, WireFieldDefinition[]>();

/**
 * Declares a property that is read from the given JSON key.
 *
 * Every declared wire name is excluded from an entity's `extras`.
 */
export const WireField = (
  wireName: string,
  options: WireFieldOptions = {},
): PropertyDecorator => {
  return (target, propertyKey) => {
    const fields = OWN_FIELDS.get(target) ?? [];
    fields.push({
      property: String(propertyKey),
      wireName,
      type: options.type,
      raw: options.raw ?? false,
    });
    OWN_FIELDS.set(target, fields);

    Expose({ name: wireName, toClassOnly: true })(target, propertyKey);

    if (options.type) {
      Type(options.type)(target, propertyKey);
      if (!options.list) {
        IsObject()(target, propertyKey);
      }
    }

    if (options.raw) {
      Transform(({ obj }) => structuredClone(obj[wireName]), { toClassOnly: true })(
        target,
        propertyKey,
      );
    }
  };
};

/**
 * Wire fields of an entity instance or prototype, inherited ones first
 */
export const getWireFields = (entity: object): WireFieldDefinition[] => {
  const chain: WireFieldDefinition[][] = [];
  let proto: object | null = Object.getPrototypeOf(entity);

  while (proto && proto !== Object.prototype) {
    const own = OWN_FIELDS.get(proto);
    if (own) chain.unshift(own);
    proto = Object.getPrototypeOf(proto);
  }

  return chain.flat();
};

export const getWireName = (entity: object, property: string): string => {
  const field = getWireFields(entity).find((f) => f.property === property);
  return field?.wireName ?? property;
};
