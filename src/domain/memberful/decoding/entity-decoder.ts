import { ClassTransformOptions, plainToInstance } from 'class-transformer';
import {
  ValidationError as ConstraintViolation,
  ValidatorOptions,
  validateSync,
} from 'class-validator';
import {
  ValidationError,
  ValidationIssue,
} from '../errors/memberful.errors';
import { JsonObject, isJsonObject } from './memberful-entity';
import {
  EntityConstructor,
  getWireFields,
  getWireName,
} from './wire-field.decorator';

const TRANSFORM_OPTIONS: ClassTransformOptions = {
  excludeExtraneousValues: true,
  exposeDefaultValues: true,
  enableImplicitConversion: false,
};

const VALIDATOR_OPTIONS: ValidatorOptions = {
  forbidUnknownValues: true,
  validationError: { target: true, value: true },
};

/**
 * Decode a JSON object into a validated, frozen entity.
 *
 * Either returns a complete instance or throws ValidationError; undeclared
 * keys end up in `extras` at every level of the tree.
 */
export function decodeEntity<T extends object>(
  entityClass: EntityConstructor<T>,
  json: unknown,
): T {
  if (!isJsonObject(json)) {
    throw new ValidationError(entityClass.name, [
      { path: '', messages: [`expected a JSON object, got ${describe(json)}`] },
    ]);
  }

  const entity = plainToInstance(entityClass, json, TRANSFORM_OPTIONS);
  const violations = validateSync(entity, VALIDATOR_OPTIONS);

  if (violations.length > 0) {
    throw new ValidationError(entityClass.name, collectIssues(violations, ''));
  }

  return seal(entity, json);
}

function seal<T extends object>(entity: T, json: JsonObject): T {
  const fields = getWireFields(entity);
  const declared = new Set(fields.map((field) => field.wireName));

  const extras: JsonObject = {};
  for (const [key, value] of Object.entries(json)) {
    if (!declared.has(key)) {
      extras[key] = deepFreeze(structuredClone(value));
    }
  }

  for (const field of fields) {
    if (field.raw) {
      deepFreeze(Reflect.get(entity, field.property));
      continue;
    }

    const value: unknown = Reflect.get(entity, field.property);
    const raw = json[field.wireName];

    if (!field.type) {
      // change pairs are copied by class-transformer, so freezing is local
      if (Array.isArray(value)) Object.freeze(value);
      continue;
    }

    if (Array.isArray(value)) {
      value.forEach((item: unknown, index) => {
        const rawItem = Array.isArray(raw) ? raw[index] : undefined;
        if (isJsonObject(item) && isJsonObject(rawItem)) {
          seal(item, rawItem);
        }
      });
      Object.freeze(value);
    } else if (isJsonObject(value) && isJsonObject(raw)) {
      seal(value, raw);
    }
  }

  Object.assign(entity, { extras: Object.freeze(extras) });
  return Object.freeze(entity);
}

/**
 * Only for values the decoder cloned itself; never the caller's input
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach((child: unknown) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

function collectIssues(
  violations: ConstraintViolation[],
  parentPath: string,
): ValidationIssue[] {
  return violations.flatMap((violation) => {
    const path = joinPath(parentPath, segmentFor(violation));
    const issues: ValidationIssue[] = [];

    if (violation.constraints) {
      issues.push({ path, messages: messagesFor(violation) });
    }
    if (violation.children?.length) {
      issues.push(...collectIssues(violation.children, path));
    }

    return issues;
  });
}

function segmentFor(violation: ConstraintViolation): string {
  const { target, property } = violation;
  if (Array.isArray(target)) return `[${property}]`;
  return target ? getWireName(target, property) : property;
}

function joinPath(parent: string, segment: string): string {
  if (!parent) return segment;
  return segment.startsWith('[') ? `${parent}${segment}` : `${parent}.${segment}`;
}

function messagesFor(violation: ConstraintViolation): string[] {
  if (violation.value === undefined) return ['is required'];
  if (violation.value === null) return ['must not be null'];

  // class-validator prefixes messages with the class property name
  const prefix = `${violation.property} `;
  return Object.values(violation.constraints ?? {}).map((message) =>
    message.startsWith(prefix) ? message.slice(prefix.length) : message,
  );
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
