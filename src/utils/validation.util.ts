import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((constraint) => `${property}: ${constraint}`);
    return [...own, ...describeErrors(error.children ?? [], property)];
  });
}

/**
 * Converts a parsed JSON object into `cls` and validates it, throwing with every failing property.
 */
export function toValidatedInstance<T extends object>(cls: ClassConstructor<T>, plain: unknown): T {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    throw new TypeError(`Expected a JSON object for ${cls.name}`);
  }

  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new TypeError(`Invalid ${cls.name} - ${describeErrors(errors).join('; ')}`);
  }
  return instance;
}

export function toValidatedInstances<T extends object>(cls: ClassConstructor<T>, plain: unknown): T[] {
  if (!Array.isArray(plain)) {
    throw new TypeError(`Expected a JSON array of ${cls.name}`);
  }
  return plain.map((item: unknown) => toValidatedInstance(cls, item));
}
