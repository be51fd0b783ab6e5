/**
 * di-registry - Decorators
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata` in
 * tsconfig.json, and `reflect-metadata` loaded before decorated classes are
 * defined (this module imports it).
 *
 * @example
 * ```typescript
 * @Injectable({ provides: GreeterType, lifetime: Lifetime.Static })
 * class EnglishGreeter implements Greeter {
 *   constructor(
 *     @Inject(Types.string) private readonly salutation: string,
 *     private readonly clock: SystemClock,   // taken from design:paramtypes
 *   ) {}
 * }
 *
 * class Report {
 *   @Inject() clock!: SystemClock;           // taken from design:type
 *   @Inject(GreeterType) greeter!: Greeter;  // interfaces need a descriptor
 * }
 * ```
 */

import 'reflect-metadata';
import { toDescriptor, typeOf } from '../../domain/types';
import type { TypeDescriptor, TypeLike } from '../../domain/types';
import { SignatureValidationError } from '../../domain/exceptions';
import {
  DESIGN_TYPE,
  INJECTABLE_METADATA,
  InjectableRecord,
  PARAMETER_METADATA,
  PROPERTY_METADATA,
  ParameterOverrides,
} from './signature';
import type { InjectableOptions } from './signature';

/**
 * A field marked for injection.
 */
export interface FieldDescriptor {
  readonly property: string | symbol;
  readonly type: TypeDescriptor;
}

/**
 * Fields marked with `@Inject()` on one class (not its bases), in
 * declaration order.
 */
export class InjectedProperties {
  private readonly fields: FieldDescriptor[] = [];

  add(field: FieldDescriptor): void {
    this.fields.push(field);
  }

  list(): readonly FieldDescriptor[] {
    return this.fields;
  }
}

/**
 * Works as both a property and a constructor parameter decorator.
 */
export type InjectDecorator = (
  target: object,
  propertyKey: string | symbol | undefined,
  parameterIndex?: number,
) => void;

/**
 * Mark a class as constructible by the container.
 *
 * @remarks
 * The lifetime and name given here sit between the container defaults and
 * the per-call options of `registerConstructor`.
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(
      INJECTABLE_METADATA,
      new InjectableRecord(options),
      target,
    );
  };
}

/**
 * Mark a field for injection, or override the type of a constructor
 * parameter.
 *
 * @param type - Required for interfaces, arrays and maps, whose declared
 * type is erased to `Object`, `Array` or `Map` at runtime
 */
export function Inject(type?: TypeLike): InjectDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (parameterIndex !== undefined) {
      if (propertyKey !== undefined) {
        throw new SignatureValidationError(
          `@Inject() on method '${String(propertyKey)}' is not supported; only constructor parameters are injected`,
        );
      }
      if (type !== undefined) overridesOf(target).set(parameterIndex, toDescriptor(type));
      return;
    }

    if (propertyKey === undefined) {
      throw new SignatureValidationError('@Inject() requires a property or a parameter');
    }

    const fieldType =
      type !== undefined
        ? toDescriptor(type)
        : designTypeOf(target, propertyKey);

    propertiesOf(target).add({ property: propertyKey, type: fieldType });
  };
}

function designTypeOf(target: object, propertyKey: string | symbol): TypeDescriptor {
  const designType: unknown = Reflect.getMetadata(DESIGN_TYPE, target, propertyKey);
  try {
    return typeOf(typeof designType === 'function' ? designType : undefined);
  } catch (error) {
    if (error instanceof SignatureValidationError) {
      throw new SignatureValidationError(
        `cannot inject field '${String(propertyKey)}': ${error.message}; pass its type to @Inject(type)`,
      );
    }
    throw error;
  }
}

function overridesOf(target: object): ParameterOverrides {
  const existing: unknown = Reflect.getOwnMetadata(PARAMETER_METADATA, target);
  if (existing instanceof ParameterOverrides) return existing;

  const created = new ParameterOverrides();
  Reflect.defineMetadata(PARAMETER_METADATA, created, target);
  return created;
}

function propertiesOf(target: object): InjectedProperties {
  const existing: unknown = Reflect.getOwnMetadata(PROPERTY_METADATA, target);
  if (existing instanceof InjectedProperties) return existing;

  const created = new InjectedProperties();
  Reflect.defineMetadata(PROPERTY_METADATA, created, target);
  return created;
}

/**
 * Fields marked with `@Inject()` across the prototype chain of an instance,
 * base classes first.
 */
export function readInjectedFields(instance: object): FieldDescriptor[] {
  const levels: (readonly FieldDescriptor[])[] = [];

  for (
    let prototype: object | null = Object.getPrototypeOf(instance);
    prototype !== null && prototype !== Object.prototype;
    prototype = Object.getPrototypeOf(prototype)
  ) {
    const own: unknown = Reflect.getOwnMetadata(PROPERTY_METADATA, prototype);
    if (own instanceof InjectedProperties) levels.unshift(own.list());
  }

  return levels.flat();
}
