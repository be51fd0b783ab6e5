/**
 * di-registry - Field Injection
 */

import { SignatureValidationError } from '../../domain/exceptions';
import { readInjectedFields } from '../../infrastructure/metadata';
import type { FieldDescriptor } from '../../infrastructure/metadata';
import type { Resolver } from './IDependencyInjection';

/**
 * Assign resolved values to the injectable fields of an existing object.
 *
 * Fields come from `@Inject()` on the object's class (and its bases), or
 * from the explicit `fields` list. Fields that cannot be assigned (read-only
 * properties, getters without setters, missing properties on a
 * non-extensible object) are skipped. The first resolution error, or an
 * assignment the target rejects, stops the walk; fields already assigned keep
 * their new values.
 *
 * @returns The same object
 *
 * @example
 * ```typescript
 * class Report {
 *   @Inject() clock!: SystemClock;
 * }
 *
 * const report = inject(container, new Report());
 * ```
 */
export function inject<T extends object>(
  resolver: Resolver,
  target: T,
  fields?: readonly FieldDescriptor[],
): T {
  const targetType = target === null ? 'null' : typeof target;
  if (targetType !== 'object' && targetType !== 'function') {
    throw new SignatureValidationError(
      `cannot inject into a value of type '${targetType}'`,
    );
  }

  for (const field of fields ?? readInjectedFields(target)) {
    if (!isSettable(target, field.property)) continue;

    const value = resolver.resolve(field.type);
    if (!Reflect.set(target, field.property, value)) {
      throw new SignatureValidationError(
        `cannot assign field '${String(field.property)}': the target rejected the value`,
      );
    }
  }

  return target;
}

function isSettable(target: object, property: string | symbol): boolean {
  for (
    let owner: object | null = target;
    owner !== null;
    owner = Object.getPrototypeOf(owner)
  ) {
    const descriptor = Object.getOwnPropertyDescriptor(owner, property);
    if (!descriptor) continue;

    if (descriptor.get !== undefined || descriptor.set !== undefined) {
      return descriptor.set !== undefined;
    }
    if (descriptor.writable !== true) return false;
    return owner === target || Object.isExtensible(target);
  }

  return Object.isExtensible(target);
}
