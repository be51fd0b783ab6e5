/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module di-registry/application/di
 *
 * ## Application Layer: REGISTRATION AND RESOLUTION CONTRACTS
 *
 * This file defines what a container *is* without saying how it stores
 * anything:
 *
 * - {@link Resolver} is the read side: `resolve`, `resolveAll`,
 *   `resolveByName`, `resolveMap`. Factories, the invocation engine and the
 *   field injector only ever see a `Resolver`.
 * - {@link IContainer} adds the write side: `registerInstance`,
 *   `registerDynamic`, `registerConstructor`, `replaceInstance`,
 *   `replaceDynamic`, `removeAll`.
 *
 * ## Registrations
 *
 * Every type descriptor owns a *group* of registrations:
 *
 * ```
 * Greeter
 * ├─ anonymous: [factory#1, factory#2]        ← resolve() picks factory#2
 * └─ named:     { english → factory#3,
 *                 french  → factory#4 }       ← resolveByName('french')
 * ```
 *
 * Anonymous registrations accumulate in insertion order; named ones are
 * unique per name and re-registering a name replaces it.
 *
 * ## Lifetimes
 *
 * ### Static
 *
 * ```
 * resolve(Storage) → factory runs → instance-1   (memoised)
 * resolve(Storage) →                 instance-1
 * resolve(Storage) →                 instance-1
 * ```
 *
 * The first outcome is kept for the life of the container, *including a
 * failure*: a Static factory that throws keeps throwing the same error without
 * running again.
 *
 * ### PerRequest (default)
 *
 * ```
 * resolve(Storage) → factory runs → instance-1
 * resolve(Storage) → factory runs → instance-2
 * ```
 *
 * ## Resolution Order
 *
 * Resolution is a depth-first walk driven by demand: resolving a
 * constructor-backed registration invokes the constructor, which resolves each
 * of its parameters, which may invoke further constructors. There is no
 * separate build phase and no cycle detection, so a constructor that (directly
 * or transitively) needs itself recurses until the stack overflows.
 *
 * @version 1.0.0
 */

import type { TypeDescriptor } from '../../domain/types';
import type { ILogger } from '../logging';
import type { Invocable } from '../../infrastructure/metadata';

/**
 * Lifetime of a registration.
 *
 * @remarks
 * | Lifetime     | Factory runs           | Typical use                         |
 * |--------------|------------------------|-------------------------------------|
 * | `Static`     | once per container     | configuration, connection pools     |
 * | `PerRequest` | on every resolution    | handlers, lightweight stateful work |
 */
export enum Lifetime {
  /**
   * The first outcome (value or error) is memoised for the life of the
   * container.
   */
  Static = 'static',

  /**
   * The factory runs on every resolution; nothing is shared.
   */
  PerRequest = 'per-request',
}

/**
 * Effective options of a single registration.
 */
export interface RegistrationOptions {
  /** Memoisation policy */
  lifetime: Lifetime;

  /**
   * Registration name; the empty string registers anonymously.
   *
   * @example
   * ```typescript
   * container.registerInstance(GreeterType, english, withName('en'));
   * container.registerInstance(GreeterType, french, { name: 'fr' });
   * ```
   */
  name: string;
}

/**
 * One override applied on top of the container defaults. Overrides are
 * applied in argument order and later ones win per field.
 */
export type RegistrationOption = Partial<RegistrationOptions>;

/**
 * Options a container applies to every registration unless overridden.
 * Names are always per registration, so only the lifetime can default.
 */
export type DefaultRegistrationOptions = Partial<
  Pick<RegistrationOptions, 'lifetime'>
>;

/**
 * Options used when none are given.
 */
export const DEFAULT_REGISTRATION_OPTIONS: Readonly<RegistrationOptions> = {
  lifetime: Lifetime.PerRequest,
  name: '',
};

export function withLifetime(lifetime: Lifetime): RegistrationOption {
  return { lifetime };
}

export function withName(name: string): RegistrationOption {
  return { name };
}

export function withDefaultLifetime(
  lifetime: Lifetime,
): DefaultRegistrationOptions {
  return { lifetime };
}

/**
 * Fold the defaults and every override into effective options.
 */
export function buildRegistrationOptions(
  defaults: readonly DefaultRegistrationOptions[],
  overrides: readonly RegistrationOption[],
): RegistrationOptions {
  const effective: RegistrationOptions = { ...DEFAULT_REGISTRATION_OPTIONS };
  const layers: readonly RegistrationOption[] = [...defaults, ...overrides];

  for (const option of layers) {
    if (option.lifetime !== undefined) effective.lifetime = option.lifetime;
    if (option.name !== undefined) effective.name = option.name;
  }

  return effective;
}

/**
 * Factory bound to a type. It receives the resolver performing the
 * resolution so it can pull its own dependencies; a thrown error fails the
 * resolution.
 *
 * @example
 * ```typescript
 * container.registerDynamic(StorageType, (resolver) =>
 *   new FileStorage(resolver.resolve(Types.string)),
 * );
 * ```
 */
export type FactoryFn<T = unknown> = (resolver: Resolver) => T;

/**
 * Read side of the container.
 *
 * @remarks
 * Every method narrows the stored value through the descriptor's guard
 * (`type.is`) and throws `SignatureValidationError` when it does not match.
 */
export interface Resolver {
  /**
   * Resolve the single registration for a type.
   *
   * @remarks
   * Tie-break: the last-registered anonymous registration wins. When the type
   * only has named registrations, the most recently registered one is used.
   *
   * @throws NotExistError when the type has no registrations
   */
  resolve<T>(type: TypeDescriptor<T>): T;

  /**
   * Resolve every registration for a type: named ones first (in the order
   * they were last registered), then anonymous ones in insertion order.
   *
   * @throws NotExistError when the type has no registrations
   */
  resolveAll<T>(type: TypeDescriptor<T>): T[];

  /**
   * Resolve one named registration.
   *
   * @throws NotExistError when the type has no registrations
   * @throws NameNotExistError when the type exists but the name does not
   */
  resolveByName<T>(type: TypeDescriptor<T>, name: string): T;

  /**
   * Resolve the named registrations only, keyed by name. Anonymous
   * registrations are excluded.
   *
   * @throws NotExistError when the type has no registrations
   */
  resolveMap<T>(type: TypeDescriptor<T>): Map<string, T>;
}

/**
 * Write side of the container plus the {@link Resolver} it must provide.
 */
export interface IContainer extends Resolver {
  /**
   * Register a fixed value.
   */
  registerInstance<T>(
    type: TypeDescriptor<T>,
    instance: T,
    ...options: RegistrationOption[]
  ): this;

  /**
   * Register a factory run according to the registration's lifetime.
   */
  registerDynamic<T>(
    type: TypeDescriptor<T>,
    factory: FactoryFn<T>,
    ...options: RegistrationOption[]
  ): this;

  /**
   * Register a function carrying a signature, or an `@Injectable()` class,
   * under its declared return type. Parameters are resolved on every
   * invocation.
   *
   * @throws SignatureValidationError when the callable has no signature or
   * its return shape is not `value` or `[value, error]`; nothing is
   * registered in that case
   */
  registerConstructor(
    constructor: Invocable,
    ...options: RegistrationOption[]
  ): this;

  /**
   * Remove every registration of the type, then register the factory.
   */
  replaceDynamic<T>(
    type: TypeDescriptor<T>,
    factory: FactoryFn<T>,
    ...options: RegistrationOption[]
  ): this;

  /**
   * Remove every registration of the type, then register the value.
   */
  replaceInstance<T>(
    type: TypeDescriptor<T>,
    instance: T,
    ...options: RegistrationOption[]
  ): this;

  /**
   * Remove every registration of the type.
   */
  removeAll(type: TypeDescriptor): this;

  /**
   * Whether the type has a registration; with a name, whether that name is
   * registered, where the empty name asks for an anonymous registration.
   */
  has(type: TypeDescriptor, name?: string): boolean;
}

/**
 * Container configuration.
 */
export interface ContainerOptions {
  /** Applied to every registration before per-call overrides */
  defaults?: readonly DefaultRegistrationOptions[];

  /** Receives registration and failure diagnostics */
  logger?: ILogger;
}
