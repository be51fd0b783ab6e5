/**
 * @fileoverview Type Descriptors
 *
 * @packageDocumentation
 * @module di-registry/domain/types
 *
 * ## Domain Layer: TYPE IDENTITY
 *
 * TypeScript erases types at compile time, so the container cannot ask a
 * value "what type are you?" the way a reflective runtime would. Instead every
 * registration and every resolution names its type through a descriptor:
 *
 * ```typescript
 * interface Greeter { name(): string }
 *
 * const GreeterType = token<Greeter>('Greeter');   // interfaces
 * const ClockType = typeOf(SystemClock);           // classes
 * const PluginsType = arrayOf(PluginType);         // sequences
 * ```
 *
 * The descriptor's `key` is the registry index. Two descriptors with the same
 * key are the same type as far as the container is concerned; no subtyping or
 * variance is applied. Keys are prefixed with the descriptor kind, so
 * `token('Storage')` (`named:Storage`) and a class named `Storage`
 * (`class:Storage`) are distinct types; `name` is the unprefixed form used in
 * messages. A registration under `Greeter` is only found by
 * resolving `Greeter`, never by resolving a class that implements it.
 *
 * Each descriptor also carries a runtime guard (`is`) used to narrow the
 * `unknown` values held by the registry back to `T`.
 */

import { SignatureValidationError } from '../exceptions';

/**
 * Canonical, comparable identity of a type.
 */
export type TypeKey = string;

/**
 * Discriminates how the invocation engine binds a parameter of this type.
 */
export type TypeDescriptorKind =
  | 'named'
  | 'class'
  | 'primitive'
  | 'array'
  | 'map'
  | 'record';

/**
 * Any class, including abstract ones used purely as tokens.
 */
export type AbstractConstructor<T = unknown> = abstract new (
  ...args: never[]
) => T;

/**
 * A class that can be instantiated.
 */
export type Constructor<T = unknown> = new (...args: never[]) => T;

/**
 * Runtime guard narrowing an unknown value to `T`.
 */
export type TypeGuard<T> = (value: unknown) => value is T;

/**
 * Runtime stand-in for a static type.
 *
 * @template T - The static type this descriptor represents
 */
export abstract class TypeDescriptor<T = unknown> {
  protected constructor(
    /** Name used in messages and dependency graphs */
    public readonly name: string,
    public readonly kind: TypeDescriptorKind,
    /** Registry index, unique across descriptor kinds */
    public readonly key: TypeKey = `${kind}:${name}`,
  ) {}

  /**
   * Whether a value of this type can be used as the error channel of a
   * two-value constructor.
   */
  get errorCapable(): boolean {
    return false;
  }

  /**
   * Narrow an arbitrary value to `T`.
   */
  abstract is(value: unknown): value is T;

  /**
   * Structural equality: descriptors are equal when their keys are.
   */
  equals(other: TypeDescriptor): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Descriptor for a type without a runtime representation (usually an
 * interface), identified purely by name.
 */
export class NamedType<T> extends TypeDescriptor<T> {
  constructor(
    name: string,
    private readonly guard?: TypeGuard<T>,
  ) {
    super(name, 'named');
  }

  is(value: unknown): value is T {
    // Without a guard the name is the only contract; any defined value passes.
    return this.guard ? this.guard(value) : value !== undefined;
  }
}

/**
 * Descriptor for a class; values are checked with `instanceof`.
 */
export class ClassType<T> extends TypeDescriptor<T> {
  constructor(
    name: string,
    public readonly target: Function,
  ) {
    super(name, 'class');
  }

  get errorCapable(): boolean {
    return (
      this.target === Error ||
      this.target.prototype instanceof Error
    );
  }

  is(value: unknown): value is T {
    return value instanceof this.target;
  }
}

/**
 * Descriptor for a JavaScript primitive (and the built-in `Error`).
 */
export class PrimitiveType<T> extends TypeDescriptor<T> {
  constructor(
    name: string,
    private readonly guard: TypeGuard<T>,
    private readonly canCarryErrors: boolean = false,
  ) {
    super(name, 'primitive');
  }

  get errorCapable(): boolean {
    return this.canCarryErrors;
  }

  is(value: unknown): value is T {
    return this.guard(value);
  }
}

/**
 * Sequence of `E`. As a parameter it collects every registration of `E`.
 */
export class ArrayType<E> extends TypeDescriptor<E[]> {
  constructor(public readonly element: TypeDescriptor<E>) {
    super(`${element.name}[]`, 'array', `${element.key}[]`);
  }

  is(value: unknown): value is E[] {
    return Array.isArray(value) && value.every((item) => this.element.is(item));
  }
}

/**
 * `Map<string, E>`. As a parameter it collects the named registrations of `E`.
 */
export class MapType<E> extends TypeDescriptor<Map<string, E>> {
  constructor(public readonly element: TypeDescriptor<E>) {
    super(
      `Map<string, ${element.name}>`,
      'map',
      `Map<string, ${element.key}>`,
    );
  }

  is(value: unknown): value is Map<string, E> {
    if (!(value instanceof Map)) return false;
    for (const [name, item] of value) {
      if (typeof name !== 'string' || !this.element.is(item)) return false;
    }
    return true;
  }
}

/**
 * Plain string-keyed object of `E`. As a parameter it collects the named
 * registrations of `E`.
 */
export class RecordType<E> extends TypeDescriptor<Record<string, E>> {
  constructor(public readonly element: TypeDescriptor<E>) {
    super(
      `Record<string, ${element.name}>`,
      'record',
      `Record<string, ${element.key}>`,
    );
  }

  is(value: unknown): value is Record<string, E> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return false;
    }
    return Object.values(value).every((item) => this.element.is(item));
  }
}

// ============================================================================
// Built-in descriptors
// ============================================================================

/**
 * Descriptors for primitives and `Error`.
 */
export const Types = {
  string: new PrimitiveType<string>(
    'string',
    (value): value is string => typeof value === 'string',
  ),
  number: new PrimitiveType<number>(
    'number',
    (value): value is number => typeof value === 'number',
  ),
  boolean: new PrimitiveType<boolean>(
    'boolean',
    (value): value is boolean => typeof value === 'boolean',
  ),
  bigint: new PrimitiveType<bigint>(
    'bigint',
    (value): value is bigint => typeof value === 'bigint',
  ),
  symbol: new PrimitiveType<symbol>(
    'symbol',
    (value): value is symbol => typeof value === 'symbol',
  ),
  error: new PrimitiveType<Error>(
    'Error',
    (value): value is Error => value instanceof Error,
    true,
  ),
} as const;

// ============================================================================
// Factories
// ============================================================================

const classTypes = new WeakMap<Function, TypeDescriptor>();
const classNameCounts = new Map<string, number>();

classTypes.set(String, Types.string);
classTypes.set(Number, Types.number);
classTypes.set(Boolean, Types.boolean);
classTypes.set(BigInt, Types.bigint);
classTypes.set(Symbol, Types.symbol);
classTypes.set(Error, Types.error);

/**
 * Constructors that decorator metadata emits when the real type was erased.
 */
const ERASED_CONSTRUCTORS: ReadonlyMap<Function, string> = new Map<
  Function,
  string
>([
  [Object, 'an interface, union or object literal type'],
  [Array, 'an array; describe it with arrayOf()'],
  [Map, 'a Map; describe it with mapOf()'],
  [Function, 'a function type'],
  [Promise, 'a Promise'],
]);

/**
 * Describe a type that has no runtime representation by name.
 *
 * @example
 * ```typescript
 * interface Storage { get(id: number): string }
 * const StorageType = token<Storage>('Storage', (v): v is Storage =>
 *   typeof v === 'object' && v !== null && 'get' in v);
 * ```
 */
export function token<T>(name: string, guard?: TypeGuard<T>): NamedType<T> {
  if (name.length === 0) {
    throw new SignatureValidationError('a type token requires a non-empty name');
  }
  return new NamedType<T>(name, guard);
}

/**
 * Describe a class. The same constructor always yields the same descriptor.
 */
export function typeOf<T>(target: AbstractConstructor<T>): TypeDescriptor<T>;
export function typeOf(target: Function | undefined): TypeDescriptor;
export function typeOf(target: Function | undefined): TypeDescriptor {
  if (target === undefined) {
    throw new SignatureValidationError(
      'type metadata is missing; enable emitDecoratorMetadata or pass a descriptor',
    );
  }

  const erased = ERASED_CONSTRUCTORS.get(target);
  if (erased) {
    throw new SignatureValidationError(
      `cannot derive a type key from ${target.name}: the declared type is ${erased}`,
    );
  }

  const existing = classTypes.get(target);
  if (existing) return existing;

  const descriptor = new ClassType<unknown>(nextClassName(target.name), target);
  classTypes.set(target, descriptor);
  return descriptor;
}

function nextClassName(name: string): string {
  const base = name || 'anonymous';
  const count = (classNameCounts.get(base) ?? 0) + 1;
  classNameCounts.set(base, count);
  return count === 1 ? base : `${base}#${count}`;
}

export function arrayOf<E>(element: TypeLike<E>): ArrayType<E> {
  return new ArrayType(toDescriptor(element));
}

export function mapOf<E>(element: TypeLike<E>): MapType<E> {
  return new MapType(toDescriptor(element));
}

export function recordOf<E>(element: TypeLike<E>): RecordType<E> {
  return new RecordType(toDescriptor(element));
}

/**
 * Anything accepted where a type is expected: a descriptor or a class.
 */
export type TypeLike<T = unknown> = TypeDescriptor<T> | AbstractConstructor<T>;

export function toDescriptor<T>(type: TypeLike<T>): TypeDescriptor<T> {
  if (type instanceof TypeDescriptor) return type;
  return typeOf(type);
}

