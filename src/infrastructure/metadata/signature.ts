/**
 * di-registry - Callable Signatures
 *
 * Parameter and return types of a callable, read from metadata:
 *
 * - plain functions declare theirs with {@link defineSignature};
 * - `@Injectable()` classes get theirs from `design:paramtypes` (emitted by
 *   the compiler under `emitDecoratorMetadata`), refined per parameter with
 *   `@Inject(type)` or replaced wholesale with `@Injectable({ parameters })`.
 */

import 'reflect-metadata';
import {
  ArrayType,
  TypeDescriptor,
  toDescriptor,
  typeOf,
} from '../../domain/types';
import type { Constructor, TypeLike } from '../../domain/types';
import {
  SignatureValidationError,
  isDependencyError,
} from '../../domain/exceptions';
import type { RegistrationOption } from '../../application/di/IDependencyInjection';

// ==================== Metadata Keys ====================

export const SIGNATURE_METADATA = 'di:signature';
export const INJECTABLE_METADATA = 'di:injectable';
export const PARAMETER_METADATA = 'di:parameters';
export const PROPERTY_METADATA = 'di:properties';
export const DESIGN_PARAMTYPES = 'design:paramtypes';
export const DESIGN_TYPE = 'design:type';

// ==================== Types ====================

/**
 * Any function; parameters are supplied by the invocation engine.
 */
export type Procedure = (...args: never[]) => unknown;

/**
 * What the invocation engine accepts: a function with a declared signature
 * or an `@Injectable()` class.
 */
export type Invocable = Procedure | Constructor;

/**
 * Signature declaration for a plain function.
 *
 * @example
 * ```typescript
 * const newAggregate = defineSignature(
 *   (deps: Dependency[]) => new Aggregate(deps),
 *   { parameters: [arrayOf(DependencyType)], returns: AggregateType },
 * );
 *
 * const openStorage = defineSignature(
 *   (path: string): [Storage | undefined, Error | undefined] => ...,
 *   { parameters: [Types.string], returns: [StorageType, Types.error] },
 * );
 * ```
 */
export interface SignatureDefinition {
  /** Parameter types in declaration order */
  parameters?: readonly TypeLike[];

  /**
   * One return type, or `[valueType, errorType]` for functions returning a
   * `[value, error]` tuple.
   */
  returns?: TypeLike | readonly TypeLike[];

  /** The last parameter is a rest parameter described with `arrayOf()` */
  variadic?: boolean;
}

/**
 * Options of the `@Injectable()` class decorator.
 */
export interface InjectableOptions extends RegistrationOption {
  /**
   * Type the class is registered under by `registerConstructor`; defaults to
   * the class itself.
   */
  provides?: TypeLike;

  /** Replaces the parameter types read from `design:paramtypes` */
  parameters?: readonly TypeLike[];

  /** The last constructor parameter is a rest parameter */
  variadic?: boolean;
}

/**
 * Resolved signature of a callable.
 */
export class CallableSignature {
  constructor(
    public readonly name: string,
    public readonly invocation: 'call' | 'construct',
    public readonly parameters: readonly TypeDescriptor[],
    public readonly returns: readonly TypeDescriptor[],
    public readonly variadic: boolean,
    /** Registration options declared on the callable itself */
    public readonly registration: RegistrationOption = {},
  ) {}

  /**
   * Whether the callable reports failures through a second return value.
   */
  get hasErrorChannel(): boolean {
    return this.returns.length === 2;
  }

  /**
   * Type a constructor registration is keyed by.
   */
  get returnType(): TypeDescriptor | undefined {
    return this.returns[0];
  }
}

/**
 * `@Injectable()` options as stored on the class.
 */
export class InjectableRecord {
  constructor(public readonly options: InjectableOptions) {}
}

/**
 * `@Inject(type)` overrides of constructor parameters, by index.
 */
export class ParameterOverrides {
  private readonly byIndex = new Map<number, TypeDescriptor>();

  set(index: number, type: TypeDescriptor): void {
    this.byIndex.set(index, type);
  }

  get(index: number): TypeDescriptor | undefined {
    return this.byIndex.get(index);
  }

  get highestIndex(): number {
    return Math.max(-1, ...this.byIndex.keys());
  }
}

// ==================== Declaring ====================

/**
 * Attach a signature to a function so it can be invoked or registered as a
 * constructor. Returns the same function.
 */
export function defineSignature<F extends Procedure>(
  fn: F,
  definition: SignatureDefinition,
): F {
  const name = fn.name || 'anonymous function';
  const returns =
    definition.returns === undefined
      ? []
      : isTypeList(definition.returns)
        ? definition.returns.map((type) => toDescriptor(type))
        : [toDescriptor(definition.returns)];

  const signature = new CallableSignature(
    name,
    'call',
    (definition.parameters ?? []).map((type) => toDescriptor(type)),
    returns,
    definition.variadic ?? false,
  );

  assertVariadicShape(signature);
  Reflect.defineMetadata(SIGNATURE_METADATA, signature, fn);
  return fn;
}

function isTypeList(
  value: TypeLike | readonly TypeLike[],
): value is readonly TypeLike[] {
  return Array.isArray(value);
}

// ==================== Reading ====================

const classSignatures = new WeakMap<Function, CallableSignature>();

/**
 * Read the signature of a callable.
 *
 * @throws SignatureValidationError when the value is not a function, or is a
 * function that carries no signature
 */
export function readSignature(callable: unknown): CallableSignature {
  assertInvocable(callable);

  const declared: unknown = Reflect.getOwnMetadata(SIGNATURE_METADATA, callable);
  if (declared instanceof CallableSignature) return declared;

  const injectable: unknown = Reflect.getOwnMetadata(
    INJECTABLE_METADATA,
    callable,
  );
  if (injectable instanceof InjectableRecord) {
    const cached = classSignatures.get(callable);
    if (cached) return cached;

    const signature = readClassSignature(callable, injectable.options);
    classSignatures.set(callable, signature);
    return signature;
  }

  throw new SignatureValidationError(
    `'${callable.name || 'anonymous function'}' is not invocable: declare its signature with defineSignature() or decorate the class with @Injectable()`,
  );
}

function readClassSignature(
  target: Function,
  options: InjectableOptions,
): CallableSignature {
  const returns = [
    options.provides === undefined ? typeOf(target) : toDescriptor(options.provides),
  ];

  const parameters = options.parameters
    ? options.parameters.map((type) => toDescriptor(type))
    : readConstructorParameters(target);

  const signature = new CallableSignature(
    target.name,
    'construct',
    parameters,
    returns,
    options.variadic ?? false,
    { lifetime: options.lifetime, name: options.name },
  );

  assertVariadicShape(signature);
  return signature;
}

function readConstructorParameters(target: Function): TypeDescriptor[] {
  const source = constructorDeclaringParameters(target);

  const designTypes: unknown = Reflect.getOwnMetadata(DESIGN_PARAMTYPES, source);
  const paramTypes = isDesignTypeList(designTypes) ? designTypes : [];

  const storedOverrides: unknown = Reflect.getOwnMetadata(
    PARAMETER_METADATA,
    source,
  );
  const overrides =
    storedOverrides instanceof ParameterOverrides
      ? storedOverrides
      : new ParameterOverrides();

  const count = Math.max(
    paramTypes.length,
    source.length,
    overrides.highestIndex + 1,
  );

  const parameters: TypeDescriptor[] = [];
  for (let index = 0; index < count; index++) {
    parameters.push(
      overrides.get(index) ?? describeParameter(target, index, paramTypes[index]),
    );
  }
  return parameters;
}

/**
 * A subclass without its own constructor inherits its base class's
 * parameters, so read them from the nearest class that declares any.
 */
function constructorDeclaringParameters(target: Function): Function {
  for (
    let current: unknown = target;
    typeof current === 'function';
    current = Object.getPrototypeOf(current)
  ) {
    if (
      Reflect.hasOwnMetadata(DESIGN_PARAMTYPES, current) ||
      Reflect.hasOwnMetadata(PARAMETER_METADATA, current)
    ) {
      return current;
    }
  }
  return target;
}

function describeParameter(
  target: Function,
  index: number,
  designType: Function | undefined,
): TypeDescriptor {
  try {
    return typeOf(designType);
  } catch (error) {
    if (isDependencyError(error, 'Validation')) {
      throw new SignatureValidationError(
        `cannot bind parameter #${index} of '${target.name}': ${error.message}; annotate it with @Inject(type)`,
      );
    }
    throw error;
  }
}

function isDesignTypeList(value: unknown): value is (Function | undefined)[] {
  return (
    Array.isArray(value) &&
    value.every((item) => item === undefined || typeof item === 'function')
  );
}

// ==================== Validation ====================

export function assertInvocable(value: unknown): asserts value is Function {
  if (typeof value !== 'function') {
    throw new SignatureValidationError(
      `value of type '${value === null ? 'null' : typeof value}' is not invocable`,
    );
  }
}

function assertVariadicShape(signature: CallableSignature): void {
  if (!signature.variadic) return;

  const last = signature.parameters[signature.parameters.length - 1];
  if (!(last instanceof ArrayType)) {
    throw new SignatureValidationError(
      `'${signature.name}' is variadic, so its last parameter must be described with arrayOf()`,
    );
  }
}

/**
 * Check the return shape the invocation engine can normalise: nothing, a
 * value, or a value plus an error-capable second result.
 */
export function assertInvocableReturns(signature: CallableSignature): void {
  const { returns } = signature;

  if (returns.length > 2) {
    throw new SignatureValidationError(
      `'${signature.name}' must return a value and an optional error, but declares ${returns.length} results`,
    );
  }

  const errorType = returns[1];
  if (errorType && !errorType.errorCapable) {
    throw new SignatureValidationError(
      `'${signature.name}' declares two results, so the second must be an Error type, not '${errorType.name}'`,
    );
  }
}

/**
 * Check that a callable can be registered as a constructor: it must return a
 * value, optionally followed by an error.
 *
 * @returns The type the constructor registers under
 */
export function assertConstructorShape(
  signature: CallableSignature,
): TypeDescriptor {
  assertInvocableReturns(signature);

  const valueType = signature.returnType;
  if (!valueType || (signature.returns.length === 1 && valueType.errorCapable)) {
    throw new SignatureValidationError(
      `'${signature.name}' must return a value and an optional error`,
    );
  }
  return valueType;
}
