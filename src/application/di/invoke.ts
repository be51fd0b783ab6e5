/**
 * di-registry - Invocation Engine
 *
 * Calls a function or constructs a class with every parameter resolved from
 * a {@link Resolver}, then normalises what it returned.
 *
 * | Parameter type        | Argument                                   |
 * |-----------------------|--------------------------------------------|
 * | `arrayOf(T)`          | `resolveAll(T)`                            |
 * | `arrayOf(T)`, variadic| `resolveAll(T)` spread into the rest param |
 * | `mapOf(T)`            | `resolveMap(T)`                            |
 * | `recordOf(T)`         | `resolveMap(T)` as a plain object          |
 * | anything else         | `resolve(T)`                               |
 */

import {
  FactoryError,
  SignatureValidationError,
  isDependencyError,
} from '../../domain/exceptions';
import { ArrayType, MapType, RecordType } from '../../domain/types';
import {
  assertInvocable,
  assertInvocableReturns,
  readSignature,
} from '../../infrastructure/metadata';
import type { CallableSignature } from '../../infrastructure/metadata';
import type { Resolver } from './IDependencyInjection';

/**
 * Invoke a callable with resolved arguments.
 *
 * @param callable - A function carrying a signature from `defineSignature()`
 * or an `@Injectable()` class
 * @returns The value it produced; `undefined` when it declares no results.
 * For a `[value, error]` signature, the value half of the tuple.
 *
 * @throws SignatureValidationError when the callable is not invocable or
 * returns something its signature does not allow
 * @throws FactoryError when it throws or reports an error, with the original
 * as `cause`
 * @throws DependencyResolutionError raised while resolving a parameter,
 * unchanged
 *
 * @example
 * ```typescript
 * const greet = defineSignature(
 *   (greeter: Greeter) => greeter.greet(),
 *   { parameters: [GreeterType], returns: Types.string },
 * );
 *
 * invoke(container, greet); // 'hello'
 * ```
 */
export function invoke(resolver: Resolver, callable: unknown): unknown {
  assertInvocable(callable);
  const signature = readSignature(callable);
  assertInvocableReturns(signature);

  const args = bindArguments(resolver, signature);

  let result: unknown;
  try {
    result =
      signature.invocation === 'construct'
        ? Reflect.construct(callable, args)
        : Reflect.apply(callable, undefined, args);
  } catch (error) {
    if (isDependencyError(error)) throw error;
    throw new FactoryError(failureKey(signature), error);
  }

  return normaliseResult(signature, result);
}

function bindArguments(
  resolver: Resolver,
  signature: CallableSignature,
): unknown[] {
  const args: unknown[] = [];
  const lastIndex = signature.parameters.length - 1;

  signature.parameters.forEach((type, index) => {
    if (type instanceof ArrayType) {
      const items = [...resolver.resolveAll(type.element)];
      if (signature.variadic && index === lastIndex) {
        args.push(...items);
      } else {
        args.push(items);
      }
    } else if (type instanceof MapType) {
      args.push(new Map(resolver.resolveMap(type.element)));
    } else if (type instanceof RecordType) {
      args.push(Object.fromEntries(resolver.resolveMap(type.element)));
    } else {
      args.push(resolver.resolve(type));
    }
  });

  return args;
}

function normaliseResult(
  signature: CallableSignature,
  result: unknown,
): unknown {
  if (!signature.hasErrorChannel) return result;

  if (!Array.isArray(result) || result.length !== 2) {
    throw new SignatureValidationError(
      `'${signature.name}' declares [value, error] results but did not return a pair`,
    );
  }

  const value: unknown = result[0];
  const failure: unknown = result[1];
  if (failure !== undefined && failure !== null) {
    if (isDependencyError(failure)) throw failure;
    throw new FactoryError(failureKey(signature), failure);
  }
  return value;
}

function failureKey(signature: CallableSignature): string {
  return signature.returnType?.name ?? signature.name;
}
