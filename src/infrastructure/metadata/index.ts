/**
 * di-registry - Metadata Module
 *
 * Decorators and the signatures the invocation engine reads.
 */

export {
  CallableSignature,
  defineSignature,
  readSignature,
  assertInvocable,
  assertInvocableReturns,
  assertConstructorShape,
} from './signature';

export type {
  Procedure,
  Invocable,
  SignatureDefinition,
  InjectableOptions,
} from './signature';

export { Injectable, Inject, readInjectedFields } from './decorators';

export type { FieldDescriptor, InjectDecorator } from './decorators';
