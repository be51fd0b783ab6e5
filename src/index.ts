/**
 * @fileoverview di-registry - Typed Service Registry
 * @description
 * A runtime dependency-injection container: register instances, factories
 * and constructors under type descriptors, then resolve them singly, all
 * together, by name or as a name-keyed map. Functions and classes are
 * invoked with their parameters resolved from the container, and existing
 * objects can have their `@Inject()` fields filled in.
 *
 * ## Architecture Layers
 *
 * - **domain**: type descriptors and container errors
 * - **application**: the container, invocation engine, field injection and
 *   the logger port
 * - **infrastructure**: reflection metadata behind signatures and decorators
 *
 * `reflect-metadata` is loaded by this entry point, before any decorated
 * class that imports from it is defined.
 *
 * @packageDocumentation
 * @module di-registry
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export {
  CallableSignature,
  defineSignature,
  readSignature,
  Injectable,
  Inject,
  readInjectedFields,
} from './infrastructure';

export type {
  Procedure,
  Invocable,
  SignatureDefinition,
  InjectableOptions,
  FieldDescriptor,
  InjectDecorator,
} from './infrastructure';

// ============================================================================
// VERSION
// ============================================================================

export const VERSION = '1.0.0';
