/**
 * @module di-registry/application/di
 * @description Container, invocation engine and field injection
 */

// ============================================================================
// Contracts & Options
// ============================================================================

export {
  Lifetime,
  DEFAULT_REGISTRATION_OPTIONS,
  withLifetime,
  withName,
  withDefaultLifetime,
  buildRegistrationOptions,
} from './IDependencyInjection';

export type {
  RegistrationOptions,
  RegistrationOption,
  DefaultRegistrationOptions,
  FactoryFn,
  Resolver,
  IContainer,
  ContainerOptions,
} from './IDependencyInjection';

// ============================================================================
// Container
// ============================================================================

export { Container, createContainer } from './Container';
export { ContainerBuilder, createContainerBuilder } from './ContainerBuilder';

// ============================================================================
// Invocation & Injection
// ============================================================================

export { invoke } from './invoke';
export { inject } from './inject';
