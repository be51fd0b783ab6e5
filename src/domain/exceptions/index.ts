/**
 * di-registry - Exception Module
 *
 * Errors raised by registration, resolution and invocation
 */

export {
  DependencyResolutionError,
  NotExistError,
  NameNotExistError,
  SignatureValidationError,
  FactoryError,
  isDependencyError,
} from './exceptions';

export type { DependencyErrorKind } from './exceptions';
