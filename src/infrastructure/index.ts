/**
 * di-registry - Infrastructure Layer
 *
 * Reflection metadata behind decorators and declared signatures.
 */

export * from './metadata';
