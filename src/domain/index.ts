/**
 * @module di-registry/domain
 * @description Domain layer exports
 */

// ============================================================================
// Type Identity
// ============================================================================

export * from './types';

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';
