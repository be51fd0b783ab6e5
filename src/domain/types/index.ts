/**
 * di-registry - Type Descriptor Module
 */

export {
  TypeDescriptor,
  NamedType,
  ClassType,
  PrimitiveType,
  ArrayType,
  MapType,
  RecordType,
  Types,
  token,
  typeOf,
  arrayOf,
  mapOf,
  recordOf,
  toDescriptor,
} from './TypeDescriptor';

export type {
  TypeKey,
  TypeDescriptorKind,
  TypeGuard,
  TypeLike,
  Constructor,
  AbstractConstructor,
} from './TypeDescriptor';
