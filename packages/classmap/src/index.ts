export { resolvePropertySelector } from './api/property-selector.js';
export type { PropertySelector } from './api/property-selector.js';

export {
  Discriminator,
  DefaultValue,
  Document,
  Element,
  Field,
  Id,
  Ignore,
  IgnoreExtraElements,
  IgnoreIfNull,
  KnownTypes,
  Required,
  UseCompactRepresentation,
} from './decorators/index.js';
export type { MemberDecorator } from './decorators/index.js';
export { StaticDirectiveRegistry } from './registry/static-registry.js';
export type { DirectiveRecord, DocumentDirective } from './registry/static-registry.js';

export { ClassMap } from './core/class-map.js';
export { ClassMapRegistry } from './core/class-map-registry.js';
export { PropertyMap } from './core/property-map.js';
export { GenericType, closeGeneric, isGenericType } from './core/generic-type.js';
export { ID_ELEMENT_NAME, UNORDERED } from './core/constants.js';
export { describeType, isAssignable } from './core/type-utils.js';

export { CORE_LIBRARY, DecoratorShapeProvider } from './shape/decorator-shape-provider.js';
export type { DecoratorShapeProviderOptions } from './shape/decorator-shape-provider.js';

export * from './conventions/conventions.js';

export type {
  ClassDirectives,
  ClassMapRegistryConfig,
  ClassType,
  Constructor,
  IdGenerator,
  IdGeneratorConstructor,
  LibraryIdentity,
  MemberDirectives,
  MemberShape,
  RegistryLogger,
  TypeShape,
  TypeShapeProvider,
  ValueType,
} from './types/types.js';

// Errors
export {
  AmbiguousDiscriminatorError,
  DuplicateRegistrationError,
  InvalidClassTypeError,
  InvalidPropertySelectorError,
  InvalidRegistryConfigError,
  TypeMismatchError,
  UnknownDiscriminatorError,
  UnknownMemberError,
} from './errors/errors.js';
