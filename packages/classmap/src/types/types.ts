import type { ConventionPack } from '../conventions/conventions.js';
import type { GenericType } from '../core/generic-type.js';

/**
 * Generic constructor signature used throughout the class-map layer.
 * Abstract classes are accepted: they can still be nominal types.
 *
 * @template T - Type produced by the constructor
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Identity of a mapped type: a class constructor, or an interned closed
 * generic type created with {@link closeGeneric}.
 */
export type ClassType = Constructor | GenericType;

/**
 * Declared value type of a member. Primitive wrappers (`Number`, `Boolean`,
 * `String`, `BigInt`) stand in for the primitive they box.
 */
export type ValueType = Constructor | BigIntConstructor | SymbolConstructor;

/**
 * Owning library of a type, rendered into type-name discriminators.
 *
 * A library with a `token` is treated as signed and rendered in full; without
 * one only `name` is kept. `core: true` marks the JavaScript runtime itself,
 * whose qualifier is omitted altogether.
 */
export interface LibraryIdentity {
  name: string;
  version?: string;
  token?: string;
  core?: boolean;
}

/**
 * Identifier generator extension point. Concrete algorithms live outside this
 * package; a PropertyMap only carries the reference.
 */
export interface IdGenerator<TId = unknown> {
  generateId(): TId;
  isEmpty(id: unknown): boolean;
}

export type IdGeneratorConstructor = new () => IdGenerator;

/**
 * Class-level directives, already extracted from whatever declared them.
 */
export interface ClassDirectives {
  knownTypes?: readonly ClassType[];
  discriminator?: string;
  discriminatorIsRequired?: boolean;
  ignoreExtraElements?: boolean;
  useCompactRepresentation?: boolean;
}

/**
 * Member-level directives. `identifier` is present when the member is the
 * document identifier; its `generator` is optional.
 */
export interface MemberDirectives {
  ignore?: boolean;
  identifier?: { generator?: IdGenerator | IdGeneratorConstructor };
  elementName?: string;
  order?: number;
  defaultValue?: { value: unknown; serialize: boolean };
  ignoreIfNull?: boolean;
  required?: boolean;
  useCompactRepresentation?: boolean;
}

/**
 * One data member declared directly on a type.
 */
export interface MemberShape {
  readonly name: string;
  readonly valueType?: ValueType;
  readonly canRead: boolean;
  readonly canWrite: boolean;
  readonly directives: Readonly<MemberDirectives>;
}

/**
 * What the type-shape provider knows about one type.
 */
export interface TypeShape {
  /** Simple name; the default discriminator */
  readonly name: string;
  /** Namespace-qualified name used by type-name discriminators */
  readonly fullName: string;
  readonly library?: LibraryIdentity;
  /** Immediate base constructor, absent for root types */
  readonly baseType?: Constructor;
  /** Structurally unnamed ad hoc record type */
  readonly isAnonymous: boolean;
  readonly directives: Readonly<ClassDirectives>;
  /** Members declared on this type only, in declaration order */
  readonly members: readonly MemberShape[];
}

/**
 * Source of type metadata consumed by class maps.
 *
 * The core never inspects decorators or prototypes on its own; everything it
 * needs about a type comes through this interface.
 */
export interface TypeShapeProvider {
  describe(type: Constructor): TypeShape;
  /** Every type that can be found by name when a discriminator names a type */
  knownTypes(): Iterable<Constructor>;
}

/**
 * Minimal logging surface; `console` satisfies it.
 */
export interface RegistryLogger {
  warn(message: string): void;
}

/**
 * Class map registry configuration.
 *
 * @example
 * ```typescript
 * const registry = new ClassMapRegistry({
 *   name: 'orders',
 *   conventions: { elementName: new CamelCaseElementNameConvention() },
 *   onClassMapCreated: (type, ns) => metrics.record(describeType(type), ns),
 * });
 * ```
 */
export interface ClassMapRegistryConfig {
  /** Metadata source; defaults to a {@link DecoratorShapeProvider} */
  shapes?: TypeShapeProvider;
  /** Merged over the built-in default convention profile */
  conventions?: ConventionPack;
  /** Used in diagnostics */
  name?: string;
  /** Receives non-fatal diagnostics; defaults to `console` */
  logger?: RegistryLogger;
  /** Called after each class map is built, with the build time in nanoseconds */
  onClassMapCreated?: (type: ClassType, durationNs: number) => void;
}
