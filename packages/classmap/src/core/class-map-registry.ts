import {
  ConventionProfile,
  type ConventionPack,
  type FilteredConventionProfile,
} from '../conventions/conventions.js';
import {
  AmbiguousDiscriminatorError,
  DuplicateRegistrationError,
  InvalidRegistryConfigError,
  TypeMismatchError,
  UnknownDiscriminatorError,
} from '../errors/errors.js';
import { DecoratorShapeProvider } from '../shape/decorator-shape-provider.js';
import type {
  ClassMapRegistryConfig,
  ClassType,
  Constructor,
  RegistryLogger,
  TypeShapeProvider,
} from '../types/types.js';
import { ClassMap } from './class-map.js';
import { DiscriminatorIndex } from './discriminator-index.js';
import { closedGenericTypes } from './generic-type.js';
import { getTypeNameDiscriminator, resolveTypeName } from './type-names.js';
import { assertClassType, describeType, isAssignable } from './type-utils.js';

/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 */
const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function' ? () => maybePerf.now() : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for the creation hook */
const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * Global symbol for the process-wide registry returned by {@link ClassMapRegistry.shared}.
 */
const SHARED_SYMBOL = Symbol.for('docmapper.classMapRegistry');

type ResolvedConfig = Readonly<ClassMapRegistryConfig>;

const isObject = (value: unknown): value is object => typeof value === 'object' && value !== null;

/**
 * Process-wide store of class maps, convention profiles and discriminators.
 *
 * Every operation is synchronous and runs to completion before any other
 * registry code can run, so each public method is its own critical section:
 * two lookups of the same type can never build two maps, and the convention
 * chain never changes in the middle of a lookup.
 *
 * Class maps are never replaced. Derived maps resolve their base map and
 * identifier lazily and keep the reference, so {@link unregisterClassMap}
 * is only safe before any dependent map has resolved those links.
 *
 * @example
 * ```typescript
 * const registry = ClassMapRegistry.shared();
 * registry.registerConventions({ ignoreIfNull: new AlwaysIgnoreIfNullConvention() }, (t) => t === Audit);
 * const cm = registry.lookupClassMap(Order);
 * const actual = registry.lookupActualType(Animal, 'Cat');
 * ```
 */
export class ClassMapRegistry {
  readonly name: string;
  readonly shapes: TypeShapeProvider;
  readonly logger: RegistryLogger;

  private readonly classMaps = new Map<ClassType, ClassMap>();
  private readonly discriminators = new DiscriminatorIndex();
  /** Every discriminator each type was indexed under, dropped with its map */
  private readonly indexedDiscriminators = new Map<ClassType, Set<string>>();
  private readonly profiles: FilteredConventionProfile[] = [];
  private readonly defaultProfile: ConventionProfile;
  private readonly createdHook?: (type: ClassType, durationNs: number) => void;

  constructor(config?: ClassMapRegistryConfig) {
    const cfg = ClassMapRegistry.validateAndFreezeConfig(config);
    this.name = cfg.name ?? 'ClassMapRegistry';
    this.shapes = cfg.shapes ?? new DecoratorShapeProvider();
    this.logger = cfg.logger ?? console;
    this.createdHook = cfg.onClassMapCreated;
    this.defaultProfile = cfg.conventions
      ? ConventionProfile.merge(cfg.conventions, ConventionProfile.defaults())
      : ConventionProfile.defaults();
  }

  /**
   * The process-wide registry, created on first use with the default
   * configuration. Stored on `globalThis` so duplicated bundles share it.
   */
  static shared(): ClassMapRegistry {
    const existing: unknown = Reflect.get(globalThis, SHARED_SYMBOL);
    if (existing instanceof ClassMapRegistry) return existing;
    const created = new ClassMapRegistry({ name: 'shared' });
    Reflect.set(globalThis, SHARED_SYMBOL, created);
    return created;
  }

  /**
   * ⚠️ For test environments only. The next {@link shared} call starts from
   * an empty registry; maps handed out before keep working.
   */
  static resetShared(): void {
    Reflect.deleteProperty(globalThis, SHARED_SYMBOL);
  }

  // ---- class maps ----

  /**
   * Class map of `type`, auto-mapped and registered on first lookup.
   *
   * The new map is registered before it is auto-mapped, so a lookup of the
   * same type during auto-mapping (a known-subtype cycle) returns it. If
   * auto-mapping throws, the map is unregistered again and the error
   * propagates.
   *
   * @throws {InvalidClassTypeError} When `type` is not a class or closed generic
   */
  lookupClassMap<T>(type: Constructor<T>): ClassMap<T>;
  lookupClassMap(type: ClassType): ClassMap;
  lookupClassMap(type: ClassType): ClassMap {
    const existing = this.classMaps.get(type);
    if (existing) return existing;
    assertClassType(type);
    return this.install(new ClassMap(type, this), (cm) => cm.autoMap());
  }

  /**
   * Register a class map.
   *
   * - `registerClassMap(map)` registers a map built elsewhere.
   * - `registerClassMap(type)` auto-maps the type.
   * - `registerClassMap(type, initializer)` hands a fresh map to the
   *   initializer, which maps it (and may call `autoMap()` itself).
   *
   * @throws {DuplicateRegistrationError} When `type` already has a class map;
   *         the registered map is left untouched
   */
  registerClassMap<T>(map: ClassMap<T>): ClassMap<T>;
  registerClassMap<T>(type: Constructor<T>, initializer?: (cm: ClassMap<T>) => void): ClassMap<T>;
  registerClassMap(type: ClassType, initializer?: (cm: ClassMap) => void): ClassMap;
  registerClassMap(target: ClassMap | ClassType, initializer?: (cm: ClassMap) => void): ClassMap {
    if (target instanceof ClassMap) return this.install(target);
    assertClassType(target);
    this.assertNotRegistered(target);
    return this.install(new ClassMap(target, this), initializer ?? ((cm) => cm.autoMap()));
  }

  /**
   * Remove the class map of `type` and every discriminator it was indexed
   * under, including ones it carried before a later `setDiscriminator`.
   *
   * ⚠️ Maps that already resolved `baseClassMap` or `idPropertyMap` through
   * the removed map keep their reference. Only unregister a type before any
   * dependent map has been used.
   *
   * @returns true if a class map was removed
   */
  unregisterClassMap(type: ClassType): boolean {
    const map = this.classMaps.get(type);
    if (!map) return false;
    this.classMaps.delete(type);
    this.forgetDiscriminators(type);
    return true;
  }

  isClassMapRegistered(type: ClassType): boolean {
    return this.classMaps.has(type);
  }

  /**
   * Registered class maps in registration order.
   */
  getRegisteredClassMaps(): ClassMap[] {
    return Array.from(this.classMaps.values());
  }

  // ---- conventions ----

  /**
   * Convention profile for `type`: the first registered filter that accepts
   * it, else the default profile.
   */
  lookupConventions(type: ClassType): ConventionProfile {
    for (const entry of this.profiles) {
      if (entry.filter(type)) return entry.profile;
    }
    return this.defaultProfile;
  }

  /**
   * Append a profile to the selection chain. A pack is completed from the
   * default profile first. Only maps created afterwards are affected.
   */
  registerConventions(conventions: ConventionPack | ConventionProfile, filter: (type: ClassType) => boolean): void {
    if (typeof filter !== 'function') {
      throw new InvalidRegistryConfigError(`convention filter must be a function.`);
    }
    this.profiles.push({
      filter,
      profile: ConventionProfile.merge(conventions, this.defaultProfile),
      source: conventions,
    });
  }

  /**
   * Remove the first chain entry registered with `conventions`.
   *
   * @returns true if an entry was removed
   */
  unregisterConventions(conventions: ConventionPack | ConventionProfile): boolean {
    const index = this.profiles.findIndex((entry) => entry.source === conventions || entry.profile === conventions);
    if (index < 0) return false;
    this.profiles.splice(index, 1);
    return true;
  }

  // ---- discriminators ----

  /**
   * Index `type` under `discriminator`. Registering the same pair twice is a
   * no-op; several types may share a discriminator.
   */
  registerDiscriminator(type: ClassType, discriminator: string): void {
    this.discriminators.add(discriminator, type);
    let indexed = this.indexedDiscriminators.get(type);
    if (!indexed) {
      indexed = new Set();
      this.indexedDiscriminators.set(type, indexed);
    }
    indexed.add(discriminator);
  }

  /**
   * Type to decode into for a document carrying `discriminator`, where a
   * value of `nominalType` is expected.
   *
   * Looks up the nominal type's class map first, so its known subtypes are
   * indexed. Without a matching registered type the discriminator is tried
   * as a type name (see {@link getTypeNameDiscriminator}).
   *
   * @throws {AmbiguousDiscriminatorError} When several registered types assignable to `nominalType` share it
   * @throws {UnknownDiscriminatorError} When nothing matches
   * @throws {TypeMismatchError} When the type it names is not assignable to `nominalType`
   */
  lookupActualType(nominalType: ClassType, discriminator?: string): ClassType {
    if (discriminator === undefined) return nominalType;

    this.lookupClassMap(nominalType);

    const candidates = this.discriminators.get(discriminator).filter((t) => isAssignable(nominalType, t));
    if (candidates.length > 1) {
      throw new AmbiguousDiscriminatorError(discriminator, describeType(nominalType), candidates.map(describeType));
    }

    const actualType = candidates[0] ?? this.resolveTypeName(discriminator);
    if (!actualType) throw new UnknownDiscriminatorError(discriminator, describeType(nominalType));
    if (!isAssignable(nominalType, actualType)) {
      throw new TypeMismatchError(describeType(actualType), describeType(nominalType));
    }
    return actualType;
  }

  /**
   * Shortened unique type name: full name, plus the library qualifier unless
   * the type is built in.
   */
  getTypeNameDiscriminator(type: ClassType): string {
    assertClassType(type);
    return getTypeNameDiscriminator(type, this.shapes);
  }

  // ---- internals ----

  private resolveTypeName(typeName: string): ClassType | undefined {
    const candidates: ClassType[] = [
      ...this.shapes.knownTypes(),
      ...this.classMaps.keys(),
      ...closedGenericTypes(),
    ];
    return resolveTypeName(typeName, candidates, this.shapes);
  }

  private forgetDiscriminators(type: ClassType): void {
    for (const discriminator of this.indexedDiscriminators.get(type) ?? []) {
      this.discriminators.remove(discriminator, type);
    }
    this.indexedDiscriminators.delete(type);
  }

  private assertNotRegistered(type: ClassType): void {
    if (this.classMaps.has(type)) throw new DuplicateRegistrationError(describeType(type), this.name);
  }

  /**
   * Register `map`, then run `build` on it. A failing build leaves no trace
   * of the map in the registry.
   */
  private install<M extends ClassMap>(map: M, build?: (map: M) => void): M {
    const type = map.classType;
    this.assertNotRegistered(type);
    this.classMaps.set(type, map);
    if (!build) {
      this.registerDiscriminator(type, map.discriminator);
      return map;
    }

    const start = this.createdHook ? nowMs() : 0;
    try {
      build(map);
    } catch (error) {
      if (this.classMaps.get(type) === map) {
        this.classMaps.delete(type);
        this.forgetDiscriminators(type);
      }
      throw error;
    }
    this.registerDiscriminator(type, map.discriminator);
    this.createdHook?.(type, toNs(nowMs() - start));
    return map;
  }

  /**
   * Validate configuration and return a frozen copy.
   */
  private static validateAndFreezeConfig(rawCfg?: ClassMapRegistryConfig): ResolvedConfig {
    if (rawCfg === undefined) return Object.freeze({});
    if (!isObject(rawCfg)) {
      throw new InvalidRegistryConfigError(`config must be an object.`);
    }
    const { shapes, conventions, name, logger, onClassMapCreated } = rawCfg;
    if (
      shapes !== undefined &&
      (!isObject(shapes) || typeof shapes.describe !== 'function' || typeof shapes.knownTypes !== 'function')
    ) {
      throw new InvalidRegistryConfigError(`'shapes' must implement describe() and knownTypes().`);
    }
    if (conventions !== undefined && !isObject(conventions)) {
      throw new InvalidRegistryConfigError(`'conventions' must be an object.`);
    }
    if (name !== undefined && (typeof name !== 'string' || name.length === 0)) {
      throw new InvalidRegistryConfigError(`'name' must be a non-empty string.`);
    }
    if (logger !== undefined && (!isObject(logger) || typeof logger.warn !== 'function')) {
      throw new InvalidRegistryConfigError(`'logger' must have a warn() method.`);
    }
    if (onClassMapCreated !== undefined && typeof onClassMapCreated !== 'function') {
      throw new InvalidRegistryConfigError(`'onClassMapCreated' must be a function.`);
    }
    return Object.freeze({ ...rawCfg });
  }
}
