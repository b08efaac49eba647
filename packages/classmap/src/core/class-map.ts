import { resolvePropertySelector, type PropertySelector } from '../api/property-selector.js';
import type { ConventionProfile } from '../conventions/conventions.js';
import { UnknownMemberError } from '../errors/errors.js';
import type {
  ClassType,
  Constructor,
  IdGenerator,
  IdGeneratorConstructor,
  MemberShape,
  TypeShape,
  ValueType,
} from '../types/types.js';
import type { ClassMapRegistry } from './class-map-registry.js';
import { ID_ELEMENT_NAME } from './constants.js';
import { runtimeConstructor } from './generic-type.js';
import { Lazy } from './lazy.js';
import { PropertyMap } from './property-map.js';
import { describeType } from './type-utils.js';

/** Value types whose members default to the compact representation. */
const COMPACT_VALUE_TYPES: readonly ValueType[] = [Number, Boolean, BigInt];

const NO_DIRECTIVES = Object.freeze({});

function instantiateGenerator(generator: IdGenerator | IdGeneratorConstructor | undefined): IdGenerator | undefined {
  return typeof generator === 'function' ? new generator() : generator;
}

/**
 * How instances of one type map to documents.
 *
 * Holds only the members declared on its own type; inherited members are
 * reached through {@link baseClassMap}, which is resolved on first access so
 * class maps can be built in any order. The identifier is resolved the same
 * way and comes from the highest ancestor that has one.
 *
 * Build one through {@link ClassMapRegistry.lookupClassMap} (auto-mapped) or
 * {@link ClassMapRegistry.registerClassMap} with an initializer:
 *
 * @example
 * ```typescript
 * registry.registerClassMap(User, (cm) => {
 *   cm.autoMap();
 *   cm.mapId((u) => u.login);
 *   cm.mapProperty((u) => u.createdAt, 'created');
 * });
 * ```
 *
 * Explicit orders are applied when {@link autoMap} runs; members mapped
 * afterwards are appended in mapping order, whatever their order.
 *
 * @template T - Instance type; only checks selectors
 */
export class ClassMap<T = unknown> {
  readonly classType: ClassType;
  /** Convention profile selected for the type when the map was created */
  readonly conventions: ConventionProfile;
  readonly isAnonymous: boolean;

  private readonly shape: TypeShape;
  private readonly declared: PropertyMap[] = [];
  private _discriminator: string;
  private _discriminatorIsRequired = false;
  private _ignoreExtraElements: boolean;
  private _useCompactRepresentation: boolean;
  private explicitId?: PropertyMap;

  private readonly baseLink = new Lazy(() => this.loadBaseClassMap());
  private idLink = new Lazy(() => this.loadIdPropertyMap());

  constructor(
    classType: ClassType,
    private readonly registry: ClassMapRegistry
  ) {
    this.classType = classType;
    this.conventions = registry.lookupConventions(classType);
    this.shape = registry.shapes.describe(runtimeConstructor(classType));
    this.isAnonymous = this.shape.isAnonymous;
    this._discriminator = this.shape.name;
    this._ignoreExtraElements = this.conventions.ignoreExtraElements.ignoreExtraElements(classType);
    this._useCompactRepresentation = this.conventions.useCompactRepresentation.useCompactRepresentation(classType);
  }

  // ---- inheritance links ----

  /**
   * Class map of the immediate base type, `undefined` for root types.
   * Resolving it looks the base type up in the registry.
   */
  get baseClassMap(): ClassMap | undefined {
    return this.baseLink.get();
  }

  /**
   * Identifier property. The base class map's identifier wins; without one
   * the type's own identifier, declared or found by convention.
   */
  get idPropertyMap(): PropertyMap | undefined {
    return this.idLink.get();
  }

  // ---- class-level settings ----

  get discriminator(): string {
    return this._discriminator;
  }

  /** True if this type or any ancestor requires an explicit discriminator. */
  get discriminatorIsRequired(): boolean {
    return this._discriminatorIsRequired || (this.baseClassMap?.discriminatorIsRequired ?? false);
  }

  get ignoreExtraElements(): boolean {
    return this._ignoreExtraElements;
  }

  get useCompactRepresentation(): boolean {
    return this._useCompactRepresentation;
  }

  /**
   * Property maps of members declared on this type: sorted by explicit order
   * as of the last {@link autoMap}, later mappings appended.
   */
  get declaredPropertyMaps(): readonly PropertyMap[] {
    return this.declared;
  }

  setDiscriminator(discriminator: string): this {
    this._discriminator = discriminator;
    return this;
  }

  /** A base class map that requires a discriminator overrides `false`. */
  setDiscriminatorIsRequired(discriminatorIsRequired: boolean): this {
    this._discriminatorIsRequired = discriminatorIsRequired;
    return this;
  }

  setIgnoreExtraElements(ignoreExtraElements: boolean): this {
    this._ignoreExtraElements = ignoreExtraElements;
    return this;
  }

  /** Only affects members mapped afterwards. */
  setUseCompactRepresentation(useCompactRepresentation: boolean): this {
    this._useCompactRepresentation = useCompactRepresentation;
    return this;
  }

  // ---- auto-mapping ----

  /**
   * Derive the map from the type's directives and conventions.
   *
   * Known subtypes are looked up first so their discriminators are indexed.
   * Only members declared on this type are mapped; members mapped before
   * (manually, or by an earlier call) are left as they are.
   */
  autoMap(): this {
    const directives = this.shape.directives;

    for (const known of directives.knownTypes ?? []) {
      this.registry.lookupClassMap(known);
    }

    if (directives.discriminator !== undefined) this._discriminator = directives.discriminator;
    if (directives.discriminatorIsRequired !== undefined) {
      this._discriminatorIsRequired = directives.discriminatorIsRequired;
    }
    if (directives.ignoreExtraElements !== undefined) this._ignoreExtraElements = directives.ignoreExtraElements;
    if (directives.useCompactRepresentation !== undefined) {
      this._useCompactRepresentation = directives.useCompactRepresentation;
    }

    for (const member of this.shape.members) {
      if (!this.isEligible(member) || this.findDeclared(member.name)) continue;
      const elementName = member.directives.identifier
        ? ID_ELEMENT_NAME
        : member.directives.elementName ?? this.conventions.elementName.getElementName(member);
      this.addPropertyMap(member, elementName);
    }

    if (this.declared.some((pm) => pm.hasExplicitOrder)) this.sortByOrder();

    this.registry.registerDiscriminator(this.classType, this._discriminator);
    return this;
  }

  // ---- manual mapping ----

  /**
   * Map one member declared on this type. Mapping a member twice returns the
   * same property map (renamed if `elementName` is given).
   *
   * @throws {InvalidPropertySelectorError} When the selector is not a plain member access
   * @throws {UnknownMemberError} When the member is a method or belongs to a base type
   */
  mapProperty<V>(selector: PropertySelector<T, V>, elementName?: string): PropertyMap {
    const name = resolvePropertySelector(selector);
    const existing = this.findDeclared(name);
    if (existing) {
      if (elementName !== undefined) existing.setElementName(elementName);
      return existing;
    }
    const member = this.ownMember(name);
    return this.addPropertyMap(member, elementName ?? this.conventions.elementName.getElementName(member));
  }

  /**
   * Map a member as the identifier. Its element name is always `_id`.
   */
  mapId<V>(selector: PropertySelector<T, V>): PropertyMap {
    const propertyMap = this.mapProperty(selector, ID_ELEMENT_NAME);
    this.explicitId = propertyMap;
    if (!this.idLink.isResolved) return propertyMap;
    this.idLink = new Lazy(() => this.loadIdPropertyMap());
    return propertyMap;
  }

  /**
   * Property map of a member of this type or an ancestor.
   */
  getPropertyMap<V>(selector: PropertySelector<T, V>): PropertyMap | undefined {
    const name = resolvePropertySelector(selector);
    return this.effectivePropertyMaps().find((pm) => pm.propertyName === name);
  }

  /**
   * Property map a document element routes to, searched base-first.
   */
  getPropertyMapForElement(elementName: string): PropertyMap | undefined {
    return this.effectivePropertyMaps().find((pm) => pm.elementName === elementName);
  }

  /**
   * Every property map of the type: the base map's effective list followed
   * by this type's own.
   */
  effectivePropertyMaps(): readonly PropertyMap[] {
    const base = this.baseClassMap;
    return base ? [...base.effectivePropertyMaps(), ...this.declared] : [...this.declared];
  }

  // ---- internals ----

  private isEligible(member: MemberShape): boolean {
    if (member.directives.ignore) return false;
    return member.canRead && (member.canWrite || this.isAnonymous);
  }

  private findDeclared(name: string): PropertyMap | undefined {
    return this.declared.find((pm) => pm.propertyName === name);
  }

  /**
   * Create a property map, resolving each setting from the member's
   * directive and falling back to the conventions.
   */
  private addPropertyMap(member: MemberShape, elementName: string): PropertyMap {
    const directives = member.directives;
    const conventions = this.conventions;
    const propertyMap = new PropertyMap(member, this.classType, elementName);

    if (directives.order !== undefined) propertyMap.setOrder(directives.order);

    if (directives.identifier) {
      if (this.explicitId) {
        this.registry.logger.warn(
          `[docmapper] '${describeType(this.classType)}' declares identifier '${member.name}' ` +
            `after '${this.explicitId.propertyName}'; the first identifier is used.`
        );
      }
      this.explicitId ??= propertyMap;
      propertyMap.setIdGenerator(instantiateGenerator(directives.identifier.generator));
    }

    if (directives.defaultValue) {
      propertyMap.setDefaultValue(directives.defaultValue.value);
      propertyMap.setSerializeDefaultValue(directives.defaultValue.serialize);
    } else {
      const defaultValue = conventions.defaultValue.getDefaultValue(member);
      if (defaultValue !== undefined) propertyMap.setDefaultValue(defaultValue);
      propertyMap.setSerializeDefaultValue(conventions.serializeDefaultValue.serializeDefaultValue(member));
    }

    propertyMap.setIgnoreIfNull(directives.ignoreIfNull ?? conventions.ignoreIfNull.ignoreIfNull(member));
    propertyMap.setIsRequired(directives.required ?? false);
    propertyMap.setUseCompactRepresentation(
      directives.useCompactRepresentation ??
        (this._useCompactRepresentation ||
          (member.valueType !== undefined && COMPACT_VALUE_TYPES.includes(member.valueType)))
    );

    this.declared.push(propertyMap);
    return propertyMap;
  }

  /**
   * Stable partition: explicitly ordered maps ascending, then the rest in
   * declaration order.
   */
  private sortByOrder(): void {
    const ordered = this.declared.filter((pm) => pm.hasExplicitOrder).sort((a, b) => a.order - b.order);
    const unordered = this.declared.filter((pm) => !pm.hasExplicitOrder);
    this.declared.splice(0, this.declared.length, ...ordered, ...unordered);
  }

  /**
   * Shape of a member of this type that the shape provider may not list,
   * read from the prototype.
   */
  private ownMember(name: string): MemberShape {
    const listed = this.shape.members.find((m) => m.name === name);
    if (listed) return listed;

    const ctor = runtimeConstructor(this.classType);
    if (this.isInheritedMember(ctor, name)) throw new UnknownMemberError(describeType(this.classType), name);

    const descriptor = Object.getOwnPropertyDescriptor(ctor.prototype, name);
    if (descriptor && typeof descriptor.value === 'function') {
      throw new UnknownMemberError(describeType(this.classType), name);
    }
    const accessor = descriptor && (descriptor.get || descriptor.set) ? descriptor : undefined;
    return Object.freeze({
      name,
      canRead: accessor ? accessor.get !== undefined : true,
      canWrite: accessor ? accessor.set !== undefined : true,
      directives: NO_DIRECTIVES,
    });
  }

  private isInheritedMember(ctor: Constructor, name: string): boolean {
    let base = this.shape.baseType;
    while (base) {
      const shape = this.registry.shapes.describe(base);
      if (shape.members.some((m) => m.name === name)) return true;
      base = shape.baseType;
    }
    const parent: unknown = Object.getPrototypeOf(ctor.prototype);
    return typeof parent === 'object' && parent !== null && name in parent;
  }

  private loadBaseClassMap(): ClassMap | undefined {
    const baseType = this.shape.baseType;
    if (!baseType) return undefined;
    const base = this.registry.lookupClassMap(baseType);
    if (base.discriminatorIsRequired) this._discriminatorIsRequired = true;
    return base;
  }

  private loadIdPropertyMap(): PropertyMap | undefined {
    const inherited = this.baseClassMap?.idPropertyMap;
    if (inherited) {
      if (this.explicitId && this.explicitId !== inherited) {
        this.registry.logger.warn(
          `[docmapper] '${describeType(this.classType)}' declares identifier '${this.explicitId.propertyName}' ` +
            `but inherits '${inherited.propertyName}' from a base class map; the inherited identifier is used.`
        );
      }
      return inherited;
    }
    if (this.explicitId) return this.explicitId;

    const ownShape: TypeShape = { ...this.shape, members: this.declared.map((pm) => pm.member) };
    const name = this.conventions.idProperty.findIdProperty(ownShape);
    const found = name === undefined ? undefined : this.findDeclared(name);
    found?.setElementName(ID_ELEMENT_NAME);
    return found;
  }
}
