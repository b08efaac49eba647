import type { ClassType, MemberShape, TypeShape } from '../types/types.js';

// ---- strategy interfaces ----

export interface ElementNameConvention {
  getElementName(member: MemberShape): string;
}

export interface IdPropertyConvention {
  /** Name of the member acting as identifier, among the type's own members */
  findIdProperty(shape: TypeShape): string | undefined;
}

export interface DefaultValueConvention {
  /** `undefined` means "no default value" */
  getDefaultValue(member: MemberShape): unknown;
}

export interface SerializeDefaultValueConvention {
  serializeDefaultValue(member: MemberShape): boolean;
}

export interface IgnoreIfNullConvention {
  ignoreIfNull(member: MemberShape): boolean;
}

export interface IgnoreExtraElementsConvention {
  ignoreExtraElements(type: ClassType): boolean;
}

export interface UseCompactRepresentationConvention {
  useCompactRepresentation(type: ClassType): boolean;
}

/**
 * The seven strategy slots of a convention profile.
 */
export interface ConventionSet {
  elementName: ElementNameConvention;
  idProperty: IdPropertyConvention;
  defaultValue: DefaultValueConvention;
  serializeDefaultValue: SerializeDefaultValueConvention;
  ignoreIfNull: IgnoreIfNullConvention;
  ignoreExtraElements: IgnoreExtraElementsConvention;
  useCompactRepresentation: UseCompactRepresentationConvention;
}

/**
 * A partial convention set. Unset slots are filled from the profile it is
 * merged over.
 */
export type ConventionPack = Partial<ConventionSet>;

// ---- built-in strategies ----

/** Element name equals the member name. */
export class MemberNameElementNameConvention implements ElementNameConvention {
  getElementName(member: MemberShape): string {
    return member.name;
  }
}

/** Lower-cases the first character of the member name: `FirstName` → `firstName`. */
export class CamelCaseElementNameConvention implements ElementNameConvention {
  getElementName(member: MemberShape): string {
    const { name } = member;
    return name.length === 0 ? name : name.charAt(0).toLowerCase() + name.slice(1);
  }
}

/** The first own member whose name is in the list. */
export class NamedIdPropertyConvention implements IdPropertyConvention {
  private readonly names: readonly string[];

  constructor(...names: string[]) {
    this.names = names;
  }

  findIdProperty(shape: TypeShape): string | undefined {
    for (const member of shape.members) {
      if (this.names.includes(member.name)) return member.name;
    }
    return undefined;
  }
}

export class NullDefaultValueConvention implements DefaultValueConvention {
  getDefaultValue(): unknown {
    return undefined;
  }
}

export class AlwaysSerializeDefaultValueConvention implements SerializeDefaultValueConvention {
  serializeDefaultValue(): boolean {
    return true;
  }
}

export class NeverSerializeDefaultValueConvention implements SerializeDefaultValueConvention {
  serializeDefaultValue(): boolean {
    return false;
  }
}

export class NeverIgnoreIfNullConvention implements IgnoreIfNullConvention {
  ignoreIfNull(): boolean {
    return false;
  }
}

export class AlwaysIgnoreIfNullConvention implements IgnoreIfNullConvention {
  ignoreIfNull(): boolean {
    return true;
  }
}

export class NeverIgnoreExtraElementsConvention implements IgnoreExtraElementsConvention {
  ignoreExtraElements(): boolean {
    return false;
  }
}

export class AlwaysIgnoreExtraElementsConvention implements IgnoreExtraElementsConvention {
  ignoreExtraElements(): boolean {
    return true;
  }
}

export class NeverUseCompactRepresentationConvention implements UseCompactRepresentationConvention {
  useCompactRepresentation(): boolean {
    return false;
  }
}

export class AlwaysUseCompactRepresentationConvention implements UseCompactRepresentationConvention {
  useCompactRepresentation(): boolean {
    return true;
  }
}

// ---- profile ----

const SLOTS = [
  'elementName',
  'idProperty',
  'defaultValue',
  'serializeDefaultValue',
  'ignoreIfNull',
  'ignoreExtraElements',
  'useCompactRepresentation',
] as const satisfies readonly (keyof ConventionSet)[];

/**
 * Immutable, complete bundle of convention strategies.
 *
 * Profiles are only ever built complete: a {@link ConventionPack} is merged
 * over an existing profile with {@link ConventionProfile.merge}, so every
 * slot is populated.
 *
 * @example
 * ```typescript
 * const camel = ConventionProfile.merge(
 *   { elementName: new CamelCaseElementNameConvention() },
 *   ConventionProfile.defaults()
 * );
 * ```
 */
export class ConventionProfile implements Readonly<ConventionSet> {
  private static defaultProfile?: ConventionProfile;

  readonly elementName: ElementNameConvention;
  readonly idProperty: IdPropertyConvention;
  readonly defaultValue: DefaultValueConvention;
  readonly serializeDefaultValue: SerializeDefaultValueConvention;
  readonly ignoreIfNull: IgnoreIfNullConvention;
  readonly ignoreExtraElements: IgnoreExtraElementsConvention;
  readonly useCompactRepresentation: UseCompactRepresentationConvention;

  private constructor(set: ConventionSet) {
    this.elementName = set.elementName;
    this.idProperty = set.idProperty;
    this.defaultValue = set.defaultValue;
    this.serializeDefaultValue = set.serializeDefaultValue;
    this.ignoreIfNull = set.ignoreIfNull;
    this.ignoreExtraElements = set.ignoreExtraElements;
    this.useCompactRepresentation = set.useCompactRepresentation;
    Object.freeze(this);
  }

  /**
   * The built-in profile: member names as element names, `id` as the
   * identifier member, no default values, defaults always serialized, nulls
   * kept, extra elements rejected, full representation.
   */
  static defaults(): ConventionProfile {
    return (ConventionProfile.defaultProfile ??= new ConventionProfile({
      elementName: new MemberNameElementNameConvention(),
      idProperty: new NamedIdPropertyConvention('id'),
      defaultValue: new NullDefaultValueConvention(),
      serializeDefaultValue: new AlwaysSerializeDefaultValueConvention(),
      ignoreIfNull: new NeverIgnoreIfNullConvention(),
      ignoreExtraElements: new NeverIgnoreExtraElementsConvention(),
      useCompactRepresentation: new NeverUseCompactRepresentationConvention(),
    }));
  }

  /**
   * Overlay `pack` on `base`: every slot `pack` sets wins, the rest come
   * from `base`.
   */
  static merge(pack: ConventionPack | ConventionProfile, base: ConventionProfile): ConventionProfile {
    if (pack instanceof ConventionProfile) return pack;
    const set = { ...base.toSet() };
    for (const slot of SLOTS) {
      const strategy = pack[slot];
      if (strategy) assignSlot(set, slot, strategy);
    }
    return new ConventionProfile(set);
  }

  toSet(): ConventionSet {
    return {
      elementName: this.elementName,
      idProperty: this.idProperty,
      defaultValue: this.defaultValue,
      serializeDefaultValue: this.serializeDefaultValue,
      ignoreIfNull: this.ignoreIfNull,
      ignoreExtraElements: this.ignoreExtraElements,
      useCompactRepresentation: this.useCompactRepresentation,
    };
  }
}

function assignSlot<K extends keyof ConventionSet>(set: ConventionSet, slot: K, strategy: ConventionSet[K]): void {
  set[slot] = strategy;
}

/**
 * One link of the convention selection chain.
 *
 * `source` is the object the caller registered (pack or profile); it is the
 * key used to unregister.
 */
export interface FilteredConventionProfile {
  readonly filter: (type: ClassType) => boolean;
  readonly profile: ConventionProfile;
  readonly source: ConventionPack | ConventionProfile;
}
