import type {
  ClassDirectives,
  ClassType,
  Constructor,
  LibraryIdentity,
  MemberDirectives,
  ValueType,
} from '../types/types.js';

/**
 * Naming information declared with `@Document()`.
 */
export interface DocumentDirective {
  /** Overrides the simple name (and so the default discriminator) */
  name?: string;
  namespace?: string;
  library?: LibraryIdentity;
  /** Marks an ad hoc record type; read-only members stay mappable */
  anonymous?: boolean;
}

type MutableClassDirectives = Omit<ClassDirectives, 'knownTypes'> & { knownTypes: ClassType[] };

type MutableMemberRecord = {
  name: string;
  valueType?: ValueType;
  directives: MemberDirectives;
};

/**
 * Mutable record storing decorator directives for a single class.
 *
 * Fields:
 * - document: `@Document()` naming options
 * - classDirectives: class-level directives, known types accumulate
 * - members: member name → directives, in first-decoration order
 * - version: bumped on every mutation so cached shapes can be invalidated
 */
type MutableDirectiveRecord = {
  document: DocumentDirective;
  classDirectives: MutableClassDirectives;
  members: Map<string, MutableMemberRecord>;
  version: number;
};

/**
 * Read-only view of a directive record.
 */
export interface DirectiveRecord {
  readonly document: Readonly<DocumentDirective>;
  readonly classDirectives: Readonly<ClassDirectives>;
  readonly members: ReadonlyMap<string, Readonly<MutableMemberRecord>>;
  readonly version: number;
}

/**
 * Fields:
 * - records: WeakMap so classes can be collected once unreachable
 * - keys: strong references for enumeration by type-name lookups
 */
type DirectiveBag = {
  records: WeakMap<Constructor, MutableDirectiveRecord>;
  keys: Set<Constructor>;
};

/**
 * Global symbol for storing the directive bag on globalThis.
 *
 * Keeps a single store per process even if the module is bundled more than
 * once, so decorators and shape providers from different copies agree.
 */
const GLOBAL_SYMBOL = Symbol.for('docmapper.staticDirectiveRegistry');

function createBag(): DirectiveBag {
  return { records: new WeakMap(), keys: new Set() };
}

function isDirectiveBag(value: unknown): value is DirectiveBag {
  return (
    typeof value === 'object' &&
    value !== null &&
    'records' in value &&
    'keys' in value &&
    value.records instanceof WeakMap &&
    value.keys instanceof Set
  );
}

function ensureBag(): DirectiveBag {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isDirectiveBag(existing)) return existing;
  const fresh = createBag();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Global store for decorator-declared directives.
 *
 * Decorators write here at class-definition time; the
 * {@link DecoratorShapeProvider} reads records back when a class map is
 * derived. Nothing here knows about class maps.
 */
export class StaticDirectiveRegistry {
  /**
   * Record `@Document()` naming options. Later calls merge over earlier ones.
   */
  static registerDocument(target: Constructor, document: DocumentDirective): void {
    const rec = this.ensureRecord(target);
    rec.document = { ...rec.document, ...document };
    rec.version += 1;
  }

  /**
   * Record class-level directives. `knownTypes` are appended (duplicates
   * skipped); every other field overwrites.
   */
  static registerClassDirectives(target: Constructor, directives: ClassDirectives): void {
    const rec = this.ensureRecord(target);
    const { knownTypes, ...rest } = directives;
    Object.assign(rec.classDirectives, rest);
    for (const known of knownTypes ?? []) {
      if (!rec.classDirectives.knownTypes.includes(known)) rec.classDirectives.knownTypes.push(known);
    }
    rec.version += 1;
  }

  /**
   * Record a member, and optionally its value type and directives.
   *
   * The first call for a member fixes its position; member decorators run
   * top to bottom, so positions follow declaration order.
   */
  static registerMember(
    target: Constructor,
    name: string,
    patch: { valueType?: ValueType; directives?: MemberDirectives } = {}
  ): void {
    const rec = this.ensureRecord(target);
    let member = rec.members.get(name);
    if (!member) {
      member = { name, directives: {} };
      rec.members.set(name, member);
    }
    if (patch.valueType !== undefined) member.valueType = patch.valueType;
    if (patch.directives) member.directives = { ...member.directives, ...patch.directives };
    rec.version += 1;
  }

  static getRecord(target: Constructor): DirectiveRecord | undefined {
    return this.getBag().records.get(target);
  }

  /**
   * Classes carrying at least one directive, in first-decoration order.
   */
  static decoratedTypes(): Constructor[] {
    return Array.from(this.getBag().keys);
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only. Alias for reset().
   */
  static resetForTests(): void {
    this.reset();
  }

  /**
   * ⚠️ Drops every recorded directive. Classes decorated before the reset
   * look undecorated afterwards.
   */
  static reset(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createBag());
  }

  // ---- internals ----

  private static getBag(): DirectiveBag {
    return ensureBag();
  }

  private static ensureRecord(target: Constructor): MutableDirectiveRecord {
    const bag = this.getBag();
    let rec = bag.records.get(target);
    if (!rec) {
      rec = {
        document: {},
        classDirectives: { knownTypes: [] },
        members: new Map(),
        version: 0,
      };
      bag.records.set(target, rec);
      bag.keys.add(target);
    }
    return rec;
  }
}
