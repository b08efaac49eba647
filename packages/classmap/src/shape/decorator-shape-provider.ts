import { baseConstructorOf } from '../core/type-utils.js';
import { StaticDirectiveRegistry, type DirectiveRecord } from '../registry';
import type {
  ClassDirectives,
  Constructor,
  LibraryIdentity,
  MemberShape,
  TypeShape,
  TypeShapeProvider,
} from '../types/types.js';

/** Library identity of the JavaScript runtime's own constructors. */
export const CORE_LIBRARY: LibraryIdentity = Object.freeze({ name: 'ecmascript', core: true });

/**
 * Built-in constructors resolvable by name. These never carry directives.
 */
const CORE_TYPES: readonly Constructor[] = [
  Object,
  Array,
  Boolean,
  Number,
  String,
  Date,
  RegExp,
  Error,
  Map,
  Set,
  Promise,
  ArrayBuffer,
  Uint8Array,
];

const NO_DIRECTIVES: Readonly<ClassDirectives> = Object.freeze({});

export interface DecoratorShapeProviderOptions {
  /** Namespace of decorated classes that do not declare one */
  namespace?: string;
  /** Library of decorated classes that do not declare one */
  library?: LibraryIdentity;
}

type CachedShape = { record: DirectiveRecord | undefined; version: number; shape: TypeShape };

/**
 * Type-shape provider backed by the decorators in this package.
 *
 * Members come from member decorators in declaration order. Read/write
 * capability is taken from the prototype: an accessor without a setter is
 * read-only, a decorated field is read-write. The base type is the class's
 * prototype parent.
 */
export class DecoratorShapeProvider implements TypeShapeProvider {
  private readonly cache = new WeakMap<Constructor, CachedShape>();
  private readonly namespace?: string;
  private readonly library?: LibraryIdentity;

  constructor(options: DecoratorShapeProviderOptions = {}) {
    this.namespace = options.namespace;
    this.library = options.library;
  }

  describe(type: Constructor): TypeShape {
    const record = StaticDirectiveRegistry.getRecord(type);
    const version = record?.version ?? -1;
    const cached = this.cache.get(type);
    if (cached && cached.record === record && cached.version === version) return cached.shape;

    const shape = CORE_TYPES.includes(type) ? this.coreShape(type) : this.buildShape(type, record);
    this.cache.set(type, { record, version, shape });
    return shape;
  }

  knownTypes(): Iterable<Constructor> {
    return [...CORE_TYPES, ...StaticDirectiveRegistry.decoratedTypes()];
  }

  private coreShape(type: Constructor): TypeShape {
    return Object.freeze({
      name: type.name,
      fullName: type.name,
      library: CORE_LIBRARY,
      baseType: undefined,
      isAnonymous: false,
      directives: NO_DIRECTIVES,
      members: [],
    });
  }

  private buildShape(type: Constructor, record: DirectiveRecord | undefined): TypeShape {
    const document = record?.document ?? {};
    const name = document.name ?? type.name;
    const namespace = document.namespace ?? this.namespace;
    const members: MemberShape[] = [];

    for (const member of record?.members.values() ?? []) {
      const descriptor = Object.getOwnPropertyDescriptor(type.prototype, member.name);
      const accessor = descriptor && (descriptor.get || descriptor.set) ? descriptor : undefined;
      members.push(
        Object.freeze({
          name: member.name,
          valueType: member.valueType,
          canRead: accessor ? accessor.get !== undefined : true,
          canWrite: accessor ? accessor.set !== undefined : true,
          directives: Object.freeze({ ...member.directives }),
        })
      );
    }

    return Object.freeze({
      name,
      fullName: namespace ? `${namespace}.${name}` : name,
      library: document.library ?? this.library,
      baseType: baseConstructorOf(type),
      isAnonymous: document.anonymous === true || name === '',
      directives: record ? Object.freeze({ ...record.classDirectives }) : NO_DIRECTIVES,
      members: Object.freeze(members),
    });
  }
}
