import type { ClassType, Constructor } from '../types/types.js';

/**
 * A parameterized type closed over concrete type arguments.
 *
 * JavaScript erases type arguments, so `Wrapper<Inner>` has no runtime
 * identity of its own. Instances are interned by {@link closeGeneric}: the
 * same definition and arguments always yield the same object, which makes
 * them usable as registry keys.
 */
export class GenericType {
  /** @internal use {@link closeGeneric} */
  constructor(
    readonly definition: Constructor,
    readonly typeArguments: readonly ClassType[]
  ) {
    Object.freeze(this.typeArguments);
  }

  get name(): string {
    return this.definition.name;
  }
}

const interned = new WeakMap<Constructor, GenericType[]>();

/**
 * Every closed generic created so far, in creation order. Strong references
 * are intended: closed types are few and live as long as their definitions.
 */
const allClosed: GenericType[] = [];

function sameArguments(a: readonly ClassType[], b: readonly ClassType[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

/**
 * Close a generic definition over type arguments.
 *
 * @example
 * ```typescript
 * const PageOfUsers = closeGeneric(Page, [User]);
 * registry.lookupClassMap(PageOfUsers) === registry.lookupClassMap(closeGeneric(Page, [User]));
 * ```
 */
export function closeGeneric(definition: Constructor, typeArguments: readonly ClassType[]): GenericType {
  if (typeArguments.length === 0) {
    throw new Error(`closeGeneric(${definition.name}) requires at least one type argument`);
  }
  let list = interned.get(definition);
  if (!list) {
    list = [];
    interned.set(definition, list);
  }
  const existing = list.find((g) => sameArguments(g.typeArguments, typeArguments));
  if (existing) return existing;

  const created = new GenericType(definition, [...typeArguments]);
  list.push(created);
  allClosed.push(created);
  return created;
}

export function isGenericType(type: unknown): type is GenericType {
  return type instanceof GenericType;
}

/**
 * Closed generic types created so far.
 */
export function closedGenericTypes(): readonly GenericType[] {
  return allClosed;
}

/**
 * Runtime constructor behind a class type.
 */
export function runtimeConstructor(type: ClassType): Constructor {
  return type instanceof GenericType ? type.definition : type;
}

