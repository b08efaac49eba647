import type { ClassType, LibraryIdentity, TypeShapeProvider } from '../types/types.js';
import { GenericType } from './generic-type.js';

/** Characters that make a rendered type argument ambiguous inside `[...]`. */
const SEPARATORS = /[,[\]]/;

/**
 * Library qualifier appended to a type name, or `undefined` when it is
 * omitted (core runtime, or no library at all).
 *
 * A signed library (one with a token) is rendered in full; an unsigned one
 * is reduced to its short name.
 */
export function libraryQualifier(library: LibraryIdentity | undefined): string | undefined {
  if (!library || library.core) return undefined;
  if (!library.token) return library.name;
  const parts = [library.name];
  if (library.version) parts.push(`Version=${library.version}`);
  parts.push(`Token=${library.token}`);
  return parts.join(', ');
}

/**
 * Full name of a type without its library qualifier.
 *
 * Closed generics render as `Definition[arg1,arg2]`, each argument rendered
 * with {@link getTypeNameDiscriminator} and bracketed when it contains a
 * separator.
 */
export function qualifiedTypeName(type: ClassType, shapes: TypeShapeProvider): string {
  if (!(type instanceof GenericType)) return shapes.describe(type).fullName;

  const args = type.typeArguments.map((arg) => {
    const rendered = getTypeNameDiscriminator(arg, shapes);
    return SEPARATORS.test(rendered) ? `[${rendered}]` : rendered;
  });
  return `${shapes.describe(type.definition).fullName}[${args.join(',')}]`;
}

/**
 * Shortened, globally unique name of a type, usable as a discriminator.
 *
 * @example
 * ```typescript
 * getTypeNameDiscriminator(Invoice, shapes);                      // 'billing.Invoice, billing-models'
 * getTypeNameDiscriminator(closeGeneric(Page, [String]), shapes); // 'Page[String]'
 * ```
 */
export function getTypeNameDiscriminator(type: ClassType, shapes: TypeShapeProvider): string {
  const definition = type instanceof GenericType ? type.definition : type;
  const name = qualifiedTypeName(type, shapes);
  const qualifier = libraryQualifier(shapes.describe(definition).library);
  return qualifier ? `${name}, ${qualifier}` : name;
}

/**
 * Find the type a type name denotes among `candidates`.
 *
 * A candidate whose full discriminator equals `typeName` wins over one that
 * only matches without its library qualifier.
 */
export function resolveTypeName(
  typeName: string,
  candidates: Iterable<ClassType>,
  shapes: TypeShapeProvider
): ClassType | undefined {
  let unqualifiedMatch: ClassType | undefined;
  for (const candidate of new Set(candidates)) {
    if (getTypeNameDiscriminator(candidate, shapes) === typeName) return candidate;
    if (!unqualifiedMatch && qualifiedTypeName(candidate, shapes) === typeName) unqualifiedMatch = candidate;
  }
  return unqualifiedMatch;
}
