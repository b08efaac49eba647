import { InvalidClassTypeError } from '../errors/errors.js';
import type { ClassType, Constructor } from '../types/types.js';
import { GenericType, isGenericType } from './generic-type.js';

/**
 * Runtime type guard for class constructors.
 *
 * Arrow functions and async functions have no `prototype` object and are
 * rejected.
 */
export function isConstructor(value: unknown): value is Constructor {
  if (typeof value !== 'function') return false;
  const prototype: unknown = value.prototype;
  return typeof prototype === 'object' && prototype !== null;
}

export function assertClassType(value: unknown): asserts value is ClassType {
  if (!isConstructor(value) && !isGenericType(value)) throw new InvalidClassTypeError(value);
}

/**
 * Immediate base constructor of a class, `undefined` for root classes.
 */
export function baseConstructorOf(ctor: Constructor): Constructor | undefined {
  const parent: unknown = Object.getPrototypeOf(ctor);
  if (parent === Function.prototype || !isConstructor(parent)) return undefined;
  return parent;
}

/**
 * Whether a value of `actual` can stand where `nominal` is expected.
 *
 * A closed generic is only assignable to itself or to a constructor its
 * definition derives from; nothing but itself is assignable to a closed
 * generic. `Object` accepts every type.
 */
export function isAssignable(nominal: ClassType, actual: ClassType): boolean {
  if (nominal === actual) return true;
  if (nominal instanceof GenericType) return false;
  if (nominal === Object) return true;

  let current: Constructor | undefined =
    actual instanceof GenericType ? actual.definition : actual;
  while (current) {
    if (current === nominal) return true;
    current = baseConstructorOf(current);
  }
  return false;
}

/**
 * Human-readable type label for diagnostics.
 */
export function describeType(type: ClassType): string {
  if (type instanceof GenericType) {
    return `${type.definition.name}<${type.typeArguments.map(describeType).join(', ')}>`;
  }
  return type.name || '<anonymous>';
}
