import { isConstructor } from '../core/type-utils.js';
import type { Constructor } from '../types/types.js';

/** First parameter of a member decorator: the prototype, or the class for statics. */
export type MemberTarget = Parameters<PropertyDecorator>[0];

/**
 * Decorator for fields and accessors. Accessor decorators receive the
 * descriptor as a third argument, which is ignored.
 */
export type MemberDecorator = (
  target: MemberTarget,
  propertyKey: string | symbol,
  descriptor?: PropertyDescriptor
) => void;

export function classTarget(target: unknown, decorator: string): Constructor {
  if (!isConstructor(target)) throw new Error(`@${decorator}() can only decorate classes`);
  return target;
}

/**
 * Resolve the owning class and member name of a member decorator. Static and
 * symbol-keyed members cannot be document elements.
 */
export function memberTarget(
  target: MemberTarget,
  propertyKey: string | symbol,
  decorator: string
): { ctor: Constructor; name: string } {
  if (typeof target === 'function') {
    throw new Error(`@${decorator}() cannot decorate static member '${String(propertyKey)}'`);
  }
  if (typeof propertyKey === 'symbol') {
    throw new Error(`@${decorator}() cannot decorate symbol-keyed member ${String(propertyKey)}`);
  }
  const ctor: unknown = target.constructor;
  if (!isConstructor(ctor)) throw new Error(`@${decorator}() target '${propertyKey}' has no class`);
  return { ctor, name: propertyKey };
}
