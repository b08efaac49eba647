import { StaticDirectiveRegistry } from '../registry';
import type { IdGenerator, IdGeneratorConstructor, MemberDirectives, ValueType } from '../types/types.js';
import { memberTarget, type MemberDecorator } from './targets.js';

function memberDecorator(
  decorator: string,
  patch: { valueType?: ValueType; directives?: MemberDirectives }
): MemberDecorator {
  return (target, propertyKey) => {
    const { ctor, name } = memberTarget(target, propertyKey, decorator);
    StaticDirectiveRegistry.registerMember(ctor, name, patch);
  };
}

/**
 * Declares a data member of a document class.
 *
 * JavaScript classes do not expose their fields at runtime, so every mapped
 * member needs at least one member decorator. `@Field()` declares the member
 * without changing any default; the value type is optional and only drives
 * the compact-representation fallback for numbers and booleans.
 *
 * @example
 * ```typescript
 * class Order {
 *   @Field() customer!: string;
 *   @Field(Number) total = 0;
 * }
 * ```
 */
export function Field(valueType?: ValueType): MemberDecorator {
  return memberDecorator('Field', { valueType });
}

/**
 * Marks the document identifier. It is always stored as `_id`, whatever
 * `@Element()` says.
 *
 * @param options.generator - Generator instance, or a class instantiated once
 *                            when the class map is built
 */
export function Id(options: { generator?: IdGenerator | IdGeneratorConstructor } = {}): MemberDecorator {
  return memberDecorator('Id', { directives: { identifier: { generator: options.generator } } });
}

/**
 * Element name and/or serialization order of a member.
 *
 * Members with an order are written first, ascending; the rest follow in
 * declaration order.
 */
export function Element(elementName?: string, options: { order?: number } = {}): MemberDecorator {
  const directives: MemberDirectives = {};
  if (elementName !== undefined) directives.elementName = elementName;
  if (options.order !== undefined) {
    if (!Number.isInteger(options.order)) {
      throw new Error(`@Element() order must be an integer, got ${options.order}`);
    }
    directives.order = options.order;
  }
  return memberDecorator('Element', { directives });
}

/**
 * Excludes a member from the class map.
 */
export function Ignore(): MemberDecorator {
  return memberDecorator('Ignore', { directives: { ignore: true } });
}

/**
 * Value assumed when the element is missing from a document.
 *
 * @param options.serialize - Whether a member equal to its default is still
 *                            written (defaults to true)
 */
export function DefaultValue(value: unknown, options: { serialize?: boolean } = {}): MemberDecorator {
  return memberDecorator('DefaultValue', {
    directives: { defaultValue: { value, serialize: options.serialize ?? true } },
  });
}

export function IgnoreIfNull(ignore = true): MemberDecorator {
  return memberDecorator('IgnoreIfNull', { directives: { ignoreIfNull: ignore } });
}

/**
 * The element must be present when decoding.
 */
export function Required(required = true): MemberDecorator {
  return memberDecorator('Required', { directives: { required } });
}
