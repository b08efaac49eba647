import { StaticDirectiveRegistry, type DocumentDirective } from '../registry';
import type { ClassType } from '../types/types.js';
import { classTarget, memberTarget, type MemberDecorator, type MemberTarget } from './targets.js';

/**
 * Names a class for type-name discriminators.
 *
 * Optional: undecorated classes use their constructor name and the shape
 * provider's default namespace and library.
 *
 * @example
 * ```typescript
 * @Document({ namespace: 'billing', library: { name: 'billing-models' } })
 * class Invoice {
 *   @Id() id!: string;
 * }
 * // type-name discriminator: 'billing.Invoice, billing-models'
 * ```
 */
export function Document(options: DocumentDirective = {}): ClassDecorator {
  return (target) => {
    StaticDirectiveRegistry.registerDocument(classTarget(target, 'Document'), { ...options });
  };
}

/**
 * Declares subtypes that must be registered whenever this class's map is.
 *
 * Looking up the class map of the decorated class also looks up each known
 * type, so their discriminators are indexed before a document of that
 * subtype is decoded.
 *
 * @example
 * ```typescript
 * @KnownTypes(Cat, Dog)
 * abstract class Animal {}
 * ```
 */
export function KnownTypes(...types: ClassType[]): ClassDecorator {
  return (target) => {
    StaticDirectiveRegistry.registerClassDirectives(classTarget(target, 'KnownTypes'), {
      knownTypes: types,
    });
  };
}

/**
 * Overrides the discriminator written for this class.
 *
 * With `required: true`, decoders must never infer this class (or any
 * subclass) without an explicit discriminator in the document.
 */
export function Discriminator(discriminator?: string, options: { required?: boolean } = {}): ClassDecorator {
  return (target) => {
    StaticDirectiveRegistry.registerClassDirectives(classTarget(target, 'Discriminator'), {
      discriminator,
      discriminatorIsRequired: options.required ?? false,
    });
  };
}

/**
 * Whether unknown incoming elements are skipped instead of rejected.
 */
export function IgnoreExtraElements(ignore = true): ClassDecorator {
  return (target) => {
    StaticDirectiveRegistry.registerClassDirectives(classTarget(target, 'IgnoreExtraElements'), {
      ignoreExtraElements: ignore,
    });
  };
}

/**
 * Compact representation flag, on a class (default for its members) or on a
 * single member.
 */
export function UseCompactRepresentation(use = true): ClassDecorator & MemberDecorator {
  return (target: MemberTarget, propertyKey?: string | symbol): void => {
    if (propertyKey === undefined) {
      StaticDirectiveRegistry.registerClassDirectives(classTarget(target, 'UseCompactRepresentation'), {
        useCompactRepresentation: use,
      });
      return;
    }
    const { ctor, name } = memberTarget(target, propertyKey, 'UseCompactRepresentation');
    StaticDirectiveRegistry.registerMember(ctor, name, { directives: { useCompactRepresentation: use } });
  };
}
