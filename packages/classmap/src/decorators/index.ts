export { Discriminator, Document, IgnoreExtraElements, KnownTypes, UseCompactRepresentation } from './document.js';
export { DefaultValue, Element, Field, Id, Ignore, IgnoreIfNull, Required } from './field.js';
export type { MemberDecorator } from './targets.js';
