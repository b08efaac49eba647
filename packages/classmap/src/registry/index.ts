export { StaticDirectiveRegistry } from './static-registry.js';
export type { DirectiveRecord, DocumentDirective } from './static-registry.js';
