import { beforeEach, describe, expect, it } from 'vitest';

import { StaticDirectiveRegistry } from '../src/registry/static-registry.js';

const GLOBAL_SYMBOL = Symbol.for('docmapper.staticDirectiveRegistry');

describe('StaticDirectiveRegistry', () => {
  beforeEach(() => {
    StaticDirectiveRegistry.resetForTests();
  });

  it('fixes member positions at first registration and merges later patches', () => {
    class Order {}

    StaticDirectiveRegistry.registerMember(Order, 'id', { directives: { identifier: {} } });
    StaticDirectiveRegistry.registerMember(Order, 'total', { valueType: Number });
    StaticDirectiveRegistry.registerMember(Order, 'id', { directives: { order: 0 } });

    const record = StaticDirectiveRegistry.getRecord(Order);

    expect(Array.from(record?.members.keys() ?? [])).toEqual(['id', 'total']);
    expect(record?.members.get('id')?.directives).toEqual({ identifier: {}, order: 0 });
    expect(record?.members.get('total')?.valueType).toBe(Number);
  });

  it('bumps the version on every change', () => {
    class Note {}

    StaticDirectiveRegistry.registerMember(Note, 'text');
    const first = StaticDirectiveRegistry.getRecord(Note)?.version;
    StaticDirectiveRegistry.registerDocument(Note, { namespace: 'notes' });
    StaticDirectiveRegistry.registerClassDirectives(Note, { ignoreExtraElements: true });

    expect(first).toBe(1);
    expect(StaticDirectiveRegistry.getRecord(Note)?.version).toBe(3);
  });

  it('appends known types without duplicates and overwrites other class directives', () => {
    class Animal {}
    class Cat {}
    class Dog {}

    StaticDirectiveRegistry.registerClassDirectives(Animal, { knownTypes: [Cat], discriminator: 'a' });
    StaticDirectiveRegistry.registerClassDirectives(Animal, { knownTypes: [Dog, Cat], discriminator: 'animal' });

    expect(StaticDirectiveRegistry.getRecord(Animal)?.classDirectives).toEqual({
      knownTypes: [Cat, Dog],
      discriminator: 'animal',
    });
  });

  it('merges document options', () => {
    class Invoice {}

    StaticDirectiveRegistry.registerDocument(Invoice, { namespace: 'billing', name: 'Bill' });
    StaticDirectiveRegistry.registerDocument(Invoice, { name: 'Invoice' });

    expect(StaticDirectiveRegistry.getRecord(Invoice)?.document).toEqual({ namespace: 'billing', name: 'Invoice' });
  });

  it('lists decorated types in first-decoration order', () => {
    class First {}
    class Second {}

    StaticDirectiveRegistry.registerMember(Second, 'b');
    StaticDirectiveRegistry.registerMember(First, 'a');
    StaticDirectiveRegistry.registerMember(Second, 'c');

    expect(StaticDirectiveRegistry.decoratedTypes()).toEqual([Second, First]);
    expect(StaticDirectiveRegistry.getRecord(class Bare {})).toBeUndefined();
  });

  it('forgets every record on reset', () => {
    class Note {}
    StaticDirectiveRegistry.registerMember(Note, 'text');

    StaticDirectiveRegistry.reset();

    expect(StaticDirectiveRegistry.getRecord(Note)).toBeUndefined();
    expect(StaticDirectiveRegistry.decoratedTypes()).toEqual([]);
  });

  it('keeps its store on globalThis and replaces a foreign value', () => {
    class Note {}
    StaticDirectiveRegistry.registerMember(Note, 'text');

    expect(Reflect.get(globalThis, GLOBAL_SYMBOL)).toBeDefined();

    Reflect.set(globalThis, GLOBAL_SYMBOL, { records: 'not a map' });

    expect(StaticDirectiveRegistry.getRecord(Note)).toBeUndefined();
    StaticDirectiveRegistry.registerMember(Note, 'text');
    expect(StaticDirectiveRegistry.decoratedTypes()).toEqual([Note]);
  });
});
