import { beforeEach, describe, expect, it } from 'vitest';

import { ClassMapRegistry } from '../src/core/class-map-registry.js';
import { Discriminator, Field, KnownTypes } from '../src/decorators/index.js';
import {
  AmbiguousDiscriminatorError,
  TypeMismatchError,
  UnknownDiscriminatorError,
} from '../src/errors/errors.js';
import { StaticDirectiveRegistry } from '../src/registry/static-registry.js';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('discriminator resolution', () => {
  let registry: ClassMapRegistry;

  beforeEach(() => {
    StaticDirectiveRegistry.resetForTests();
    registry = new ClassMapRegistry();
  });

  const defineAnimals = () => {
    class Animal {
      @Field() name = '';
    }
    class Cat extends Animal {
      @Field() lives = 9;
    }
    class Dog extends Animal {
      @Field() breed = '';
    }
    KnownTypes(Cat, Dog)(Animal);
    return { Animal, Cat, Dog };
  };

  it('returns the nominal type when the document carries no discriminator', () => {
    const { Animal } = defineAnimals();

    expect(registry.lookupActualType(Animal)).toBe(Animal);
    expect(registry.lookupActualType(Animal, undefined)).toBe(Animal);
    expect(registry.isClassMapRegistered(Animal)).toBe(false);
  });

  it('resolves every registered discriminator back to its type', () => {
    const { Animal, Cat, Dog } = defineAnimals();

    for (const type of [Animal, Cat, Dog]) {
      const discriminator = registry.lookupClassMap(type).discriminator;
      expect(registry.lookupActualType(Animal, discriminator)).toBe(type);
    }
  });

  it('registers known subtypes when the nominal type is looked up', () => {
    const { Animal, Dog } = defineAnimals();

    expect(registry.lookupActualType(Animal, 'Dog')).toBe(Dog);
    expect(registry.isClassMapRegistered(Dog)).toBe(true);
  });

  it('resolves through Object as the nominal type', () => {
    const { Animal, Cat } = defineAnimals();
    registry.lookupClassMap(Animal);

    expect(registry.lookupActualType(Object, 'Cat')).toBe(Cat);
  });

  it('resolves a discriminator registered by hand', () => {
    const { Animal, Cat } = defineAnimals();
    registry.registerDiscriminator(Cat, 'feline');

    expect(registry.lookupActualType(Animal, 'feline')).toBe(Cat);
  });

  it('reports ambiguity among assignable types and narrows by nominal type', () => {
    class Animal {
      @Field() name = '';
    }
    @Discriminator('D')
    class Lion extends Animal {}
    @Discriminator('D')
    class Tiger extends Animal {}
    KnownTypes(Lion, Tiger)(Animal);

    const error = captureError(() => registry.lookupActualType(Animal, 'D'));

    expect(error).toBeInstanceOf(AmbiguousDiscriminatorError);
    expect(error).toMatchObject({ discriminator: 'D', nominalType: 'Animal', candidates: ['Lion', 'Tiger'] });
    expect(registry.lookupActualType(Lion, 'D')).toBe(Lion);
    expect(registry.lookupActualType(Tiger, 'D')).toBe(Tiger);
  });

  it('lets unrelated types share a discriminator', () => {
    @Discriminator('doc')
    class Invoice {
      @Field() total = 0;
    }
    @Discriminator('doc')
    class Letter {
      @Field() body = '';
    }
    registry.lookupClassMap(Invoice);
    registry.lookupClassMap(Letter);

    expect(registry.lookupActualType(Invoice, 'doc')).toBe(Invoice);
    expect(registry.lookupActualType(Letter, 'doc')).toBe(Letter);
  });

  it('falls back to type names for decorated types without a class map', () => {
    const { Animal } = defineAnimals();
    class Bird extends Animal {
      @Field() wings = 2;
    }

    expect(registry.lookupActualType(Animal, 'Bird')).toBe(Bird);
    expect(registry.isClassMapRegistered(Bird)).toBe(false);
  });

  it('fails on a discriminator nothing answers to', () => {
    const { Animal } = defineAnimals();

    const error = captureError(() => registry.lookupActualType(Animal, 'Unicorn'));

    expect(error).toBeInstanceOf(UnknownDiscriminatorError);
    expect(error).toMatchObject({ discriminator: 'Unicorn', nominalType: 'Animal' });
  });

  it('fails when the named type is not assignable to the nominal type', () => {
    const { Animal } = defineAnimals();

    const error = captureError(() => registry.lookupActualType(Animal, 'String'));

    expect(error).toBeInstanceOf(TypeMismatchError);
    expect(error).toMatchObject({ actualType: 'String', nominalType: 'Animal' });
  });

  it('does not resolve a base type from a subtype nominal', () => {
    const { Animal, Cat } = defineAnimals();
    registry.lookupClassMap(Animal);

    expect(() => registry.lookupActualType(Cat, 'Animal')).toThrow(TypeMismatchError);
  });

  it('stops resolving a discriminator once its class map is unregistered', () => {
    @Discriminator('memo-v1')
    class Memo {
      @Field() text = '';
    }
    registry.lookupClassMap(Memo);
    registry.unregisterClassMap(Memo);

    expect(() => registry.lookupActualType(Object, 'memo-v1')).toThrow(UnknownDiscriminatorError);
  });
});
