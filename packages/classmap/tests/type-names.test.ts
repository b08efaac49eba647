import { beforeEach, describe, expect, it } from 'vitest';

import { ClassMapRegistry } from '../src/core/class-map-registry.js';
import { closeGeneric, isGenericType } from '../src/core/generic-type.js';
import { libraryQualifier } from '../src/core/type-names.js';
import { describeType } from '../src/core/type-utils.js';
import { Document, Field } from '../src/decorators/index.js';
import { InvalidClassTypeError } from '../src/errors/errors.js';
import { StaticDirectiveRegistry } from '../src/registry/static-registry.js';
import { DecoratorShapeProvider } from '../src/shape/decorator-shape-provider.js';

describe('type-name discriminators', () => {
  let registry: ClassMapRegistry;

  beforeEach(() => {
    StaticDirectiveRegistry.resetForTests();
    registry = new ClassMapRegistry();
  });

  describe('libraryQualifier', () => {
    it('renders signed libraries in full and unsigned ones by name', () => {
      expect(libraryQualifier(undefined)).toBeUndefined();
      expect(libraryQualifier({ name: 'ecmascript', core: true })).toBeUndefined();
      expect(libraryQualifier({ name: 'models', version: '1.0.0' })).toBe('models');
      expect(libraryQualifier({ name: 'ledger', version: '2.1.0', token: 'abc123' })).toBe(
        'ledger, Version=2.1.0, Token=abc123'
      );
      expect(libraryQualifier({ name: 'ledger', token: 'abc123' })).toBe('ledger, Token=abc123');
    });
  });

  describe('getTypeNameDiscriminator', () => {
    it('qualifies a type with its namespace and library', () => {
      @Document({ namespace: 'billing', library: { name: 'billing-models', version: '3.0.0' } })
      class Invoice {
        @Field() total = 0;
      }
      @Document({ namespace: 'acct', library: { name: 'ledger', version: '2.1.0', token: 'abc123' } })
      class Entry {
        @Field() amount = 0;
      }

      expect(registry.getTypeNameDiscriminator(Invoice)).toBe('billing.Invoice, billing-models');
      expect(registry.getTypeNameDiscriminator(Entry)).toBe('acct.Entry, ledger, Version=2.1.0, Token=abc123');
    });

    it('omits the qualifier of built-in and unqualified types', () => {
      class Loose {}

      expect(registry.getTypeNameDiscriminator(String)).toBe('String');
      expect(registry.getTypeNameDiscriminator(Date)).toBe('Date');
      expect(registry.getTypeNameDiscriminator(Loose)).toBe('Loose');
    });

    it('renders a document name in place of the class name', () => {
      @Document({ name: 'Customer', namespace: 'crm' })
      class CustomerRecord {
        @Field() name = '';
      }

      expect(registry.getTypeNameDiscriminator(CustomerRecord)).toBe('crm.Customer');
      expect(registry.lookupClassMap(CustomerRecord).discriminator).toBe('Customer');
    });

    it('renders closed generics with bracketed qualified arguments', () => {
      @Document({ namespace: 'billing', library: { name: 'billing-models' } })
      class Invoice {
        @Field() total = 0;
      }
      class Page<TItem> {
        @Field() items: TItem[] = [];
      }
      class Pair<A, B> {
        @Field() first?: A;
        @Field() second?: B;
      }
      @Document({ namespace: 'app' })
      class Wrapper<T> {
        @Field() inner?: T;
      }
      @Document({ namespace: 'app' })
      class Inner {}

      const pair = closeGeneric(Pair, [String, Number]);

      expect(registry.getTypeNameDiscriminator(closeGeneric(Page, [Invoice]))).toBe(
        'Page[[billing.Invoice, billing-models]]'
      );
      expect(registry.getTypeNameDiscriminator(pair)).toBe('Pair[String,Number]');
      expect(registry.getTypeNameDiscriminator(closeGeneric(Page, [pair]))).toBe('Page[[Pair[String,Number]]]');
      expect(registry.getTypeNameDiscriminator(closeGeneric(Wrapper, [Inner]))).toBe('app.Wrapper[app.Inner]');
    });

    it('appends the library of the generic definition', () => {
      @Document({ namespace: 'coll', library: { name: 'collections' } })
      class Bag<T> {
        @Field() items: T[] = [];
      }

      expect(registry.getTypeNameDiscriminator(closeGeneric(Bag, [Number]))).toBe('coll.Bag[Number], collections');
    });

    it('uses the shape provider defaults for undeclared namespaces and libraries', () => {
      const shop = new ClassMapRegistry({
        shapes: new DecoratorShapeProvider({ namespace: 'models', library: { name: 'shop' } }),
      });
      class Cart {
        @Field() lines = 0;
      }
      @Document({ namespace: 'legacy' })
      class Coupon {}

      expect(shop.getTypeNameDiscriminator(Cart)).toBe('models.Cart, shop');
      expect(shop.getTypeNameDiscriminator(Coupon)).toBe('legacy.Coupon, shop');
      expect(shop.getTypeNameDiscriminator(Number)).toBe('Number');
    });

    it('rejects values that are not class types', () => {
      expect(() => registry.getTypeNameDiscriminator('Invoice' as never)).toThrow(InvalidClassTypeError);
    });
  });

  describe('closeGeneric', () => {
    it('interns closed generics by definition and arguments', () => {
      class Box<T> {
        @Field() value?: T;
      }

      const boxOfString = closeGeneric(Box, [String]);

      expect(closeGeneric(Box, [String])).toBe(boxOfString);
      expect(closeGeneric(Box, [Number])).not.toBe(boxOfString);
      expect(isGenericType(boxOfString)).toBe(true);
      expect(isGenericType(Box)).toBe(false);
      expect(boxOfString.name).toBe('Box');
      expect(describeType(boxOfString)).toBe('Box<String>');
      expect(Object.isFrozen(boxOfString.typeArguments)).toBe(true);
    });

    it('requires at least one type argument', () => {
      class Box {}

      expect(() => closeGeneric(Box, [])).toThrow('closeGeneric(Box) requires at least one type argument');
    });

    it('gives each closed generic its own class map', () => {
      class Box<T> {
        @Field() value?: T;
      }
      const ofString = closeGeneric(Box, [String]);
      const ofNumber = closeGeneric(Box, [Number]);

      const stringMap = registry.lookupClassMap(ofString);

      expect(registry.lookupClassMap(closeGeneric(Box, [String]))).toBe(stringMap);
      expect(registry.lookupClassMap(ofNumber)).not.toBe(stringMap);
      expect(stringMap.classType).toBe(ofString);
      expect(stringMap.discriminator).toBe('Box');
      expect(stringMap.declaredPropertyMaps.map((pm) => pm.propertyName)).toEqual(['value']);
    });
  });

  describe('name lookup', () => {
    it('finds types by qualified name, with or without the library', () => {
      @Document({ namespace: 'billing', library: { name: 'billing-models' } })
      class Invoice {
        @Field() total = 0;
      }

      expect(registry.lookupActualType(Object, 'billing.Invoice, billing-models')).toBe(Invoice);
      expect(registry.lookupActualType(Object, 'billing.Invoice')).toBe(Invoice);
      expect(registry.lookupActualType(Object, 'Date')).toBe(Date);
    });

    it('prefers an exact library match over an earlier unqualified one', () => {
      @Document({ name: 'Thing', namespace: 'x', library: { name: 'one' } })
      class ThingOne {}
      @Document({ name: 'Thing', namespace: 'x', library: { name: 'two' } })
      class ThingTwo {}

      expect(registry.lookupActualType(Object, 'x.Thing, two')).toBe(ThingTwo);
      expect(registry.lookupActualType(Object, 'x.Thing')).toBe(ThingOne);
    });

    it('finds closed generics by name', () => {
      class Cat {
        @Field() lives = 9;
      }
      class Page<TItem> {
        @Field() items: TItem[] = [];
      }
      const pageOfCats = closeGeneric(Page, [Cat]);

      expect(registry.lookupActualType(Page, 'Page[Cat]')).toBe(pageOfCats);
    });
  });
});
