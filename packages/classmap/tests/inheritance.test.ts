import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ClassMapRegistry } from '../src/core/class-map-registry.js';
import { Discriminator, Field, Id } from '../src/decorators/index.js';
import { StaticDirectiveRegistry } from '../src/registry/static-registry.js';

describe('inheritance links', () => {
  let registry: ClassMapRegistry;

  beforeEach(() => {
    StaticDirectiveRegistry.resetForTests();
    registry = new ClassMapRegistry();
  });

  it('links the base class map on first access, whatever the lookup order', () => {
    class Entity {
      @Id() id = '';
      @Field() createdAt = 0;
    }
    class Customer extends Entity {
      @Field() name = '';
    }

    const customer = registry.lookupClassMap(Customer);
    expect(registry.isClassMapRegistered(Entity)).toBe(false);

    const entity = customer.baseClassMap;

    expect(entity).toBe(registry.lookupClassMap(Entity));
    expect(customer.declaredPropertyMaps.map((pm) => pm.propertyName)).toEqual(['name']);
    expect(customer.effectivePropertyMaps().map((pm) => pm.propertyName)).toEqual(['id', 'createdAt', 'name']);
  });

  it('inherits the identifier of the base class map', () => {
    class Entity {
      @Id() id = '';
    }
    class Customer extends Entity {
      @Field() name = '';
    }

    const customerId = registry.lookupClassMap(Customer).idPropertyMap;
    const entityId = registry.lookupClassMap(Entity).idPropertyMap;

    expect(customerId).toBeDefined();
    expect(customerId).toBe(entityId);
    expect(customerId?.elementName).toBe('_id');
    expect(registry.lookupClassMap(Customer).getPropertyMapForElement('_id')).toBe(entityId);
  });

  it('takes the identifier from the highest ancestor that has one', () => {
    class Root {
      @Id() key = '';
    }
    class Middle extends Root {
      @Field() level = 0;
    }
    class Leaf extends Middle {
      @Field() tag = '';
    }

    expect(registry.lookupClassMap(Leaf).idPropertyMap).toBe(registry.lookupClassMap(Root).idPropertyMap);
    expect(registry.lookupClassMap(Middle).idPropertyMap?.propertyName).toBe('key');
  });

  it('discovers an identifier by convention among own members and renames it', () => {
    class Person {
      @Field() name = '';
      @Field() id = '';
    }

    const cm = registry.lookupClassMap(Person);
    expect(cm.getPropertyMap('id')?.elementName).toBe('id');

    const id = cm.idPropertyMap;

    expect(id?.propertyName).toBe('id');
    expect(id?.elementName).toBe('_id');
    expect(cm.getPropertyMapForElement('_id')).toBe(id);
  });

  it('finds a derived identifier when the base has none', () => {
    class Shape {
      @Field() color = '';
    }
    class Tile extends Shape {
      @Field() id = 0;
    }

    expect(registry.lookupClassMap(Shape).idPropertyMap).toBeUndefined();
    expect(registry.lookupClassMap(Tile).idPropertyMap?.propertyName).toBe('id');
  });

  it('does not look for identifiers among inherited members', () => {
    class Named {
      @Field() title = '';
    }
    class Tagged extends Named {
      @Field() tag = '';
    }
    const custom = new ClassMapRegistry();
    custom.registerConventions(
      { idProperty: { findIdProperty: (shape) => shape.members[0]?.name } },
      (type) => type === Tagged
    );

    expect(custom.lookupClassMap(Named).idPropertyMap).toBeUndefined();

    expect(custom.lookupClassMap(Tagged).idPropertyMap?.propertyName).toBe('tag');
  });

  it('warns when a declared identifier is shadowed by an inherited one', () => {
    const warn = vi.fn();
    const logged = new ClassMapRegistry({ logger: { warn } });
    class StoredFile {
      @Id() id = '';
    }
    class Attachment extends StoredFile {
      @Id() ref = '';
    }

    const id = logged.lookupClassMap(Attachment).idPropertyMap;

    expect(id?.propertyName).toBe('id');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[docmapper] 'Attachment' declares identifier 'ref' but inherits 'id' from a base class map; " +
        'the inherited identifier is used.'
    );
  });

  it('inherits a required discriminator monotonically', () => {
    @Discriminator(undefined, { required: true })
    class Base {
      @Field() kind = '';
    }
    @Discriminator('derived')
    class Derived extends Base {
      @Field() extra = '';
    }
    class Grandchild extends Derived {}

    const derived = registry.lookupClassMap(Derived);
    const grandchild = registry.lookupClassMap(Grandchild);

    expect(derived.discriminatorIsRequired).toBe(true);
    expect(grandchild.discriminatorIsRequired).toBe(true);

    derived.setDiscriminatorIsRequired(false);
    expect(derived.discriminatorIsRequired).toBe(true);
  });

  it('does not make a base require a discriminator because a subclass does', () => {
    class Base {
      @Field() kind = '';
    }
    @Discriminator('strict', { required: true })
    class Strict extends Base {}

    expect(registry.lookupClassMap(Strict).discriminatorIsRequired).toBe(true);
    expect(registry.lookupClassMap(Base).discriminatorIsRequired).toBe(false);
  });
});
