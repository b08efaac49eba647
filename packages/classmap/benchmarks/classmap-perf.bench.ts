import { Bench } from 'tinybench';
import {
  ClassMapRegistry,
  Discriminator,
  Element,
  Field,
  Id,
  KnownTypes,
  closeGeneric,
} from '../src';

/**
 * Class Map Performance Benchmark
 *
 * Measures the cost of deriving class maps for a small polymorphic model
 * (known subtypes, inheritance, explicit ordering) and of the hot paths an
 * encoder/decoder hits once maps exist: cached lookup, discriminator
 * resolution and element routing.
 */

@Discriminator('shape', { required: true })
class Shape {
  @Id() id = '';
  @Element('n', { order: 2 }) name = '';
  @Element('c', { order: 1 }) color = '';
  @Field() createdAt = new Date(0);
}

class Circle extends Shape {
  @Field(Number) radius = 1;
}

class Square extends Shape {
  @Field(Number) side = 1;
}

// Subclasses do not exist yet when Shape's decorators run.
KnownTypes(Circle, Square)(Shape);

class Page<TItem> {
  @Field() items: TItem[] = [];
  @Field(Number) total = 0;
}

const PageOfShapes = closeGeneric(Page, [Shape]);

const bootstrapRegistry = () => {
  const registry = new ClassMapRegistry({ name: 'bench' });
  registry.lookupClassMap(Shape);
  return registry;
};

async function runClassMapBenchmark() {
  console.log('=== Class Map Performance Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warm = bootstrapRegistry();
  const warmMap = warm.lookupClassMap(Circle);
  warmMap.effectivePropertyMaps();
  warm.lookupClassMap(PageOfShapes);

  console.log('[phase] warmup complete: registry populated and lazy links resolved\n');

  bench
    // T1: known subtypes, directives and ordering for the whole model
    .add('T1: Cold Auto-Map (Shape + Known Types)', () => {
      bootstrapRegistry();
    })

    // T2: T1 plus base link and identifier resolution on a subtype
    .add('T2: Cold Auto-Map + Lazy Links', () => {
      const registry = bootstrapRegistry();
      const circle = registry.lookupClassMap(Circle);
      void circle.idPropertyMap;
      circle.effectivePropertyMaps();
    })

    // T3: cached lookup
    .add('T3: Warm Lookup (Cached Map)', () => {
      warm.lookupClassMap(Circle);
    })

    // T4: discriminator → subtype
    .add('T4: Discriminator Resolution', () => {
      warm.lookupActualType(Shape, 'Square');
    })

    // T5: decode-time element routing through the base map
    .add('T5: Element Routing (Inherited)', () => {
      warmMap.getPropertyMapForElement('c');
    })

    // T6: type-name rendering of a closed generic
    .add('T6: Type Name Discriminator (Generic)', () => {
      warm.getTypeNameDiscriminator(PageOfShapes);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1_000_000;
  };

  console.log('\n=== Hot Path Summary ===\n');
  console.log(`  Warm Lookup:          ${getNs('T3: Warm Lookup (Cached Map)').toFixed(0)} ns`);
  console.log(`  Discriminator:        ${getNs('T4: Discriminator Resolution').toFixed(0)} ns`);
  console.log(`  Element Routing:      ${getNs('T5: Element Routing (Inherited)').toFixed(0)} ns`);
  console.log(
    `  Lazy Link Overhead:   +${(getNs('T2: Cold Auto-Map + Lazy Links') - getNs('T1: Cold Auto-Map (Shape + Known Types)')).toFixed(0)} ns`
  );
}

runClassMapBenchmark().catch(console.error);
