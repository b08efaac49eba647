import type { ClassType } from '../types/types.js';

const EMPTY: readonly ClassType[] = Object.freeze([]);

/**
 * Discriminator string → types that declared it.
 *
 * Each bucket is an insertion-ordered set: adding a type twice is a no-op.
 * Several unrelated types may share a discriminator; the caller narrows the
 * bucket by assignability to the nominal type.
 */
export class DiscriminatorIndex {
  private readonly buckets = new Map<string, Set<ClassType>>();

  get size(): number {
    return this.buckets.size;
  }

  add(discriminator: string, type: ClassType): void {
    let bucket = this.buckets.get(discriminator);
    if (!bucket) {
      bucket = new Set();
      this.buckets.set(discriminator, bucket);
    }
    bucket.add(type);
  }

  /**
   * Remove one type from a bucket; empty buckets are dropped.
   *
   * @returns true if the type was present
   */
  remove(discriminator: string, type: ClassType): boolean {
    const bucket = this.buckets.get(discriminator);
    if (!bucket?.delete(type)) return false;
    if (bucket.size === 0) this.buckets.delete(discriminator);
    return true;
  }

  get(discriminator: string): readonly ClassType[] {
    const bucket = this.buckets.get(discriminator);
    return bucket ? Array.from(bucket) : EMPTY;
  }

  *discriminators(): IterableIterator<string> {
    yield* this.buckets.keys();
  }

  clear(): void {
    this.buckets.clear();
  }
}
