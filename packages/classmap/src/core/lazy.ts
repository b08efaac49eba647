/**
 * Compute-once cell.
 *
 * The factory runs on first `get()` and its result (including `undefined`)
 * is kept for the lifetime of the cell. A factory that throws leaves the cell
 * unresolved, so the next `get()` runs it again. Re-entering `get()` while
 * the factory runs is a bug in the caller and throws.
 */
export class Lazy<T> {
  private resolved?: { readonly value: T };
  private running = false;

  constructor(private readonly factory: () => T) {}

  get isResolved(): boolean {
    return this.resolved !== undefined;
  }

  get(): T {
    if (this.resolved) return this.resolved.value;
    if (this.running) throw new Error('Lazy value requested while it is being computed');
    this.running = true;
    try {
      const value = this.factory();
      this.resolved = { value };
      return value;
    } finally {
      this.running = false;
    }
  }
}
