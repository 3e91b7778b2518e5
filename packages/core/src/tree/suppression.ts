import type { QName } from '../model/schema-node.js';

/**
 * Path positions (index from the module root) that belong to a choice or a
 * case currently being rendered. Those levels exist in the schema tree but
 * not in the data tree.
 */
export class SuppressionSet {
  readonly #counts = new Map<number, number>();

  /**
   * Mark a position as synthetic. The returned release function must run on
   * every exit path; callers wrap the scope in try/finally.
   */
  acquire(position: number): () => void {
    this.#counts.set(position, (this.#counts.get(position) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const count = this.#counts.get(position) ?? 0;
      if (count <= 1) {
        this.#counts.delete(position);
      } else {
        this.#counts.set(position, count - 1);
      }
    };
  }

  has(position: number): boolean {
    return this.#counts.has(position);
  }

  get size(): number {
    return this.#counts.size;
  }

  /** Schema path with the suppressed positions removed */
  dataPath(path: readonly QName[]): QName[] {
    return path.filter((_, position) => !this.has(position));
  }
}
