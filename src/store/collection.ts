/**
 * Ordered in-memory list backing one store collection.
 * Items are mutated in place by findAndUpdate; nothing is ever removed.
 */
export class Collection<T> {
  private items: T[] = [];

  append(item: T): T {
    this.items.push(item);
    return item;
  }

  /**
   * Apply `mutate` to the first item matching `predicate` and return it.
   * Returns undefined (and changes nothing) when no item matches.
   */
  findAndUpdate(predicate: (item: T) => boolean, mutate: (item: T) => void): T | undefined {
    const match = this.items.find(predicate);
    if (!match) return undefined;
    mutate(match);
    return match;
  }

  filter(predicate: (item: T) => boolean): T[] {
    return this.items.filter(predicate);
  }

  all(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
