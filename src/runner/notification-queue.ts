/**
 * Insertion-ordered, duplicate-suppressing queue of handler names.
 *
 * Names may be added while the queue is being iterated; they are visited in
 * turn. A name that was ever added is never yielded twice.
 */
export class NotificationQueue implements Iterable<string> {
  private readonly names = new Set<string>();

  /**
   * Returns false when the name was already queued (or already drained).
   */
  add(name: string): boolean {
    if (this.names.has(name)) {
      return false;
    }
    this.names.add(name);
    return true;
  }

  addAll(names: readonly string[]): string[] {
    return names.filter((name) => this.add(name));
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  get size(): number {
    return this.names.size;
  }

  [Symbol.iterator](): Iterator<string> {
    // Set iteration also visits entries added during the walk
    return this.names.values();
  }
}
