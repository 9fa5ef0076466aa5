/**
 * Bounded failure buffer.
 *
 * Insertion never blocks: once `capacity` entries are held, further offers are
 * dropped and existing entries are kept (no eviction).
 */
export class DeadLetterBuffer<TEntry> {
  private readonly entries: TEntry[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError('capacity must be a non-negative integer');
    }
  }

  /** Returns false when the entry was dropped. */
  offer(entry: TEntry): boolean {
    if (this.entries.length >= this.capacity) return false;
    this.entries.push(entry);
    return true;
  }

  snapshot(): TEntry[] {
    return this.entries.slice();
  }
}
