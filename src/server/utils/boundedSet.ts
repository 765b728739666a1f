// =============================================================================
// Bounded Set — fixed-capacity membership set with clear-on-overflow
// =============================================================================
// Holds "already processed" keys for the dedup guards (BoundedSet) and the
// resolver's created-contact cache (BoundedMap):
//   • `add()` inserts, then wipes the whole set once it holds more than
//     `capacity` entries
//   • No per-entry eviction order, no TTL
//
// Clearing everything is an approximate window: right after a wipe a
// redelivered key is not recognised. Memory stays bounded regardless of
// traffic.
// =============================================================================

const DEFAULT_CAPACITY = 1000;

function assertCapacity(name: string, capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`${name} capacity must be a positive integer, got ${capacity}`);
  }
}

export class BoundedSet<K = string> {
  private readonly capacity: number;
  private readonly store = new Set<K>();
  private clears = 0;

  /**
   * @param capacity — Entries kept before the set is wiped (default 1000)
   */
  constructor(capacity = DEFAULT_CAPACITY) {
    assertCapacity('BoundedSet', capacity);
    this.capacity = capacity;
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  /**
   * Insert a key. Returns `true` when the insert overflowed the set and
   * every entry (including this one) was dropped.
   */
  add(key: K): boolean {
    this.store.add(key);
    if (this.store.size > this.capacity) {
      this.store.clear();
      this.clears++;
      return true;
    }
    return false;
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }

  /** Number of overflow wipes since construction */
  get overflowCount(): number {
    return this.clears;
  }
}

/** Same clear-on-overflow rule, with a value per key */
export class BoundedMap<K, V> {
  private readonly capacity: number;
  private readonly store = new Map<K, V>();

  constructor(capacity = DEFAULT_CAPACITY) {
    assertCapacity('BoundedMap', capacity);
    this.capacity = capacity;
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  /** Returns `true` when the insert overflowed and the map was wiped */
  set(key: K, value: V): boolean {
    this.store.set(key, value);
    if (this.store.size > this.capacity) {
      this.store.clear();
      return true;
    }
    return false;
  }

  delete(key: K): void {
    this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
