interface CacheEntry<V> {
  value: V;
  storedAt: number;
}

/** Memo table whose entries are reused until they are ttlMs old. */
export class TtlCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();

  constructor(private ttlMs: number, private now: () => number = Date.now) {}

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt < this.ttlMs) return entry.value;
    this.entries.delete(key);
    return undefined;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
