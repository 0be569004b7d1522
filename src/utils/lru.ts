export type EvictionListener<K, V> = (key: K, value: V) => void;

/**
 * Strict LRU on top of Map insertion order. Eviction only drops the map's
 * reference; values handed out earlier stay valid for whoever holds them.
 */
export class LRU<K, V> {
  private readonly max: number;
  private map: Map<K, V> = new Map();
  private onEvict?: EvictionListener<K, V>;

  constructor(max: number = 100, onEvict?: EvictionListener<K, V>) {
    this.max = Math.max(1, max);
    this.onEvict = onEvict;
  }

  get(key: K): V | undefined {
    const v = this.map.get(key);
    if (v !== undefined) {
      // refresh
      this.map.delete(key);
      this.map.set(key, v);
    }
    return v;
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);
    while (this.map.size > this.max) {
      const first = this.map.entries().next();
      if (first.done) break;
      const [oldKey, oldValue] = first.value;
      this.map.delete(oldKey);
      this.onEvict?.(oldKey, oldValue);
    }
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  get size(): number {
    return this.map.size;
  }

  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  clear(): void {
    this.map.clear();
  }
}
