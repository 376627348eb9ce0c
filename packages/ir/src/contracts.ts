class ReadonlyMapView<K, V> implements ReadonlyMap<K, V> {
  readonly #inner: ReadonlyMap<K, V>;

  constructor(inner: ReadonlyMap<K, V>) {
    this.#inner = inner;
  }

  get size(): number {
    return this.#inner.size;
  }

  get(key: K): V | undefined {
    return this.#inner.get(key);
  }

  has(key: K): boolean {
    return this.#inner.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.#inner.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries(): IterableIterator<[K, V]> {
    return this.#inner.entries();
  }

  keys(): IterableIterator<K> {
    return this.#inner.keys();
  }

  values(): IterableIterator<V> {
    return this.#inner.values();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.#inner[Symbol.iterator]();
  }
}

export function asReadonlyMap<K, V>(map: ReadonlyMap<K, V>): ReadonlyMap<K, V> {
  if (map instanceof ReadonlyMapView) return map;
  const snapshot = new Map<K, V>();
  for (const [k, v] of map.entries()) snapshot.set(k, v);
  return Object.freeze(new ReadonlyMapView(snapshot));
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}

export function assertPosition(position: number, length: number, what: string): void {
  if (!Number.isInteger(position) || position < 0 || position > length) {
    throw new RangeError(`${what} position ${position} is outside 0..${length}.`);
  }
}

export function assertElementPosition(position: number, length: number, what: string): void {
  if (!Number.isInteger(position) || position < 0 || position >= length) {
    throw new RangeError(`${what} position ${position} does not name an element (size ${length}).`);
  }
}
