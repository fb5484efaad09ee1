export interface KvReader {
  get(key: string): Uint8Array | undefined;
}

export interface KvWriter extends KvReader {
  put(key: string, value: Uint8Array): void;
}

/** Backing store. `write` must apply the whole change set or none of it. */
export interface KvStore extends KvReader {
  write(changes: ReadonlyMap<string, Uint8Array>): void;
  entries(): IterableIterator<[string, Uint8Array]>;
}

export class MemoryKvStore implements KvStore {
  protected readonly data = new Map<string, Uint8Array>();

  constructor(initial: Iterable<readonly [string, Uint8Array]> = []) {
    for (const [k, v] of initial) this.data.set(k, Uint8Array.from(v));
  }

  get(key: string): Uint8Array | undefined {
    return this.data.get(key);
  }

  write(changes: ReadonlyMap<string, Uint8Array>): void {
    for (const [k, v] of changes) this.data.set(k, Uint8Array.from(v));
  }

  entries(): IterableIterator<[string, Uint8Array]> {
    return this.data.entries();
  }
}

/* ── staged writes: nothing reaches the base until commit ── */
export class StagedStore implements KvWriter {
  private readonly changes = new Map<string, Uint8Array>();

  constructor(private readonly base: KvReader & Pick<KvStore, "write">) {}

  get(key: string): Uint8Array | undefined {
    return this.changes.get(key) ?? this.base.get(key);
  }

  put(key: string, value: Uint8Array): void {
    this.changes.set(key, value);
  }

  get size(): number {
    return this.changes.size;
  }

  commit(): void {
    if (this.changes.size > 0) this.base.write(this.changes);
  }
}

/** Runs one unit of work; a throw anywhere inside discards every staged write. */
export const atomically = <T>(store: KvStore, unit: (tx: StagedStore) => T): T => {
  const tx = new StagedStore(store);
  const result = unit(tx);
  tx.commit();
  return result;
};
