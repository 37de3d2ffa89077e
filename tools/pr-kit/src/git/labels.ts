/**
 * Immutable, insertion-ordered multimap of revision labels.
 * Keys are unique; each key may carry several values.
 */
export class LabelMap {
  private readonly values: ReadonlyMap<string, readonly string[]>;

  constructor(entries: Iterable<readonly [string, readonly string[]]> = []) {
    const map = new Map<string, readonly string[]>();
    for (const [key, values] of entries) {
      if (values.length === 0) continue;
      const existing = map.get(key) ?? [];
      map.set(key, Object.freeze([...existing, ...values]));
    }
    this.values = map;
  }

  static empty(): LabelMap {
    return new LabelMap();
  }

  /** All values for a key, in insertion order. Empty when absent. */
  get(key: string): readonly string[] {
    return this.values.get(key) ?? [];
  }

  /** Last value for a key, or undefined when absent. */
  last(key: string): string | undefined {
    const values = this.get(key);
    return values.length > 0 ? values[values.length - 1] : undefined;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[string, readonly string[]]> {
    return Array.from(this.values.entries());
  }

  get size(): number {
    return this.values.size;
  }

  /** Copy with extra values appended; the receiver is left untouched. */
  with(key: string, ...values: string[]): LabelMap {
    return new LabelMap([...this.values.entries(), [key, values]]);
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [key, values] of this.values) {
      record[key] = [...values];
    }
    return record;
  }
}

/**
 * Accumulates labels before freezing them into a {@link LabelMap}.
 */
export class LabelMapBuilder {
  private readonly entries: Array<[string, string[]]> = [];

  put(key: string, value: string): this {
    this.entries.push([key, [value]]);
    return this;
  }

  putAll(key: string, values: Iterable<string>): this {
    this.entries.push([key, Array.from(values)]);
    return this;
  }

  build(): LabelMap {
    return new LabelMap(this.entries);
  }
}
