/**
 * Identity-keyed registry of view entries with an explicit display order.
 *
 * A Map gives constant-time lookup and an array holds the display order; every
 * mutation updates both, so the key set and the order always describe the same
 * entries.
 */

export interface RegistryItem {
  readonly uniqueId: string;
}

export interface RegistryEntry<TItem extends RegistryItem> {
  readonly uniqueId: string;
  setPackage(item: TItem): void;
}

export class EntryRegistry<TItem extends RegistryItem, TEntry extends RegistryEntry<TItem>> {
  private _lookup = new Map<string, TEntry>();
  private _order: TEntry[] = [];

  constructor(private readonly _createEntry: (item: TItem) => TEntry) {}

  get size(): number {
    return this._lookup.size;
  }

  /** Empty and unknown identities resolve to undefined. */
  get(uniqueId: string | undefined): TEntry | undefined {
    if (!uniqueId) return undefined;
    return this._lookup.get(uniqueId);
  }

  has(uniqueId: string | undefined): boolean {
    return this.get(uniqueId) !== undefined;
  }

  /**
   * Update the existing entry for `item.uniqueId` in place, or append a new one
   * at the end of the display order.
   */
  upsert(item: TItem): TEntry {
    const existing = this._lookup.get(item.uniqueId);
    if (existing) {
      existing.setPackage(item);
      return existing;
    }
    const entry = this._createEntry(item);
    this._lookup.set(item.uniqueId, entry);
    this._order.push(entry);
    return entry;
  }

  remove(uniqueId: string | undefined): TEntry | undefined {
    const entry = this.get(uniqueId);
    if (!entry) return undefined;
    this._lookup.delete(entry.uniqueId);
    const index = this._order.indexOf(entry);
    if (index >= 0) this._order.splice(index, 1);
    return entry;
  }

  clear(): void {
    this._lookup.clear();
    this._order = [];
  }

  /** Display order. The returned array is a copy. */
  all(): TEntry[] {
    return [...this._order];
  }

  /**
   * Rebuild the display order from `orderedIds`. Ids with no entry are skipped
   * and returned; entries not named in `orderedIds` are dropped from both the
   * order and the lookup, so the two stay in sync.
   */
  reorderTo(orderedIds: Iterable<string>): string[] {
    const skipped: string[] = [];
    const order: TEntry[] = [];
    const lookup = new Map<string, TEntry>();
    for (const id of orderedIds) {
      const entry = this._lookup.get(id);
      if (!entry) {
        skipped.push(id);
        continue;
      }
      if (lookup.has(id)) continue;
      order.push(entry);
      lookup.set(id, entry);
    }
    this._order = order;
    this._lookup = lookup;
    return skipped;
  }
}
