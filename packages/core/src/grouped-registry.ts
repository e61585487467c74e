/**
 * Two-level map from a group key to the entries registered under it, each
 * keyed by a unique key. A reverse index gives direct access to an entry by
 * its unique key.
 *
 * Not synchronized: the owner serializes access.
 */
export class GroupedRegistry<G, U, V> {
  private storage: Map<G, Map<U, V>> = new Map();
  private reverseLookup: Map<U, G> = new Map();

  /**
   * Does the group have at least one entry?
   */
  has(group: G): boolean {
    return (this.storage.get(group)?.size ?? 0) > 0;
  }

  hasUniqueKey(unique: U): boolean {
    return this.reverseLookup.has(unique);
  }

  get(unique: U): V | undefined {
    const group = this.reverseLookup.get(unique);
    if (group === undefined) {
      return undefined;
    }
    return this.storage.get(group)?.get(unique);
  }

  groupOf(unique: U): G | undefined {
    return this.reverseLookup.get(unique);
  }

  /**
   * Insert or overwrite an entry. A unique key lives in one group only, so an
   * entry registered under another group is moved.
   */
  add(group: G, unique: U, value: V): void {
    const previous = this.reverseLookup.get(unique);
    if (previous !== undefined && previous !== group) {
      this.removeByUniqueKey(unique);
    }

    this.reverseLookup.set(unique, group);
    const entries = this.storage.get(group);
    if (entries) {
      entries.set(unique, value);
    } else {
      this.storage.set(group, new Map([[unique, value]]));
    }
  }

  /**
   * Remove and return a single entry
   */
  removeByUniqueKey(unique: U): V | undefined {
    const group = this.reverseLookup.get(unique);
    if (group === undefined) {
      return undefined;
    }
    this.reverseLookup.delete(unique);

    const entries = this.storage.get(group);
    const value = entries?.get(unique);
    entries?.delete(unique);
    if (!this.has(group)) {
      this.storage.delete(group);
    }
    return value;
  }

  /**
   * Remove and return every entry of a group
   */
  drainGroup(group: G): V[] {
    const entries = this.storage.get(group);
    if (!entries) {
      return [];
    }
    for (const unique of entries.keys()) {
      this.reverseLookup.delete(unique);
    }
    this.storage.delete(group);
    return Array.from(entries.values());
  }

  /**
   * Clear out everything
   */
  drainAll(): V[] {
    const values: V[] = [];
    for (const entries of this.storage.values()) {
      values.push(...entries.values());
    }
    this.storage.clear();
    this.reverseLookup.clear();
    return values;
  }

  groupSize(group: G): number {
    return this.storage.get(group)?.size ?? 0;
  }

  get groupCount(): number {
    return this.storage.size;
  }

  /** Total number of entries across all groups */
  get size(): number {
    return this.reverseLookup.size;
  }
}
