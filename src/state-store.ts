/**
 * State Store
 * Layer: core
 *
 * Provided ports:
 *   - store.read
 *   - store.replace
 *
 * "Currently believed present" as of the end of the last successful cycle:
 * AggregationKey -> set of ClientIdentity. Created once per run, seeded by
 * the reconciler, then written only by the diff engine. Never persisted.
 */

import type { AggregationKey, ClientIdentity } from './types';

export class StateStore {
  private readonly clientsByKey = new Map<AggregationKey, Set<ClientIdentity>>();

  /**
   * Builds a store from plain data (tests, seeding).
   */
  static from(entries: Record<AggregationKey, Iterable<ClientIdentity>>): StateStore {
    const store = new StateStore();
    for (const [key, ids] of Object.entries(entries)) {
      store.replace(key, ids);
    }
    return store;
  }

  has(key: AggregationKey): boolean {
    return this.clientsByKey.has(key);
  }

  /**
   * Identities under a key; empty when the key was never observed.
   */
  get(key: AggregationKey): ReadonlySet<ClientIdentity> {
    return this.clientsByKey.get(key) ?? new Set<ClientIdentity>();
  }

  keys(): AggregationKey[] {
    return [...this.clientsByKey.keys()];
  }

  get size(): number {
    return this.clientsByKey.size;
  }

  get isEmpty(): boolean {
    return this.clientsByKey.size === 0;
  }

  replace(key: AggregationKey, ids: Iterable<ClientIdentity>): void {
    this.clientsByKey.set(key, new Set(ids));
  }

  add(key: AggregationKey, id: ClientIdentity): void {
    const existing = this.clientsByKey.get(key);
    if (existing) {
      existing.add(id);
    } else {
      this.clientsByKey.set(key, new Set([id]));
    }
  }

  /**
   * Sorted plain-object view, for logging and assertions.
   */
  toJSON(): Record<AggregationKey, ClientIdentity[]> {
    const out: Record<AggregationKey, ClientIdentity[]> = {};
    for (const key of [...this.clientsByKey.keys()].sort()) {
      out[key] = [...this.get(key)].sort();
    }
    return out;
  }
}
