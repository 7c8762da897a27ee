/**
 * Initialization Reconciler
 * Layer: core
 *
 * Provided ports:
 *   - reconciler.seed
 *
 * Merges the output of 0..N state sources into the StateStore the poll loop
 * starts from. Sources are read in order; a later source overwrites an
 * earlier one's fact for the same (key, identity) whatever its forceSnapshot
 * flag says. A failing source contributes nothing. Only facts that end up
 * "connected" are seeded.
 */

import * as core from '@actions/core';
import type { AggregationKey, ClientIdentity, ClientState, StateSource } from './types';
import { ALL_APS_AGGREGATE, UNKNOWN_AP } from './types';
import { isUnknownIdentity, normalizeIdentity } from './identity';
import { StateStore } from './state-store';
import { errorMessage } from './utils';

export interface SourceReport {
  name: string;
  forceSnapshot: boolean;
  /** Number of facts read (0 on failure) */
  count: number;
  /** Read error, null when the source answered */
  error: string | null;
}

export interface ReconcileResult {
  store: StateStore;
  sources: SourceReport[];
}

interface MergedFact {
  key: AggregationKey;
  id: ClientIdentity;
  state: ClientState;
}

/**
 * Aggregation key a seeded fact belongs to.
 */
export function seedKeyFor(state: ClientState, aggregate: boolean): AggregationKey {
  if (aggregate) return ALL_APS_AGGREGATE;
  return state.apHostname || UNKNOWN_AP;
}

// -----------------------------------------------------------------------------
// Port: reconciler.seed
// -----------------------------------------------------------------------------

export async function reconcileSources(
  sources: StateSource[],
  aggregate: boolean,
): Promise<ReconcileResult> {
  const merged = new Map<string, MergedFact>();
  const reports: SourceReport[] = [];

  for (const source of sources) {
    const kind = source.forceSnapshot ? 'authoritative snapshot' : 'incremental';
    let states: Record<string, ClientState>;
    try {
      states = await source.readCurrentStates();
    } catch (err) {
      const message = errorMessage(err);
      core.error(`Failed to read client states from ${source.name}: ${message}`);
      reports.push({ name: source.name, forceSnapshot: source.forceSnapshot, count: 0, error: message });
      continue;
    }

    const facts = Object.values(states);
    core.info(`Found ${facts.length} existing client states from ${source.name} (${kind})`);
    reports.push({ name: source.name, forceSnapshot: source.forceSnapshot, count: facts.length, error: null });

    for (const state of facts) {
      if (isUnknownIdentity(state.clientId)) {
        core.warning(`Ignoring state from ${source.name} without a client id`);
        continue;
      }
      const id = normalizeIdentity(state.clientId);
      const key = seedKeyFor(state, aggregate);
      const mergeKey = `${key}\u0000${id}`;
      if (merged.has(mergeKey)) {
        core.debug(`Overriding state for ${id} on ${key} with ${source.name}`);
      }
      merged.set(mergeKey, { key, id, state });
    }
  }

  const store = new StateStore();
  for (const { key, id, state } of merged.values()) {
    if (!state.connected) continue;
    store.add(key, id);
    core.debug(`Initialized client ${id} as connected to ${key}`);
  }

  for (const key of store.keys()) {
    const ids = [...store.get(key)];
    core.info(`AP ${key} initialized with ${ids.length} connected clients: ${ids.join(', ')}`);
  }

  return { store, sources: reports };
}
