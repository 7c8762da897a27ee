/**
 * Diff Engine
 * Layer: core
 *
 * Provided ports:
 *   - diff.extractIdentities
 *   - diff.apply
 *
 * Computes per-cycle connect/disconnect sets against the StateStore and
 * writes the new presence back into it.
 *
 * Algorithm (per cycle):
 *   per-AP mode, for each key reported this cycle:
 *     new  = current - previous[key]
 *     gone = previous[key] - current
 *     previous[key] = current
 *     key missing from the store before -> firstObservation
 *   aggregated mode:
 *     current = union of every host's identities, keyed ALL_APS_AGGREGATE
 *     new/gone as above
 *     gone -= union of all hosts' identities (roaming guard)
 *   a host whose payload was malformed reports nothing and loses nothing:
 *     its previous identities are carried forward, never reported as gone
 *
 * Only diffs with a non-empty list are returned; the store is updated for
 * every key regardless.
 */

import * as core from '@actions/core';
import type { AggregationKey, ClientIdentity, CycleResult, Diff, IdentityMode } from './types';
import { ALL_APS_AGGREGATE } from './types';
import { clientId, describeClient, isUnknownIdentity, normalizeIdentity } from './identity';
import type { StateStore } from './state-store';

export interface DiffOptions {
  aggregate: boolean;
  identityMode: IdentityMode;
}

export interface DiffOutcome {
  /** Non-empty diffs, in key order of first appearance */
  diffs: Diff[];
  /** Every identity any healthy host reported this cycle */
  connected: Set<ClientIdentity>;
}

// -----------------------------------------------------------------------------
// Port: diff.extractIdentities
// -----------------------------------------------------------------------------

/**
 * Normalized, de-duplicated identities for one host's clients.
 * Clients without a usable identifier are dropped with a warning.
 */
export function extractIdentities(result: CycleResult, mode: IdentityMode): ClientIdentity[] {
  const ids = new Set<ClientIdentity>();
  const label = result.aggregationKey ?? result.host;

  for (const client of result.clients) {
    const raw = clientId(client, mode);
    if (isUnknownIdentity(raw)) {
      core.warning(`Client entry on ${label} missing valid identifier: ${describeClient(client)}`);
      continue;
    }
    ids.add(normalizeIdentity(raw));
  }

  core.debug(`AP ${label} has ${ids.size} clients: ${[...ids].join(', ')}`);
  return [...ids];
}

// -----------------------------------------------------------------------------
// Port: diff.apply
// -----------------------------------------------------------------------------

/**
 * Diffs one cycle's results against the store and updates it.
 * Must only be called with a complete, transport-clean result set.
 */
export function applyCycle(
  store: StateStore,
  results: CycleResult[],
  options: DiffOptions,
): DiffOutcome {
  return options.aggregate
    ? applyAggregated(store, results, options.identityMode)
    : applyPerAp(store, results, options.identityMode);
}

function applyPerAp(store: StateStore, results: CycleResult[], mode: IdentityMode): DiffOutcome {
  const currentByKey = new Map<AggregationKey, Set<ClientIdentity>>();
  const malformedKeys = new Set<AggregationKey>();
  const connected = new Set<ClientIdentity>();

  for (const result of results) {
    const key = result.aggregationKey;
    if (!key) {
      core.debug(`Skipping result from ${result.host}: no access point name`);
      continue;
    }
    if (result.malformed) {
      malformedKeys.add(key);
      continue;
    }
    const current = currentByKey.get(key) ?? new Set<ClientIdentity>();
    for (const id of extractIdentities(result, mode)) {
      current.add(id);
      connected.add(id);
    }
    currentByKey.set(key, current);
  }

  for (const key of malformedKeys) {
    if (!currentByKey.has(key) && store.has(key)) {
      core.warning(`Keeping previous ${store.get(key).size} clients for ${key}: response unusable`);
    }
  }

  const diffs: Diff[] = [];
  for (const [key, current] of currentByKey) {
    const carryForward = malformedKeys.has(key);
    const diff = diffKey(store, key, current, carryForward);
    if (diff) diffs.push(diff);
  }

  return { diffs, connected };
}

function applyAggregated(
  store: StateStore,
  results: CycleResult[],
  mode: IdentityMode,
): DiffOutcome {
  const connected = new Set<ClientIdentity>();
  let anyMalformed = false;

  for (const result of results) {
    if (result.malformed) {
      anyMalformed = true;
      continue;
    }
    core.debug(`Processing AP ${result.aggregationKey ?? result.host} with ${result.clients.length} clients`);
    for (const id of extractIdentities(result, mode)) {
      connected.add(id);
    }
  }

  if (anyMalformed) {
    core.warning('At least one access point response was unusable; departures deferred this cycle');
  }

  const diff = diffKey(store, ALL_APS_AGGREGATE, connected, anyMalformed, connected);
  return { diffs: diff ? [diff] : [], connected };
}

/**
 * Diffs a single key, logs the transitions and replaces the stored set.
 *
 * @param carryForward - keep previous identities instead of reporting them gone
 * @param roamingGuard - identities seen anywhere this cycle; never reported gone
 */
function diffKey(
  store: StateStore,
  key: AggregationKey,
  current: Set<ClientIdentity>,
  carryForward: boolean,
  roamingGuard?: Set<ClientIdentity>,
): Diff | null {
  const firstObservation = !store.has(key);
  const previous = store.get(key);

  const newIdentities = [...current].filter((id) => !previous.has(id));
  let goneIdentities = [...previous].filter((id) => !current.has(id));

  if (roamingGuard) {
    goneIdentities = goneIdentities.filter((id) => {
      if (roamingGuard.has(id)) {
        core.debug(`Client ${id} moved between access points; not reported as disconnected`);
        return false;
      }
      return true;
    });
  }

  if (carryForward) {
    store.replace(key, [...current, ...goneIdentities]);
    goneIdentities = [];
  } else {
    store.replace(key, current);
  }

  if (firstObservation) {
    core.info(`${key} initially has ${newIdentities.length} clients: ${newIdentities.join(', ')}`);
  } else {
    for (const id of newIdentities) {
      core.info(`New client connected to ${key}: ${id}`);
    }
    for (const id of goneIdentities) {
      core.info(`Client disconnected from ${key}: ${id}`);
    }
  }

  if (newIdentities.length === 0 && goneIdentities.length === 0) {
    return null;
  }
  return { aggregationKey: key, newIdentities, goneIdentities, firstObservation };
}
