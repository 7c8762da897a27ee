/**
 * Poll Cycle
 *
 * One polling cycle: query every host, apply the fail-fast policy, diff
 * against the StateStore and forward non-empty diffs to the publisher.
 *
 * A cycle is atomic. Either every host answered without a transport failure
 * and the whole diff is applied, or nothing is: a transport failure or a
 * cancellation leaves the store exactly as it was.
 */

import * as core from '@actions/core';
import type {
  ClientInfoProvider,
  CycleResult,
  Diff,
  HostMalformedResponse,
  HostQueryOutcome,
  HostTransportFailure,
  IdentityMode,
  Publisher,
} from '../types';
import { applyCycle } from '../diff';
import type { StateStore } from '../state-store';
import { errorMessage } from '../utils';

/** Host answers that can feed the diff engine */
export type UsableOutcome = Exclude<HostQueryOutcome, HostTransportFailure>;

export interface CycleContext {
  hosts: string[];
  aggregate: boolean;
  identityMode: IdentityMode;
  provider: ClientInfoProvider;
  publisher: Publisher;
  store: StateStore;
}

export interface CycleCompleted {
  status: 'completed';
  /** Non-empty diffs produced this cycle */
  diffs: Diff[];
  /** Diffs handed to the publisher without error */
  published: number;
  /** True when diffs existed but the publisher was not ready */
  publishSkipped: boolean;
  malformedHosts: string[];
}

export interface CycleTransportFailure {
  status: 'transport-failure';
  failures: HostTransportFailure[];
  totalHosts: number;
}

export interface CycleCancelled {
  status: 'cancelled';
}

export type CycleOutcome = CycleCompleted | CycleTransportFailure | CycleCancelled;

// -----------------------------------------------------------------------------
// Host queries
// -----------------------------------------------------------------------------

/**
 * Queries every host; null when cancelled part-way.
 * Uses the provider's batch call when it has one.
 */
export async function queryHosts(
  provider: ClientInfoProvider,
  hosts: string[],
  signal?: AbortSignal,
): Promise<HostQueryOutcome[] | null> {
  if (provider.getClientsBatch) {
    if (signal?.aborted) return null;
    let batch: Map<string, HostQueryOutcome>;
    try {
      batch = await provider.getClientsBatch(hosts, signal);
    } catch (err) {
      const error = errorMessage(err);
      return hosts.map((host): HostQueryOutcome => ({ status: 'transport-failure', host, error }));
    }
    return hosts.map(
      (host): HostQueryOutcome =>
        batch.get(host) ?? { status: 'transport-failure', host, error: 'No result returned for host' },
    );
  }

  const outcomes: HostQueryOutcome[] = [];
  for (const host of hosts) {
    if (signal?.aborted) return null;
    try {
      outcomes.push(await provider.getClients(host, signal));
    } catch (err) {
      outcomes.push({ status: 'transport-failure', host, error: errorMessage(err) });
    }
  }
  return outcomes;
}

/**
 * Maps host outcomes to diff input. Transport failures must be handled
 * before this is called.
 */
export function toCycleResults(outcomes: UsableOutcome[]): CycleResult[] {
  return outcomes.map((outcome): CycleResult => {
    if (outcome.status === 'ok') {
      return {
        host: outcome.host,
        aggregationKey: outcome.hostname || outcome.host,
        clients: outcome.clients,
        malformed: false,
      };
    }
    return {
      host: outcome.host,
      aggregationKey: outcome.hostname,
      clients: [],
      malformed: true,
    };
  });
}

// -----------------------------------------------------------------------------
// Publishing
// -----------------------------------------------------------------------------

/**
 * Forwards diffs to the publisher. A not-ready publisher skips the whole
 * cycle's output; a failing publish is logged and the next diff still goes.
 */
export async function publishDiffs(
  publisher: Publisher,
  diffs: Diff[],
): Promise<{ published: number; skipped: boolean }> {
  if (diffs.length === 0) {
    return { published: 0, skipped: false };
  }
  if (!publisher.isReady) {
    core.info(`Publisher not ready, skipping ${diffs.length} presence updates`);
    return { published: 0, skipped: true };
  }

  let published = 0;
  for (const diff of diffs) {
    try {
      await publisher.publishClients(diff.aggregationKey, diff.newIdentities, diff.goneIdentities);
      published++;
    } catch (err) {
      core.error(`Failed to publish client events for ${diff.aggregationKey}: ${errorMessage(err)}`);
    }
  }
  return { published, skipped: false };
}

// -----------------------------------------------------------------------------
// Cycle
// -----------------------------------------------------------------------------

export async function performCycle(ctx: CycleContext, signal?: AbortSignal): Promise<CycleOutcome> {
  core.debug(`Cycle running at ${new Date().toISOString()}`);
  if (ctx.hosts.length === 0) {
    core.debug('No hosts configured; nothing to poll');
    return { status: 'completed', diffs: [], published: 0, publishSkipped: false, malformedHosts: [] };
  }

  const outcomes = await queryHosts(ctx.provider, ctx.hosts, signal);
  // Checked once every answer is in and before anything is applied
  if (outcomes === null || signal?.aborted) {
    core.info('Cycle cancelled; discarding partial results');
    return { status: 'cancelled' };
  }

  const failures: HostTransportFailure[] = [];
  const usable: UsableOutcome[] = [];
  const malformed: HostMalformedResponse[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'transport-failure') {
      core.warning(`Connection failed for host ${outcome.host}: ${outcome.error}`);
      failures.push(outcome);
      continue;
    }
    if (outcome.status === 'malformed') {
      core.warning(`Unusable response from host ${outcome.host}: ${outcome.error}`);
      malformed.push(outcome);
    }
    usable.push(outcome);
  }

  if (failures.length > 0) {
    core.error(
      `Connection failures detected (${failures.length}/${ctx.hosts.length}); discarding cycle`,
    );
    return { status: 'transport-failure', failures, totalHosts: ctx.hosts.length };
  }

  const { diffs } = applyCycle(ctx.store, toCycleResults(usable), {
    aggregate: ctx.aggregate,
    identityMode: ctx.identityMode,
  });
  const { published, skipped } = await publishDiffs(ctx.publisher, diffs);

  return {
    status: 'completed',
    diffs,
    published,
    publishSkipped: skipped,
    malformedHosts: malformed.map((m) => m.host),
  };
}
