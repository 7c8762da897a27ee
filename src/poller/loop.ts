/**
 * Poller Main Loop
 *
 * Runs poll cycles at a fixed interval until the signal aborts or the
 * restart policy asks for the process to be restarted.
 * Dependencies are injected for testability.
 */

import * as core from '@actions/core';
import { errorMessage, sleep as sleepImpl } from '../utils';
import { performCycle as performCycleImpl } from './cycle';
import type { CycleContext } from './cycle';
import { decideRestart } from './restart-policy';

/** Why the loop returned */
export type LoopExit = 'stopped' | 'restart';

/**
 * Creates a signal handler that aborts the loop.
 *
 * @param controller - Controller whose signal the loop watches
 * @param event - Signal name, for the log line
 */
export function createShutdownHandler(controller: AbortController, event: string): () => void {
  return () => {
    if (controller.signal.aborted) return;
    core.info(`Received ${event}, stopping after the current cycle`);
    controller.abort();
  };
}

/**
 * Dependency injection interface for runPollerLoop.
 * Production defaults are used when not provided by tests.
 */
export interface LoopDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  performCycle: typeof performCycleImpl;
}

const defaultDeps: LoopDeps = {
  sleep: sleepImpl,
  performCycle: performCycleImpl,
};

// -----------------------------------------------------------------------------
// Poller main loop
// -----------------------------------------------------------------------------

/**
 * Main polling loop.
 *
 * Per iteration:
 *   1. Run one cycle
 *   2. Consult the restart policy; on restart, wait one interval and return
 *   3. Sleep the interval (cancellable)
 *
 * An unexpected error thrown by a cycle is logged and retried after the
 * interval; the cycle applied nothing.
 */
export async function runPollerLoop(
  ctx: CycleContext,
  intervalSeconds: number,
  signal: AbortSignal,
  deps: LoopDeps = defaultDeps,
): Promise<LoopExit> {
  const intervalMs = intervalSeconds * 1000;

  while (!signal.aborted) {
    try {
      const outcome = await deps.performCycle(ctx, signal);
      const decision = decideRestart(outcome);
      if (decision.restart) {
        core.error(`${decision.reason ?? 'Cycle failed'}. Requesting restart.`);
        // One interval passes before the supervisor gets control back
        await deps.sleep(intervalMs, signal);
        return 'restart';
      }
    } catch (error: unknown) {
      core.error(`Poller loop error: ${errorMessage(error)}`);
    }

    await deps.sleep(intervalMs, signal);
  }

  core.info('Poller loop stopped');
  return 'stopped';
}
