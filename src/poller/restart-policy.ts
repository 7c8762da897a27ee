/**
 * Restart Policy
 * Layer: poller
 *
 * Decides from a cycle outcome whether the process must stop and be
 * restarted by its supervisor. Any transport failure ends the run.
 */

import type { CycleOutcome } from './cycle';

export interface RestartDecision {
  restart: boolean;
  /** Why the restart is requested; null when it is not */
  reason: string | null;
}

export function decideRestart(outcome: CycleOutcome): RestartDecision {
  switch (outcome.status) {
    case 'transport-failure': {
      const hosts = outcome.failures.map((f) => f.host).join(', ');
      return {
        restart: true,
        reason: `Connection failures on ${outcome.failures.length}/${outcome.totalHosts} hosts: ${hosts}`,
      };
    }
    case 'completed':
    case 'cancelled':
      return { restart: false, reason: null };
  }
}
