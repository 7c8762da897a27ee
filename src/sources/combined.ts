/**
 * Combined State Source
 *
 * Reads several sources in order, primary first, and merges their facts;
 * a later source overrides an earlier one for the same key. A failing
 * sub-source is skipped so the remaining ones still contribute, and only
 * when every sub-source fails does the result come back empty.
 */

import * as core from '@actions/core';
import type { ClientState, StateSource } from '../types';
import { errorMessage } from '../utils';

export class CombinedStateSource implements StateSource {
  readonly name: string;
  readonly forceSnapshot = true;

  constructor(private readonly sources: StateSource[]) {
    this.name = `combined (${sources.map((s) => s.name).join(' + ')})`;
  }

  async readCurrentStates(): Promise<Record<string, ClientState>> {
    const combined: Record<string, ClientState> = {};
    let succeeded = 0;

    for (const [index, source] of this.sources.entries()) {
      let states: Record<string, ClientState>;
      try {
        core.debug(`Reading client states from ${source.name}`);
        states = await source.readCurrentStates();
      } catch (err) {
        core.error(`Failed to read client states from ${source.name}: ${errorMessage(err)}`);
        if (index < this.sources.length - 1) {
          core.warning(`Falling back to the remaining sources after ${source.name}`);
        }
        continue;
      }

      succeeded++;
      core.info(`Found ${Object.keys(states).length} client states from ${source.name}`);
      for (const [key, state] of Object.entries(states)) {
        if (key in combined) {
          core.debug(`Overriding state for ${state.clientId} with ${source.name}`);
        }
        combined[key] = state;
      }
    }

    if (succeeded === 0 && this.sources.length > 0) {
      core.error('Every state source failed; starting with an empty state');
      return {};
    }

    core.info(`Merged total: ${Object.keys(combined).length} client states from ${succeeded} sources`);
    return combined;
  }
}
