/**
 * Null State Source
 *
 * Used when initialization is disabled: every run starts cold.
 */

import type { ClientState, StateSource } from '../types';

export class NullStateSource implements StateSource {
  readonly name = 'none';
  readonly forceSnapshot = false;

  async readCurrentStates(): Promise<Record<string, ClientState>> {
    return {};
  }
}
