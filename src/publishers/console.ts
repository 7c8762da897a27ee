/**
 * Console Publisher
 * Layer: infra
 *
 * Prints transitions to stdout instead of the bus. Always ready.
 */

import * as core from '@actions/core';
import type { AggregationKey, ClientIdentity, Publisher } from '../types';

export type WriteLine = (line: string) => void;

/**
 * "YYYY-MM-DD HH:mm:ss" in UTC.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

export class ConsolePublisher implements Publisher {
  readonly isReady = true;

  constructor(
    private readonly writeLine: WriteLine = (line) => {
      process.stdout.write(`${line}\n`);
    },
    private readonly now: () => Date = () => new Date(),
  ) {}

  async initialize(): Promise<void> {
    core.info('Console publisher initialized');
  }

  async publishClients(
    key: AggregationKey,
    newIdentities: ClientIdentity[],
    goneIdentities: ClientIdentity[],
  ): Promise<void> {
    const timestamp = formatTimestamp(this.now());
    if (newIdentities.length > 0) {
      this.writeLine(
        `[${timestamp}] CONNECTED to ${key} (${newIdentities.length}): ${newIdentities.join(', ')}`,
      );
    }
    if (goneIdentities.length > 0) {
      this.writeLine(
        `[${timestamp}] DISCONNECTED from ${key} (${goneIdentities.length}): ${goneIdentities.join(', ')}`,
      );
    }
  }

  async close(): Promise<void> {
    core.info('Console publisher closed');
  }
}
