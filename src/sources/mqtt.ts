/**
 * MQTT Retained State Source
 * Layer: infra
 *
 * Rebuilds last-known presence from the retained messages the broker
 * replays on subscribe. Incremental: a client with no retained message is
 * unknown, not absent.
 *
 * Topics read:
 *   per-AP mode:     <prefix>/+/+   (<prefix>/<ap>/<client>)
 *   aggregated mode: <prefix>/+     (<prefix>/<client>)
 */

import { randomUUID } from 'crypto';
import * as os from 'os';
import * as core from '@actions/core';
import type { ClientState, MqttConfig, StateSource } from '../types';
import { ALL_APS_AGGREGATE, RETAINED_SETTLE_MS } from '../types';
import { createClientStateKey } from '../identity';
import type { BusConnector, BusMessage } from '../mqtt-bus';
import { sleep as sleepImpl } from '../utils';

export interface ParsedTopic {
  clientId: string;
  /** AP segment; null in aggregated mode */
  apHostname: string | null;
}

export function subscriptionTopic(prefix: string, aggregate: boolean): string {
  return aggregate ? `${prefix}/+` : `${prefix}/+/+`;
}

/**
 * Splits a presence topic; null when it is not one of ours.
 */
export function parseTopic(topic: string, prefix: string, aggregate: boolean): ParsedTopic | null {
  if (!topic.startsWith(`${prefix}/`)) return null;
  const parts = topic.slice(prefix.length + 1).split('/');

  if (aggregate) {
    const [clientId] = parts;
    if (parts.length !== 1 || !clientId) return null;
    return { clientId, apHostname: null };
  }

  const [apHostname, clientId] = parts;
  if (parts.length !== 2 || !apHostname || !clientId) return null;
  return { clientId, apHostname };
}

export class MqttStateSource implements StateSource {
  readonly name = 'MQTT retained messages';
  readonly forceSnapshot = false;

  constructor(
    private readonly config: MqttConfig,
    private readonly aggregate: boolean,
    private readonly connect: BusConnector,
    private readonly settleMs: number = RETAINED_SETTLE_MS,
    private readonly sleep: (ms: number) => Promise<void> = sleepImpl,
  ) {}

  async readCurrentStates(): Promise<Record<string, ClientState>> {
    const states: Record<string, ClientState> = {};
    const client = await this.connect({
      clientId: `presence-reader-${os.hostname()}-${randomUUID()}`,
      reconnect: false,
    });

    try {
      client.onMessage((message) => this.collect(message, states));
      const topic = subscriptionTopic(this.config.topicPrefix, this.aggregate);
      await client.subscribe(topic);
      core.info(`Subscribed to ${topic}, waiting for retained messages...`);

      await this.sleep(this.settleMs);
      core.info(`Finished reading retained messages. Found ${Object.keys(states).length} client states`);
      return { ...states };
    } finally {
      await client.end();
    }
  }

  private collect(message: BusMessage, states: Record<string, ClientState>): void {
    if (!message.retained) {
      core.debug(`Skipping non-retained message on ${message.topic}`);
      return;
    }
    const parsed = parseTopic(message.topic, this.config.topicPrefix, this.aggregate);
    if (!parsed) {
      core.debug(`Ignoring message on unexpected topic ${message.topic}`);
      return;
    }

    const apHostname = parsed.apHostname ?? ALL_APS_AGGREGATE;
    const connected =
      message.payload.toLowerCase() === this.config.connectedPayload.toLowerCase();
    states[createClientStateKey(parsed.clientId, apHostname)] = {
      clientId: parsed.clientId,
      apHostname,
      connected,
      lastUpdated: new Date().toISOString(),
      lastPayload: message.payload,
    };
    core.debug(`Client state ${parsed.clientId} @ ${apHostname} = ${connected}`);
  }
}
