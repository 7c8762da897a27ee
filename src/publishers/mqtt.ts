/**
 * MQTT Publisher
 * Layer: infra
 *
 * One message per transition:
 *   per-AP mode:     <prefix>/<ap>/<client>  -> connected/disconnected payload
 *   aggregated mode: <prefix>/<client>
 */

import * as core from '@actions/core';
import type { AggregationKey, ClientIdentity, MqttConfig, Publisher } from '../types';
import type { BusClient, BusConnector } from '../mqtt-bus';

export function buildTopic(
  prefix: string,
  key: AggregationKey,
  id: ClientIdentity,
  aggregate: boolean,
): string {
  return aggregate ? `${prefix}/${id}` : `${prefix}/${key}/${id}`;
}

export class MqttPublisher implements Publisher {
  private client: BusClient | null = null;

  constructor(
    private readonly config: MqttConfig,
    private readonly aggregate: boolean,
    private readonly connect: BusConnector,
  ) {}

  get isReady(): boolean {
    return this.client?.connected ?? false;
  }

  async initialize(): Promise<void> {
    if (this.client) return;
    this.client = await this.connect({ reconnect: true });
    core.info(`MQTT publisher connected to ${this.config.url}`);
  }

  async publishClients(
    key: AggregationKey,
    newIdentities: ClientIdentity[],
    goneIdentities: ClientIdentity[],
  ): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) {
      core.info('MQTT client not connected, skipping publish');
      return;
    }

    const { topicPrefix, retain, connectedPayload, disconnectedPayload } = this.config;
    for (const id of newIdentities) {
      const topic = buildTopic(topicPrefix, key, id, this.aggregate);
      await client.publish(topic, connectedPayload, retain);
      core.debug(`Published ${topic}=${connectedPayload} for ${key}`);
    }
    for (const id of goneIdentities) {
      const topic = buildTopic(topicPrefix, key, id, this.aggregate);
      await client.publish(topic, disconnectedPayload, retain);
      core.debug(`Published ${topic}=${disconnectedPayload} for ${key}`);
    }
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
      core.info('MQTT publisher closed');
    }
  }
}
