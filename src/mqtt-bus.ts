/**
 * MQTT Bus
 * Layer: infra
 *
 * Provided ports:
 *   - bus.connect
 *
 * Thin wrapper over the mqtt client exposing only what the publisher and
 * the retained-message source use. Everything above this file talks to
 * BusClient, so tests never open a socket.
 */

import * as core from '@actions/core';
import { connectAsync } from 'mqtt';
import type { MqttClient } from 'mqtt';
import type { MqttConfig } from './types';

const RECONNECT_PERIOD_MS = 5000;

export interface BusMessage {
  topic: string;
  payload: string;
  retained: boolean;
}

export interface BusClient {
  readonly connected: boolean;
  publish(topic: string, payload: string, retain: boolean): Promise<void>;
  subscribe(topic: string): Promise<void>;
  onMessage(handler: (message: BusMessage) => void): void;
  end(): Promise<void>;
}

export interface BusConnectOptions {
  clientId?: string;
  /** Keep reconnecting after a drop (long-lived publisher) */
  reconnect: boolean;
}

export type BusConnector = (options: BusConnectOptions) => Promise<BusClient>;

function wrapClient(client: MqttClient): BusClient {
  return {
    get connected() {
      return client.connected;
    },
    async publish(topic, payload, retain) {
      await client.publishAsync(topic, payload, { qos: 1, retain });
    },
    async subscribe(topic) {
      await client.subscribeAsync(topic, { qos: 1 });
    },
    onMessage(handler) {
      client.on('message', (topic, payload, packet) => {
        handler({ topic, payload: payload.toString('utf-8'), retained: packet.retain });
      });
    },
    async end() {
      await client.endAsync();
    },
  };
}

// -----------------------------------------------------------------------------
// Port: bus.connect
// -----------------------------------------------------------------------------

/**
 * Connector bound to the configured broker. The first connection attempt
 * rejects if the broker is unreachable.
 */
export function createBusConnector(config: MqttConfig): BusConnector {
  return async (options) => {
    core.debug(`Connecting to MQTT broker at ${config.url}`);
    const client = await connectAsync(
      config.url,
      {
        clientId: options.clientId,
        username: config.username ?? undefined,
        password: config.password ?? undefined,
        clean: true,
        reconnectPeriod: options.reconnect ? RECONNECT_PERIOD_MS : 0,
      },
      false,
    );
    client.on('close', () => {
      core.warning(`MQTT connection to ${config.url} closed`);
    });
    client.on('reconnect', () => {
      core.info(`Reconnecting to MQTT broker at ${config.url}`);
    });
    client.on('error', (err) => {
      core.error(`MQTT client error: ${err.message}`);
    });
    return wrapClient(client);
  };
}
