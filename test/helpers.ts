/**
 * Shared test helpers: fixtures and in-process fakes for the provider,
 * publisher and bus seams.
 */

import { vi } from 'vitest';
import type {
  ClientInfo,
  ClientInfoProvider,
  ClientState,
  Config,
  HostQueryOutcome,
  MqttConfig,
  Publisher,
} from '../src/types';
import type { BusClient, BusConnectOptions, BusMessage } from '../src/mqtt-bus';

export function makeClient(overrides: Partial<ClientInfo> = {}): ClientInfo {
  return {
    mac: 'AA:BB:CC:00:00:01',
    ip: '192.168.1.10',
    hostname: 'laptop',
    idleTime: 0,
    ...overrides,
  };
}

/** Client whose MAC ends in the given byte, e.g. mac(2) -> AA:BB:CC:00:00:02 */
export function mac(n: number): string {
  return `AA:BB:CC:00:00:${n.toString(16).padStart(2, '0').toUpperCase()}`;
}

export function ok(host: string, hostname: string, macs: string[]): HostQueryOutcome {
  return {
    status: 'ok',
    host,
    hostname,
    clients: macs.map((m) => makeClient({ mac: m, hostname: null })),
  };
}

export function makeState(overrides: Partial<ClientState> = {}): ClientState {
  return {
    clientId: mac(1),
    apHostname: 'ap-lobby',
    connected: true,
    lastUpdated: '2026-01-01T00:00:00.000Z',
    lastPayload: 'home',
    ...overrides,
  };
}

export function makeMqttConfig(overrides: Partial<MqttConfig> = {}): MqttConfig {
  return {
    url: 'mqtt://localhost:1883',
    username: null,
    password: null,
    topicPrefix: 'presence',
    retain: false,
    connectedPayload: 'home',
    disconnectedPayload: 'not_home',
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<Config> = {}): Config {
  return {
    hosts: ['10.0.0.1', '10.0.0.2'],
    aggregate: false,
    intervalSeconds: 60,
    maxIdleSeconds: 0,
    identityMode: 'mac',
    initialState: 'none',
    publisher: 'console',
    ssh: {
      username: 'admin',
      privateKeyPath: '/keys/id_test',
      connectTimeoutSeconds: 5,
      commandTimeoutSeconds: 15,
    },
    mqtt: makeMqttConfig(),
    unifi: null,
    ...overrides,
  };
}

// -----------------------------------------------------------------------------
// Fakes
// -----------------------------------------------------------------------------

/**
 * Provider answering from a per-host script; each call consumes the next
 * answer for that host, the last one repeating.
 */
export class ScriptedProvider implements ClientInfoProvider {
  readonly calls: string[] = [];
  private readonly scripts = new Map<string, HostQueryOutcome[]>();

  script(host: string, ...answers: HostQueryOutcome[]): this {
    this.scripts.set(host, answers);
    return this;
  }

  async getClients(host: string): Promise<HostQueryOutcome> {
    this.calls.push(host);
    const answers = this.scripts.get(host) ?? [];
    const answer = answers.length > 1 ? answers.shift() : answers[0];
    if (!answer) {
      throw new Error(`no scripted answer for ${host}`);
    }
    return answer;
  }
}

export interface PublishedCall {
  key: string;
  newIdentities: string[];
  goneIdentities: string[];
}

export class RecordingPublisher implements Publisher {
  isReady = true;
  readonly published: PublishedCall[] = [];
  initialize = vi.fn(async (): Promise<void> => {});
  close = vi.fn(async (): Promise<void> => {});

  async publishClients(key: string, newIdentities: string[], goneIdentities: string[]): Promise<void> {
    this.published.push({ key, newIdentities, goneIdentities });
  }
}

/**
 * In-memory bus: records publishes and lets a test replay messages to the
 * registered handlers.
 */
export class FakeBusClient implements BusClient {
  connected = true;
  readonly publishes: { topic: string; payload: string; retain: boolean }[] = [];
  readonly subscriptions: string[] = [];
  ended = false;
  private readonly handlers: ((message: BusMessage) => void)[] = [];

  async publish(topic: string, payload: string, retain: boolean): Promise<void> {
    this.publishes.push({ topic, payload, retain });
  }

  async subscribe(topic: string): Promise<void> {
    this.subscriptions.push(topic);
  }

  onMessage(handler: (message: BusMessage) => void): void {
    this.handlers.push(handler);
  }

  deliver(message: BusMessage): void {
    for (const handler of this.handlers) {
      handler(message);
    }
  }

  async end(): Promise<void> {
    this.ended = true;
    this.connected = false;
  }
}

export function fakeConnector(client: BusClient): {
  connect: (options: BusConnectOptions) => Promise<BusClient>;
  options: BusConnectOptions[];
} {
  const options: BusConnectOptions[] = [];
  return {
    options,
    connect: async (opts) => {
      options.push(opts);
      return client;
    },
  };
}
