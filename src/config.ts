/**
 * Configuration
 * Layer: infra
 *
 * Provided ports:
 *   - config.load
 *
 * Reads the PRESENCE_* environment variables once at startup. Every problem
 * is collected so a misconfigured deployment reports them all at once.
 */

import type {
  Config,
  IdentityMode,
  InitialStateMode,
  MqttConfig,
  PublisherKind,
  UnifiConfig,
} from './types';
import {
  POLL_INTERVAL_SECONDS,
  SSH_COMMAND_TIMEOUT_SECONDS,
  SSH_CONNECT_TIMEOUT_SECONDS,
  UNIFI_PAGE_SIZE,
} from './types';
import { parseBooleanFlag } from './utils';

export const ENV_PREFIX = 'PRESENCE_';

export interface LoadConfigResult {
  success: true;
  config: Config;
}

export interface LoadConfigError {
  success: false;
  errors: string[];
}

export type LoadConfigOutcome = LoadConfigResult | LoadConfigError;

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly errors: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | null {
    const value = this.env[`${ENV_PREFIX}${name}`]?.trim();
    return value ? value : null;
  }

  required(name: string): string {
    const value = this.string(name);
    if (value === null) {
      this.errors.push(`${ENV_PREFIX}${name} is required`);
      return '';
    }
    return value;
  }

  flag(name: string): boolean {
    return parseBooleanFlag(this.string(name) ?? undefined);
  }

  int(name: string, fallback: number, min: number): number {
    const raw = this.string(name);
    if (raw === null) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      this.errors.push(`${ENV_PREFIX}${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return parsed;
  }

  oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    const match = allowed.find((value) => value === raw);
    if (!match) {
      this.errors.push(`${ENV_PREFIX}${name} must be one of ${allowed.join(', ')} (got "${raw}")`);
      return fallback;
    }
    return match;
  }
}

const IDENTITY_MODES: readonly IdentityMode[] = ['mac', 'hostname'];
const INITIAL_STATE_MODES: readonly InitialStateMode[] = ['none', 'mqtt', 'unifi', 'all'];
const PUBLISHER_KINDS: readonly PublisherKind[] = ['mqtt', 'console'];

/**
 * Comma or whitespace separated list, empties dropped.
 */
export function parseHostList(raw: string): string[] {
  return raw
    .split(/[,\s]+/)
    .map((h) => h.trim())
    .filter(Boolean);
}

function readMqtt(reader: EnvReader): MqttConfig {
  return {
    url: reader.string('MQTT_URL') ?? 'mqtt://localhost:1883',
    username: reader.string('MQTT_USERNAME'),
    password: reader.string('MQTT_PASSWORD'),
    topicPrefix: (reader.string('MQTT_TOPIC_PREFIX') ?? 'presence').replace(/\/+$/, ''),
    retain: reader.flag('MQTT_RETAIN'),
    connectedPayload: reader.string('MQTT_CONNECTED_PAYLOAD') ?? 'home',
    disconnectedPayload: reader.string('MQTT_DISCONNECTED_PAYLOAD') ?? 'not_home',
  };
}

function readUnifi(reader: EnvReader, initialState: InitialStateMode): UnifiConfig | null {
  if (initialState !== 'unifi' && initialState !== 'all') {
    return null;
  }
  return {
    baseUrl: reader.required('UNIFI_URL'),
    apiKey: reader.required('UNIFI_API_KEY'),
    pageSize: reader.int('UNIFI_PAGE_SIZE', UNIFI_PAGE_SIZE, 1),
  };
}

// -----------------------------------------------------------------------------
// Port: config.load
// -----------------------------------------------------------------------------

export function loadConfig(env: Env): LoadConfigOutcome {
  const reader = new EnvReader(env);

  const hosts = parseHostList(reader.required('HOSTS'));
  if (reader.string('HOSTS') !== null && hosts.length === 0) {
    reader.errors.push(`${ENV_PREFIX}HOSTS lists no hosts`);
  }
  const initialState = reader.oneOf('INITIAL_STATE', INITIAL_STATE_MODES, 'mqtt');

  const config: Config = {
    hosts,
    aggregate: reader.flag('AGGREGATE'),
    intervalSeconds: reader.int('INTERVAL_SECONDS', POLL_INTERVAL_SECONDS, 1),
    maxIdleSeconds: reader.int('MAX_IDLE_SECONDS', 0, 0),
    identityMode: reader.oneOf('IDENTITY', IDENTITY_MODES, 'mac'),
    initialState,
    publisher: reader.oneOf('PUBLISHER', PUBLISHER_KINDS, 'mqtt'),
    ssh: {
      username: reader.string('SSH_USER') ?? 'admin',
      privateKeyPath: reader.required('SSH_KEY'),
      connectTimeoutSeconds: reader.int('SSH_CONNECT_TIMEOUT_SECONDS', SSH_CONNECT_TIMEOUT_SECONDS, 1),
      commandTimeoutSeconds: reader.int('SSH_COMMAND_TIMEOUT_SECONDS', SSH_COMMAND_TIMEOUT_SECONDS, 1),
    },
    mqtt: readMqtt(reader),
    unifi: readUnifi(reader, initialState),
  };

  if (reader.errors.length > 0) {
    return { success: false, errors: reader.errors };
  }
  return { success: true, config };
}
