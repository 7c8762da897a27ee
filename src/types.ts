/**
 * Boundary types for ap-presence-bridge
 *
 * These types define the contracts between modules: the presence core
 * (state store, diff engine, reconciler, poll cycle) and the adapters that
 * talk to access points, controllers and the message bus.
 */

// -----------------------------------------------------------------------------
// Identities and keys
// -----------------------------------------------------------------------------

/** Normalized client identifier (uppercase colon MAC, or alternate id) */
export type ClientIdentity = string;

/** Per-AP name, or ALL_APS_AGGREGATE when aggregation is enabled */
export type AggregationKey = string;

/** Which client attribute identifies a device */
export type IdentityMode = 'mac' | 'hostname';

/** Single aggregation key used when presence is tracked fleet-wide */
export const ALL_APS_AGGREGATE = 'all_aps';

/** Sentinel identity for clients that report neither MAC nor hostname */
export const UNKNOWN_CLIENT_ID = 'Unknown';

/** AP name used for seeded states whose source did not name an AP */
export const UNKNOWN_AP = 'unknown';

// -----------------------------------------------------------------------------
// ClientInfo
// One station entry as reported by an access point
// -----------------------------------------------------------------------------

export interface ClientInfo {
  mac: string | null;
  ip: string | null;
  hostname: string | null;
  /** Seconds since the station last sent traffic */
  idleTime: number | null;
}

// -----------------------------------------------------------------------------
// ClientState
// Presence fact read from a state source during initialization
// -----------------------------------------------------------------------------

export interface ClientState {
  clientId: ClientIdentity;
  /** AP the fact was recorded against (null when the source has none) */
  apHostname: string | null;
  connected: boolean;
  /** ISO timestamp of when the fact was read */
  lastUpdated: string;
  lastPayload: string;
}

// -----------------------------------------------------------------------------
// Host query outcomes
// -----------------------------------------------------------------------------

export interface HostQuerySuccess {
  status: 'ok';
  /** Dial string used to reach the host */
  host: string;
  /** Hostname the device reported (falls back to the dial string) */
  hostname: string;
  clients: ClientInfo[];
}

export interface HostTransportFailure {
  status: 'transport-failure';
  host: string;
  error: string;
}

export interface HostMalformedResponse {
  status: 'malformed';
  host: string;
  /** Hostname if the payload got far enough to name the device */
  hostname: string | null;
  error: string;
}

export type HostQueryOutcome = HostQuerySuccess | HostTransportFailure | HostMalformedResponse;

// -----------------------------------------------------------------------------
// Cycle data
// -----------------------------------------------------------------------------

export interface CycleResult {
  host: string;
  /** Key this host reports under; null when the host could not be named */
  aggregationKey: AggregationKey | null;
  clients: ClientInfo[];
  /** True when the host answered but its payload could not be used */
  malformed: boolean;
}

export interface Diff {
  aggregationKey: AggregationKey;
  newIdentities: ClientIdentity[];
  goneIdentities: ClientIdentity[];
  /** Key was not in the store before this cycle (initial population) */
  firstObservation: boolean;
}

// -----------------------------------------------------------------------------
// Capability interfaces
// -----------------------------------------------------------------------------

export interface ClientInfoProvider {
  getClients(host: string, signal?: AbortSignal): Promise<HostQueryOutcome>;
  /** Optional concurrent variant; one entry per requested host */
  getClientsBatch?(hosts: string[], signal?: AbortSignal): Promise<Map<string, HostQueryOutcome>>;
}

export interface StateSource {
  readonly name: string;
  /** Absence of an entry means "not connected" rather than "unknown" */
  readonly forceSnapshot: boolean;
  readCurrentStates(): Promise<Record<string, ClientState>>;
}

export interface Publisher {
  readonly isReady: boolean;
  initialize(): Promise<void>;
  publishClients(
    key: AggregationKey,
    newIdentities: ClientIdentity[],
    goneIdentities: ClientIdentity[],
  ): Promise<void>;
  close(): Promise<void>;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export type InitialStateMode = 'none' | 'mqtt' | 'unifi' | 'all';

export type PublisherKind = 'mqtt' | 'console';

export interface SshConfig {
  username: string;
  privateKeyPath: string;
  connectTimeoutSeconds: number;
  commandTimeoutSeconds: number;
}

export interface MqttConfig {
  url: string;
  username: string | null;
  password: string | null;
  topicPrefix: string;
  retain: boolean;
  connectedPayload: string;
  disconnectedPayload: string;
}

export interface UnifiConfig {
  baseUrl: string;
  apiKey: string;
  pageSize: number;
}

export interface Config {
  hosts: string[];
  aggregate: boolean;
  intervalSeconds: number;
  maxIdleSeconds: number;
  identityMode: IdentityMode;
  initialState: InitialStateMode;
  publisher: PublisherKind;
  ssh: SshConfig;
  mqtt: MqttConfig;
  /** Null unless initial state reads from the controller */
  unifi: UnifiConfig | null;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const POLL_INTERVAL_SECONDS = 60;
export const SSH_CONNECT_TIMEOUT_SECONDS = 5;
export const SSH_COMMAND_TIMEOUT_SECONDS = 15;
export const UNIFI_PAGE_SIZE = 100;

/** Timeout for controller API requests (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;

/** How long the retained-message reader waits for the broker to replay */
export const RETAINED_SETTLE_MS = 1000;
