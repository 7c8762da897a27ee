/**
 * Client Identity
 * Layer: core
 *
 * Provided ports:
 *   - identity.normalize
 *   - identity.clientId
 *   - identity.stateKey
 *
 * Every identity that enters the core passes through normalizeIdentity so
 * that "aa-bb-cc-dd-ee-ff" from one system and "AA:BB:CC:DD:EE:FF" from
 * another compare equal.
 */

import type { ClientIdentity, ClientInfo, IdentityMode } from './types';
import { UNKNOWN_CLIENT_ID } from './types';

const MAC_PATTERN = /^[0-9a-f]{2}([:-])[0-9a-f]{2}(\1[0-9a-f]{2}){4}$/i;

// -----------------------------------------------------------------------------
// Port: identity.normalize
// -----------------------------------------------------------------------------

/**
 * MAC-shaped values become uppercase with colon separators.
 * Anything else (hostnames, custom ids) is only trimmed.
 */
export function normalizeIdentity(raw: string): ClientIdentity {
  const trimmed = raw.trim();
  if (MAC_PATTERN.test(trimmed)) {
    return trimmed.replace(/-/g, ':').toUpperCase();
  }
  return trimmed;
}

/**
 * True for identities the diff engine must discard.
 */
export function isUnknownIdentity(id: string): boolean {
  const trimmed = id.trim();
  return trimmed === '' || trimmed === UNKNOWN_CLIENT_ID;
}

// -----------------------------------------------------------------------------
// Port: identity.clientId
// -----------------------------------------------------------------------------

export function clientId(client: ClientInfo, mode: IdentityMode): string {
  if (mode === 'hostname') {
    return client.hostname || client.mac || UNKNOWN_CLIENT_ID;
  }
  return client.mac || UNKNOWN_CLIENT_ID;
}

export function displayName(client: ClientInfo): string {
  return client.hostname || client.mac || UNKNOWN_CLIENT_ID;
}

export function isIdle(client: ClientInfo, maxIdleSeconds: number): boolean {
  return client.idleTime !== null && client.idleTime > maxIdleSeconds;
}

/**
 * "MAC(hostname)" for log lines.
 */
export function describeClient(client: ClientInfo): string {
  if (!client.mac) {
    return 'Unknown Client';
  }
  return client.hostname ? `${client.mac}(${client.hostname})` : client.mac;
}

// -----------------------------------------------------------------------------
// Port: identity.stateKey
// -----------------------------------------------------------------------------

/**
 * Key under which state sources report a client fact.
 */
export function createClientStateKey(id: ClientIdentity, apHostname: string | null): string {
  return apHostname ? `${apHostname}/${id}` : id;
}
