/**
 * mca-dump Parser
 * Layer: infra
 *
 * Parses the JSON an access point prints for `mca-dump` into the device
 * hostname and its associated stations. Stations come from every
 * vap_table[].sta_table[] entry.
 *
 * A reply that is not JSON, or has no vap_table array, is reported as
 * 'malformed', never as a transport failure.
 */

import * as core from '@actions/core';
import type { ClientInfo, HostMalformedResponse, HostQuerySuccess } from '../types';
import { displayName, isIdle } from '../identity';
import { isARealObject } from '../utils';

/**
 * Extracts the station fields we track; anything unusable becomes null.
 */
export function toClientInfo(entry: unknown): ClientInfo {
  if (!isARealObject(entry)) {
    return { mac: null, ip: null, hostname: null, idleTime: null };
  }
  const mac = entry['mac'];
  const ip = entry['ip'];
  const hostname = entry['hostname'];
  const idle = entry['idletime'];
  return {
    mac: typeof mac === 'string' ? mac.toUpperCase() : null,
    ip: typeof ip === 'string' ? ip : null,
    hostname: typeof hostname === 'string' ? hostname : null,
    idleTime: typeof idle === 'number' && Number.isInteger(idle) ? idle : null,
  };
}

/**
 * @param raw - stdout of `mca-dump`
 * @param host - dial string, used when the reply carries no hostname
 * @param maxIdleSeconds - stations idle longer than this are dropped; 0 disables
 */
export function parseMcaDump(
  raw: string,
  host: string,
  maxIdleSeconds: number,
): HostQuerySuccess | HostMalformedResponse {
  let root: unknown;
  try {
    root = JSON.parse(raw);
  } catch {
    return { status: 'malformed', host, hostname: null, error: 'Response is not valid JSON' };
  }
  if (!isARealObject(root)) {
    return { status: 'malformed', host, hostname: null, error: 'Response is not a JSON object' };
  }

  const reported = root['hostname'];
  const hostname = typeof reported === 'string' && reported !== '' ? reported : host;
  core.debug(`Hostname of ${host} is AP ${hostname}`);

  const vapTable = root['vap_table'];
  if (!Array.isArray(vapTable)) {
    return { status: 'malformed', host, hostname, error: `No vap_table found for ${hostname}` };
  }

  const clients: ClientInfo[] = [];
  vapTable.forEach((vap: unknown, vapIndex) => {
    const staTable = isARealObject(vap) ? vap['sta_table'] : undefined;
    if (!Array.isArray(staTable) || staTable.length === 0) {
      core.debug(`vap_table index ${vapIndex} on ${hostname} has no stations`);
      return;
    }
    for (const entry of staTable) {
      const client = toClientInfo(entry);
      if (maxIdleSeconds > 0 && isIdle(client, maxIdleSeconds)) {
        core.debug(
          `Skipping client ${displayName(client)} idle ${client.idleTime}s (max ${maxIdleSeconds}s)`,
        );
        continue;
      }
      clients.push(client);
    }
  });

  core.debug(`Stored ${clients.length} clients for ${hostname}`);
  return { status: 'ok', host, hostname, clients };
}
