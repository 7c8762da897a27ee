/**
 * UniFi State Source
 * Layer: infra
 *
 * Authoritative snapshot of wireless clients from the controller: a client
 * the controller does not list is not connected.
 *
 * An unreachable controller (sites request failed) rejects so the
 * reconciler or a composite source can fall back. A failure inside one site
 * is logged and only that site is skipped.
 */

import * as core from '@actions/core';
import type { ClientState, StateSource } from '../types';
import { ALL_APS_AGGREGATE } from '../types';
import { createClientStateKey, normalizeIdentity } from '../identity';
import type { UnifiApi, UnifiClient } from '../unifi';

export class UnifiStateSource implements StateSource {
  readonly name = 'UniFi API';
  readonly forceSnapshot = true;

  constructor(
    private readonly api: UnifiApi,
    private readonly aggregate: boolean,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async readCurrentStates(): Promise<Record<string, ClientState>> {
    core.info('Reading current wireless client states from UniFi API');
    const sites = await this.api.getSites();
    if (!sites.success) {
      throw new Error(`Failed to list UniFi sites: ${sites.error}`);
    }
    if (sites.data.length === 0) {
      core.warning('No UniFi sites found');
      return {};
    }

    const states: Record<string, ClientState> = {};
    for (const site of sites.data) {
      const devices = await this.api.getDevices(site.id);
      if (!devices.success) {
        core.error(`Error reading devices for UniFi site ${site.name} (${site.id}): ${devices.error}`);
        continue;
      }
      const clients = await this.api.getWirelessClients(site.id);
      if (!clients.success) {
        core.error(`Error reading clients for UniFi site ${site.name} (${site.id}): ${clients.error}`);
        continue;
      }

      const deviceNames = new Map(devices.data.map((d): [string, string] => [d.id, d.name]));
      core.debug(`Site ${site.name}: found ${clients.data.length} wireless clients`);

      for (const client of clients.data) {
        const state = this.toState(client, deviceNames);
        states[createClientStateKey(state.clientId, state.apHostname)] = state;
      }
    }

    core.info(`Read ${Object.keys(states).length} wireless client states from UniFi API`);
    return states;
  }

  private toState(client: UnifiClient, deviceNames: Map<string, string>): ClientState {
    const apName = deviceNames.get(client.uplinkDeviceId) || client.uplinkDeviceId;
    const apHostname = this.aggregate ? ALL_APS_AGGREGATE : apName;
    return {
      clientId: normalizeIdentity(client.macAddress),
      apHostname,
      connected: true,
      lastUpdated: this.now().toISOString(),
      lastPayload: `Connected to ${apHostname} at ${client.connectedAt}`,
    };
  }
}
