/**
 * UniFi Controller API Client
 * Layer: infra
 *
 * Provided ports:
 *   - unifi.getSites
 *   - unifi.getDevices
 *   - unifi.getWirelessClients
 *
 * Reads the controller's integration API. Every list endpoint is paged with
 * limit/offset until a short or empty page comes back.
 */

import * as core from '@actions/core';
import type { UnifiConfig } from './types';
import { FETCH_TIMEOUT_MS } from './types';
import { errorMessage, isARealObject } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const API_PREFIX = '/proxy/network/integration/v1';
const USER_AGENT = 'ap-presence-bridge';
const WIRELESS_FILTER = "type.eq('WIRELESS')";

// -----------------------------------------------------------------------------
// Models
// -----------------------------------------------------------------------------

export interface UnifiSite {
  id: string;
  name: string;
}

export interface UnifiDevice {
  id: string;
  name: string;
}

export interface UnifiClient {
  id: string;
  name: string;
  macAddress: string;
  /** ISO timestamp the client associated */
  connectedAt: string;
  /** Id of the device (AP) the client is attached to */
  uplinkDeviceId: string;
}

export interface FetchListResult<T> {
  success: true;
  data: T[];
}

export interface FetchListError {
  success: false;
  error: string;
}

export type FetchListOutcome<T> = FetchListResult<T> | FetchListError;

export type FetchFn = typeof fetch;

export interface UnifiApi {
  getSites(): Promise<FetchListOutcome<UnifiSite>>;
  getDevices(siteId: string): Promise<FetchListOutcome<UnifiDevice>>;
  getWirelessClients(siteId: string): Promise<FetchListOutcome<UnifiClient>>;
}

// -----------------------------------------------------------------------------
// Parsing
// -----------------------------------------------------------------------------

function stringField(obj: Record<string, unknown>, name: string): string {
  const value = obj[name];
  return typeof value === 'string' ? value : '';
}

export function parseSite(raw: unknown): UnifiSite | null {
  if (!isARealObject(raw) || typeof raw['id'] !== 'string') return null;
  return { id: raw['id'], name: stringField(raw, 'name') };
}

export function parseDevice(raw: unknown): UnifiDevice | null {
  if (!isARealObject(raw) || typeof raw['id'] !== 'string') return null;
  return { id: raw['id'], name: stringField(raw, 'name') };
}

export function parseClient(raw: unknown): UnifiClient | null {
  if (!isARealObject(raw) || typeof raw['macAddress'] !== 'string') return null;
  return {
    id: stringField(raw, 'id'),
    name: stringField(raw, 'name'),
    macAddress: raw['macAddress'],
    connectedAt: stringField(raw, 'connectedAt'),
    uplinkDeviceId: stringField(raw, 'uplinkDeviceId'),
  };
}

export interface ParsedPage<T> {
  items: T[];
  /** Entries the page carried, valid or not */
  received: number;
}

/**
 * Items of a `{ data: [...] }` page; null when the page has another shape.
 */
export function parsePage<T>(
  raw: unknown,
  parseItem: (item: unknown) => T | null,
): ParsedPage<T> | null {
  if (!isARealObject(raw) || !Array.isArray(raw['data'])) {
    return null;
  }
  const items: T[] = [];
  for (const entry of raw['data']) {
    const item = parseItem(entry);
    if (item) items.push(item); // Skip invalid entries instead of failing the page
  }
  return { items, received: raw['data'].length };
}

// -----------------------------------------------------------------------------
// Client
// -----------------------------------------------------------------------------

/**
 * Controller base URL; a bare host gets https://.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function createUnifiApi(config: UnifiConfig, fetchFn: FetchFn = fetch): UnifiApi {
  const baseUrl = normalizeBaseUrl(config.baseUrl);

  async function fetchPage(url: string): Promise<{ success: true; raw: unknown } | FetchListError> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    try {
      const response = await fetchFn(url, {
        signal: controller.signal,
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': USER_AGENT,
          'X-API-Key': config.apiKey,
        },
      });
      if (!response.ok) {
        const statusText = response.statusText || 'Unknown error';
        return { success: false, error: `HTTP ${response.status}: ${statusText}` };
      }
      const raw: unknown = await response.json();
      return { success: true, raw };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return {
          success: false,
          error: `Request timeout: controller did not respond within ${FETCH_TIMEOUT_MS}ms`,
        };
      }
      return { success: false, error: `Network error: ${errorMessage(err)}` };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function fetchAll<T>(
    path: string,
    query: Record<string, string>,
    parseItem: (item: unknown) => T | null,
  ): Promise<FetchListOutcome<T>> {
    const limit = config.pageSize;
    const all: T[] = [];
    let offset = 0;

    while (true) {
      const params = new URLSearchParams({ ...query, limit: String(limit), offset: String(offset) });
      const url = `${baseUrl}${API_PREFIX}${path}?${params.toString()}`;
      core.debug(`Fetching ${url}`);

      const page = await fetchPage(url);
      if (!page.success) {
        return page;
      }
      const parsed = parsePage(page.raw, parseItem);
      if (!parsed) {
        return { success: false, error: `Failed to parse response from ${path}` };
      }

      all.push(...parsed.items);
      if (parsed.received < limit) {
        return { success: true, data: all };
      }
      offset += limit;
    }
  }

  return {
    getSites: () => fetchAll('/sites', {}, parseSite),
    getDevices: (siteId) => fetchAll(`/sites/${encodeURIComponent(siteId)}/devices`, {}, parseDevice),
    getWirelessClients: (siteId) =>
      fetchAll(
        `/sites/${encodeURIComponent(siteId)}/clients`,
        { filter: WIRELESS_FILTER },
        parseClient,
      ),
  };
}
