import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { CombinedStateSource } from '../../src/sources/combined';
import { NullStateSource } from '../../src/sources/null';
import type { ClientState, StateSource } from '../../src/types';
import { makeState } from '../helpers';

vi.mock('@actions/core');

function source(name: string, states: Record<string, ClientState>): StateSource {
  return { name, forceSnapshot: false, readCurrentStates: async () => states };
}

function failing(name: string): StateSource {
  return {
    name,
    forceSnapshot: true,
    readCurrentStates: async () => {
      throw new Error('unreachable');
    },
  };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe('NullStateSource', () => {
  it('reports no states', async () => {
    const source = new NullStateSource();
    expect(await source.readCurrentStates()).toEqual({});
    expect(source.forceSnapshot).toBe(false);
  });
});

describe('CombinedStateSource', () => {
  const connected = makeState({ connected: true, lastPayload: 'from unifi' });
  const disconnected = makeState({ connected: false, lastPayload: 'from mqtt' });

  it('names its parts', () => {
    expect(new CombinedStateSource([source('UniFi API', {}), source('MQTT', {})]).name).toBe(
      'combined (UniFi API + MQTT)',
    );
  });

  it('lets later sources override earlier ones', async () => {
    const combined = new CombinedStateSource([
      source('primary', { 'ap-lobby/x': connected, 'ap-lobby/y': connected }),
      source('secondary', { 'ap-lobby/x': disconnected }),
    ]);

    expect(await combined.readCurrentStates()).toEqual({
      'ap-lobby/x': disconnected,
      'ap-lobby/y': connected,
    });
  });

  it('falls back to the remaining sources when the primary fails', async () => {
    const combined = new CombinedStateSource([
      failing('primary'),
      source('secondary', { 'ap-lobby/x': disconnected }),
    ]);

    expect(await combined.readCurrentStates()).toEqual({ 'ap-lobby/x': disconnected });
    expect(core.error).toHaveBeenCalledWith('Failed to read client states from primary: unreachable');
    expect(core.warning).toHaveBeenCalledWith('Falling back to the remaining sources after primary');
  });

  it('keeps the primary data when the secondary fails', async () => {
    const combined = new CombinedStateSource([
      source('primary', { 'ap-lobby/x': connected }),
      failing('secondary'),
    ]);

    expect(await combined.readCurrentStates()).toEqual({ 'ap-lobby/x': connected });
    expect(core.warning).not.toHaveBeenCalled();
  });

  it('returns nothing when every source fails', async () => {
    const combined = new CombinedStateSource([failing('a'), failing('b')]);

    expect(await combined.readCurrentStates()).toEqual({});
    expect(core.error).toHaveBeenCalledWith('Every state source failed; starting with an empty state');
  });
});
