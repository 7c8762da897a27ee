/**
 * Tests for the composition root.
 *
 * Publisher, provider, sources, loop and signal registration are injected
 * through MainDeps.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { createPublisher, createStateSources, run } from '../src/main';
import type { MainDeps } from '../src/main';
import { ConsolePublisher } from '../src/publishers/console';
import { MqttPublisher } from '../src/publishers/mqtt';
import { NullStateSource } from '../src/sources/null';
import { MqttStateSource } from '../src/sources/mqtt';
import { UnifiStateSource } from '../src/sources/unifi';
import type { StateSource } from '../src/types';
import { RecordingPublisher, ScriptedProvider, mac, makeConfig, makeState } from './helpers';

vi.mock('@actions/core');

const ENV = {
  PRESENCE_HOSTS: '10.0.0.1',
  PRESENCE_SSH_KEY: '/keys/id_test',
  PRESENCE_PUBLISHER: 'console',
  PRESENCE_INTERVAL_SECONDS: '15',
};

interface Harness {
  deps: MainDeps;
  publisher: RecordingPublisher;
  handlers: Map<string, () => void>;
  removed: string[];
}

function makeHarness(sources: StateSource[] = []): Harness {
  const publisher = new RecordingPublisher();
  const handlers = new Map<string, () => void>();
  const removed: string[] = [];
  const deps: MainDeps = {
    createPublisher: () => publisher,
    createProvider: () => new ScriptedProvider(),
    createStateSources: () => sources,
    runPollerLoop: vi.fn().mockResolvedValue('stopped'),
    onSignal: (event, handler) => {
      handlers.set(event, handler);
      return () => {
        removed.push(event);
      };
    },
  };
  return { deps, publisher, handlers, removed };
}

beforeEach(() => {
  vi.clearAllMocks();
});

// -----------------------------------------------------------------------------
// run
// -----------------------------------------------------------------------------

describe('run', () => {
  it('exits 1 on invalid configuration without connecting anything', async () => {
    const { deps, publisher } = makeHarness();

    const code = await run({}, deps);

    expect(code).toBe(1);
    expect(core.error).toHaveBeenCalledWith('PRESENCE_HOSTS is required');
    expect(core.error).toHaveBeenCalledWith('PRESENCE_SSH_KEY is required');
    expect(core.setFailed).toHaveBeenCalledWith('Invalid configuration');
    expect(publisher.initialize).not.toHaveBeenCalled();
  });

  it('seeds the store and runs the loop with the configured interval', async () => {
    const seeded: StateSource = {
      name: 'seed',
      forceSnapshot: true,
      readCurrentStates: async () => ({ 'ap-lobby/x': makeState({ clientId: mac(1) }) }),
    };
    const { deps, publisher } = makeHarness([seeded]);

    const code = await run(ENV, deps);

    expect(code).toBe(0);
    expect(publisher.initialize).toHaveBeenCalledTimes(1);
    expect(publisher.close).toHaveBeenCalledTimes(1);

    const [ctx, interval, signal] = vi.mocked(deps.runPollerLoop).mock.calls[0] ?? [];
    expect(interval).toBe(15);
    expect(signal?.aborted).toBe(false);
    expect(ctx?.hosts).toEqual(['10.0.0.1']);
    expect(ctx?.publisher).toBe(publisher);
    expect(ctx?.store.toJSON()).toEqual({ 'ap-lobby': [mac(1)] });
  });

  it('exits 1 when the loop asks for a restart', async () => {
    const { deps, publisher } = makeHarness();
    vi.mocked(deps.runPollerLoop).mockResolvedValue('restart');

    expect(await run(ENV, deps)).toBe(1);
    expect(publisher.close).toHaveBeenCalledTimes(1);
  });

  it('exits 1 when the publisher cannot start', async () => {
    const { deps, publisher } = makeHarness();
    publisher.initialize.mockRejectedValue(new Error('connect ECONNREFUSED'));

    expect(await run(ENV, deps)).toBe(1);
    expect(core.setFailed).toHaveBeenCalledWith(
      'Failed to initialize publisher: connect ECONNREFUSED',
    );
    expect(deps.runPollerLoop).not.toHaveBeenCalled();
  });

  it('aborts the loop on SIGTERM and removes its handlers afterwards', async () => {
    const { deps, handlers, removed } = makeHarness();
    let abortedBySignal = false;
    vi.mocked(deps.runPollerLoop).mockImplementation(async (_ctx, _interval, signal) => {
      handlers.get('SIGTERM')?.();
      abortedBySignal = signal.aborted;
      return 'stopped';
    });

    expect(await run(ENV, deps)).toBe(0);
    expect(abortedBySignal).toBe(true);
    expect([...handlers.keys()]).toEqual(['SIGINT', 'SIGTERM']);
    expect(removed).toEqual(['SIGINT', 'SIGTERM']);
  });

  it('masks secrets from the configuration', async () => {
    const { deps } = makeHarness();

    await run({ ...ENV, PRESENCE_MQTT_PASSWORD: 'test-secret' }, deps);

    expect(core.setSecret).toHaveBeenCalledWith('test-secret');
  });
});

// -----------------------------------------------------------------------------
// Wiring
// -----------------------------------------------------------------------------

describe('createPublisher', () => {
  it('builds the configured publisher', () => {
    expect(createPublisher(makeConfig({ publisher: 'console' }))).toBeInstanceOf(ConsolePublisher);
    expect(createPublisher(makeConfig({ publisher: 'mqtt' }))).toBeInstanceOf(MqttPublisher);
  });
});

describe('createStateSources', () => {
  const unifi = { baseUrl: 'https://unifi.local', apiKey: 'test-secret', pageSize: 100 };

  it('maps each initial-state mode to its sources', () => {
    expect(createStateSources(makeConfig({ initialState: 'none' }))[0]).toBeInstanceOf(NullStateSource);
    expect(createStateSources(makeConfig({ initialState: 'mqtt' }))[0]).toBeInstanceOf(MqttStateSource);
    expect(createStateSources(makeConfig({ initialState: 'unifi', unifi }))[0]).toBeInstanceOf(
      UnifiStateSource,
    );
  });

  it('combines UniFi and MQTT with UniFi first', () => {
    const sources = createStateSources(makeConfig({ initialState: 'all', unifi }));
    expect(sources.map((s) => s.name)).toEqual(['combined (UniFi API + MQTT retained messages)']);
  });

  it('refuses UniFi without its settings', () => {
    expect(() => createStateSources(makeConfig({ initialState: 'unifi' }))).toThrow(
      'UniFi state source selected without UniFi configuration',
    );
  });
});
