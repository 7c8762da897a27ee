/**
 * Main Entry
 * Layer: app
 *
 * Composition root: loads configuration, builds the provider, publisher
 * and state sources, seeds the store and runs the poll loop until it stops
 * or asks for a restart.
 *
 * Required ports:
 *   - config.load
 *   - reconciler.seed
 *   - poller.loop
 *
 * Exit codes:
 *   0  stopped by a signal
 *   1  configuration error, publisher failed to start, or restart requested
 */

import * as core from '@actions/core';
import type { ClientInfoProvider, Config, Publisher, StateSource } from './types';
import { loadConfig } from './config';
import { reconcileSources } from './reconciler';
import { createBusConnector } from './mqtt-bus';
import { createUnifiApi } from './unifi';
import { SshClientProvider } from './providers/ssh';
import { ConsolePublisher } from './publishers/console';
import { MqttPublisher } from './publishers/mqtt';
import { CombinedStateSource } from './sources/combined';
import { MqttStateSource } from './sources/mqtt';
import { NullStateSource } from './sources/null';
import { UnifiStateSource } from './sources/unifi';
import { createShutdownHandler, runPollerLoop } from './poller/loop';
import type { LoopExit } from './poller/loop';
import { errorMessage } from './utils';

// -----------------------------------------------------------------------------
// Wiring
// -----------------------------------------------------------------------------

export function createPublisher(config: Config): Publisher {
  if (config.publisher === 'console') {
    return new ConsolePublisher();
  }
  return new MqttPublisher(config.mqtt, config.aggregate, createBusConnector(config.mqtt));
}

export function createProvider(config: Config): ClientInfoProvider {
  return new SshClientProvider(config.ssh, config.maxIdleSeconds);
}

function createUnifiSource(config: Config): StateSource {
  if (!config.unifi) {
    throw new Error('UniFi state source selected without UniFi configuration');
  }
  return new UnifiStateSource(createUnifiApi(config.unifi), config.aggregate);
}

/**
 * Sources the reconciler reads, primary first.
 */
export function createStateSources(config: Config): StateSource[] {
  switch (config.initialState) {
    case 'none':
      return [new NullStateSource()];
    case 'mqtt':
      return [new MqttStateSource(config.mqtt, config.aggregate, createBusConnector(config.mqtt))];
    case 'unifi':
      return [createUnifiSource(config)];
    case 'all':
      return [
        new CombinedStateSource([
          createUnifiSource(config),
          new MqttStateSource(config.mqtt, config.aggregate, createBusConnector(config.mqtt)),
        ]),
      ];
  }
}

/**
 * Dependency injection interface for run().
 * Production defaults are used when not provided by tests.
 */
export interface MainDeps {
  createPublisher: (config: Config) => Publisher;
  createProvider: (config: Config) => ClientInfoProvider;
  createStateSources: (config: Config) => StateSource[];
  runPollerLoop: typeof runPollerLoop;
  /** Registers a process signal handler; returns its removal */
  onSignal: (event: NodeJS.Signals, handler: () => void) => () => void;
}

const defaultDeps: MainDeps = {
  createPublisher,
  createProvider,
  createStateSources,
  runPollerLoop,
  onSignal: (event, handler) => {
    process.on(event, handler);
    return () => {
      process.off(event, handler);
    };
  },
};

function exitCodeFor(exit: LoopExit): number {
  return exit === 'restart' ? 1 : 0;
}

// -----------------------------------------------------------------------------
// Entry point
// -----------------------------------------------------------------------------

export async function run(
  env: Record<string, string | undefined> = process.env,
  deps: MainDeps = defaultDeps,
): Promise<number> {
  const loaded = loadConfig(env);
  if (!loaded.success) {
    for (const error of loaded.errors) {
      core.error(error);
    }
    core.setFailed('Invalid configuration');
    return 1;
  }
  const config = loaded.config;
  if (config.mqtt.password) {
    core.setSecret(config.mqtt.password);
  }
  if (config.unifi) {
    core.setSecret(config.unifi.apiKey);
  }

  core.info(
    `Starting presence monitor for ${config.hosts.length} hosts ` +
      `(${config.aggregate ? 'aggregated' : 'per-AP'} mode, every ${config.intervalSeconds}s)`,
  );

  const publisher = deps.createPublisher(config);
  try {
    await publisher.initialize();
  } catch (err) {
    core.setFailed(`Failed to initialize publisher: ${errorMessage(err)}`);
    return 1;
  }

  const controller = new AbortController();
  const removeHandlers = (['SIGINT', 'SIGTERM'] as const).map((event) =>
    deps.onSignal(event, createShutdownHandler(controller, event)),
  );

  try {
    const { store } = await reconcileSources(deps.createStateSources(config), config.aggregate);
    const exit = await deps.runPollerLoop(
      {
        hosts: config.hosts,
        aggregate: config.aggregate,
        identityMode: config.identityMode,
        provider: deps.createProvider(config),
        publisher,
        store,
      },
      config.intervalSeconds,
      controller.signal,
    );
    return exitCodeFor(exit);
  } finally {
    for (const remove of removeHandlers) {
      remove();
    }
    try {
      await publisher.close();
    } catch (err) {
      core.warning(`Failed to close publisher: ${errorMessage(err)}`);
    }
  }
}
