import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as core from '@actions/core';
import { MqttPublisher, buildTopic } from '../../src/publishers/mqtt';
import { FakeBusClient, fakeConnector, makeMqttConfig } from '../helpers';

vi.mock('@actions/core');

beforeEach(() => {
  vi.clearAllMocks();
});

describe('buildTopic', () => {
  it('includes the AP in per-AP mode', () => {
    expect(buildTopic('presence', 'ap-lobby', 'AA:BB:CC:00:00:01', false)).toBe(
      'presence/ap-lobby/AA:BB:CC:00:00:01',
    );
  });

  it('omits the key in aggregated mode', () => {
    expect(buildTopic('presence', 'all_aps', 'AA:BB:CC:00:00:01', true)).toBe(
      'presence/AA:BB:CC:00:00:01',
    );
  });
});

describe('MqttPublisher', () => {
  it('is not ready before initialize', () => {
    const publisher = new MqttPublisher(makeMqttConfig(), false, fakeConnector(new FakeBusClient()).connect);
    expect(publisher.isReady).toBe(false);
  });

  it('connects once with reconnects enabled', async () => {
    const { connect, options } = fakeConnector(new FakeBusClient());
    const publisher = new MqttPublisher(makeMqttConfig(), false, connect);

    await publisher.initialize();
    await publisher.initialize();

    expect(options).toEqual([{ reconnect: true }]);
    expect(publisher.isReady).toBe(true);
  });

  it('publishes connected then disconnected payloads', async () => {
    const bus = new FakeBusClient();
    const publisher = new MqttPublisher(
      makeMqttConfig({ retain: true }),
      false,
      fakeConnector(bus).connect,
    );
    await publisher.initialize();

    await publisher.publishClients('ap-lobby', ['AA:BB:CC:00:00:01'], ['AA:BB:CC:00:00:02']);

    expect(bus.publishes).toEqual([
      { topic: 'presence/ap-lobby/AA:BB:CC:00:00:01', payload: 'home', retain: true },
      { topic: 'presence/ap-lobby/AA:BB:CC:00:00:02', payload: 'not_home', retain: true },
    ]);
  });

  it('uses the configured prefix and payloads in aggregated mode', async () => {
    const bus = new FakeBusClient();
    const config = makeMqttConfig({
      topicPrefix: 'home/wifi',
      connectedPayload: 'present',
      disconnectedPayload: 'away',
    });
    const publisher = new MqttPublisher(config, true, fakeConnector(bus).connect);
    await publisher.initialize();

    await publisher.publishClients('all_aps', ['phone'], []);

    expect(bus.publishes).toEqual([{ topic: 'home/wifi/phone', payload: 'present', retain: false }]);
  });

  it('skips publishing while the connection is down', async () => {
    const bus = new FakeBusClient();
    const publisher = new MqttPublisher(makeMqttConfig(), false, fakeConnector(bus).connect);
    await publisher.initialize();
    bus.connected = false;

    await publisher.publishClients('ap-lobby', ['AA:BB:CC:00:00:01'], []);

    expect(bus.publishes).toEqual([]);
    expect(publisher.isReady).toBe(false);
    expect(core.info).toHaveBeenCalledWith('MQTT client not connected, skipping publish');
  });

  it('propagates publish errors', async () => {
    const bus = new FakeBusClient();
    vi.spyOn(bus, 'publish').mockRejectedValue(new Error('broker gone'));
    const publisher = new MqttPublisher(makeMqttConfig(), false, fakeConnector(bus).connect);
    await publisher.initialize();

    await expect(publisher.publishClients('ap-lobby', ['x'], [])).rejects.toThrow('broker gone');
  });

  it('ends the connection on close', async () => {
    const bus = new FakeBusClient();
    const publisher = new MqttPublisher(makeMqttConfig(), false, fakeConnector(bus).connect);
    await publisher.initialize();

    await publisher.close();

    expect(bus.ended).toBe(true);
    expect(publisher.isReady).toBe(false);
  });
});
