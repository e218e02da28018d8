import mqtt from 'mqtt';
import { describe, expect, it } from 'vitest';
import { testSessionConfig } from '../../__tests__/helpers/fakeTransport';
import type { TransportEvent } from '../ITransportClient';
import { MQTTConnection, buildClientOptions } from '../MQTTConnection';

describe('buildClientOptions', () => {
  it('maps the session config onto mqtt.js options', () => {
    const options = buildClientOptions(
      testSessionConfig({ clientId: 'garden-01', username: 'device', password: 'test-secret' })
    );

    expect(options).toEqual({
      clientId: 'garden-01',
      clean: true,
      keepalive: 60,
      reconnectPeriod: 5000,
      connectTimeout: 1000,
      manualConnect: true,
      username: 'device',
      password: 'test-secret',
      will: {
        topic: 'demo/central/status',
        payload: Buffer.from('OFFLINE'),
        qos: 1,
        retain: true,
      },
    });
  });

  it('turns off the client reconnect loop when auto-reconnect is disabled', () => {
    const options = buildClientOptions(testSessionConfig({ autoReconnect: false }));

    expect(options.reconnectPeriod).toBe(0);
    expect(options).not.toHaveProperty('username');
  });
});

describe('MQTTConnection', () => {
  // The client itself never reconnects here, so emitting `close` opens no socket.
  const createClient = () => {
    const config = testSessionConfig({ autoReconnect: false });
    return mqtt.connect(config.brokerUrl, buildClientOptions(config));
  };

  const setup = (autoReconnect: boolean) => {
    const client = createClient();
    const connection = new MQTTConnection(client, autoReconnect);
    const events: TransportEvent[] = [];
    connection.onEvent((event) => events.push(event));
    return { client, connection, events };
  };

  it('reports a closed socket as disconnected', () => {
    const { client, events } = setup(true);

    client.emit('close');

    expect(events).toEqual([{ kind: 'disconnected' }]);
  });

  it('reports a first attempt that closes without auto-reconnect as an error', () => {
    const { client, events } = setup(false);

    client.emit('close');

    expect(events).toEqual([
      { kind: 'disconnected' },
      { kind: 'error', errorKind: 'connection-closed', detail: 'Connection closed before CONNACK' },
    ]);
  });

  it('classifies client errors', () => {
    const { client, events } = setup(true);

    client.emit('error', new Error('connect ECONNREFUSED 127.0.0.1:1883'));

    expect(events).toEqual([
      { kind: 'error', errorKind: 'transport', detail: 'connect ECONNREFUSED 127.0.0.1:1883' },
    ]);
  });

  it('forwards inbound messages', () => {
    const { client, events } = setup(true);
    const payload = Buffer.from('LIGAR');

    client.emit('message', 'demo/central/commands/pump', payload, {
      cmd: 'publish',
      topic: 'demo/central/commands/pump',
      payload,
      qos: 1,
      dup: false,
      retain: false,
    });

    expect(events).toEqual([{ kind: 'message', topic: 'demo/central/commands/pump', payload }]);
  });

  it('stops forwarding once the listener is removed', () => {
    const client = createClient();
    const connection = new MQTTConnection(client, true);
    const events: TransportEvent[] = [];
    const remove = connection.onEvent((event) => events.push(event));

    remove();
    client.emit('close');

    expect(events).toEqual([]);
  });
});
