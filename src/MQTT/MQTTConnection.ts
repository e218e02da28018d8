import { errorMessage, logDebug, logError, logInfo, logWarn } from '@utils/logger';
import EventEmitter from 'events';
import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { ITransportClient, QoS, SessionConfig, TransportEvent, TransportEventListener } from './ITransportClient';

type PublishedPacket = Awaited<ReturnType<MqttClient['publishAsync']>>;

const messageIdOf = (packet: PublishedPacket): number =>
  packet !== undefined && 'messageId' in packet && typeof packet.messageId === 'number' ? packet.messageId : 0;

// SUBACK return code for a refused subscription.
const SUBACK_FAILURE = 128;

export const buildClientOptions = (config: SessionConfig): IClientOptions => {
  const options: IClientOptions = {
    clientId: config.clientId,
    clean: true,
    keepalive: config.keepaliveSec,
    // 0 disables mqtt.js' own reconnect loop.
    reconnectPeriod: config.autoReconnect ? config.reconnectPeriodMs : 0,
    connectTimeout: config.connectTimeoutMs,
    manualConnect: true,
    will: {
      topic: config.lastWill.topic,
      payload: Buffer.from(config.lastWill.payload),
      qos: config.lastWill.qos,
      retain: config.lastWill.retain,
    },
  };

  if (config.username) options.username = config.username;
  if (config.password) options.password = config.password;

  return options;
};

/**
 * `ITransportClient` on top of an mqtt.js client.
 *
 * mqtt.js owns socket handling and the reconnect schedule; this class only turns its callbacks
 * into `TransportEvent`s.
 */
export class MQTTConnection extends EventEmitter implements ITransportClient {
  private everConnected = false;
  private closing = false;

  constructor(
    private readonly client: MqttClient,
    private readonly autoReconnect: boolean
  ) {
    super();

    client.on('connect', () => {
      logInfo('[MQTT] Connected');
      this.everConnected = true;
      this.emitEvent({ kind: 'connected' });
    });

    client.on('reconnect', () => {
      logInfo('[MQTT] Reconnecting...');
    });

    client.on('offline', () => logWarn('[MQTT] Client went offline'));

    client.on('close', () => {
      if (this.closing) return;
      this.emitEvent({ kind: 'disconnected' });
      // Without auto-reconnect a failed first attempt would otherwise never report back.
      if (!this.autoReconnect && !this.everConnected) {
        this.emitEvent({ kind: 'error', errorKind: 'connection-closed', detail: 'Connection closed before CONNACK' });
      }
    });

    client.on('error', (error) => {
      logError(`[MQTT] Error: ${error.message}`);
      const errorKind = 'code' in error && typeof error.code === 'number' ? 'protocol' : 'transport';
      this.emitEvent({ kind: 'error', errorKind, detail: error.message });
    });

    client.on('message', (topic, payload) => {
      this.emitEvent({ kind: 'message', topic, payload });
    });
    this.setMaxListeners(0);
  }

  connect(): void {
    logInfo('[MQTT] Connecting...');
    this.client.connect();
  }

  /**
   * Stop the underlying client so it can't linger, reconnect and fire events later.
   *
   * A clean DISCONNECT means the broker does not publish the last will.
   */
  async disconnect(): Promise<void> {
    this.closing = true;
    try {
      // Force-close when there is no live connection to flush.
      await this.client.endAsync(!this.client.connected);
    } finally {
      this.client.removeAllListeners();
      // A late socket error must not become an unhandled 'error' event.
      this.client.on('error', (error) => logDebug(`[MQTT] Error after disconnect: ${error.message}`));
      this.removeAllListeners();
    }
  }

  async publish(topic: string, payload: Buffer, qos: QoS, retain: boolean): Promise<number> {
    const packet = await this.client.publishAsync(topic, payload, { qos, retain });
    const messageId = messageIdOf(packet);
    this.emitEvent({ kind: 'published', topic, messageId });
    return messageId;
  }

  async subscribe(topic: string, qos: QoS): Promise<void> {
    const grants = await this.client.subscribeAsync(topic, { qos });
    if (grants.some((grant) => grant.qos === SUBACK_FAILURE)) {
      throw new Error(`Broker refused subscription to ${topic}`);
    }
    this.emitEvent({ kind: 'subscribed', topic, qos });
  }

  async unsubscribe(topic: string): Promise<void> {
    await this.client.unsubscribeAsync(topic);
    this.emitEvent({ kind: 'unsubscribed', topic });
  }

  onEvent(listener: TransportEventListener): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }

  private emitEvent(event: TransportEvent) {
    try {
      this.emit('event', event);
    } catch (error) {
      logError(`[MQTT] Listener failed for ${event.kind} event: ${errorMessage(error)}`);
    }
  }
}

export const createMqttTransport = (config: SessionConfig): ITransportClient =>
  new MQTTConnection(mqtt.connect(config.brokerUrl, buildClientOptions(config)), config.autoReconnect);
