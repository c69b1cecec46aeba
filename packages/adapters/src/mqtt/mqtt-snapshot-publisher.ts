import { readFileSync } from 'node:fs';
import { connect } from 'mqtt';
import type { IClientOptions, IClientPublishOptions } from 'mqtt';
import type { QoS } from 'mqtt-packet';
import type { MessageBusSink, Snapshot } from '@telemetry-relay/domain';
import { serializeSnapshot } from '../serialization/snapshot-payload.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('mqtt');

/** The slice of `MqttClient` the publisher drives. */
export interface MqttTransport {
  readonly connected: boolean;
  publishAsync(topic: string, message: string, opts?: IClientPublishOptions): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

export interface MqttPublisherOptions {
  deviceId: string;
  topicPrefix: string;
  qos: QoS;
  retain: boolean;
  statusTopicSuffix: string;
  onlinePayload: string;
  offlinePayload: string;
}

export class MqttSnapshotPublisher implements MessageBusSink {
  readonly statusTopic: string;
  private closed = false;

  constructor(
    private readonly transport: MqttTransport,
    private readonly options: MqttPublisherOptions,
  ) {
    this.statusTopic = this.topicFor(options.statusTopicSuffix);
  }

  topicFor(subTopic: string): string {
    return `${this.options.topicPrefix}/${this.options.deviceId}/${subTopic}`;
  }

  isConnected(): boolean {
    return !this.closed && this.transport.connected;
  }

  async publish(snapshot: Snapshot, subTopic: string): Promise<boolean> {
    if (!this.isConnected()) {
      log.warn('not connected to broker, cannot publish');
      return false;
    }
    const topic = this.topicFor(subTopic);
    try {
      await this.transport.publishAsync(topic, serializeSnapshot(snapshot), {
        qos: this.options.qos,
        retain: this.options.retain,
      });
      log.info(`published snapshot to '${topic}'`);
      return true;
    } catch (err) {
      log.warn(`publish to '${topic}' failed: ${describeError(err)}`);
      return false;
    }
  }

  /** Retained online/offline marker on the status topic. */
  async publishStatus(online: boolean): Promise<void> {
    if (!this.transport.connected) return;
    await this.transport.publishAsync(
      this.statusTopic,
      online ? this.options.onlinePayload : this.options.offlinePayload,
      { qos: this.options.qos, retain: true },
    );
    log.info(`published ${online ? 'online' : 'offline'} status to '${this.statusTopic}'`);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    try {
      await this.publishStatus(false);
    } catch (err) {
      log.warn(`could not publish offline status: ${describeError(err)}`);
    }
    this.closed = true;
    await this.transport.endAsync();
    log.info('disconnected from broker');
  }
}

export interface MqttConnectConfig extends Omit<MqttPublisherOptions, 'deviceId'> {
  url: string;
  username?: string;
  password?: string;
  connectTimeoutSeconds: number;
  keepaliveSeconds: number;
  tls?: { caFile?: string; certFile?: string; keyFile?: string };
}

/**
 * Connects to the broker with a Last-Will of `offlinePayload` on the status topic
 * and publishes `onlinePayload` there on every (re)connect.
 */
export function createMqttSnapshotPublisher(config: MqttConnectConfig, deviceId: string): MqttSnapshotPublisher {
  const { url, username, password, connectTimeoutSeconds, keepaliveSeconds, tls, ...publisherOptions } = config;
  const options: MqttPublisherOptions = { ...publisherOptions, deviceId };
  const statusTopic = `${options.topicPrefix}/${deviceId}/${options.statusTopicSuffix}`;

  const clientOptions: IClientOptions = {
    clientId: `telemetry-relay-${deviceId}-${Math.floor(Date.now() / 1_000)}`,
    protocolVersion: 4,
    keepalive: keepaliveSeconds,
    connectTimeout: connectTimeoutSeconds * 1_000,
    will: {
      topic: statusTopic,
      payload: Buffer.from(options.offlinePayload),
      qos: options.qos,
      retain: true,
    },
  };
  if (username) {
    clientOptions.username = username;
    clientOptions.password = password;
  }
  if (tls?.caFile) clientOptions.ca = readFileSync(tls.caFile);
  if (tls?.certFile) clientOptions.cert = readFileSync(tls.certFile);
  if (tls?.keyFile) clientOptions.key = readFileSync(tls.keyFile);

  log.info(`connecting to ${url} as ${clientOptions.clientId}`);
  const client = connect(url, clientOptions);
  const publisher = new MqttSnapshotPublisher(client, options);

  client.on('connect', () => {
    log.info(`connected to ${url}`);
    publisher.publishStatus(true).catch((err) => {
      log.warn(`could not publish online status: ${describeError(err)}`);
    });
  });
  client.on('offline', () => log.warn('broker connection lost, client will retry'));
  client.on('error', (err) => log.error(`client error: ${err.message}`));

  return publisher;
}
