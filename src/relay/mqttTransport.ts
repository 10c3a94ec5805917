import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import logger, { type LogSink } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { matchesTopic } from './topics.js';
import type { MessageHandler, PubSubTransport, Unsubscribe } from './transport.js';

export type BrokerConfig = {
  url: string;
  clientId: string;
  username?: string;
  password?: string;
  connectTimeoutMs: number;
  reconnectPeriodMs: number;
};

type Subscription = {
  filter: string;
  handler: MessageHandler;
};

export type MqttConnectFn = (url: string, options: IClientOptions) => MqttClient;

export class MqttTransport implements PubSubTransport {
  private readonly client: MqttClient;
  private readonly subscriptions = new Set<Subscription>();
  private readonly log: LogSink;
  private closed = false;

  constructor(broker: BrokerConfig, options: { log?: LogSink; connect?: MqttConnectFn } = {}) {
    this.log = options.log ?? logger.child({ component: 'mqtt', clientId: broker.clientId });
    const connectFn = options.connect ?? connect;
    this.client = connectFn(broker.url, {
      clientId: broker.clientId,
      username: broker.username,
      password: broker.password,
      connectTimeout: broker.connectTimeoutMs,
      reconnectPeriod: broker.reconnectPeriodMs,
      clean: true
    });

    this.client.on('connect', () => {
      this.log.info({ url: broker.url }, 'Connected to broker');
    });
    this.client.on('reconnect', () => {
      this.log.debug({ url: broker.url }, 'Reconnecting to broker');
    });
    this.client.on('offline', () => {
      this.log.warn({ url: broker.url }, 'Broker connection offline');
    });
    this.client.on('error', error => {
      this.log.warn({ err: error, url: broker.url }, 'Broker connection error');
    });
    this.client.on('message', (topic, payload) => {
      this.dispatch(topic, payload);
    });
  }

  isConnected() {
    return this.client.connected;
  }

  async publish(topic: string, payload: string) {
    if (this.closed) {
      throw new Error('transport closed');
    }
    await this.client.publishAsync(topic, payload, { qos: 1 });
  }

  async subscribe(topicFilter: string, handler: MessageHandler): Promise<Unsubscribe> {
    const subscription: Subscription = { filter: topicFilter, handler };
    this.subscriptions.add(subscription);
    // mqtt.js replays subscriptions after a reconnect since `resubscribe` defaults on.
    await this.client.subscribeAsync(topicFilter, { qos: 1 });
    return async () => {
      this.subscriptions.delete(subscription);
      const stillUsed = Array.from(this.subscriptions).some(entry => entry.filter === topicFilter);
      if (!stillUsed && !this.closed) {
        await this.client.unsubscribeAsync(topicFilter);
      }
    };
  }

  async close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.subscriptions.clear();
    await withTimeout(this.client.endAsync(), 2000, 'broker disconnect', () => {
      this.client.end(true);
    });
  }

  private dispatch(topic: string, payload: Buffer) {
    for (const subscription of this.subscriptions) {
      if (!matchesTopic(subscription.filter, topic)) {
        continue;
      }
      try {
        subscription.handler(topic, payload);
      } catch (error) {
        this.log.error({ err: error, topic }, 'Message handler failed');
      }
    }
  }
}

export default MqttTransport;
