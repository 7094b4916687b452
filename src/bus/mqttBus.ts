/**
 * MQTT Message Bus
 * QoS 1 publish/subscribe over an MQTT broker with exponential reconnect backoff.
 * Nothing is queued while offline: phase is retained and republished on reconnect.
 */

import { EventEmitter } from 'events';
import { connect, MqttClient } from 'mqtt';
import { DEFAULT_MQTT_CONFIG, MessageBus, MessageHandler, MqttConfig, PublishOptions } from './types';

export function reconnectDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxDelay, baseDelay * 2 ** exponent);
}

export class MqttBus extends EventEmitter implements MessageBus {
  private config: MqttConfig;
  private client: MqttClient | null = null;
  private handlers = new Map<string, MessageHandler[]>();
  private reconnectAttempts = 0;
  private droppedWhileOffline = 0;

  constructor(config: Partial<MqttConfig> = {}) {
    super();
    this.config = { ...DEFAULT_MQTT_CONFIG, ...config };
  }

  /**
   * Resolves once the first connection is up. Connection failures are
   * retried by the client with backoff; they never reject.
   */
  connect(): Promise<void> {
    if (this.client) {
      return Promise.resolve();
    }

    console.log(`[MqttBus] Connecting to ${this.config.url} as ${this.config.clientId}...`);

    const client = connect(this.config.url, {
      clientId: this.config.clientId,
      reconnectPeriod: this.config.reconnectBaseDelay,
      queueQoSZero: false,
      clean: true,
    });
    this.client = client;

    client.on('message', (topic: string, message: Buffer) => {
      this.dispatch(topic, message.toString('utf8'));
    });

    client.on('error', (error: Error) => {
      console.error('[MqttBus] Client error:', error.message);
    });

    client.on('close', () => {
      this.reconnectAttempts++;
      const delay = reconnectDelay(
        this.reconnectAttempts,
        this.config.reconnectBaseDelay,
        this.config.reconnectMaxDelay
      );
      client.options.reconnectPeriod = delay;
      console.warn(`[MqttBus] Connection closed, retrying in ${delay}ms (attempt ${this.reconnectAttempts})`);
    });

    return new Promise((resolve) => {
      client.on('connect', () => {
        console.log('[MqttBus] ✓ Connected');
        if (this.droppedWhileOffline > 0) {
          console.warn(`[MqttBus] ${this.droppedWhileOffline} messages were dropped while offline`);
          this.droppedWhileOffline = 0;
        }
        this.reconnectAttempts = 0;
        client.options.reconnectPeriod = this.config.reconnectBaseDelay;

        for (const topic of this.handlers.keys()) {
          this.subscribeOnBroker(client, topic);
        }

        this.emit('connected');
        resolve();
      });
    });
  }

  publish(topic: string, payload: string, options: PublishOptions = {}): void {
    const client = this.client;
    if (!client || !client.connected) {
      this.droppedWhileOffline++;
      return;
    }

    client.publish(topic, payload, { qos: 1, retain: options.retain ?? false }, (error) => {
      if (error) {
        console.error(`[MqttBus] Publish to ${topic} failed:`, error.message);
      }
    });
  }

  subscribe(topic: string, handler: MessageHandler): void {
    const list = this.handlers.get(topic);
    if (list) {
      list.push(handler);
      return;
    }

    this.handlers.set(topic, [handler]);
    if (this.client && this.client.connected) {
      this.subscribeOnBroker(this.client, topic);
    }
  }

  onConnect(listener: () => void): void {
    this.on('connected', listener);
  }

  async close(): Promise<void> {
    if (!this.client) {
      return;
    }

    console.log('[MqttBus] Closing connection...');
    const client = this.client;
    this.client = null;
    client.removeAllListeners();
    await client.endAsync();
    this.removeAllListeners();
    console.log('[MqttBus] Closed');
  }

  private subscribeOnBroker(client: MqttClient, topic: string): void {
    client.subscribe(topic, { qos: 1 }, (error) => {
      if (error) {
        console.error(`[MqttBus] Subscribe to ${topic} failed:`, error.message);
      }
    });
  }

  private dispatch(topic: string, payload: string): void {
    for (const handler of this.handlers.get(topic) ?? []) {
      try {
        handler(payload, topic);
      } catch (error) {
        console.error(`[MqttBus] Handler for ${topic} threw:`, error);
      }
    }
  }
}
