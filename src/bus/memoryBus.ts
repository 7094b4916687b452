/**
 * In-process message bus
 * Delivers synchronously and keeps retained messages like a broker would.
 */

import { MessageBus, MessageHandler, PublishOptions } from './types';

export type PublishedMessage = {
  topic: string;
  payload: string;
  retain: boolean;
};

export class MemoryBus implements MessageBus {
  private handlers = new Map<string, MessageHandler[]>();
  private retained = new Map<string, string>();
  private connectListeners: Array<() => void> = [];
  private closed = false;

  readonly published: PublishedMessage[] = [];

  publish(topic: string, payload: string, options: PublishOptions = {}): void {
    if (this.closed) {
      console.warn(`[MemoryBus] Dropping message on closed bus: ${topic}`);
      return;
    }

    const retain = options.retain ?? false;
    this.published.push({ topic, payload, retain });
    if (retain) {
      this.retained.set(topic, payload);
    }

    for (const handler of this.handlers.get(topic) ?? []) {
      this.deliver(handler, topic, payload);
    }
  }

  subscribe(topic: string, handler: MessageHandler): void {
    const list = this.handlers.get(topic) ?? [];
    list.push(handler);
    this.handlers.set(topic, list);

    const retainedPayload = this.retained.get(topic);
    if (retainedPayload !== undefined) {
      this.deliver(handler, topic, retainedPayload);
    }
  }

  onConnect(listener: () => void): void {
    this.connectListeners.push(listener);
  }

  /**
   * Replays the broker reconnect path for tests.
   */
  simulateReconnect(): void {
    for (const listener of this.connectListeners) {
      listener();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
  }

  messagesOn(topic: string): string[] {
    return this.published.filter((m) => m.topic === topic).map((m) => m.payload);
  }

  retainedValue(topic: string): string | undefined {
    return this.retained.get(topic);
  }

  private deliver(handler: MessageHandler, topic: string, payload: string): void {
    try {
      handler(payload, topic);
    } catch (error) {
      console.error(`[MemoryBus] Handler for ${topic} threw:`, error);
    }
  }
}
