/**
 * Message Bus Types
 * Topic-addressed publish/subscribe with plain UTF-8 string payloads.
 * Delivery is at-least-once and there is no ordering guarantee across topics.
 */

export type MessageHandler = (payload: string, topic: string) => void;

export type PublishOptions = {
  // Broker keeps the last value and hands it to late subscribers
  retain?: boolean;
};

export interface MessageBus {
  /**
   * Fire-and-forget. Never blocks the caller and never throws on
   * connectivity problems; a message published while offline is dropped.
   */
  publish(topic: string, payload: string, options?: PublishOptions): void;
  subscribe(topic: string, handler: MessageHandler): void;
  /**
   * Called after every (re)connect, so retained state can be republished.
   */
  onConnect(listener: () => void): void;
  close(): Promise<void>;
}

export type TopicMap = {
  wakeDetected: string;
  state: string;
  command: string;
  transcription: string;
  noSpeech: string;
  llmRequest: string;
  llmResponse: string;
  speaking: string;
  emotion: string;
};

export const DEFAULT_TOPICS: TopicMap = {
  wakeDetected: 'session/wake_detected',
  state: 'session/state',
  command: 'session/command',
  transcription: 'audio/transcription',
  noSpeech: 'audio/no_speech',
  llmRequest: 'llm/request',
  llmResponse: 'llm/response',
  speaking: 'robot/speaking',
  emotion: 'robot/emotion',
};

export type MqttConfig = {
  url: string;
  clientId: string;
  // Reconnect backoff (ms)
  reconnectBaseDelay: number;
  reconnectMaxDelay: number;
};

export const DEFAULT_MQTT_CONFIG: MqttConfig = {
  url: 'mqtt://localhost:1883',
  clientId: 'voice-session',
  reconnectBaseDelay: 1000,
  reconnectMaxDelay: 30000,
};

/**
 * Parse the "true"/"false" flag published by the speech synthesis service.
 */
export function parseFlag(payload: string): boolean | null {
  const normalized = payload.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return null;
}
