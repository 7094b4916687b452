/**
 * Configuration
 * Read once at startup from a YAML file (snake_case keys), with deployment
 * values and secrets taken from the environment (.env via dotenv).
 */

import { readFileSync } from "fs";
import { parse } from "yaml";
import { DEFAULT_MQTT_CONFIG, DEFAULT_TOPICS, MqttConfig, TopicMap } from "./bus/types";
import { ConfigError } from "./errors";
import { DEFAULT_SESSION_CONFIG, SessionConfig } from "./session/types";
import {
  AudioConfig,
  DEFAULT_AUDIO_CONFIG,
  DEFAULT_TRANSCRIPTION_CONFIG,
  DEFAULT_WAKE_WORD_CONFIG,
  TranscriptionConfig,
  WakeWordConfig,
} from "./wake/types";

export type AppConfig = {
  mqtt: MqttConfig;
  topics: TopicMap;
  audio: AudioConfig;
  wakeWord: WakeWordConfig;
  session: SessionConfig;
  transcription: TranscriptionConfig;
  secrets: {
    picovoiceAccessKey?: string;
    googleSpeechApiKey?: string;
  };
};

export const DEFAULT_CONFIG_PATH = "config/assistant.yaml";

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Section, name: string): Section {
  const value = raw[name];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(name, "expected a mapping");
  }
  return value;
}

type NumberRule = {
  min?: number;
  max?: number;
  integer?: boolean;
  // Zero is rejected unless allowed
  positive?: boolean;
};

function readNumber(values: Section, prefix: string, key: string, fallback: number, rule: NumberRule = {}): number {
  const value = values[key];
  if (value === undefined || value === null) {
    return fallback;
  }

  const name = `${prefix}.${key}`;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(name, `expected a number, got ${JSON.stringify(value)}`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ConfigError(name, "expected an integer");
  }
  if (rule.positive && value <= 0) {
    throw new ConfigError(name, "must be greater than 0");
  }
  if (rule.min !== undefined && value < rule.min) {
    throw new ConfigError(name, `must be at least ${rule.min}`);
  }
  if (rule.max !== undefined && value > rule.max) {
    throw new ConfigError(name, `must be at most ${rule.max}`);
  }
  return value;
}

function readString(values: Section, prefix: string, key: string, fallback: string): string {
  const value = values[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigError(`${prefix}.${key}`, "expected a non-empty string");
  }
  return value;
}

function readBoolean(values: Section, prefix: string, key: string, fallback: boolean): boolean {
  const value = values[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${prefix}.${key}`, "expected true or false");
  }
  return value;
}

function readStringList(values: Section, prefix: string, key: string, fallback: string[], allowEmpty: boolean): string[] {
  const value = values[key];
  if (value === undefined || value === null) {
    return [...fallback];
  }

  const name = `${prefix}.${key}`;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(name, "expected a list of strings");
  }
  if (!allowEmpty && value.length === 0) {
    throw new ConfigError(name, "must not be empty");
  }
  return value;
}

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the app config from parsed YAML and the environment
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError("(root)", "expected a mapping");
  }

  const mqtt = section(raw, "mqtt");
  const topics = section(raw, "topics");
  const audio = section(raw, "audio");
  const wake = section(raw, "wake_word");
  const session = section(raw, "session");
  const transcription = section(raw, "transcription");

  const device = audio.device === null ? null : readString(audio, "audio", "device", DEFAULT_AUDIO_CONFIG.device ?? "");

  const config: AppConfig = {
    mqtt: {
      url: envValue(env, "MQTT_URL") ?? readString(mqtt, "mqtt", "url", DEFAULT_MQTT_CONFIG.url),
      clientId: readString(mqtt, "mqtt", "client_id", DEFAULT_MQTT_CONFIG.clientId),
      reconnectBaseDelay: readNumber(mqtt, "mqtt", "reconnect_base_delay", DEFAULT_MQTT_CONFIG.reconnectBaseDelay, { positive: true }),
      reconnectMaxDelay: readNumber(mqtt, "mqtt", "reconnect_max_delay", DEFAULT_MQTT_CONFIG.reconnectMaxDelay, { positive: true }),
    },
    topics: {
      wakeDetected: readString(topics, "topics", "wake_detected", DEFAULT_TOPICS.wakeDetected),
      state: readString(topics, "topics", "state", DEFAULT_TOPICS.state),
      command: readString(topics, "topics", "command", DEFAULT_TOPICS.command),
      transcription: readString(topics, "topics", "transcription", DEFAULT_TOPICS.transcription),
      noSpeech: readString(topics, "topics", "no_speech", DEFAULT_TOPICS.noSpeech),
      llmRequest: readString(topics, "topics", "llm_request", DEFAULT_TOPICS.llmRequest),
      llmResponse: readString(topics, "topics", "llm_response", DEFAULT_TOPICS.llmResponse),
      speaking: readString(topics, "topics", "speaking", DEFAULT_TOPICS.speaking),
      emotion: readString(topics, "topics", "emotion", DEFAULT_TOPICS.emotion),
    },
    audio: {
      sampleRate: readNumber(audio, "audio", "sample_rate", DEFAULT_AUDIO_CONFIG.sampleRate, { positive: true, integer: true }),
      frameSamples: readNumber(audio, "audio", "frame_samples", DEFAULT_AUDIO_CONFIG.frameSamples, { positive: true, integer: true }),
      device: envValue(env, "MIC_DEVICE") ?? (device || null),
      recordProgram: readString(audio, "audio", "record_program", DEFAULT_AUDIO_CONFIG.recordProgram),
      minDetectionVolume: readNumber(audio, "audio", "min_detection_volume", DEFAULT_AUDIO_CONFIG.minDetectionVolume, { min: 0 }),
      silenceThreshold: readNumber(audio, "audio", "silence_threshold", DEFAULT_AUDIO_CONFIG.silenceThreshold, { min: 0 }),
      silenceDuration: readNumber(audio, "audio", "silence_duration", DEFAULT_AUDIO_CONFIG.silenceDuration, { positive: true }),
      maxRecordingDuration: readNumber(audio, "audio", "max_recording_duration", DEFAULT_AUDIO_CONFIG.maxRecordingDuration, { positive: true }),
      captureMaxRetries: readNumber(audio, "audio", "capture_max_retries", DEFAULT_AUDIO_CONFIG.captureMaxRetries, { min: 0, integer: true }),
      captureRetryDelay: readNumber(audio, "audio", "capture_retry_delay", DEFAULT_AUDIO_CONFIG.captureRetryDelay, { positive: true }),
    },
    wakeWord: {
      keyword: readString(wake, "wake_word", "keyword", DEFAULT_WAKE_WORD_CONFIG.keyword),
      sensitivity: readNumber(wake, "wake_word", "sensitivity", DEFAULT_WAKE_WORD_CONFIG.sensitivity, { min: 0, max: 1 }),
      threshold: readNumber(wake, "wake_word", "threshold", DEFAULT_WAKE_WORD_CONFIG.threshold, { min: 0, max: 1 }),
      detectionRateLimit: readNumber(wake, "wake_word", "detection_rate_limit", DEFAULT_WAKE_WORD_CONFIG.detectionRateLimit, { min: 0 }),
      cooldownDuration: readNumber(wake, "wake_word", "cooldown_duration", DEFAULT_WAKE_WORD_CONFIG.cooldownDuration, { min: 0 }),
      windowFrames: readNumber(wake, "wake_word", "window_frames", DEFAULT_WAKE_WORD_CONFIG.windowFrames, { positive: true, integer: true }),
    },
    session: {
      idleTimeout: readNumber(session, "session", "idle_timeout", DEFAULT_SESSION_CONFIG.idleTimeout, { positive: true }),
      responseTimeout: readNumber(session, "session", "response_timeout", DEFAULT_SESSION_CONFIG.responseTimeout, { positive: true }),
      immediateSpeaking: readBoolean(session, "session", "immediate_speaking", DEFAULT_SESSION_CONFIG.immediateSpeaking),
      goodbyePhrases: readStringList(session, "session", "goodbye_phrases", DEFAULT_SESSION_CONFIG.goodbyePhrases, false),
    },
    transcription: {
      languageCode: readString(transcription, "transcription", "language_code", DEFAULT_TRANSCRIPTION_CONFIG.languageCode),
      sampleRate: readNumber(transcription, "transcription", "sample_rate", DEFAULT_TRANSCRIPTION_CONFIG.sampleRate, { positive: true, integer: true }),
      denylist: readStringList(transcription, "transcription", "denylist", DEFAULT_TRANSCRIPTION_CONFIG.denylist, true),
    },
    secrets: {
      picovoiceAccessKey: envValue(env, "PICOVOICE_ACCESS_KEY"),
      googleSpeechApiKey: envValue(env, "GOOGLE_SPEECH_API_KEY"),
    },
  };

  if (config.mqtt.reconnectMaxDelay < config.mqtt.reconnectBaseDelay) {
    throw new ConfigError("mqtt.reconnect_max_delay", "must not be smaller than mqtt.reconnect_base_delay");
  }
  if (config.audio.maxRecordingDuration < config.audio.silenceDuration) {
    throw new ConfigError("audio.max_recording_duration", "must not be shorter than audio.silence_duration");
  }
  if (config.session.idleTimeout <= config.audio.maxRecordingDuration) {
    throw new ConfigError("session.idle_timeout", "must be longer than audio.max_recording_duration");
  }

  return config;
}

export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): AppConfig {
  console.log(`[Config] Loading ${filePath}`);

  let text: string;
  try {
    text = readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError("(file)", `cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(parse(text), env);
}
