import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { loadConfig, parseConfig } from "./config";
import { ConfigError } from "./errors";
import { DEFAULT_TOPICS } from "./bus/types";
import { DEFAULT_SESSION_CONFIG } from "./session/types";
import { DEFAULT_AUDIO_CONFIG, DEFAULT_TRANSCRIPTION_CONFIG, DEFAULT_WAKE_WORD_CONFIG } from "./wake/types";

const CONFIG_FILE = path.join(__dirname, "..", "config", "assistant.yaml");

test("an empty document yields the defaults", () => {
  const config = parseConfig(null);
  assert.deepEqual(config.audio, DEFAULT_AUDIO_CONFIG);
  assert.deepEqual(config.wakeWord, DEFAULT_WAKE_WORD_CONFIG);
  assert.deepEqual(config.session, DEFAULT_SESSION_CONFIG);
  assert.deepEqual(config.transcription, DEFAULT_TRANSCRIPTION_CONFIG);
  assert.deepEqual(config.topics, DEFAULT_TOPICS);
  assert.deepEqual(config.secrets, { picovoiceAccessKey: undefined, googleSpeechApiKey: undefined });
});

test("the shipped config file matches the defaults", () => {
  const config = loadConfig(CONFIG_FILE, {});
  assert.deepEqual(config, parseConfig({}));
});

test("snake_case keys map onto the config", () => {
  const config = parseConfig({
    audio: { min_detection_volume: 350, device: "hw:1,0" },
    wake_word: { threshold: 0.7, cooldown_duration: 5 },
    session: { immediate_speaking: false },
    topics: { no_speech: "custom/no_speech" },
  });

  assert.equal(config.audio.minDetectionVolume, 350);
  assert.equal(config.audio.device, "hw:1,0");
  assert.equal(config.wakeWord.threshold, 0.7);
  assert.equal(config.wakeWord.cooldownDuration, 5);
  assert.equal(config.session.immediateSpeaking, false);
  assert.equal(config.topics.noSpeech, "custom/no_speech");
  assert.equal(config.topics.state, "session/state");
});

test("environment values override the file", () => {
  const config = parseConfig(
    { mqtt: { url: "mqtt://file:1883" } },
    {
      MQTT_URL: "mqtt://broker:1883",
      MIC_DEVICE: "plughw:2",
      PICOVOICE_ACCESS_KEY: "test-secret",
      GOOGLE_SPEECH_API_KEY: "  ",
    }
  );

  assert.equal(config.mqtt.url, "mqtt://broker:1883");
  assert.equal(config.audio.device, "plughw:2");
  assert.equal(config.secrets.picovoiceAccessKey, "test-secret");
  assert.equal(config.secrets.googleSpeechApiKey, undefined);
});

test("an empty denylist is allowed", () => {
  const config = parseConfig({ transcription: { denylist: [] } });
  assert.deepEqual(config.transcription.denylist, []);
});

function rejects(raw: unknown, key: string): void {
  assert.throws(
    () => parseConfig(raw),
    (error: unknown) => error instanceof ConfigError && error.details?.key === key
  );
}

test("out-of-range values are rejected with their key", () => {
  rejects({ wake_word: { threshold: 1.5 } }, "wake_word.threshold");
  rejects({ audio: { sample_rate: 0 } }, "audio.sample_rate");
  rejects({ audio: { frame_samples: 20.5 } }, "audio.frame_samples");
  rejects({ session: { idle_timeout: -1 } }, "session.idle_timeout");
});

test("values of the wrong type are rejected", () => {
  rejects({ audio: { silence_duration: "long" } }, "audio.silence_duration");
  rejects({ session: { immediate_speaking: "yes" } }, "session.immediate_speaking");
  rejects({ session: { goodbye_phrases: ["bye", 3] } }, "session.goodbye_phrases");
  rejects({ mqtt: { url: "" } }, "mqtt.url");
  rejects({ audio: [] }, "audio");
  rejects("not a mapping", "(root)");
});

test("the idle timeout must outlast a full recording", () => {
  rejects({ session: { idle_timeout: 30 } }, "session.idle_timeout");
  rejects({ session: { idle_timeout: 10 }, audio: { max_recording_duration: 20 } }, "session.idle_timeout");

  const config = parseConfig({ session: { idle_timeout: 21 }, audio: { max_recording_duration: 20 } });
  assert.equal(config.session.idleTimeout, 21);
});

test("goodbye phrases must not be empty", () => {
  rejects({ session: { goodbye_phrases: [] } }, "session.goodbye_phrases");
});

test("inconsistent durations are rejected", () => {
  rejects({ audio: { silence_duration: 10, max_recording_duration: 5 } }, "audio.max_recording_duration");
  rejects({ mqtt: { reconnect_base_delay: 5000, reconnect_max_delay: 1000 } }, "mqtt.reconnect_max_delay");
});

test("a missing config file is a config error", () => {
  assert.throws(() => loadConfig(path.join(__dirname, "missing.yaml"), {}), ConfigError);
});
