import { EventEmitter } from "node:events";
import { AudioConfig, AudioFrame, Transcriber, WakeWordConfig } from "./wake/types";
import { FrameSource } from "./wake/audioFrontEnd";
import { createAudioFrame } from "./wake/vad";
import { WakeWordScorer } from "./wake/wakeWordScorer";

export const TEST_AUDIO_CONFIG: AudioConfig = {
  sampleRate: 48000,
  frameSamples: 2000,
  device: null,
  recordProgram: "sox",
  minDetectionVolume: 350,
  silenceThreshold: 300,
  silenceDuration: 2.5,
  maxRecordingDuration: 30,
  captureMaxRetries: 2,
  captureRetryDelay: 1,
};

export const TEST_WAKE_WORD_CONFIG: WakeWordConfig = {
  keyword: "jarvis",
  sensitivity: 0.5,
  threshold: 0.6,
  detectionRateLimit: 2,
  cooldownDuration: 3,
  windowFrames: 3,
};

/**
 * A 2000-sample 48kHz frame whose samples all equal `level`, so volume === |level|
 */
export function makeFrame(level: number, timestamp = 0, samples = 2000, sampleRate = 48000): AudioFrame {
  return createAudioFrame(new Int16Array(samples).fill(level), sampleRate, timestamp);
}

export class FakeSource extends EventEmitter implements FrameSource {
  started = 0;
  stopped = 0;
  flushes = 0;

  start(): void {
    this.started++;
  }

  stop(): void {
    this.stopped++;
  }

  flush(): void {
    this.flushes++;
  }
}

export class FakeScorer implements WakeWordScorer {
  readonly sampleRate = 16000;
  calls = 0;
  resets = 0;
  released = 0;
  lastInputLength = 0;

  constructor(public value = 0) {}

  score(samples: Int16Array): number {
    this.calls++;
    this.lastInputLength = samples.length;
    return this.value;
  }

  reset(): void {
    this.resets++;
  }

  release(): void {
    this.released++;
  }
}

type Deferred = {
  resolve: (text: string) => void;
  reject: (error: Error) => void;
};

export class FakeTranscriber implements Transcriber {
  readonly sampleRate = 16000;
  inputs: Int16Array[] = [];
  // When set, transcribe() waits until the test settles it
  manual = false;
  private waiting: Deferred[] = [];

  constructor(public reply: string | Error = "") {}

  transcribe(samples: Int16Array): Promise<string> {
    this.inputs.push(samples);

    if (this.manual) {
      return new Promise((resolve, reject) => {
        this.waiting.push({ resolve, reject });
      });
    }

    const reply = this.reply;
    return reply instanceof Error ? Promise.reject(reply) : Promise.resolve(reply);
  }

  settle(text: string): void {
    const next = this.waiting.shift();
    if (!next) {
      throw new Error("No transcription is waiting");
    }
    next.resolve(text);
  }
}

export function createClock(start = 10_000) {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}
