/**
 * Audio Front End
 * Owns the single capture stream and routes every frame to exactly one consumer:
 * the wake word scorer while the session is IDLE, the recorder while it is
 * ACTIVE, nothing otherwise. Frame handling is synchronous; bus publishes are
 * fire-and-forget and transcription runs off the frame path.
 */

import { EventEmitter } from "events";
import { MessageBus, parseFlag, TopicMap } from "../bus/types";
import { CaptureError, FatalCaptureError, toError } from "../errors";
import { parseCommand, parsePhase, Phase } from "../session/types";
import { Recorder } from "./recorder";
import { decimate } from "./resample";
import {
  AudioConfig,
  AudioFrame,
  DetectionEvent,
  NoSpeechReason,
  RecordingResult,
  Transcriber,
  WakeWordConfig,
} from "./types";
import { VoiceActivityGate } from "./vad";
import { WakeWordScorer } from "./wakeWordScorer";

/**
 * The capture device as seen by the front end
 */
export interface FrameSource {
  start(): void;
  stop(): void;
  flush(): void;
  on(event: "frame", listener: (frame: AudioFrame) => void): this;
  on(event: "error", listener: (error: CaptureError) => void): this;
  on(event: "fatal", listener: (error: FatalCaptureError) => void): this;
}

export interface AudioFrontEndEvents {
  detection: (event: DetectionEvent) => void;
  transcription: (text: string) => void;
  noSpeech: (reason: NoSpeechReason) => void;
  fatal: (error: FatalCaptureError) => void;
}

export type AudioFrontEndOptions = {
  bus: MessageBus;
  topics: TopicMap;
  source: FrameSource;
  scorer: WakeWordScorer;
  transcriber: Transcriber;
  audio: AudioConfig;
  wakeWord: WakeWordConfig;
  denylist: string[];
  now?: () => number;
};

export class AudioFrontEnd extends EventEmitter {
  private bus: MessageBus;
  private topics: TopicMap;
  private source: FrameSource;
  private scorer: WakeWordScorer;
  private transcriber: Transcriber;
  private wakeWord: WakeWordConfig;
  private minDetectionVolume: number;
  private denylist: Set<string>;
  private recorder: Recorder;
  private now: () => number;

  private phase: Phase = "idle";
  private robotSpeaking = false;
  private isRunning = false;
  private lastDetectionAt: number | null = null;
  private cooldownUntil: number | null = null;
  // Bumped on every reset so late transcriptions can be recognized and dropped
  private generation = 0;
  private pendingTranscriptions = new Set<Promise<void>>();

  constructor(options: AudioFrontEndOptions) {
    super();
    this.bus = options.bus;
    this.topics = options.topics;
    this.source = options.source;
    this.scorer = options.scorer;
    this.transcriber = options.transcriber;
    this.wakeWord = options.wakeWord;
    this.denylist = new Set(options.denylist);
    this.now = options.now ?? Date.now;
    this.minDetectionVolume = options.audio.minDetectionVolume;
    this.recorder = new Recorder({
      sampleRate: options.audio.sampleRate,
      gate: new VoiceActivityGate(options.audio.silenceThreshold),
      silenceDuration: options.audio.silenceDuration,
      maxRecordingDuration: options.audio.maxRecordingDuration,
    });

    this.source.on("frame", (frame) => this.onFrame(frame));
    this.source.on("error", (error) => {
      console.warn(`[AudioFrontEnd] Capture problem (${error.code}), continuing`);
    });
    this.source.on("fatal", (error) => this.handleFatal(error));
  }

  start(): void {
    if (this.isRunning) {
      console.warn("[AudioFrontEnd] Already running");
      return;
    }

    console.log("[AudioFrontEnd] Starting...");
    this.isRunning = true;

    this.bus.subscribe(this.topics.state, (payload) => this.handleState(payload));
    this.bus.subscribe(this.topics.speaking, (payload) => this.handleSpeaking(payload));
    this.bus.subscribe(this.topics.command, (payload) => this.handleCommand(payload));

    this.source.start();
    console.log("[AudioFrontEnd] ✓ Listening for wake word...");
  }

  /**
   * Stops the capture device first so no frame is handled during teardown
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    console.log("[AudioFrontEnd] Stopping...");
    this.isRunning = false;
    this.source.stop();
    this.recorder.cancel();
    this.generation++;
  }

  /**
   * Resolves once every transcription started so far has settled
   */
  async drain(): Promise<void> {
    await Promise.all([...this.pendingTranscriptions]);
  }

  getPhase(): Phase {
    return this.phase;
  }

  get recording(): boolean {
    return this.recorder.active;
  }

  onFrame(frame: AudioFrame): void {
    if (!this.isRunning) {
      return;
    }

    if (this.phase === "active") {
      if (this.recorder.active) {
        const result = this.recorder.push(frame);
        if (result) {
          this.finishRecording(result);
        }
      }
      return;
    }

    // Scoring is disabled outside IDLE and while our own reply is playing
    if (this.phase !== "idle" || this.robotSpeaking) {
      return;
    }

    this.processWakeWord(frame);
  }

  private processWakeWord(frame: AudioFrame): void {
    if (frame.volume < this.minDetectionVolume) {
      return;
    }

    const now = this.now();

    if (this.lastDetectionAt !== null && now - this.lastDetectionAt < this.wakeWord.detectionRateLimit * 1000) {
      return;
    }

    if (this.cooldownUntil !== null) {
      if (now < this.cooldownUntil) {
        return;
      }
      this.cooldownUntil = null;
      this.scorer.reset();
    }

    const samples = decimate(frame.samples, frame.sampleRate, this.scorer.sampleRate);
    const score = this.scorer.score(samples);

    if (score > this.wakeWord.threshold) {
      this.handleDetection(score, now, frame.volume);
    }
  }

  private handleDetection(score: number, now: number, volume: number): void {
    this.lastDetectionAt = now;
    this.cooldownUntil = now + this.wakeWord.cooldownDuration * 1000;
    this.scorer.reset();

    console.log(`[AudioFrontEnd] 🔊 Wake word detected! (score: ${score.toFixed(2)}, volume: ${Math.round(volume)})`);
    this.bus.publish(this.topics.wakeDetected, String(score));

    const event: DetectionEvent = { confidence: score, timestamp: now };
    this.emit("detection", event);
  }

  private handleState(payload: string): void {
    const next = parsePhase(payload);
    if (!next) {
      console.warn(`[AudioFrontEnd] Ignoring malformed state: "${payload}"`);
      return;
    }

    const previous = this.phase;
    if (previous === next) {
      return;
    }
    this.phase = next;

    if (next === "active") {
      this.startRecording();
      return;
    }

    if (next === "idle") {
      console.log(`[AudioFrontEnd] 🔄 Session ended (${previous} → idle), re-arming wake word`);
      // A lost speaking=false must not keep scoring off after a timeout or reset
      if (previous === "speaking" || previous === "thinking") {
        this.robotSpeaking = false;
      }
      this.discardAudio();
      this.scorer.reset();
      this.startCooldown();
      return;
    }

    if (this.recorder.active) {
      this.recorder.cancel();
    }
  }

  private handleSpeaking(payload: string): void {
    const speaking = parseFlag(payload);
    if (speaking === null) {
      console.warn(`[AudioFrontEnd] Ignoring malformed speaking flag: "${payload}"`);
      return;
    }
    this.robotSpeaking = speaking;
  }

  private handleCommand(payload: string): void {
    const command = parseCommand(payload);
    if (!command) {
      return;
    }

    console.log(`[AudioFrontEnd] ⚠️ ${command} received, discarding buffered audio`);
    this.robotSpeaking = false;
    this.discardAudio();
  }

  private startRecording(): void {
    if (this.recorder.active) {
      console.warn("[AudioFrontEnd] Recording already in progress, not starting another");
      return;
    }

    // Audio queued during the wake phrase belongs to the previous mode
    this.source.flush();
    this.recorder.start();
  }

  private startCooldown(): void {
    const until = this.now() + this.wakeWord.cooldownDuration * 1000;
    this.cooldownUntil = Math.max(this.cooldownUntil ?? 0, until);
  }

  private discardAudio(): void {
    this.recorder.cancel();
    this.source.flush();
    this.generation++;
  }

  private finishRecording(result: RecordingResult): void {
    if (!result.speechDetected) {
      console.log(`[AudioFrontEnd] ❌ No speech detected in ${result.durationSeconds.toFixed(1)}s`);
      this.reportNoSpeech("no_speech");
      return;
    }

    const generation = this.generation;
    const task = this.transcribe(result, generation)
      .catch((error: unknown) => {
        console.error("[AudioFrontEnd] Transcription failed:", toError(error).message);
        if (generation === this.generation) {
          this.reportNoSpeech("error");
        }
      })
      .finally(() => {
        this.pendingTranscriptions.delete(task);
      });
    this.pendingTranscriptions.add(task);
  }

  private async transcribe(result: RecordingResult, generation: number): Promise<void> {
    const started = this.now();
    const samples = decimate(result.samples, result.sampleRate, this.transcriber.sampleRate);

    console.log(`[AudioFrontEnd] ⚡ Transcribing ${result.durationSeconds.toFixed(1)}s of audio...`);
    const text = (await this.transcriber.transcribe(samples)).trim();
    const elapsed = ((this.now() - started) / 1000).toFixed(2);

    if (generation !== this.generation) {
      console.log(`[AudioFrontEnd] Dropping transcription from a cancelled recording: "${text}"`);
      return;
    }

    if (!text) {
      console.log(`[AudioFrontEnd] ❌ Empty transcription (${elapsed}s)`);
      this.reportNoSpeech("empty");
      return;
    }

    if (this.denylist.has(text)) {
      console.log(`[AudioFrontEnd] ⚠️ Filtered known mis-transcription: "${text}" (${elapsed}s)`);
      this.reportNoSpeech("filtered");
      return;
    }

    console.log(`[AudioFrontEnd] ✅ "${text}" (${elapsed}s)`);
    this.bus.publish(this.topics.transcription, text);
    this.emit("transcription", text);
  }

  private reportNoSpeech(reason: NoSpeechReason): void {
    this.bus.publish(this.topics.noSpeech, reason);
    this.emit("noSpeech", reason);
  }

  private handleFatal(error: FatalCaptureError): void {
    console.error("[AudioFrontEnd] ✗ Fatal capture failure:", error.message);
    this.bus.publish(this.topics.command, "reset");
    this.stop();
    this.emit("fatal", error);
  }
}
