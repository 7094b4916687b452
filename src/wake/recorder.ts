/**
 * Recorder
 * Accumulates frames for one utterance and decides when capture is complete.
 * Elapsed time is counted in samples, so endpointing does not drift with
 * scheduling jitter.
 */

import { RecorderBusyError } from '../errors';
import { AudioFrame, RecorderStopReason, RecordingResult } from './types';
import { VoiceActivityGate } from './vad';

export type RecorderOptions = {
  sampleRate: number;
  gate: VoiceActivityGate;
  silenceDuration: number;
  maxRecordingDuration: number;
};

export class Recorder {
  private frames: Int16Array[] = [];
  private recording = false;
  private speechDetected = false;
  private totalSamples = 0;
  private silentSamples = 0;
  private readonly silenceLimit: number;
  private readonly maxSamples: number;

  constructor(private readonly options: RecorderOptions) {
    this.silenceLimit = Math.round(options.silenceDuration * options.sampleRate);
    this.maxSamples = Math.round(options.maxRecordingDuration * options.sampleRate);
  }

  get active(): boolean {
    return this.recording;
  }

  get elapsedSeconds(): number {
    return this.totalSamples / this.options.sampleRate;
  }

  start(): void {
    if (this.recording) {
      throw new RecorderBusyError();
    }

    this.clear();
    this.recording = true;
    console.log('[Recorder] 🎙️ Recording started (VAD-based)...');
  }

  /**
   * Returns the finished recording on the frame that ends it, otherwise null.
   */
  push(frame: AudioFrame): RecordingResult | null {
    if (!this.recording) {
      return null;
    }

    this.frames.push(frame.samples);
    this.totalSamples += frame.samples.length;

    if (this.options.gate.isSpeech(frame)) {
      this.silentSamples = 0;
      this.speechDetected = true;
    } else {
      this.silentSamples += frame.samples.length;
    }

    if (this.speechDetected && this.silentSamples >= this.silenceLimit) {
      return this.finish('silence');
    }

    if (this.totalSamples >= this.maxSamples) {
      return this.finish('max_duration');
    }

    return null;
  }

  cancel(): void {
    if (this.recording) {
      console.log(`[Recorder] Recording discarded after ${this.elapsedSeconds.toFixed(1)}s`);
    }
    this.recording = false;
    this.clear();
  }

  private finish(reason: RecorderStopReason): RecordingResult {
    const samples = new Int16Array(this.totalSamples);
    let offset = 0;
    for (const chunk of this.frames) {
      samples.set(chunk, offset);
      offset += chunk.length;
    }

    const result: RecordingResult = {
      reason,
      speechDetected: this.speechDetected,
      samples,
      sampleRate: this.options.sampleRate,
      durationSeconds: this.elapsedSeconds,
    };

    console.log(`[Recorder] ✓ Recording stopped (${reason}): ${result.durationSeconds.toFixed(1)}s`);

    this.recording = false;
    this.clear();
    return result;
  }

  private clear(): void {
    this.frames = [];
    this.speechDetected = false;
    this.totalSamples = 0;
    this.silentSamples = 0;
  }
}
