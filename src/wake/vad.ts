/**
 * Voice Activity Detection (VAD)
 * Amplitude-threshold gate: a frame is speech when its mean absolute
 * amplitude is above the threshold.
 */

import { AudioFrame } from './types';

export function meanAbsoluteAmplitude(samples: Int16Array): number {
  if (samples.length === 0) {
    return 0;
  }

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += Math.abs(samples[i]);
  }
  return sum / samples.length;
}

export function createAudioFrame(samples: Int16Array, sampleRate: number, timestamp: number): AudioFrame {
  return {
    samples,
    sampleRate,
    volume: meanAbsoluteAmplitude(samples),
    timestamp,
  };
}

export class VoiceActivityGate {
  constructor(private readonly threshold: number) {}

  isSpeech(frame: AudioFrame): boolean {
    return frame.volume > this.threshold;
  }

  get silenceThreshold(): number {
    return this.threshold;
  }
}
