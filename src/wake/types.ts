/**
 * Audio Front End Types
 */

export type AudioFrame = {
  // Signed 16-bit mono samples at the microphone's native rate
  samples: Int16Array;
  sampleRate: number;
  // Mean absolute amplitude, computed once when the frame is built
  volume: number;
  timestamp: number;
};

export type DetectionEvent = {
  confidence: number;
  timestamp: number;
};

export type RecorderStopReason = 'silence' | 'max_duration';

export type RecordingResult = {
  reason: RecorderStopReason;
  speechDetected: boolean;
  samples: Int16Array;
  sampleRate: number;
  durationSeconds: number;
};

export type NoSpeechReason = 'no_speech' | 'empty' | 'filtered' | 'error';

export interface Transcriber {
  // Rate the utterance is converted to before transcription
  readonly sampleRate: number;
  transcribe(samples: Int16Array): Promise<string>;
}

export type AudioConfig = {
  // Microphone native rate (Hz)
  sampleRate: number;
  // Samples per frame; 2000 @ 48kHz is ~42ms
  frameSamples: number;
  device: string | null;
  recordProgram: string;
  // Frames quieter than this never reach the wake word scorer
  minDetectionVolume: number;
  // VAD amplitude threshold
  silenceThreshold: number;
  // Seconds of silence after speech that end a recording
  silenceDuration: number;
  maxRecordingDuration: number;
  captureMaxRetries: number;
  // Base delay (ms) for capture restart backoff
  captureRetryDelay: number;
};

export const DEFAULT_AUDIO_CONFIG: AudioConfig = {
  sampleRate: 48000,
  frameSamples: 2000,
  device: null,
  recordProgram: 'sox',
  minDetectionVolume: 300,
  silenceThreshold: 300,
  silenceDuration: 2.5,
  maxRecordingDuration: 30,
  captureMaxRetries: 5,
  captureRetryDelay: 500,
};

export type WakeWordConfig = {
  // Built-in keyword name or path to a keyword file
  keyword: string;
  sensitivity: number;
  // Minimum score (exclusive) for a detection
  threshold: number;
  // Seconds
  detectionRateLimit: number;
  cooldownDuration: number;
  // Number of recent spotter frames the score is taken over
  windowFrames: number;
};

export const DEFAULT_WAKE_WORD_CONFIG: WakeWordConfig = {
  keyword: 'jarvis',
  sensitivity: 0.5,
  threshold: 0.6,
  detectionRateLimit: 2.0,
  cooldownDuration: 3.0,
  windowFrames: 3,
};

export type TranscriptionConfig = {
  languageCode: string;
  sampleRate: number;
  // Known silence mis-transcriptions, matched exactly
  denylist: string[];
};

export const DEFAULT_TRANSCRIPTION_CONFIG: TranscriptionConfig = {
  languageCode: 'en-US',
  sampleRate: 16000,
  denylist: ['You', 'you', 'Thank you.', 'Thanks for watching.', 'Bye.'],
};
