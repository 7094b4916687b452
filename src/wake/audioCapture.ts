/**
 * Audio Capture Service
 * Owns the microphone via node-record-lpcm16 (SoX under the hood) and cuts the
 * raw PCM stream into fixed-size frames. Device failures are retried with
 * backoff; once retries run out a fatal error is emitted.
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { record } from 'node-record-lpcm16';
import { CaptureError, FatalCaptureError } from '../errors';
import { AudioFrame } from './types';
import { createAudioFrame } from './vad';

export interface AudioCaptureEvents {
  frame: (frame: AudioFrame) => void;
  // Non-fatal; capture keeps going or restarts
  error: (error: CaptureError) => void;
  fatal: (error: FatalCaptureError) => void;
  started: () => void;
  stopped: () => void;
}

export type RecordingHandle = {
  stream: () => NodeJS.ReadableStream;
  stop: () => void;
};

export type RecordingRequest = {
  sampleRate: number;
  device: string | null;
  recordProgram: string;
};

export type RecordingFactory = (request: RecordingRequest) => RecordingHandle;

export type AudioCaptureOptions = {
  sampleRate: number;
  frameSamples: number;
  device: string | null;
  recordProgram: string;
  maxRetries: number;
  // Base restart delay (ms), doubled per attempt
  retryDelay: number;
  // Backlog above this is treated as an overflow and dropped
  maxPendingBytes?: number;
  now?: () => number;
  openRecording?: RecordingFactory;
};

const MAX_RETRY_DELAY_MS = 30000;

function openSoxRecording(request: RecordingRequest): RecordingHandle {
  return record({
    sampleRate: request.sampleRate,
    channels: 1,
    threshold: 0,
    recorder: request.recordProgram,
    audioType: 'raw',
    endOnSilence: false,
    ...(request.device ? { device: request.device } : {}),
  });
}

export class AudioCapture extends EventEmitter {
  private recording: RecordingHandle | null = null;
  private audioStream: NodeJS.ReadableStream | null = null;
  private isCapturing = false;
  private pending: Buffer = Buffer.alloc(0);
  private restartAttempts = 0;
  private restartTimer: NodeJS.Timeout | null = null;
  private readonly frameBytes: number;
  private readonly maxPendingBytes: number;
  private readonly now: () => number;
  private readonly openRecording: RecordingFactory;
  private frameCount = 0;
  private lastLogTime = 0;

  constructor(private readonly options: AudioCaptureOptions) {
    super();
    this.frameBytes = options.frameSamples * 2;
    // One second of audio by default
    this.maxPendingBytes = options.maxPendingBytes ?? Math.max(options.sampleRate * 2, this.frameBytes * 2);
    this.now = options.now ?? Date.now;
    this.openRecording = options.openRecording ?? openSoxRecording;
  }

  /**
   * Start capturing audio from the microphone
   */
  start(): void {
    if (this.isCapturing) {
      console.warn('[AudioCapture] Already capturing');
      return;
    }

    console.log(
      `[AudioCapture] Starting capture: ${this.options.sampleRate}Hz, ` +
      `${this.options.frameSamples} samples/frame, device: ${this.options.device ?? 'default'}`
    );

    this.isCapturing = true;
    this.restartAttempts = 0;
    this.open();
    this.emit('started');
  }

  /**
   * Stop capturing audio. No frame is emitted after this returns.
   */
  stop(): void {
    if (!this.isCapturing) {
      return;
    }

    this.isCapturing = false;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = null;
    }
    this.closeRecording();
    this.pending = Buffer.alloc(0);

    this.emit('stopped');
    console.log('[AudioCapture] Stopped capturing audio');
  }

  /**
   * Drop audio that has been received but not yet cut into frames
   */
  flush(): void {
    this.pending = Buffer.alloc(0);
  }

  get capturing(): boolean {
    return this.isCapturing;
  }

  private open(): void {
    try {
      const recording = this.openRecording({
        sampleRate: this.options.sampleRate,
        device: this.options.device,
        recordProgram: this.options.recordProgram,
      });
      this.recording = recording;

      const stream = recording.stream();
      this.audioStream = stream;

      stream.on('data', (chunk: Buffer) => {
        this.handleChunk(chunk);
      });

      stream.on('error', (error: unknown) => {
        this.handleFailure(new CaptureError('Audio stream error', 'DEVICE_ERROR', error));
      });

      stream.on('end', () => {
        this.handleFailure(new CaptureError('Audio stream ended unexpectedly', 'STREAM_ENDED'));
      });

      console.log('[AudioCapture] ✓ Audio stream open');
    } catch (error) {
      this.handleFailure(new CaptureError('Failed to open audio device', 'DEVICE_ERROR', error));
    }
  }

  private handleChunk(chunk: Buffer): void {
    if (!this.isCapturing) {
      return;
    }

    this.restartAttempts = 0;
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    if (this.pending.length > this.maxPendingBytes) {
      const dropped = this.pending.length;
      this.pending = Buffer.alloc(0);
      console.warn(`[AudioCapture] Buffer overflow, dropped ${dropped} bytes of backlog`);
      this.emit('error', new CaptureError(`Audio buffer overflow (${dropped} bytes)`, 'BUFFER_OVERFLOW'));
      return;
    }

    while (this.pending.length >= this.frameBytes && this.isCapturing) {
      const frameBuffer = this.pending.subarray(0, this.frameBytes);
      this.pending = this.pending.subarray(this.frameBytes);

      const samples = new Int16Array(this.options.frameSamples);
      for (let i = 0; i < samples.length; i++) {
        samples[i] = frameBuffer.readInt16LE(i * 2);
      }

      this.frameCount++;
      this.emit('frame', createAudioFrame(samples, this.options.sampleRate, this.now()));
    }

    const now = this.now();
    if (now - this.lastLogTime > 30000) {
      console.log(`[AudioCapture] ✓ ${this.frameCount} frames captured`);
      this.lastLogTime = now;
      this.frameCount = 0;
    }
  }

  private handleFailure(error: CaptureError): void {
    console.error(`[AudioCapture] ${error.message}:`, error.details?.originalError ?? '');
    this.closeRecording();
    this.pending = Buffer.alloc(0);
    this.emit('error', error);

    if (!this.isCapturing) {
      return;
    }

    this.restartAttempts++;
    if (this.restartAttempts > this.options.maxRetries) {
      this.isCapturing = false;
      console.error(`[AudioCapture] ✗ Giving up after ${this.options.maxRetries} restart attempts`);
      this.emit('fatal', new FatalCaptureError(this.options.maxRetries, error));
      return;
    }

    const delay = Math.min(this.options.retryDelay * 2 ** (this.restartAttempts - 1), MAX_RETRY_DELAY_MS);
    console.log(`[AudioCapture] Restarting in ${delay}ms (attempt ${this.restartAttempts}/${this.options.maxRetries})`);

    this.restartTimer = setTimeout(() => {
      this.restartTimer = null;
      if (this.isCapturing) {
        this.open();
      }
    }, delay);
  }

  private closeRecording(): void {
    if (this.audioStream) {
      this.audioStream.removeAllListeners();
      // The recorder process may still error the stream while it shuts down
      this.audioStream.on('error', (error: unknown) => {
        console.warn('[AudioCapture] Error from closed stream:', error);
      });
      this.audioStream = null;
    }

    if (this.recording) {
      const recording = this.recording;
      this.recording = null;
      try {
        recording.stop();
      } catch (error) {
        console.error('[AudioCapture] Error stopping recorder:', error);
      }
    }
  }
}

/**
 * Check if the recording program is installed
 */
export async function checkRecorderInstalled(program: string): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn('which', [program]);
    child.on('close', (code) => {
      resolve(code === 0);
    });
    child.on('error', () => {
      resolve(false);
    });
  });
}
