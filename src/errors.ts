
export class PipelineError extends Error {
  constructor(message: string, public readonly code: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class ConfigError extends PipelineError {
  constructor(key: string, reason: string) {
    super(
      `Invalid configuration value for "${key}": ${reason}`,
      'INVALID_CONFIG',
      { key }
    );
    this.name = 'ConfigError';
  }
}

export class CaptureError extends PipelineError {
  constructor(message: string, code: 'DEVICE_ERROR' | 'BUFFER_OVERFLOW' | 'STREAM_ENDED', originalError?: unknown) {
    super(message, code, { originalError });
    this.name = 'CaptureError';
  }
}

export class FatalCaptureError extends PipelineError {
  constructor(attempts: number, lastError?: unknown) {
    super(
      `Audio capture failed after ${attempts} restart attempts.`,
      'CAPTURE_FATAL',
      { attempts, lastError }
    );
    this.name = 'FatalCaptureError';
  }
}

export class RecorderBusyError extends PipelineError {
  constructor() {
    super(
      'A recording is already in progress for this session.',
      'RECORDER_BUSY'
    );
    this.name = 'RecorderBusyError';
  }
}

export class TranscriptionError extends PipelineError {
  constructor(originalError: unknown) {
    super(
      'Failed to transcribe the captured utterance.',
      'TRANSCRIPTION_FAILED',
      { originalError }
    );
    this.name = 'TranscriptionError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
