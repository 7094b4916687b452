/**
 * Audio Front End Module
 *
 * One continuous microphone stream feeding either:
 * - the wake word scorer (Porcupine behind a sliding window) while the session is idle
 * - the VAD-endpointed recorder while the session is active
 *
 * Usage:
 * ```
 * const frontEnd = new AudioFrontEnd({ bus, topics, source, scorer, transcriber, ... });
 *
 * frontEnd.on('detection', ({ confidence }) => {
 *   console.log('Wake word detected:', confidence);
 * });
 *
 * frontEnd.start();
 * ```
 */

export * from './types';
export * from './resample';
export * from './vad';
export * from './wakeWordScorer';
export * from './recorder';
export * from './audioCapture';
export * from './googleSpeech';
export * from './audioFrontEnd';
