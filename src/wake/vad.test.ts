import test from 'node:test';
import assert from 'node:assert/strict';
import { createAudioFrame, meanAbsoluteAmplitude, VoiceActivityGate } from './vad';

test('meanAbsoluteAmplitude averages absolute sample values', () => {
  assert.equal(meanAbsoluteAmplitude(Int16Array.from([100, -300, 0, 200])), 150);
});

test('meanAbsoluteAmplitude of an empty frame is zero', () => {
  assert.equal(meanAbsoluteAmplitude(new Int16Array(0)), 0);
});

test('createAudioFrame computes volume once', () => {
  const frame = createAudioFrame(Int16Array.from([-10, 10, -10, 10]), 48000, 1234);
  assert.equal(frame.volume, 10);
  assert.equal(frame.sampleRate, 48000);
  assert.equal(frame.timestamp, 1234);
});

test('VoiceActivityGate treats the threshold itself as silence', () => {
  const gate = new VoiceActivityGate(300);
  const at = createAudioFrame(new Int16Array(4).fill(300), 48000, 0);
  const above = createAudioFrame(new Int16Array(4).fill(301), 48000, 0);

  assert.equal(gate.isSpeech(at), false);
  assert.equal(gate.isSpeech(above), true);
  assert.equal(gate.silenceThreshold, 300);
});
