import test from 'node:test';
import assert from 'node:assert/strict';
import { RecorderBusyError } from '../errors';
import { makeFrame } from '../testHelpers';
import { Recorder } from './recorder';
import { RecordingResult } from './types';
import { VoiceActivityGate } from './vad';

const SPEECH = 500;
const SILENCE = 100;

function createRecorder(): Recorder {
  return new Recorder({
    sampleRate: 48000,
    gate: new VoiceActivityGate(300),
    silenceDuration: 2.5,
    maxRecordingDuration: 30,
  });
}

function pushFrames(recorder: Recorder, level: number, count: number): RecordingResult | null {
  let result: RecordingResult | null = null;
  for (let i = 0; i < count; i++) {
    result = recorder.push(makeFrame(level));
    if (result) {
      assert.equal(i, count - 1, `recording stopped early at frame ${i + 1} of ${count}`);
    }
  }
  return result;
}

test('push outside a recording is ignored', () => {
  const recorder = createRecorder();
  assert.equal(recorder.push(makeFrame(SPEECH)), null);
  assert.equal(recorder.active, false);
});

test('starting twice is refused', () => {
  const recorder = createRecorder();
  recorder.start();
  assert.throws(() => recorder.start(), RecorderBusyError);
});

test('recording stops after 2.5s of silence following speech', () => {
  const recorder = createRecorder();
  recorder.start();

  assert.equal(pushFrames(recorder, SPEECH, 10), null);
  // 59 frames is 118000 samples, one frame short of 2.5s at 48kHz
  assert.equal(pushFrames(recorder, SILENCE, 59), null);

  const result = recorder.push(makeFrame(SILENCE));
  assert.ok(result);
  assert.equal(result.reason, 'silence');
  assert.equal(result.speechDetected, true);
  assert.equal(result.samples.length, 70 * 2000);
  assert.equal(result.sampleRate, 48000);
  assert.equal(recorder.active, false);
});

test('speech during trailing silence restarts the silence count', () => {
  const recorder = createRecorder();
  recorder.start();

  pushFrames(recorder, SPEECH, 1);
  pushFrames(recorder, SILENCE, 59);
  pushFrames(recorder, SPEECH, 1);
  assert.equal(pushFrames(recorder, SILENCE, 59), null);

  const result = recorder.push(makeFrame(SILENCE));
  assert.ok(result);
  assert.equal(result.samples.length, 121 * 2000);
});

test('frames at the threshold count as silence', () => {
  const recorder = createRecorder();
  recorder.start();

  pushFrames(recorder, SPEECH, 1);
  const result = pushFrames(recorder, 300, 60);
  assert.ok(result);
  assert.equal(result.reason, 'silence');
});

test('continuous speech stops at exactly 30 seconds', () => {
  const recorder = createRecorder();
  recorder.start();

  assert.equal(pushFrames(recorder, SPEECH, 719), null);
  const result = recorder.push(makeFrame(SPEECH));

  assert.ok(result);
  assert.equal(result.reason, 'max_duration');
  assert.equal(result.samples.length, 720 * 2000);
  assert.equal(result.durationSeconds, 30);
});

test('silence alone never ends the recording early', () => {
  const recorder = createRecorder();
  recorder.start();

  const result = pushFrames(recorder, SILENCE, 720);
  assert.ok(result);
  assert.equal(result.reason, 'max_duration');
  assert.equal(result.speechDetected, false);
});

test('cancel discards buffered audio', () => {
  const recorder = createRecorder();
  recorder.start();
  pushFrames(recorder, SPEECH, 5);

  recorder.cancel();
  assert.equal(recorder.active, false);
  assert.equal(recorder.elapsedSeconds, 0);

  recorder.start();
  pushFrames(recorder, SPEECH, 1);
  const result = pushFrames(recorder, SILENCE, 60);
  assert.ok(result);
  assert.equal(result.samples.length, 61 * 2000);
});
