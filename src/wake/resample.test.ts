import test from "node:test";
import assert from "node:assert/strict";
import { decimate } from "./resample";

test("decimate averages blocks for integer ratios and drops the remainder", () => {
  const out = decimate(Int16Array.from([3, 6, 9, 1, 2, 3, 10]), 48000, 16000);
  assert.deepEqual(Array.from(out), [6, 2]);
});

test("decimate truncates block averages toward zero", () => {
  const out = decimate(Int16Array.from([-1, -2, -2, 1, 1, 2]), 48000, 16000);
  assert.deepEqual(Array.from(out), [-1, 1]);
});

test("decimate turns a 2000-sample 48kHz frame into 666 samples at 16kHz", () => {
  const out = decimate(new Int16Array(2000).fill(500), 48000, 16000);
  assert.equal(out.length, 666);
  assert.equal(out[0], 500);
  assert.equal(out[665], 500);
});

test("decimate returns the input unchanged when rates match", () => {
  const input = Int16Array.from([1, 2, 3]);
  assert.equal(decimate(input, 16000, 16000), input);
});

test("decimate interpolates non-integer ratios", () => {
  const out = decimate(new Int16Array(441).fill(100), 44100, 16000);
  assert.equal(out.length, 160);
  assert.ok(out.every((sample) => sample === 100));
});

test("decimate interpolates when upsampling", () => {
  const out = decimate(Int16Array.from([0, 100]), 8000, 16000);
  assert.deepEqual(Array.from(out), [0, 50, 100, 100]);
});

test("decimate rejects non-positive rates", () => {
  assert.throws(() => decimate(new Int16Array(4), 0, 16000), RangeError);
  assert.throws(() => decimate(new Int16Array(4), 48000, -1), RangeError);
});
