import test from "node:test";
import assert from "node:assert/strict";
import { GoogleSpeechTranscriber, transcriptFromResponse } from "./googleSpeech";

test("transcriptFromResponse joins the top alternative of each result", () => {
  const text = transcriptFromResponse({
    results: [
      { alternatives: [{ transcript: " what's 2 " }, { transcript: "watts too" }] },
      { alternatives: [{ transcript: "plus 2" }] },
    ],
  });
  assert.equal(text, "what's 2 plus 2");
});

test("transcriptFromResponse skips results without a transcript", () => {
  const text = transcriptFromResponse({
    results: [{ alternatives: [] }, { alternatives: [{ transcript: "hello" }] }, {}],
  });
  assert.equal(text, "hello");
});

test("transcriptFromResponse of an empty response is empty", () => {
  assert.equal(transcriptFromResponse({}), "");
});

test("transcriber converts to the configured rate", () => {
  assert.equal(new GoogleSpeechTranscriber().sampleRate, 16000);
  assert.equal(new GoogleSpeechTranscriber({ sampleRate: 8000 }).sampleRate, 8000);
});

test("transcribe before initialize rejects", async () => {
  const transcriber = new GoogleSpeechTranscriber({ apiKey: "test-secret" });
  await assert.rejects(transcriber.transcribe(new Int16Array(4)), /not initialized/);
});
