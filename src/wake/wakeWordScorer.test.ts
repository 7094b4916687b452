import test from 'node:test';
import assert from 'node:assert/strict';
import { KeywordSpotter, SlidingWindowScorer } from './wakeWordScorer';

const HIT = 999;

class FakeSpotter implements KeywordSpotter {
  readonly frameLength = 4;
  readonly sampleRate = 16000;
  frames: number[][] = [];
  released = 0;

  process(frame: Int16Array): number {
    this.frames.push(Array.from(frame));
    return frame.includes(HIT) ? 0 : -1;
  }

  release(): void {
    this.released++;
  }
}

test('scorer buffers input until a full spotter frame is available', () => {
  const spotter = new FakeSpotter();
  const scorer = new SlidingWindowScorer(spotter);

  assert.equal(scorer.score(Int16Array.from([1, 2, 3])), 0);
  assert.equal(spotter.frames.length, 0);

  scorer.score(Int16Array.from([4]));
  assert.deepEqual(spotter.frames, [[1, 2, 3, 4]]);
});

test('scorer joins frames split across calls', () => {
  const spotter = new FakeSpotter();
  const scorer = new SlidingWindowScorer(spotter);

  scorer.score(Int16Array.from([1, 2]));
  assert.equal(scorer.score(Int16Array.from([HIT, 4])), 1);
  assert.deepEqual(spotter.frames, [[1, 2, HIT, 4]]);
});

test('scorer processes every complete frame in a long input', () => {
  const spotter = new FakeSpotter();
  const scorer = new SlidingWindowScorer(spotter);

  scorer.score(Int16Array.from([1, 2, 3, 4, 5, 6, 7, 8, 9]));
  assert.deepEqual(spotter.frames, [[1, 2, 3, 4], [5, 6, 7, 8]]);
});

test('a hit keeps scoring until it leaves the window', () => {
  const scorer = new SlidingWindowScorer(new FakeSpotter(), 2);

  assert.equal(scorer.score(Int16Array.from([HIT, 0, 0, 0])), 1);
  assert.equal(scorer.score(Int16Array.from([0, 0, 0, 0])), 1);
  assert.equal(scorer.score(Int16Array.from([0, 0, 0, 0])), 0);
});

test('reset clears the window so the same utterance does not fire again', () => {
  const scorer = new SlidingWindowScorer(new FakeSpotter());

  assert.equal(scorer.score(Int16Array.from([HIT, 0, 0, 0])), 1);
  scorer.reset();
  assert.equal(scorer.score(Int16Array.from([0, 0, 0, 0])), 0);
});

test('reset drops partially buffered samples', () => {
  const spotter = new FakeSpotter();
  const scorer = new SlidingWindowScorer(spotter);

  scorer.score(Int16Array.from([1, 2, 3]));
  scorer.reset();
  scorer.reset();
  scorer.score(Int16Array.from([4]));

  assert.equal(spotter.frames.length, 0);
});

test('release resets and releases the spotter', () => {
  const spotter = new FakeSpotter();
  const scorer = new SlidingWindowScorer(spotter);

  scorer.release();
  assert.equal(spotter.released, 1);
});

test('scorer exposes the spotter sample rate', () => {
  assert.equal(new SlidingWindowScorer(new FakeSpotter()).sampleRate, 16000);
});

test('scorer rejects an empty window', () => {
  assert.throws(() => new SlidingWindowScorer(new FakeSpotter(), 0), RangeError);
});
