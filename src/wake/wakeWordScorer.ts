/**
 * Wake Word Scorer
 * Scores audio for the trigger phrase. The scorer keeps a sliding window of
 * recent results, so it must be reset after each detection; otherwise the
 * same utterance keeps scoring high on the following frames.
 */

import { Porcupine } from '@picovoice/porcupine-node';

export interface WakeWordScorer {
  // Rate the scorer expects its input at
  readonly sampleRate: number;
  /**
   * Feed samples at `sampleRate` and get the current confidence (0-1).
   */
  score(samples: Int16Array): number;
  // Idempotent
  reset(): void;
  release(): void;
}

/**
 * Frame-level keyword spotter: processes exactly `frameLength` samples and
 * returns the index of the detected keyword, or -1.
 */
export interface KeywordSpotter {
  readonly frameLength: number;
  readonly sampleRate: number;
  process(frame: Int16Array): number;
  release(): void;
}

export class SlidingWindowScorer implements WakeWordScorer {
  private pending: Int16Array;
  private pendingLength = 0;
  private window: number[] = [];

  constructor(
    private readonly spotter: KeywordSpotter,
    private readonly windowFrames = 3
  ) {
    if (windowFrames < 1) {
      throw new RangeError('windowFrames must be at least 1');
    }
    this.pending = new Int16Array(spotter.frameLength);
  }

  get sampleRate(): number {
    return this.spotter.sampleRate;
  }

  score(samples: Int16Array): number {
    const frameLength = this.spotter.frameLength;
    let offset = 0;

    while (offset < samples.length) {
      const take = Math.min(frameLength - this.pendingLength, samples.length - offset);
      this.pending.set(samples.subarray(offset, offset + take), this.pendingLength);
      this.pendingLength += take;
      offset += take;

      if (this.pendingLength === frameLength) {
        const keywordIndex = this.spotter.process(this.pending);
        this.push(keywordIndex >= 0 ? 1 : 0);
        this.pending = new Int16Array(frameLength);
        this.pendingLength = 0;
      }
    }

    return this.window.length === 0 ? 0 : Math.max(...this.window);
  }

  reset(): void {
    this.pending = new Int16Array(this.spotter.frameLength);
    this.pendingLength = 0;
    this.window = [];
  }

  release(): void {
    this.reset();
    this.spotter.release();
  }

  private push(value: number): void {
    this.window.push(value);
    if (this.window.length > this.windowFrames) {
      this.window.shift();
    }
  }
}

export type PorcupineScorerOptions = {
  accessKey: string;
  keyword: string;
  sensitivity: number;
  windowFrames: number;
};

export function createPorcupineScorer(options: PorcupineScorerOptions): SlidingWindowScorer {
  if (!options.accessKey) {
    throw new Error('Porcupine access key is required (set PICOVOICE_ACCESS_KEY)');
  }

  const porcupine = new Porcupine(options.accessKey, [options.keyword], [options.sensitivity]);
  console.log(
    `[WakeWordScorer] ✓ Porcupine loaded: keyword "${options.keyword}", ` +
    `${porcupine.frameLength} samples @ ${porcupine.sampleRate}Hz`
  );
  return new SlidingWindowScorer(porcupine, options.windowFrames);
}
