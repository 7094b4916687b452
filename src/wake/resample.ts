/**
 * Sample rate conversion
 * Integer ratios use block-average decimation, which keeps frames aligned with
 * the source timing. Other ratios fall back to linear interpolation.
 */

export function decimate(samples: Int16Array, fromRate: number, toRate: number): Int16Array {
  if (!(fromRate > 0) || !(toRate > 0)) {
    throw new RangeError(`Sample rates must be positive (got ${fromRate} -> ${toRate})`);
  }

  if (fromRate === toRate) {
    return samples;
  }

  if (fromRate > toRate && fromRate % toRate === 0) {
    return blockAverage(samples, fromRate / toRate);
  }

  return interpolate(samples, fromRate, toRate);
}

function blockAverage(samples: Int16Array, factor: number): Int16Array {
  // Trailing samples that do not fill a block are dropped
  const length = Math.floor(samples.length / factor);
  const out = new Int16Array(length);

  for (let i = 0; i < length; i++) {
    let sum = 0;
    const start = i * factor;
    for (let j = 0; j < factor; j++) {
      sum += samples[start + j];
    }
    out[i] = Math.trunc(sum / factor);
  }

  return out;
}

function interpolate(samples: Int16Array, fromRate: number, toRate: number): Int16Array {
  const length = Math.floor((samples.length * toRate) / fromRate);
  const out = new Int16Array(length);
  const step = fromRate / toRate;
  const last = samples.length - 1;

  for (let i = 0; i < length; i++) {
    const position = i * step;
    const index = Math.floor(position);
    const next = Math.min(index + 1, last);
    const fraction = position - index;
    out[i] = Math.round(samples[index] + (samples[next] - samples[index]) * fraction);
  }

  return out;
}
