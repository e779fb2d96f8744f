export const FLATLINE_AMPLITUDE = 0.1;
export const FLATLINE_AMPLITUDE_ACCURACY = 0.001;
export const FLATLINE_ALIGN_ACCURACY = 0;

export type FlatlineReading = {
  ok: boolean;
  expected: number;
  min: number;
  max: number;
};

/**
 * Checks that every sample sits within `accuracy` of the expected level,
 * positive or negative.
 */
export function detectFlatlineAmplitude(
  samples: ArrayLike<number>,
  positive: boolean,
  amplitude = FLATLINE_AMPLITUDE,
  accuracy = FLATLINE_AMPLITUDE_ACCURACY
): FlatlineReading {
  const expected = (positive ? 1 : -1) * amplitude;
  if (samples.length === 0) {
    return { ok: false, expected, min: Number.NaN, max: Number.NaN };
  }

  let min = samples[0];
  let max = samples[0];
  for (let index = 1; index < samples.length; index += 1) {
    const value = samples[index];
    if (value < min) {
      min = value;
    }
    if (value > max) {
      max = value;
    }
  }

  return {
    ok: min >= expected - accuracy && max <= expected + accuracy,
    expected,
    min,
    max
  };
}

/** Index of the first negative sample, or -1. */
export function detectFallingEdge(samples: ArrayLike<number>): number {
  for (let index = 0; index < samples.length; index += 1) {
    if (samples[index] < 0) {
      return index;
    }
  }
  return -1;
}
