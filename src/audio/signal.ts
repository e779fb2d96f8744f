import Meyda from 'meyda';

export const MAX_SIGNAL_CHANNELS = 8;
export const MAX_FREQUENCIES_PER_CHANNEL = 64;

type SignalFrequency = {
  /** Effective frequency after clipping to a whole number of samples per period. */
  freq: number;
  /** Playback channel, or -1 for every channel. */
  channel: number;
  period: Float64Array | null;
  offset: number;
};

export type DetectionReport = {
  detected: boolean;
  matched: number[];
  missing: number[];
  unexpected: number[];
};

/**
 * Per-channel mixture of sine tones. Each tone is stored as one period table so
 * consecutive fills stay phase-continuous.
 */
export class AudioSignal {
  private readonly freqs: SignalFrequency[] = [];

  constructor(
    readonly channels: number,
    readonly rate: number
  ) {
    if (!Number.isInteger(channels) || channels < 1 || channels > MAX_SIGNAL_CHANNELS) {
      throw new RangeError(`Unsupported channel count ${channels}`);
    }
    if (!Number.isInteger(rate) || rate <= 0) {
      throw new RangeError(`Unsupported sampling rate ${rate}`);
    }
  }

  /**
   * Adds a tone to one channel, or to all channels when `channel` is -1.
   * Returns false when the tone is above Nyquist or the table is full.
   */
  addFrequency(frequency: number, channel = -1): boolean {
    if (channel < -1 || channel >= this.channels) {
      throw new RangeError(`Channel ${channel} out of range for ${this.channels} channel(s)`);
    }
    if (this.freqs.length >= MAX_FREQUENCIES_PER_CHANNEL * this.channels) {
      return false;
    }
    if (frequency <= 0 || frequency > this.rate / 2) {
      return false;
    }

    this.freqs.push({
      freq: effectiveFrequency(this.rate, frequency),
      channel,
      period: null,
      offset: 0
    });
    return true;
  }

  /** Effective frequencies expected on a playback channel. */
  frequenciesFor(channel: number): number[] {
    return this.freqs.filter(entry => appliesTo(entry, channel)).map(entry => entry.freq);
  }

  synthesize() {
    for (const entry of this.freqs) {
      const frames = Math.round(this.rate / entry.freq);
      const amplitude = 1 / this.countFor(entry);
      const period = new Float64Array(frames);
      for (let index = 0; index < frames; index += 1) {
        period[index] = amplitude * Math.sin((2 * Math.PI * index) / frames);
      }
      entry.period = period;
      entry.offset = 0;
    }
  }

  /** Writes `frames` interleaved frames into `buffer`. */
  fill(buffer: Float64Array, frames: number) {
    const needed = frames * this.channels;
    if (buffer.length < needed) {
      throw new RangeError(`Buffer holds ${buffer.length} sample(s), ${needed} required`);
    }
    buffer.fill(0, 0, needed);

    for (const entry of this.freqs) {
      const period = entry.period;
      if (!period) {
        throw new Error('Signal must be synthesized before filling');
      }
      for (let channel = 0; channel < this.channels; channel += 1) {
        if (!appliesTo(entry, channel)) {
          continue;
        }
        for (let frame = 0; frame < frames; frame += 1) {
          buffer[frame * this.channels + channel] += period[(entry.offset + frame) % period.length];
        }
      }
      entry.offset = (entry.offset + frames) % period.length;
    }
  }

  detect(rate: number, channel: number, samples: Float64Array): boolean {
    return this.analyze(rate, channel, samples).detected;
  }

  /**
   * Looks for power peaks above half the strongest bin. Each peak must match
   * an expected frequency within one FFT bin, and every expected frequency
   * must be seen.
   */
  analyze(rate: number, channel: number, samples: Float64Array): DetectionReport {
    const length = samples.length;
    if (length < 2 || (length & (length - 1)) !== 0) {
      throw new RangeError(`Detection window must be a power of two, got ${length}`);
    }

    Meyda.bufferSize = length;
    Meyda.sampleRate = rate;
    Meyda.windowingFunction = 'hanning';
    const features = Meyda.extract('amplitudeSpectrum', Float32Array.from(samples));
    const spectrum = features?.amplitudeSpectrum;
    if (!spectrum) {
      throw new Error('Spectrum extraction returned no amplitude spectrum');
    }

    const expected = this.frequenciesFor(channel);
    const detected = new Array<boolean>(expected.length).fill(false);
    const unexpected: number[] = [];
    const accuracy = rate / length;

    let max = 0;
    for (let bin = 1; bin < spectrum.length; bin += 1) {
      max = Math.max(max, spectrum[bin]);
    }

    const threshold = max / 2;
    let above = false;
    let localMax = 0;
    let localMaxFreq = -1;
    for (let bin = 0; bin < spectrum.length; bin += 1) {
      const power = spectrum[bin];
      if (power > threshold) {
        above = true;
      }
      if (!above) {
        continue;
      }

      if (power < threshold) {
        const index = expected.findIndex(
          freq => freq > localMaxFreq - accuracy && freq < localMaxFreq + accuracy
        );
        if (index >= 0) {
          detected[index] = true;
        } else {
          unexpected.push(localMaxFreq);
        }
        above = false;
        localMax = 0;
        localMaxFreq = -1;
      }

      if (power > localMax) {
        localMax = power;
        localMaxFreq = (rate * bin) / length;
      }
    }

    const matched = expected.filter((_, index) => detected[index]);
    const missing = expected.filter((_, index) => !detected[index]);
    return {
      detected: expected.length > 0 && missing.length === 0 && unexpected.length === 0,
      matched,
      missing,
      unexpected
    };
  }

  clean() {
    for (const entry of this.freqs) {
      entry.period = null;
      entry.offset = 0;
    }
  }

  private countFor(entry: SignalFrequency) {
    if (entry.channel >= 0) {
      return this.freqs.filter(other => appliesTo(other, entry.channel)).length;
    }
    let count = 0;
    for (let channel = 0; channel < this.channels; channel += 1) {
      count = Math.max(count, this.freqs.filter(other => appliesTo(other, channel)).length);
    }
    return count;
  }
}

/** Frequency actually played: clipped to a whole number of frames per period. */
export function effectiveFrequency(rate: number, frequency: number) {
  return rate / Math.floor(rate / frequency);
}

function appliesTo(entry: SignalFrequency, channel: number) {
  return entry.channel === -1 || entry.channel === channel;
}
