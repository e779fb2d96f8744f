import { describe, expect, it } from 'vitest';
import { AudioSignal, effectiveFrequency } from '../src/audio/signal.js';
import { FLATLINE_AMPLITUDE, detectFallingEdge, detectFlatlineAmplitude } from '../src/audio/detectors.js';

function render(signal: AudioSignal, frames: number, channel = 0) {
  const buffer = new Float64Array(frames * signal.channels);
  signal.fill(buffer, frames);
  return Float64Array.from({ length: frames }, (_, frame) => buffer[frame * signal.channels + channel]);
}

describe('AudioSignal', () => {
  it('rejects tones above Nyquist and keeps tones at it', () => {
    const signal = new AudioSignal(2, 48000);

    expect(signal.addFrequency(80000)).toBe(false);
    expect(signal.addFrequency(24000)).toBe(true);
    expect(signal.frequenciesFor(1)).toEqual([24000]);
  });

  it('clips tones to a whole number of frames per period', () => {
    const signal = new AudioSignal(2, 48000);
    signal.addFrequency(10000, 0);

    expect(signal.frequenciesFor(0)).toEqual([12000]);
    expect(signal.frequenciesFor(1)).toEqual([]);
    expect(effectiveFrequency(32000, 300)).toBeCloseTo(301.887, 3);
  });

  it('refuses to fill before synthesis', () => {
    const signal = new AudioSignal(1, 48000);
    signal.addFrequency(12000);

    expect(() => signal.fill(new Float64Array(4), 4)).toThrow('Signal must be synthesized before filling');
  });

  it('keeps phase across consecutive fills', () => {
    const signal = new AudioSignal(2, 48000);
    signal.addFrequency(12000, 0);
    signal.synthesize();

    const first = new Float64Array(6);
    signal.fill(first, 3);
    const second = new Float64Array(4);
    signal.fill(second, 2);

    expect(first[0]).toBeCloseTo(0, 10);
    expect(first[2]).toBeCloseTo(1, 10);
    expect(first[4]).toBeCloseTo(0, 10);
    expect(second[0]).toBeCloseTo(-1, 10);
    expect(second[2]).toBeCloseTo(0, 10);
    expect(first[1]).toBe(0);
    expect(second[1]).toBe(0);
  });

  it('splits the full scale between the tones of a channel', () => {
    const signal = new AudioSignal(1, 48000);
    signal.addFrequency(12000);
    signal.addFrequency(6000);
    signal.synthesize();

    const samples = render(signal, 8);
    expect(Math.max(...samples)).toBeLessThanOrEqual(1);
    expect(samples[1]).toBeCloseTo(0.5 + 0.5 * Math.sin(Math.PI / 4), 10);
    expect(samples[2]).toBeCloseTo(0.5, 10);
  });

  it('detects exactly the expected tones', () => {
    const signal = new AudioSignal(1, 48000);
    signal.addFrequency(1200);
    signal.addFrequency(6000);
    signal.synthesize();
    const samples = render(signal, 2048);

    const report = signal.analyze(48000, 0, samples);
    expect(report.detected).toBe(true);
    expect(report.matched).toEqual([1200, 6000]);
    expect(signal.detect(48000, 0, samples)).toBe(true);
  });

  it('reports tones that were not expected', () => {
    const played = new AudioSignal(1, 48000);
    played.addFrequency(1200);
    played.addFrequency(6000);
    played.synthesize();
    const samples = render(played, 2048);

    const expected = new AudioSignal(1, 48000);
    expected.addFrequency(1200);
    const report = expected.analyze(48000, 0, samples);

    expect(report.detected).toBe(false);
    expect(report.matched).toEqual([1200]);
    expect(report.unexpected).toEqual([6000]);
  });

  it('reports expected tones that are missing', () => {
    const played = new AudioSignal(1, 48000);
    played.addFrequency(6000);
    played.synthesize();
    const samples = render(played, 2048);

    const expected = new AudioSignal(1, 48000);
    expected.addFrequency(1200);
    expected.addFrequency(6000);
    const report = expected.analyze(48000, 0, samples);

    expect(report.detected).toBe(false);
    expect(report.missing).toEqual([1200]);
  });

  it('requires a power-of-two window', () => {
    const signal = new AudioSignal(1, 48000);
    signal.addFrequency(1200);

    expect(() => signal.analyze(48000, 0, new Float64Array(1000))).toThrow(
      'Detection window must be a power of two, got 1000'
    );
  });
});

describe('FlatlineDetectors', () => {
  it('accepts samples within the amplitude tolerance', () => {
    expect(detectFlatlineAmplitude([0.0995, 0.1005], true).ok).toBe(true);
    expect(detectFlatlineAmplitude([-0.0995, -0.1005], false).ok).toBe(true);
  });

  it('rejects samples outside the tolerance or of the wrong polarity', () => {
    const reading = detectFlatlineAmplitude([0.1, 0.1012], true);

    expect(reading).toEqual({ ok: false, expected: FLATLINE_AMPLITUDE, min: 0.1, max: 0.1012 });
    expect(detectFlatlineAmplitude([0.1, 0.1], false).ok).toBe(false);
    expect(detectFlatlineAmplitude([], true).ok).toBe(false);
  });

  it('finds the first negative sample', () => {
    expect(detectFallingEdge([0.1, 0, 0.1, -0.1, -0.1])).toBe(3);
    expect(detectFallingEdge([0.1, 0, -0])).toBe(-1);
  });
});
