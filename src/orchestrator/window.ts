/**
 * Gathers interleaved capture pages into fixed-size analysis windows. Samples
 * past the end of a window start the next one.
 */
export class CaptureWindow {
  private readonly buffer: Int32Array;
  private filled = 0;

  constructor(
    readonly channels: number,
    readonly frames: number
  ) {
    if (!Number.isInteger(channels) || channels < 1) {
      throw new RangeError(`Invalid channel count ${channels}`);
    }
    if (!Number.isInteger(frames) || frames < 1) {
      throw new RangeError(`Invalid window size ${frames}`);
    }
    this.buffer = new Int32Array(frames * channels);
  }

  /** Frames waiting for the current window to fill. */
  get pendingFrames() {
    return this.filled / this.channels;
  }

  /**
   * Appends a page and yields each window it completes. The yielded array is
   * reused, so read it before resuming.
   */
  *append(samples: Int32Array): Generator<Int32Array, void, undefined> {
    if (samples.length % this.channels !== 0) {
      throw new RangeError(`Page of ${samples.length} sample(s) does not fit ${this.channels} channel(s)`);
    }
    let offset = 0;
    while (offset < samples.length) {
      const take = Math.min(samples.length - offset, this.buffer.length - this.filled);
      this.buffer.set(samples.subarray(offset, offset + take), this.filled);
      this.filled += take;
      offset += take;
      if (this.filled === this.buffer.length) {
        this.filled = 0;
        yield this.buffer;
      }
    }
  }

  reset() {
    this.filled = 0;
  }
}
