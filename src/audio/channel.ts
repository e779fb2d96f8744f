import { INT32_MAX } from './format.js';

/**
 * Copies one channel of an interleaved S32_LE buffer into a mono buffer of
 * normalized samples.
 */
export function extractChannelS32(
  source: Int32Array,
  channels: number,
  channel: number,
  target?: Float64Array
): Float64Array {
  if (!Number.isInteger(channels) || channels <= 0) {
    throw new RangeError(`Invalid channel count ${channels}`);
  }
  if (!Number.isInteger(channel) || channel < 0 || channel >= channels) {
    throw new RangeError(`Channel ${channel} out of range for ${channels} channel(s)`);
  }
  if (source.length % channels !== 0) {
    throw new RangeError(`Buffer length ${source.length} is not a multiple of ${channels} channel(s)`);
  }

  const frames = source.length / channels;
  const output = target ?? new Float64Array(frames);
  if (output.length < frames) {
    throw new RangeError(`Target holds ${output.length} frame(s), ${frames} required`);
  }

  for (let frame = 0; frame < frames; frame += 1) {
    output[frame] = source[frame * channels + channel] / INT32_MAX;
  }
  return output;
}
