export const PCM_FORMAT_NAMES = ['S16_LE', 'S24_LE', 'S32_LE'] as const;

export type PcmFormatName = (typeof PCM_FORMAT_NAMES)[number];

export type PcmFormat = {
  name: PcmFormatName;
  /** Significant bits per sample. */
  width: 16 | 24 | 32;
  /** Bytes per sample in the device container; S24_LE sits in 32 bits. */
  containerBytes: 2 | 4;
  /** Bytes per sample in a packed raw stream. */
  packedBytes: 2 | 3 | 4;
  /** ffmpeg raw demuxer name for the packed layout. */
  ffmpegName: 's16le' | 's24le' | 's32le';
  max: number;
};

export type PcmLayout = 'container' | 'packed';

const FORMATS: Record<PcmFormatName, PcmFormat> = {
  S16_LE: { name: 'S16_LE', width: 16, containerBytes: 2, packedBytes: 2, ffmpegName: 's16le', max: 0x7fff },
  S24_LE: { name: 'S24_LE', width: 24, containerBytes: 4, packedBytes: 3, ffmpegName: 's24le', max: 0x7fffff },
  S32_LE: { name: 'S32_LE', width: 32, containerBytes: 4, packedBytes: 4, ffmpegName: 's32le', max: 0x7fffffff }
};

export const INT32_MAX = 0x7fffffff;

export function isPcmFormatName(value: string): value is PcmFormatName {
  return PCM_FORMAT_NAMES.some(name => name === value);
}

export function getPcmFormat(name: PcmFormatName): PcmFormat {
  return FORMATS[name];
}

function bytesPerSample(format: PcmFormat, layout: PcmLayout) {
  return layout === 'packed' ? format.packedBytes : format.containerBytes;
}

function clamp(value: number) {
  if (value > 1) {
    return 1;
  }
  if (value < -1) {
    return -1;
  }
  return value;
}

/**
 * Converts normalized interleaved samples to little-endian PCM. Values are
 * truncated toward zero after scaling, so 0.1 in S16_LE becomes 3276.
 */
export function encodePcm(samples: ArrayLike<number>, name: PcmFormatName, layout: PcmLayout = 'container'): Buffer {
  const format = FORMATS[name];
  const stride = bytesPerSample(format, layout);
  const output = Buffer.alloc(samples.length * stride);

  for (let index = 0; index < samples.length; index += 1) {
    const value = Math.trunc(clamp(samples[index]) * format.max);
    const offset = index * stride;
    if (stride === 2) {
      output.writeInt16LE(value, offset);
    } else if (stride === 3) {
      output.writeIntLE(value, offset, 3);
    } else {
      output.writeInt32LE(value, offset);
    }
  }

  return output;
}

/** Reads PCM back to integer sample values at the format's own width. */
export function decodePcm(buffer: Buffer, name: PcmFormatName, layout: PcmLayout = 'container'): Int32Array {
  const format = FORMATS[name];
  const stride = bytesPerSample(format, layout);
  const count = Math.floor(buffer.length / stride);
  const output = new Int32Array(count);

  for (let index = 0; index < count; index += 1) {
    const offset = index * stride;
    if (stride === 2) {
      output[index] = buffer.readInt16LE(offset);
    } else if (stride === 3) {
      output[index] = buffer.readIntLE(offset, 3);
    } else if (format.width === 24) {
      output[index] = buffer.readIntLE(offset, 3);
    } else {
      output[index] = buffer.readInt32LE(offset);
    }
  }

  return output;
}

/** Left-aligns integer samples of the given format into S32_LE range. */
export function widenToS32(samples: Int32Array, name: PcmFormatName): Int32Array {
  const shift = 32 - FORMATS[name].width;
  if (shift === 0) {
    return samples.slice();
  }
  return samples.map(value => value << shift);
}
