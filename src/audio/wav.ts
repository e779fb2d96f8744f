import fs from 'node:fs';
import path from 'node:path';
import { DiagnosticDumpError } from '../errors.js';

export const WAV_HEADER_BYTES = 44;

const UNKNOWN_SIZE = 0xffffffff;

/**
 * RIFF/WAVE header for S32_LE PCM. Both size fields are left at their maximum
 * since the dump is streamed and never rewritten.
 */
export function buildWavHeaderS32(sampleRate: number, channels: number): Buffer {
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  const bitsPerSample = 32;
  const blockAlign = (channels * bitsPerSample) / 8;

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(UNKNOWN_SIZE, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(UNKNOWN_SIZE, 40);
  return header;
}

export type DiagnosticDumpOptions = {
  directory: string;
  name: string;
  sampleRate: number;
  channels: number;
};

/** Raw capture written page by page; dropped when the run passes. */
export class DiagnosticDump {
  readonly path: string;
  private fd: number | null;
  private bytesWritten = 0;

  constructor(options: DiagnosticDumpOptions) {
    this.path = path.join(options.directory, `${options.name}.wav`);
    try {
      fs.mkdirSync(options.directory, { recursive: true });
      this.fd = fs.openSync(this.path, 'w');
      fs.writeSync(this.fd, buildWavHeaderS32(options.sampleRate, options.channels));
    } catch (error) {
      throw new DiagnosticDumpError(`Failed to create audio dump ${this.path}`, { cause: error });
    }
  }

  get size() {
    return this.bytesWritten;
  }

  write(samples: Int32Array) {
    if (this.fd === null) {
      throw new DiagnosticDumpError(`Audio dump ${this.path} is already closed`);
    }
    const bytes = Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
    try {
      fs.writeSync(this.fd, bytes);
    } catch (error) {
      throw new DiagnosticDumpError(`Failed to write audio dump ${this.path}`, { cause: error });
    }
    this.bytesWritten += bytes.length;
  }

  /** Returns the retained path, or null when the dump was removed. */
  close(keep: boolean): string | null {
    if (this.fd !== null) {
      const fd = this.fd;
      this.fd = null;
      fs.closeSync(fd);
    }
    if (keep) {
      return this.path;
    }
    fs.rmSync(this.path, { force: true });
    return null;
  }
}
