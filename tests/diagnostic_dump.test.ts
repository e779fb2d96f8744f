import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DiagnosticDump, WAV_HEADER_BYTES, buildWavHeaderS32 } from '../src/audio/wav.js';
import { DiagnosticDumpError } from '../src/errors.js';

describe('WavHeader', () => {
  it('describes streamed S32_LE PCM', () => {
    const header = buildWavHeaderS32(48000, 2);

    expect(header).toHaveLength(WAV_HEADER_BYTES);
    expect(header.toString('ascii', 0, 4)).toBe('RIFF');
    expect(header.toString('ascii', 8, 12)).toBe('WAVE');
    expect(header.toString('ascii', 36, 40)).toBe('data');
    expect(header.readUInt16LE(20)).toBe(1);
    expect(header.readUInt16LE(22)).toBe(2);
    expect(header.readUInt32LE(24)).toBe(48000);
    expect(header.readUInt32LE(28)).toBe(384000);
    expect(header.readUInt16LE(32)).toBe(8);
    expect(header.readUInt16LE(34)).toBe(32);
    expect(header.readUInt32LE(40)).toBe(0xffffffff);
  });
});

describe('DiagnosticDump', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'loopback-wav-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createDump(directory = path.join(tempDir, 'dumps')) {
    return new DiagnosticDump({ directory, name: 'capture', sampleRate: 48000, channels: 2 });
  }

  it('keeps header and samples when asked to', () => {
    const dump = createDump();
    dump.write(Int32Array.from([1, -1, 2, -2]));

    expect(dump.size).toBe(16);
    const kept = dump.close(true);
    expect(kept).toBe(path.join(tempDir, 'dumps', 'capture.wav'));

    const contents = fs.readFileSync(path.join(tempDir, 'dumps', 'capture.wav'));
    expect(contents).toHaveLength(WAV_HEADER_BYTES + 16);
    expect(contents.readInt32LE(WAV_HEADER_BYTES + 4)).toBe(-1);
  });

  it('removes the file when dropped', () => {
    const dump = createDump();
    dump.write(Int32Array.from([1, 2]));

    expect(dump.close(false)).toBeNull();
    expect(fs.existsSync(dump.path)).toBe(false);
  });

  it('refuses writes after closing', () => {
    const dump = createDump();
    dump.close(false);

    expect(() => dump.write(Int32Array.from([1]))).toThrow(`Audio dump ${dump.path} is already closed`);
  });

  it('reports directories it cannot create', () => {
    const blocker = path.join(tempDir, 'file');
    fs.writeFileSync(blocker, 'x');

    expect(() => createDump(path.join(blocker, 'nested'))).toThrow(DiagnosticDumpError);
  });
});
