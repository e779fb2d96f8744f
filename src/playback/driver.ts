import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { once } from 'node:events';
import process from 'node:process';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { encodePcm, getPcmFormat, type PcmFormatName } from '../audio/format.js';
import { InvalidStateError, PlaybackThreadError } from '../errors.js';

export const PLAYBACK_SAMPLES = 1024;

/**
 * Fills `frames` interleaved frames of normalized samples. A non-zero return
 * ends playback.
 */
export type FillCallback = (buffer: Float64Array, frames: number) => number;

export type PlaybackConfiguration = {
  format: PcmFormatName;
  channels: number;
  rate: number;
};

export interface PlaybackDriver {
  testConfiguration(format: PcmFormatName, channels: number, rate: number): boolean;
  configure(format: PcmFormatName, channels: number, rate: number): void;
  open(device: string): void;
  registerFillCallback(callback: FillCallback, windowFrames: number): void;
  /** Resolves once the fill callback asks to stop. */
  run(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Shared bookkeeping for drivers: configuration, device and callback
 * registration, plus the fill loop itself.
 */
export abstract class BasePlaybackDriver implements PlaybackDriver {
  protected device: string | null = null;
  protected configuration: PlaybackConfiguration | null = null;
  private callback: FillCallback | null = null;
  private windowFrames = PLAYBACK_SAMPLES;

  abstract testConfiguration(format: PcmFormatName, channels: number, rate: number): boolean;

  configure(format: PcmFormatName, channels: number, rate: number) {
    this.configuration = { format, channels, rate };
  }

  open(device: string) {
    this.device = device;
  }

  registerFillCallback(callback: FillCallback, windowFrames = PLAYBACK_SAMPLES) {
    if (!Number.isInteger(windowFrames) || windowFrames <= 0) {
      throw new RangeError(`Invalid playback window ${windowFrames}`);
    }
    this.callback = callback;
    this.windowFrames = windowFrames;
  }

  async run(): Promise<void> {
    const configuration = this.configuration;
    const callback = this.callback;
    if (!configuration || !callback || this.device === null) {
      throw new InvalidStateError('Playback driver must be opened, configured and given a fill callback');
    }

    await this.begin(configuration);
    const buffer = new Float64Array(this.windowFrames * configuration.channels);
    try {
      while (callback(buffer, this.windowFrames) === 0) {
        await this.write(buffer, configuration);
      }
    } finally {
      await this.end();
    }
  }

  async close() {
    this.device = null;
  }

  protected abstract begin(configuration: PlaybackConfiguration): Promise<void>;
  protected abstract write(buffer: Float64Array, configuration: PlaybackConfiguration): Promise<void>;
  protected abstract end(): Promise<void>;
}

export type FfmpegPlaybackOptions = {
  binary?: string;
  /** ffmpeg output device format, `alsa` on Linux. */
  outputFormat?: string;
};

const MIN_RATE = 8000;
const MAX_RATE = 192000;
const MAX_CHANNELS = 8;

/** Streams PCM through an ffmpeg child process into an output device. */
export class FfmpegPlaybackDriver extends BasePlaybackDriver {
  private process: ChildProcessWithoutNullStreams | null = null;
  private exit: Promise<number | null> | null = null;
  private failure: Error | null = null;
  private stderr: string[] = [];
  private readonly binary: string;
  private readonly outputFormat: string;

  constructor(options: FfmpegPlaybackOptions = {}) {
    super();
    this.binary = options.binary ?? process.env.FFMPEG_PATH ?? 'ffmpeg';
    this.outputFormat = options.outputFormat ?? 'alsa';
  }

  testConfiguration(_format: PcmFormatName, channels: number, rate: number) {
    return channels >= 1 && channels <= MAX_CHANNELS && rate >= MIN_RATE && rate <= MAX_RATE;
  }

  buildArgs(configuration: PlaybackConfiguration, device: string): string[] {
    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      getPcmFormat(configuration.format).ffmpegName,
      '-ar',
      String(configuration.rate),
      '-ac',
      String(configuration.channels),
      '-i',
      'pipe:0',
      '-f',
      this.outputFormat,
      device
    ];
  }

  protected async begin(configuration: PlaybackConfiguration) {
    const device = this.device ?? 'default';
    const proc = spawn(this.binary, this.buildArgs(configuration, device));
    this.failure = null;
    this.stderr = [];
    proc.on('error', error => {
      this.failure = error;
    });
    proc.stdin.on('error', error => {
      this.failure = error;
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      this.stderr.push(chunk.toString());
    });
    this.exit = new Promise<number | null>(resolve => {
      proc.once('close', code => {
        resolve(code);
      });
    });

    try {
      await once(proc, 'spawn');
    } catch (error) {
      this.exit = null;
      throw new PlaybackThreadError(`Failed to start ${this.binary}`, { cause: error });
    }
    this.process = proc;
  }

  protected async write(buffer: Float64Array, configuration: PlaybackConfiguration) {
    const proc = this.process;
    if (!proc) {
      throw new InvalidStateError('Playback process is not running');
    }
    if (this.failure) {
      throw new PlaybackThreadError(`Playback through ${this.binary} failed`, { cause: this.failure });
    }
    const chunk = encodePcm(buffer, configuration.format, 'packed');
    if (!proc.stdin.write(chunk)) {
      await once(proc.stdin, 'drain');
    } else {
      await yieldToEventLoop();
    }
  }

  protected async end() {
    const proc = this.process;
    const exit = this.exit;
    this.process = null;
    this.exit = null;
    if (!proc || !exit) {
      return;
    }
    proc.stdin.end();
    const code = await exit;
    if (code !== 0 && code !== null) {
      throw new PlaybackThreadError(`${this.binary} exited with code ${code}: ${this.stderr.join('').trim()}`);
    }
  }

  async close() {
    const proc = this.process;
    const exit = this.exit;
    this.process = null;
    this.exit = null;
    if (proc && exit) {
      if (proc.exitCode === null) {
        proc.kill('SIGTERM');
      }
      await exit;
    }
    await super.close();
  }
}
