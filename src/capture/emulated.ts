import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { decodePcm, encodePcm, widenToS32 } from '../audio/format.js';
import { CaptureStreamError, InvalidStateError, PlaybackThreadError } from '../errors.js';
import { buildAudioInfoFrame, expectedInfoFrame } from '../infoframe/audio.js';
import { BasePlaybackDriver, type PlaybackConfiguration } from '../playback/driver.js';
import type { Port } from '../utils/port.js';
import {
  MAX_CAPTURE_CHANNELS,
  PAGE_FRAMES,
  type AudioPage,
  type AudioStream,
  type CaptureSession,
  type CapturedAudioFile,
  type InfoFrameKind,
  type RawInfoFrame,
  type ReportedAudioFormat,
  type StreamMode
} from './session.js';

const DEFAULT_SUPPORTED_RATES = [32000, 44100, 48000, 88200, 96000, 176400, 192000];
const DEFAULT_MAX_QUEUED_PAGES = 1024;

export type EmulatedFixtureOptions = {
  captureChannels?: number;
  /** Playback channel carried by each capture channel, -1 for silence. Defaults to 1:1. */
  routing?: number[];
  /** Mapping the fixture reports; defaults to the routing it really applies. */
  reportedMapping?: number[];
  /** Rate the receiver reports. 0 means it cannot tell; omitted means the playback rate. */
  reportedRate?: number;
  /** Leading silent frames per capture channel. */
  channelDelays?: number[];
  /** Last audio InfoFrame. Omitted builds one from the playback format; null means none arrived. */
  infoFrame?: RawInfoFrame | null;
  supportsInfoFrame?: boolean;
  supportedRates?: number[];
  maxQueuedPages?: number;
  faults?: {
    openStream?: boolean;
    playback?: boolean;
  };
};

class EmulatedAudioStream implements AudioStream {
  private readonly queue: AudioPage[] = [];
  private waiter: { resolve: (page: AudioPage) => void; reject: (error: Error) => void } | null = null;
  private failure: Error | null = null;
  private stopped = false;

  constructor(private readonly maxQueuedPages: number) {}

  get active() {
    return !this.stopped && this.failure === null;
  }

  push(page: AudioPage) {
    if (!this.active) {
      return;
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(page);
      return;
    }
    if (this.queue.length >= this.maxQueuedPages) {
      this.fail(new CaptureStreamError(`Audio stream overflowed after ${this.maxQueuedPages} queued page(s)`));
      return;
    }
    this.queue.push(page);
  }

  receive(): Promise<AudioPage> {
    const page = this.queue.shift();
    if (page) {
      return Promise.resolve(page);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.stopped) {
      return Promise.reject(new CaptureStreamError('Audio stream is stopped'));
    }
    if (this.waiter) {
      return Promise.reject(new CaptureStreamError('Audio stream already has a pending receive'));
    }
    return new Promise<AudioPage>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  async stop() {
    this.stopped = true;
    this.queue.length = 0;
    this.rejectWaiter(new CaptureStreamError('Audio stream is stopped'));
  }

  private fail(error: Error) {
    this.failure = error;
    this.rejectWaiter(error);
  }

  private rejectWaiter(error: Error) {
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
  }
}

/**
 * In-process loopback fixture. Its playback driver hands PCM straight to the
 * capture side, which routes, delays and pages it like the hardware receiver.
 */
export class EmulatedFixture implements CaptureSession {
  readonly captureChannels: number;
  readonly getLastInfoFrame?: (port: Port, kind: InfoFrameKind) => Promise<RawInfoFrame | null>;
  private readonly options: EmulatedFixtureOptions;
  private playback: PlaybackConfiguration | null = null;
  private playing = false;
  private capturing = false;
  private stream: EmulatedAudioStream | null = null;
  private page: Int32Array;
  private pageFill = 0;
  private pageCount = 0;
  private delayLines: Array<{ line: Int32Array; index: number }> = [];
  private readonly calls: string[] = [];

  constructor(options: EmulatedFixtureOptions = {}) {
    this.options = options;
    this.captureChannels = options.captureChannels ?? MAX_CAPTURE_CHANNELS;
    if (this.captureChannels < 1 || this.captureChannels > MAX_CAPTURE_CHANNELS) {
      throw new RangeError(`Emulated fixture supports 1-${MAX_CAPTURE_CHANNELS} capture channels`);
    }
    this.page = new Int32Array(PAGE_FRAMES * this.captureChannels);

    if (options.supportsInfoFrame ?? true) {
      this.getLastInfoFrame = async (_port, kind) => {
        this.calls.push(`getLastInfoFrame:${kind}`);
        if (kind !== 'audio') {
          return null;
        }
        if (options.infoFrame !== undefined) {
          return options.infoFrame;
        }
        return this.playback ? buildAudioInfoFrame(expectedInfoFrame(this.playback)) : null;
      };
    }
  }

  /** Order of session calls, for asserting lifecycle sequencing. */
  get callLog(): readonly string[] {
    return this.calls;
  }

  get pagesDelivered() {
    return this.pageCount;
  }

  createPlaybackDriver(): EmulatedPlaybackDriver {
    return new EmulatedPlaybackDriver(this);
  }

  supports(channels: number, rate: number) {
    const rates = this.options.supportedRates ?? DEFAULT_SUPPORTED_RATES;
    return channels >= 1 && channels <= MAX_CAPTURE_CHANNELS && rates.includes(rate);
  }

  async startCapturingAudio(_port: Port, _saveToFile: boolean) {
    this.calls.push('startCapturingAudio');
    this.capturing = true;
  }

  async getAudioFormat(_port: Port): Promise<ReportedAudioFormat> {
    this.calls.push('getAudioFormat');
    const rate = this.options.reportedRate ?? this.playback?.rate ?? 0;
    return { rate, channels: this.captureChannels };
  }

  async getAudioChannelMapping(_port: Port): Promise<number[]> {
    this.calls.push('getAudioChannelMapping');
    return (this.options.reportedMapping ?? this.resolveRouting()).slice();
  }

  async openRealtimeStream(_mode: StreamMode): Promise<AudioStream> {
    this.calls.push('openRealtimeStream');
    if (this.options.faults?.openStream) {
      throw new CaptureStreamError('Failed to start streaming audio capture');
    }
    this.stream = new EmulatedAudioStream(this.options.maxQueuedPages ?? DEFAULT_MAX_QUEUED_PAGES);
    this.pageFill = 0;
    return this.stream;
  }

  async stopCapturingAudio(_port: Port): Promise<CapturedAudioFile | null> {
    this.calls.push('stopCapturingAudio');
    this.capturing = false;
    return null;
  }

  /** @internal */
  beginPlayback(configuration: PlaybackConfiguration) {
    this.playback = configuration;
    this.playing = true;
    this.delayLines = Array.from({ length: this.captureChannels }, (_, channel) => ({
      line: new Int32Array(Math.max(0, this.options.channelDelays?.[channel] ?? 0)),
      index: 0
    }));
  }

  /** @internal Receives interleaved playback frames already widened to S32. */
  deliver(samples: Int32Array) {
    const playback = this.playback;
    if (!playback || !this.playing) {
      throw new InvalidStateError('Emulated playback has not begun');
    }
    if (this.options.faults?.playback) {
      throw new PlaybackThreadError('Emulated playback device stopped responding');
    }
    const routing = this.resolveRouting();
    const frames = samples.length / playback.channels;

    for (let frame = 0; frame < frames; frame += 1) {
      for (let channel = 0; channel < this.captureChannels; channel += 1) {
        const source = routing[channel] ?? -1;
        const value = source >= 0 && source < playback.channels ? samples[frame * playback.channels + source] : 0;
        this.page[this.pageFill * this.captureChannels + channel] = this.delay(channel, value);
      }
      this.pageFill += 1;
      if (this.pageFill === PAGE_FRAMES) {
        this.flushPage();
      }
    }
  }

  /** @internal */
  endPlayback() {
    this.playing = false;
  }

  private delay(channel: number, value: number) {
    const entry = this.delayLines[channel];
    if (!entry || entry.line.length === 0) {
      return value;
    }
    const delayed = entry.line[entry.index];
    entry.line[entry.index] = value;
    entry.index = (entry.index + 1) % entry.line.length;
    return delayed;
  }

  private flushPage() {
    const page = this.page;
    this.page = new Int32Array(PAGE_FRAMES * this.captureChannels);
    this.pageFill = 0;
    if (!this.capturing || !this.stream?.active) {
      return;
    }
    this.pageCount += 1;
    this.stream.push({ pageCount: this.pageCount, samples: page });
  }

  private resolveRouting(): number[] {
    if (this.options.routing) {
      return this.options.routing;
    }
    const channels = this.playback?.channels ?? 0;
    return Array.from({ length: this.captureChannels }, (_, channel) => (channel < channels ? channel : -1));
  }
}

/** Playback side of the emulated fixture. */
export class EmulatedPlaybackDriver extends BasePlaybackDriver {
  constructor(private readonly fixture: EmulatedFixture) {
    super();
  }

  testConfiguration(_format: string, channels: number, rate: number) {
    return this.fixture.supports(channels, rate);
  }

  protected async begin(configuration: PlaybackConfiguration) {
    this.fixture.beginPlayback(configuration);
  }

  protected async write(buffer: Float64Array, configuration: PlaybackConfiguration) {
    const pcm = encodePcm(buffer, configuration.format, 'container');
    this.fixture.deliver(widenToS32(decodePcm(pcm, configuration.format, 'container'), configuration.format));
    await yieldToEventLoop();
  }

  protected async end() {
    this.fixture.endPlayback();
  }
}
