import defaultLogger from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { AtomicFlag } from '../audio/atomicFlag.js';
import { DiagnosticDump } from '../audio/wav.js';
import type { CaptureFormat, AudioPage, AudioStream, CaptureSession } from '../capture/session.js';
import { CaptureStreamError, ChannelMappingError, InvalidStateError, PlaybackThreadError, toError } from '../errors.js';
import { PLAYBACK_SAMPLES, type PlaybackConfiguration, type PlaybackDriver } from '../playback/driver.js';
import { PlaybackThread } from '../playback/thread.js';
import type { Port } from '../utils/port.js';

export const DEFAULT_TIMEOUT_MS = 2000;

export type AudioStatus = 'init' | 'started' | 'running' | 'stopping' | 'done';

export interface AudioLog {
  debug(obj: Record<string, unknown>, message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  warn(obj: Record<string, unknown>, message: string): void;
  error(obj: Record<string, unknown>, message: string): void;
}

export type AudioStateOptions = {
  port: Port;
  session: CaptureSession;
  driver: PlaybackDriver;
  playback: PlaybackConfiguration;
  timeoutMs?: number;
  /** Directory for raw capture dumps; no dump is written when null. */
  dumpDirectory?: string | null;
  logger?: AudioLog;
  metrics?: MetricsRegistry;
};

/** Writes `frames` interleaved playback frames. */
export type SignalFill = (buffer: Float64Array, frames: number) => void;

/**
 * Turns the fixture's per-capture-channel mapping (value = playback channel)
 * into one capture channel per playback channel.
 */
export function invertChannelMapping(mapping: readonly number[], playbackChannels: number): number[] {
  const inverted = new Array<number>(playbackChannels).fill(-1);

  mapping.forEach((playbackChannel, captureChannel) => {
    if (playbackChannel < 0) {
      return;
    }
    if (playbackChannel >= playbackChannels) {
      throw new ChannelMappingError(
        `Capture channel ${captureChannel} carries playback channel ${playbackChannel}, only ${playbackChannels} played`,
        mapping
      );
    }
    if (inverted[playbackChannel] !== -1) {
      throw new ChannelMappingError(
        `Playback channel ${playbackChannel} mapped to capture channels ${inverted[playbackChannel]} and ${captureChannel}`,
        mapping
      );
    }
    inverted[playbackChannel] = captureChannel;
  });

  const missing = inverted.flatMap((captureChannel, playbackChannel) => (captureChannel < 0 ? [playbackChannel] : []));
  if (missing.length > 0) {
    throw new ChannelMappingError(`Playback channel(s) ${missing.join(', ')} missing from capture mapping`, mapping);
  }
  return inverted;
}

export function dumpFileName(port: Port, test: string, playback: PlaybackConfiguration, captureRate: number) {
  const portLabel = port.id.replace(/[^A-Za-z0-9_.-]+/g, '-');
  return `audio-${portLabel}-capture-${test}-${playback.format}-${playback.channels}ch-${captureRate}Hz`;
}

/**
 * Lifecycle of one playback/capture run: start both sides, hand out capture
 * pages while tracking elapsed capture time, then tear everything down.
 */
export class AudioState {
  readonly port: Port;
  readonly playback: PlaybackConfiguration;
  readonly timeoutMs: number;
  readonly session: CaptureSession;
  private readonly driver: PlaybackDriver;
  private readonly dumpDirectory: string | null;
  readonly log: AudioLog;
  readonly metrics: MetricsRegistry;
  private readonly runFlag = new AtomicFlag();

  private currentStatus: AudioStatus = 'init';
  private testName = '';
  private captureFormat: CaptureFormat = { kind: 'unknown' };
  private mapping: number[] = [];
  private stream: AudioStream | null = null;
  private thread: PlaybackThread | null = null;
  private playbackEnded: Promise<null> | null = null;
  private capturing = false;
  private dump: DiagnosticDump | null = null;
  private retainedDump: string | null = null;
  private frames = 0;
  private pages = 0;

  constructor(options: AudioStateOptions) {
    this.port = options.port;
    this.session = options.session;
    this.driver = options.driver;
    this.playback = { ...options.playback };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dumpDirectory = options.dumpDirectory ?? null;
    this.log = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get status(): AudioStatus {
    return this.currentStatus;
  }

  get capture(): CaptureFormat {
    return this.captureFormat;
  }

  /** Capture channel carrying each playback channel. */
  get channelMapping(): readonly number[] {
    return this.mapping;
  }

  get receivedPages() {
    return this.pages;
  }

  get receivedFrames() {
    return this.frames;
  }

  get elapsedMs() {
    return this.captureFormat.kind === 'known' ? (this.frames / this.captureFormat.rate) * 1000 : 0;
  }

  get timedOut() {
    return this.elapsedMs >= this.timeoutMs;
  }

  get logContext(): Record<string, unknown> {
    return {
      port: this.port.id,
      test: this.testName,
      format: this.playback.format,
      rate: this.playback.rate,
      channels: this.playback.channels
    };
  }

  /**
   * Runs `consume` between start and stop. Teardown always runs; an error
   * from `consume` wins over one raised during teardown.
   */
  async run(testName: string, fill: SignalFill, consume: () => Promise<boolean>): Promise<string | null> {
    let success = false;
    let failure: Error | null = null;
    try {
      await this.start(testName, fill);
      success = await consume();
    } catch (error) {
      failure = toError(error);
    }

    let dumpPath: string | null = null;
    try {
      dumpPath = await this.stop(success && failure === null);
    } catch (error) {
      failure = failure ?? toError(error);
    }

    if (failure) {
      throw failure;
    }
    return dumpPath;
  }

  /**
   * Starts a test run. A state that finished a previous run may be started
   * again for the next test of the same combination; per-run counters restart.
   */
  async start(testName: string, fill: SignalFill) {
    if (this.currentStatus !== 'init' && this.currentStatus !== 'done') {
      throw new InvalidStateError(`Audio state already ${this.currentStatus}`);
    }
    this.resetRun();
    this.testName = testName;
    this.currentStatus = 'started';
    const { format, channels, rate } = this.playback;
    this.log.debug(this.logContext, 'Starting audio loopback');

    this.driver.configure(format, channels, rate);

    await this.session.startCapturingAudio(this.port, false);
    this.capturing = true;
    this.stream = await this.session.openRealtimeStream('stop-when-overflow');

    this.driver.registerFillCallback((buffer, frames) => {
      if (!this.runFlag.isSet()) {
        return -1;
      }
      fill(buffer, frames);
      return 0;
    }, PLAYBACK_SAMPLES);
    this.runFlag.set();

    const thread = new PlaybackThread(this.driver);
    this.thread = thread;
    thread.start();
    this.playbackEnded = thread.settled().then(() => null);

    const reported = await this.session.getAudioFormat(this.port);
    if (!Number.isInteger(reported.channels) || reported.channels < 1) {
      throw new CaptureStreamError(`Fixture reported ${reported.channels} capture channel(s)`);
    }
    if (reported.rate > 0) {
      this.captureFormat = {
        kind: 'known',
        encoding: 'S32_LE',
        channels: reported.channels,
        rate: reported.rate,
        rateSource: 'fixture'
      };
    } else {
      this.log.debug(
        { ...this.logContext, assumedRate: rate },
        'Capture sampling rate unknown, assuming playback rate'
      );
      this.captureFormat = {
        kind: 'known',
        encoding: 'S32_LE',
        channels: reported.channels,
        rate,
        rateSource: 'playback-fallback'
      };
    }

    const mapping = await this.session.getAudioChannelMapping(this.port);
    this.mapping = invertChannelMapping(mapping, channels);
    const outOfRange = this.mapping.find(captureChannel => captureChannel >= reported.channels);
    if (outOfRange !== undefined) {
      throw new ChannelMappingError(
        `Capture channel ${outOfRange} exceeds the ${reported.channels} captured channel(s)`,
        mapping
      );
    }

    this.currentStatus = 'running';
    this.log.debug({ ...this.logContext, mapping: this.mapping }, 'Audio loopback running');
  }

  private resetRun() {
    this.captureFormat = { kind: 'unknown' };
    this.mapping = [];
    this.frames = 0;
    this.pages = 0;
    this.retainedDump = null;
  }

  /** Next capture page, in delivery order. */
  async receive(): Promise<AudioPage> {
    const stream = this.stream;
    const capture = this.captureFormat;
    if (this.currentStatus !== 'running' || !stream || capture.kind !== 'known') {
      throw new InvalidStateError(`Cannot receive audio while ${this.currentStatus}`);
    }

    const pending = stream.receive();
    const page = this.playbackEnded ? await Promise.race([pending, this.playbackEnded]) : await pending;
    if (page === null) {
      throw new PlaybackThreadError(`Audio playback ended before capture completed (${this.thread?.state ?? 'idle'})`);
    }

    const { samples } = page;
    if (samples.length === 0 || samples.length % capture.channels !== 0) {
      throw new CaptureStreamError(
        `Audio page ${page.pageCount} holds ${samples.length} sample(s) for ${capture.channels} channel(s)`
      );
    }

    this.frames += samples.length / capture.channels;
    this.pages += 1;
    this.metrics.recordPageReceived();

    if (this.dumpDirectory !== null) {
      if (!this.dump) {
        this.dump = new DiagnosticDump({
          directory: this.dumpDirectory,
          name: dumpFileName(this.port, this.testName, this.playback, capture.rate),
          sampleRate: capture.rate,
          channels: capture.channels
        });
      }
      this.dump.write(samples);
    }
    return page;
  }

  /**
   * Tears down playback and capture. Every step runs; the first error is
   * rethrown once all of them have. Returns the retained dump path, if any.
   */
  async stop(success: boolean): Promise<string | null> {
    if (this.currentStatus === 'done') {
      return this.retainedDump;
    }
    this.currentStatus = 'stopping';
    const errors: Error[] = [];
    const attempt = async (step: () => unknown) => {
      try {
        await step();
      } catch (error) {
        errors.push(toError(error));
      }
    };

    this.runFlag.clear();
    await attempt(() => this.thread?.join());
    await attempt(() => this.stream?.stop());
    await attempt(async () => {
      if (!this.capturing) {
        return;
      }
      this.capturing = false;
      const file = await this.session.stopCapturingAudio(this.port);
      if (file) {
        this.log.info({ ...this.logContext, path: file.path }, 'Fixture saved captured audio');
      }
    });
    const passed = success && errors.length === 0;
    await attempt(() => {
      if (this.dump) {
        this.retainedDump = this.dump.close(!passed);
        this.dump = null;
      }
    });

    this.stream = null;
    this.thread = null;
    this.playbackEnded = null;
    this.currentStatus = 'done';
    this.metrics.observeElapsed(this.testName, this.elapsedMs);

    const verdict = passed && errors.length === 0 ? 'ALL GREEN' : 'FAILED';
    const message = `Audio ${this.testName} test result for format ${this.playback.format}, sampling rate ${this.playback.rate} Hz and ${this.playback.channels} channels: ${verdict}`;
    const context = {
      ...this.logContext,
      elapsedMs: this.elapsedMs,
      receivedPages: this.pages,
      dumpPath: this.retainedDump
    };
    if (verdict === 'ALL GREEN') {
      this.log.debug(context, message);
    } else {
      this.log.error(context, message);
    }

    if (errors.length > 0) {
      throw errors[0];
    }
    return this.retainedDump;
  }
}
