import { describe, expect, it } from 'vitest';
import { InvalidStateError, PlaybackThreadError } from '../src/errors.js';
import { BasePlaybackDriver, FfmpegPlaybackDriver, type PlaybackConfiguration } from '../src/playback/driver.js';
import { PlaybackThread } from '../src/playback/thread.js';

class RecordingDriver extends BasePlaybackDriver {
  writes: number[][] = [];
  ended = false;

  constructor(private readonly failOnWrite?: number) {
    super();
  }

  testConfiguration() {
    return true;
  }

  protected async begin(_configuration: PlaybackConfiguration) {
    this.ended = false;
  }

  protected async write(buffer: Float64Array) {
    this.writes.push(Array.from(buffer));
    if (this.writes.length === this.failOnWrite) {
      throw new Error('device lost');
    }
  }

  protected async end() {
    this.ended = true;
  }
}

function countdown(calls: number) {
  let remaining = calls;
  return (buffer: Float64Array) => {
    if (remaining === 0) {
      return 1;
    }
    remaining -= 1;
    buffer.fill(remaining);
    return 0;
  };
}

describe('PlaybackThread', () => {
  it('requires an opened, configured driver with a fill callback', async () => {
    const driver = new RecordingDriver();
    driver.configure('S16_LE', 2, 48000);

    await expect(driver.run()).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('plays until the fill callback asks to stop', async () => {
    const driver = new RecordingDriver();
    driver.configure('S16_LE', 1, 48000);
    driver.open('default');
    driver.registerFillCallback(countdown(3), 2);

    const thread = new PlaybackThread(driver);
    thread.start();
    expect(thread.state).toBe('running');
    await thread.join();

    expect(thread.state).toBe('finished');
    expect(driver.writes).toEqual([
      [2, 2],
      [1, 1],
      [0, 0]
    ]);
    expect(driver.ended).toBe(true);
  });

  it('surfaces a failed playback loop on join', async () => {
    const driver = new RecordingDriver(2);
    driver.configure('S16_LE', 1, 48000);
    driver.open('default');
    driver.registerFillCallback(countdown(5), 1);

    const thread = new PlaybackThread(driver);
    thread.start();
    await thread.settled();

    expect(thread.state).toBe('failed');
    expect(driver.ended).toBe(true);
    await expect(thread.join()).rejects.toThrow('Audio playback thread failed: device lost');
  });

  it('refuses to start twice', () => {
    const driver = new RecordingDriver();
    driver.configure('S16_LE', 1, 48000);
    driver.open('default');
    driver.registerFillCallback(countdown(0), 1);

    const thread = new PlaybackThread(driver);
    thread.start();

    expect(() => thread.start()).toThrow(PlaybackThreadError);
  });

  it('rejects an empty playback window', () => {
    expect(() => new RecordingDriver().registerFillCallback(countdown(1), 0)).toThrow('Invalid playback window 0');
  });
});

describe('FfmpegPlaybackDriver', () => {
  it('pipes packed PCM into the output device', () => {
    const driver = new FfmpegPlaybackDriver({ binary: 'ffmpeg' });

    expect(driver.buildArgs({ format: 'S24_LE', channels: 2, rate: 48000 }, 'hw:0')).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      's24le',
      '-ar',
      '48000',
      '-ac',
      '2',
      '-i',
      'pipe:0',
      '-f',
      'alsa',
      'hw:0'
    ]);
  });

  it('limits channel counts and sampling rates', () => {
    const driver = new FfmpegPlaybackDriver({ binary: 'ffmpeg' });

    expect(driver.testConfiguration('S16_LE', 2, 48000)).toBe(true);
    expect(driver.testConfiguration('S16_LE', 9, 48000)).toBe(false);
    expect(driver.testConfiguration('S16_LE', 2, 4000)).toBe(false);
  });
});
