import { describe, expect, it } from 'vitest';
import { EmulatedFixture, type EmulatedFixtureOptions } from '../src/capture/emulated.js';
import { PAGE_FRAMES } from '../src/capture/session.js';
import { CaptureStreamError } from '../src/errors.js';
import { TEST_PORT, captureRouting } from './helpers/loopback.js';

async function playPages(fixture: EmulatedFixture, pages: number, levels: [number, number] = [0.5, -0.25]) {
  const driver = fixture.createPlaybackDriver();
  driver.configure('S16_LE', 2, 48000);
  driver.open('emulated');
  let remaining = pages;
  driver.registerFillCallback((buffer, frames) => {
    if (remaining === 0) {
      return 1;
    }
    remaining -= 1;
    for (let frame = 0; frame < frames; frame += 1) {
      buffer[frame * 2] = levels[0];
      buffer[frame * 2 + 1] = levels[1];
    }
    return 0;
  }, PAGE_FRAMES);
  await driver.run();
}

async function startFixture(options: EmulatedFixtureOptions = {}) {
  const fixture = new EmulatedFixture({ captureChannels: 4, ...options });
  await fixture.startCapturingAudio(TEST_PORT, false);
  const stream = await fixture.openRealtimeStream('stop-when-overflow');
  return { fixture, stream };
}

describe('EmulatedFixture', () => {
  it('routes playback channels into S32 capture pages', async () => {
    const { fixture, stream } = await startFixture();
    await playPages(fixture, 1);

    const page = await stream.receive();
    expect(page.pageCount).toBe(1);
    expect(page.samples).toHaveLength(PAGE_FRAMES * 4);
    expect(Array.from(page.samples.subarray(0, 4))).toEqual([1073676288, -536805376, 0, 0]);
  });

  it('reports the routing it applies unless told otherwise', async () => {
    const { fixture } = await startFixture();
    await playPages(fixture, 1);

    expect(await fixture.getAudioChannelMapping(TEST_PORT)).toEqual([0, 1, -1, -1]);
    expect(await fixture.getAudioFormat(TEST_PORT)).toEqual({ rate: 48000, channels: 4 });

    const misreporting = new EmulatedFixture({ reportedMapping: captureRouting(1, 0), reportedRate: 0 });
    expect(await misreporting.getAudioChannelMapping(TEST_PORT)).toEqual(captureRouting(1, 0));
    expect((await misreporting.getAudioFormat(TEST_PORT)).rate).toBe(0);
  });

  it('delays a capture channel by leading silent frames', async () => {
    const { fixture, stream } = await startFixture({ channelDelays: [0, 3] });
    await playPages(fixture, 1);

    const { samples } = await stream.receive();
    const channel1 = Array.from({ length: 5 }, (_, frame) => samples[frame * 4 + 1]);
    expect(channel1).toEqual([0, 0, 0, -536805376, -536805376]);
    expect(samples[0]).toBe(1073676288);
  });

  it('drops audio while not capturing', async () => {
    const fixture = new EmulatedFixture();
    await fixture.openRealtimeStream('stop-when-overflow');
    await playPages(fixture, 2);

    expect(fixture.pagesDelivered).toBe(0);
  });

  it('fails the stream once too many pages queue up', async () => {
    const { fixture, stream } = await startFixture({ maxQueuedPages: 2 });
    await playPages(fixture, 3);

    expect((await stream.receive()).pageCount).toBe(1);
    expect((await stream.receive()).pageCount).toBe(2);
    await expect(stream.receive()).rejects.toThrow('Audio stream overflowed after 2 queued page(s)');
  });

  it('rejects a pending receive when the stream stops', async () => {
    const { stream } = await startFixture();
    const pending = stream.receive();
    await stream.stop();

    await expect(pending).rejects.toThrow('Audio stream is stopped');
  });

  it('can refuse to open a stream', async () => {
    const fixture = new EmulatedFixture({ faults: { openStream: true } });

    await expect(fixture.openRealtimeStream('stop-when-overflow')).rejects.toBeInstanceOf(CaptureStreamError);
  });

  it('reports an audio InfoFrame matching the playback format', async () => {
    const { fixture } = await startFixture();
    await playPages(fixture, 1);

    const frame = await fixture.getLastInfoFrame?.(TEST_PORT, 'audio');
    expect(frame?.version).toBe(1);
    expect(Array.from(frame?.payload.subarray(0, 2) ?? [])).toEqual([0x11, 0x0d]);
    expect(await fixture.getLastInfoFrame?.(TEST_PORT, 'avi')).toBeNull();
    expect(new EmulatedFixture({ supportsInfoFrame: false }).getLastInfoFrame).toBeUndefined();
  });
});
