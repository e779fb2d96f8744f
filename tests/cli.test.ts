import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EmulatedFixture } from '../src/capture/emulated.js';
import {
  __test__,
  createHarness,
  formatCombination,
  registerCaptureSession,
  resolveExitCode,
  runCli
} from '../src/cli.js';
import { ConfigManager, loadConfigFromFile, type VerifierConfig } from '../src/config/index.js';
import { clearEvents } from '../src/db.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import { FfmpegPlaybackDriver } from '../src/playback/driver.js';
import { captureRouting, createTestIo } from './helpers/loopback.js';

const BASE_CONFIG = {
  app: { name: 'audio-loopback-verifier' },
  logging: { level: 'silent' },
  database: { path: ':memory:' },
  audio: {
    port: 'hdmi:HDMI-A-1',
    device: 'emulated',
    timeoutMs: 2000,
    channels: 2,
    rates: [48000],
    formats: ['S16_LE', 'S24_LE'],
    frequencies: [300, 600, 1200, 10000, 80000],
    dumpDirectory: null
  }
};

describe('LoopbackCli', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'loopback-cli-'));
    clearEvents();
  });

  afterEach(() => {
    __test__.setHarnessFactory(null);
    registerCaptureSession(null);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(audio: Partial<(typeof BASE_CONFIG)['audio']> = {}) {
    const file = path.join(tempDir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ ...BASE_CONFIG, audio: { ...BASE_CONFIG.audio, ...audio } }));
    return file;
  }

  it('prints usage by default', async () => {
    const { io, stdout } = createTestIo();

    expect(await runCli([], io)).toBe(0);
    expect(stdout().split('\n')[0]).toBe('Audio loopback verifier');
  });

  it('rejects unknown commands', async () => {
    const { io, stderr } = createTestIo();

    expect(await runCli(['frobnicate'], io)).toBe(1);
    expect(stderr()).toBe('Unknown command: frobnicate\n');
  });

  it('runs the matrix against the emulated fixture', async () => {
    const { io, stdout } = createTestIo();

    const code = await runCli(['run', '--emulate', '--config', writeConfig()], io);

    expect(code).toBe(0);
    expect(stdout().trim().split('\n')).toEqual([
      'PASS S16_LE 48000 Hz 2ch',
      'SKIP S24_LE 48000 Hz 2ch: Fixture captures S24_LE at 48000 Hz malformed',
      'Port hdmi:HDMI-A-1: ran=1, passed=1, failed=0, skipped=1'
    ]);
  });

  it('lists stored verdicts newest first', async () => {
    const run = createTestIo();
    await runCli(['run', '-e', '-c', writeConfig({ formats: ['S16_LE'] })], run.io);

    const { io, stdout } = createTestIo();
    expect(await runCli(['results'], io)).toBe(0);
    const lines = stdout().trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^#\d+ \S+ info Audio flatline test passed for S16_LE, 48000 Hz, 2 channel\(s\)$/);
    expect(lines[1]).toMatch(/^#\d+ \S+ info Audio frequency test passed for S16_LE, 48000 Hz, 2 channel\(s\)$/);
    expect(lines[2]).toBe('Showing 2 of 2');

    const filtered = createTestIo();
    expect(await runCli(['results', 'list', '--test', 'frequency', '--limit', '5'], filtered.io)).toBe(0);
    expect(filtered.stdout().trim().split('\n')).toHaveLength(2);
  });

  it('reports an empty result store', async () => {
    const { io, stdout } = createTestIo();

    expect(await runCli(['results'], io)).toBe(0);
    expect(stdout()).toBe('No results recorded\n');
  });

  it('exits with 2 when every combination was skipped', async () => {
    const { io, stdout } = createTestIo();

    const code = await runCli(['run', '--emulate', '--config', writeConfig({ formats: ['S24_LE'] })], io);

    expect(code).toBe(2);
    expect(stdout()).toContain('Port hdmi:HDMI-A-1: ran=0, passed=0, failed=0, skipped=1\n');
  });

  it('exits with 1 and names the failing test', async () => {
    __test__.setHarnessFactory(() => {
      const fixture = new EmulatedFixture({ routing: captureRouting(1, 0), reportedMapping: captureRouting(0, 1) });
      return { session: fixture, driver: fixture.createPlaybackDriver() };
    });
    const { io, stdout } = createTestIo();

    const code = await runCli(['run', '--config', writeConfig({ formats: ['S16_LE'], timeoutMs: 100 })], io);

    expect(code).toBe(1);
    expect(stdout().split('\n')[0]).toBe('FAIL S16_LE 48000 Hz 2ch: frequency streak-timeout');
  });

  it('needs a fixture client unless emulating', async () => {
    const { io, stderr } = createTestIo();

    expect(await runCli(['run', '--config', writeConfig()], io)).toBe(1);
    expect(stderr()).toBe('No capture fixture client is configured; pass --emulate to use the in-process fixture\n');
  });

  it('validates options, configuration and port', async () => {
    const badOption = createTestIo();
    expect(await runCli(['run', '--bogus'], badOption.io)).toBe(1);
    expect(badOption.stderr()).toBe('Unknown option: --bogus\n');

    const missingValue = createTestIo();
    expect(await runCli(['run', '--config'], missingValue.io)).toBe(1);
    expect(missingValue.stderr()).toBe('Missing value for --config\n');

    const badConfig = createTestIo();
    expect(await runCli(['run', '--config', path.join(tempDir, 'missing.json')], badConfig.io)).toBe(1);
    expect(badConfig.stderr()).toMatch(/^Failed to load configuration: /);

    const badPort = createTestIo();
    expect(await runCli(['run', '-e', '-c', writeConfig(), '--port', 'usb:1'], badPort.io)).toBe(1);
    expect(badPort.stderr()).toBe('Invalid port: usb:1\n');
  });

  it('changes the log level', async () => {
    const previous = getLogLevel();
    try {
      const { io, stdout } = createTestIo();
      expect(await runCli(['log-level', 'set', 'debug'], io)).toBe(0);
      expect(stdout()).toBe('Log level set to debug\n');
      expect(getLogLevel()).toBe('debug');

      const unknown = createTestIo();
      expect(await runCli(['log-level', 'loud'], unknown.io)).toBe(1);
      expect(unknown.stderr()).toContain('Unknown log level "loud"');
    } finally {
      setLogLevel(previous);
    }
  });

  it('plays through ffmpeg once a fixture client is registered', () => {
    const config = loadConfigFromFile(writeConfig());
    expect(() => createHarness(config, { emulate: false })).toThrow(
      'No capture fixture client is configured; pass --emulate to use the in-process fixture'
    );

    const fixture = new EmulatedFixture();
    registerCaptureSession(() => fixture);
    const harness = createHarness(config, { emulate: false });

    expect(harness.session).toBe(fixture);
    expect(harness.driver).toBeInstanceOf(FfmpegPlaybackDriver);
  });

  it('re-runs verification after every configuration reload until stopped', async () => {
    const file = writeConfig();
    const manager = new ConfigManager(file);
    const controller = new AbortController();
    const timeouts: number[] = [];
    const runOnce = vi.fn(async (config: VerifierConfig) => {
      timeouts.push(config.audio.timeoutMs);
      return timeouts.length === 1 ? 0 : 1;
    });

    const watching = __test__.watchVerification(manager, runOnce, controller.signal);
    writeConfig({ timeoutMs: 500 });
    manager.reload();
    controller.abort();

    expect(await watching).toBe(1);
    expect(timeouts).toEqual([2000, 500]);
    expect(manager.listenerCount('reload')).toBe(0);
  });

  it('prints verdict counters as Prometheus metrics', async () => {
    await runCli(['run', '-e', '-c', writeConfig({ formats: ['S16_LE'] })], createTestIo().io);
    const { io, stdout } = createTestIo();

    expect(await runCli(['metrics'], io)).toBe(0);
    expect(stdout()).toContain('# TYPE loopback_audio_verdicts_total gauge');
    expect(stdout()).toMatch(/loopback_audio_verdicts_total\{test="frequency",verdict="passed"\} \d+/);
    expect(stdout()).toContain('# TYPE loopback_audio_flatline_elapsed_ms histogram');
  });
});

describe('LoopbackCliHelpers', () => {
  it('parses run options', () => {
    expect(__test__.parseRunArgs(['-e', '-p', 'dp:DP-1', '--json'])).toEqual({
      emulate: true,
      json: true,
      port: 'dp:DP-1',
      errors: []
    });
    expect(__test__.parseRunArgs(['--watch'])).toEqual({ emulate: false, json: false, watch: true, errors: [] });
  });

  it('maps reports to exit codes', () => {
    expect(resolveExitCode({ ran: 3, success: true })).toBe(0);
    expect(resolveExitCode({ ran: 3, success: false })).toBe(1);
    expect(resolveExitCode({ ran: 0, success: false })).toBe(2);
  });

  it('formats failures with collaborator errors', () => {
    expect(
      formatCombination({
        format: 'S32_LE',
        rate: 32000,
        channels: 2,
        status: 'failed',
        reason: 'error',
        error: 'fixture went away',
        tests: []
      })
    ).toBe('FAIL S32_LE 32000 Hz 2ch: error: fixture went away');
  });
});
