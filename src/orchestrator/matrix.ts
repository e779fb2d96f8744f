import defaultEventBus from '../eventBus.js';
import defaultLogger from '../logger.js';
import defaultMetrics, { type MetricsRegistry, type TestVerdict } from '../metrics/index.js';
import type { PcmFormatName } from '../audio/format.js';
import type { CaptureSession } from '../capture/session.js';
import { UnsupportedConfigurationError, toError } from '../errors.js';
import type { PlaybackDriver } from '../playback/driver.js';
import type { EventPayload } from '../types.js';
import type { Port } from '../utils/port.js';
import { AudioState, type AudioLog } from './audioState.js';
import { runFlatlineTest } from './flatlineTest.js';
import { runFrequencyTest } from './frequencyTest.js';
import type { AudioTestName, AudioTestResult } from './results.js';

export const DEFAULT_RATES: readonly number[] = [32000, 44100, 48000];
export const DEFAULT_FORMATS: readonly PcmFormatName[] = ['S16_LE', 'S24_LE', 'S32_LE'];
export const DEFAULT_CHANNELS = 2;
export const AUDIO_TESTS: readonly AudioTestName[] = ['frequency', 'flatline'];

const EVENT_DETECTOR = 'audio-loopback';

export type AudioCombination = {
  format: PcmFormatName;
  rate: number;
  channels: number;
};

export type CombinationStatus = 'passed' | 'failed' | 'skipped';

export type CombinationResult = AudioCombination & {
  status: CombinationStatus;
  /** Why the combination was skipped, or `error` when a collaborator threw. */
  reason?: string;
  error?: string;
  tests: AudioTestResult[];
};

export type MatrixReport = {
  port: string;
  results: CombinationResult[];
  ran: number;
  passed: number;
  failed: number;
  skipped: number;
  success: boolean;
};

interface VerdictEvents {
  emitEvent(payload: EventPayload): boolean;
}

export type AudioMatrixOptions = {
  port: Port;
  device: string;
  session: CaptureSession;
  driver: PlaybackDriver;
  rates?: readonly number[];
  formats?: readonly PcmFormatName[];
  channels?: number;
  timeoutMs?: number;
  frequencies?: readonly number[];
  dumpDirectory?: string | null;
  logger?: AudioLog;
  metrics?: MetricsRegistry;
  events?: VerdictEvents;
};

/** Throws `UnsupportedConfigurationError` for combinations that must be skipped. */
export function checkAudioConfiguration(driver: PlaybackDriver, combination: AudioCombination) {
  const { format, rate, channels } = combination;
  if (!driver.testConfiguration(format, channels, rate)) {
    throw new UnsupportedConfigurationError(
      `Playback does not support ${format} at ${rate} Hz with ${channels} channel(s)`
    );
  }
  if (format !== 'S16_LE' && rate >= 44100) {
    throw new UnsupportedConfigurationError(`Fixture captures ${format} at ${rate} Hz malformed`);
  }
  if (channels > 2) {
    throw new UnsupportedConfigurationError(`Fixture captures more than 2 channels malformed`);
  }
}

export function summarizeMatrix(port: string, results: CombinationResult[]): MatrixReport {
  const ran = results.filter(result => result.status !== 'skipped').length;
  const passed = results.filter(result => result.status === 'passed').length;
  const failed = results.filter(result => result.status === 'failed').length;
  return {
    port,
    results,
    ran,
    passed,
    failed,
    skipped: results.length - ran,
    success: ran > 0 && failed === 0
  };
}

/**
 * Runs the frequency and flatline tests for every rate and format. A thrown
 * error only fails the combination it happened in.
 */
export async function runAudioMatrix(options: AudioMatrixOptions): Promise<MatrixReport> {
  const log = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const events = options.events ?? defaultEventBus;
  const rates = options.rates ?? DEFAULT_RATES;
  const formats = options.formats ?? DEFAULT_FORMATS;
  const channels = options.channels ?? DEFAULT_CHANNELS;
  const results: CombinationResult[] = [];

  const report = (combination: AudioCombination, test: AudioTestName, verdict: TestVerdict, result?: AudioTestResult, error?: Error) => {
    const failures = result?.failures.map(failure => failure.name) ?? (error ? ['error'] : []);
    metrics.recordVerdict(test, verdict, failures);
    events.emitEvent({
      source: options.port.id,
      detector: EVENT_DETECTOR,
      severity: verdict === 'passed' ? 'info' : 'critical',
      message: `Audio ${test} test ${verdict} for ${combination.format}, ${combination.rate} Hz, ${combination.channels} channel(s)`,
      meta: {
        test,
        verdict,
        ...combination,
        failures: result?.failures ?? [],
        error: error?.message,
        elapsedMs: result?.elapsedMs,
        receivedPages: result?.receivedPages,
        dumpPath: result?.dumpPath ?? null
      }
    });
  };

  for (const rate of rates) {
    for (const format of formats) {
      const combination: AudioCombination = { format, rate, channels };
      const context = { port: options.port.id, ...combination };

      let skipReason: string | null = null;
      let failure: Error | null = null;
      try {
        checkAudioConfiguration(options.driver, combination);
      } catch (error) {
        if (error instanceof UnsupportedConfigurationError) {
          skipReason = error.message;
        } else {
          failure = toError(error);
        }
      }

      if (skipReason !== null) {
        log.info({ ...context, reason: skipReason }, 'Skipping audio configuration');
        for (const test of AUDIO_TESTS) {
          metrics.recordVerdict(test, 'skipped');
        }
        results.push({ ...combination, status: 'skipped', reason: skipReason, tests: [] });
        continue;
      }

      const tests: AudioTestResult[] = [];
      let current: AudioTestName = AUDIO_TESTS[0];
      if (failure) {
        log.error({ ...context, err: failure }, 'Audio configuration check failed');
        report(combination, current, 'error', undefined, failure);
      } else {
        // one state per combination, restarted for each test
        const state = new AudioState({
          port: options.port,
          session: options.session,
          driver: options.driver,
          playback: combination,
          timeoutMs: options.timeoutMs,
          dumpDirectory: options.dumpDirectory,
          logger: log,
          metrics
        });
        try {
          options.driver.open(options.device);
          for (const test of AUDIO_TESTS) {
            current = test;
            const result =
              test === 'frequency'
                ? await runFrequencyTest(state, { frequencies: options.frequencies })
                : await runFlatlineTest(state);
            tests.push(result);
            report(combination, test, result.success ? 'passed' : 'failed', result);
          }
        } catch (error) {
          failure = toError(error);
          log.error({ ...context, test: current, err: failure }, 'Audio test aborted');
          report(combination, current, 'error', undefined, failure);
        } finally {
          try {
            await options.driver.close();
          } catch (error) {
            const closeError = toError(error);
            log.error({ ...context, err: closeError }, 'Failed to close playback device');
            failure = failure ?? closeError;
          }
        }
      }

      if (failure) {
        results.push({ ...combination, status: 'failed', reason: 'error', error: failure.message, tests });
      } else {
        results.push({
          ...combination,
          status: tests.every(test => test.success) ? 'passed' : 'failed',
          tests
        });
      }
    }
  }

  const summary = summarizeMatrix(options.port.id, results);
  log.info(
    { port: summary.port, ran: summary.ran, passed: summary.passed, failed: summary.failed, skipped: summary.skipped },
    summary.success ? 'Audio loopback verification passed' : 'Audio loopback verification failed'
  );
  return summary;
}
