#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, getLogLevelPrometheusMetrics, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { listEvents } from './db.js';
import {
  ConfigManager,
  loadConfigFromFile,
  loadVerifierConfig,
  type ConfigReloadEvent,
  type VerifierConfig
} from './config/index.js';
import { EmulatedFixture } from './capture/emulated.js';
import type { CaptureSession } from './capture/session.js';
import { FfmpegPlaybackDriver, type PlaybackDriver } from './playback/driver.js';
import { AUDIO_TESTS, runAudioMatrix, type CombinationResult, type MatrixReport } from './orchestrator/matrix.js';
import { parsePortId } from './utils/port.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type LoopbackHarness = {
  session: CaptureSession;
  driver: PlaybackDriver;
};

export type HarnessFactory = (config: VerifierConfig, options: { emulate: boolean }) => LoopbackHarness;

/** Builds the client of a physical capture fixture. */
export type CaptureSessionFactory = (config: VerifierConfig) => CaptureSession;

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const EXIT_PASSED = 0;
const EXIT_FAILED = 1;
const EXIT_NOTHING_RAN = 2;

const USAGE_LINES = [
  'Audio loopback verifier',
  '',
  'Usage:',
  '  loopback run [options]        Run the audio loopback test matrix',
  '  loopback results [options]    List stored test verdicts',
  '  loopback metrics              Print Prometheus metrics for this process',
  '  loopback log-level            Get or set the active log level',
  '  loopback help                 Show this help message'
];

const RUN_USAGE = [
  'Audio loopback run',
  '',
  'Usage:',
  '  loopback run [options]',
  '',
  'Options:',
  '  -c, --config <path>  Load configuration from a JSON file',
  '  -p, --port <id>      Override the connector, e.g. hdmi:HDMI-A-1 or dp:DP-1',
  '  -d, --device <name>  Override the playback device',
  '  -e, --emulate        Use the in-process loopback fixture',
  '  -w, --watch          Re-run whenever the configuration file changes',
  '  -j, --json           Print the report as JSON',
  '  -h, --help           Show this help message',
  '',
  'Exit codes: 0 all passed, 1 any failure, 2 nothing ran'
].join('\n');

const RESULTS_USAGE = [
  'Audio loopback results',
  '',
  'Usage:',
  '  loopback results [list] [options]',
  '',
  'Options:',
  '  -t, --test <name>    Only show one test (frequency, flatline)',
  '  -l, --limit <count>  Number of results to show (default 20)',
  '  -j, --json           Print results as JSON',
  '  -h, --help           Show this help message'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Audio loopback log level commands',
  '',
  'Usage:',
  '  loopback log-level              Show the current log level',
  '  loopback log-level get          Show the current log level',
  '  loopback log-level set <level>  Change the active log level',
  '  loopback log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

let captureSessionFactory: CaptureSessionFactory | null = null;

/** Registers the fixture client used by `run` without `--emulate`; null unregisters it. */
export function registerCaptureSession(factory: CaptureSessionFactory | null) {
  captureSessionFactory = factory;
}

/** Physical runs play through ffmpeg into the configured ALSA device. */
export const createHarness: HarnessFactory = (config, options) => {
  if (options.emulate) {
    const fixture = new EmulatedFixture();
    return { session: fixture, driver: fixture.createPlaybackDriver() };
  }
  if (!captureSessionFactory) {
    throw new Error('No capture fixture client is configured; pass --emulate to use the in-process fixture');
  }
  return { session: captureSessionFactory(config), driver: new FfmpegPlaybackDriver() };
};

let harnessFactory: HarnessFactory = createHarness;

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'help';

  switch (command) {
    case 'run': {
      return runVerification(argv.slice(1), io);
    }
    case 'results': {
      return runResultsCommand(argv.slice(1), io);
    }
    case 'metrics': {
      io.stdout.write(`${buildPrometheusMetrics()}\n`);
      return 0;
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      return 1;
    }
  }
}

type RunCliArgs = {
  configPath?: string;
  port?: string;
  device?: string;
  emulate: boolean;
  json: boolean;
  watch?: boolean;
  help?: boolean;
  errors: string[];
};

function parseRunArgs(args: string[]): RunCliArgs {
  const result: RunCliArgs = { emulate: false, json: false, errors: [] };
  const takeValue = (index: number, flag: string) => {
    const value = args[index + 1];
    if (!value || value.startsWith('-')) {
      result.errors.push(`Missing value for ${flag}`);
      return undefined;
    }
    return value;
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }
    switch (token) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--emulate':
      case '-e':
        result.emulate = true;
        break;
      case '--json':
      case '-j':
        result.json = true;
        break;
      case '--watch':
      case '-w':
        result.watch = true;
        break;
      case '--config':
      case '-c': {
        const value = takeValue(index, '--config');
        if (value) {
          result.configPath = value;
          index += 1;
        }
        break;
      }
      case '--port':
      case '-p': {
        const value = takeValue(index, '--port');
        if (value) {
          result.port = value;
          index += 1;
        }
        break;
      }
      case '--device':
      case '-d': {
        const value = takeValue(index, '--device');
        if (value) {
          result.device = value;
          index += 1;
        }
        break;
      }
      default:
        result.errors.push(`Unknown option: ${token}`);
    }
  }
  return result;
}

export function resolveExitCode(report: Pick<MatrixReport, 'ran' | 'success'>) {
  if (report.ran === 0) {
    return EXIT_NOTHING_RAN;
  }
  return report.success ? EXIT_PASSED : EXIT_FAILED;
}

export function formatCombination(result: CombinationResult): string {
  const label = `${result.format} ${result.rate} Hz ${result.channels}ch`;
  if (result.status === 'skipped') {
    return `SKIP ${label}: ${result.reason ?? 'unsupported'}`;
  }
  if (result.status === 'passed') {
    return `PASS ${label}`;
  }
  const details = result.tests.flatMap(test => test.failures.map(failure => `${test.test} ${failure.name}`));
  if (result.error) {
    details.push(`error: ${result.error}`);
  }
  return `FAIL ${label}: ${details.join(', ')}`;
}

type RunOnce = (config: VerifierConfig) => Promise<number>;

function untilAborted(signal: AbortSignal) {
  return new Promise<void>(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Runs once for the current configuration and again after every reload, one
 * run at a time, until `signal` aborts. Resolves with the last run's exit code.
 */
async function watchVerification(manager: ConfigManager, runOnce: RunOnce, signal: AbortSignal): Promise<number> {
  let code = EXIT_FAILED;
  let queue = Promise.resolve();
  const enqueue = (config: VerifierConfig) => {
    queue = queue
      .then(() => runOnce(config))
      .then(
        result => {
          code = result;
        },
        error => {
          logger.error({ err: error, path: manager.getPath() }, 'Loopback verification failed');
          code = EXIT_FAILED;
        }
      );
  };
  const onReload = ({ next }: ConfigReloadEvent) => {
    logger.info({ path: manager.getPath() }, 'Configuration changed, re-running verification');
    enqueue(next);
  };

  manager.on('reload', onReload);
  const stopWatching = manager.watch();
  enqueue(manager.getConfig());
  try {
    await untilAborted(signal);
    await queue;
  } finally {
    stopWatching();
    manager.off('reload', onReload);
  }
  return code;
}

async function runVerification(args: string[], io: CliIo): Promise<number> {
  const parsed = parseRunArgs(args);
  if (parsed.help) {
    io.stdout.write(`${RUN_USAGE}\n`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  let manager: ConfigManager | null = null;
  let config: VerifierConfig;
  try {
    if (parsed.watch) {
      manager = new ConfigManager(parsed.configPath);
      config = manager.getConfig();
    } else {
      config = parsed.configPath ? loadConfigFromFile(parsed.configPath) : loadVerifierConfig();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Failed to load configuration: ${message}\n`);
    logger.error({ err: error }, 'Loopback CLI failed to load configuration');
    return 1;
  }

  const runOnce: RunOnce = current => verifyOnce(parsed, current, io);
  if (!manager) {
    return runOnce(config);
  }

  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  try {
    return await watchVerification(manager, runOnce, controller.signal);
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

async function verifyOnce(parsed: RunCliArgs, config: VerifierConfig, io: CliIo): Promise<number> {
  const port = parsePortId(parsed.port ?? config.audio.port);
  if (!port) {
    io.stderr.write(`Invalid port: ${parsed.port ?? config.audio.port}\n`);
    return 1;
  }

  let harness: LoopbackHarness;
  try {
    harness = harnessFactory(config, { emulate: parsed.emulate });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }

  let report: MatrixReport;
  try {
    report = await runAudioMatrix({
      port,
      device: parsed.device ?? config.audio.device,
      session: harness.session,
      driver: harness.driver,
      rates: config.audio.rates,
      formats: config.audio.formats,
      channels: config.audio.channels,
      timeoutMs: config.audio.timeoutMs,
      frequencies: config.audio.frequencies,
      dumpDirectory: config.audio.dumpDirectory
    });
  } catch (error) {
    logger.error({ err: error }, 'Loopback verification failed');
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Verification failed: ${message}\n`);
    return 1;
  }

  if (parsed.json) {
    io.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } else {
    for (const result of report.results) {
      io.stdout.write(`${formatCombination(result)}\n`);
    }
    io.stdout.write(
      `Port ${report.port}: ran=${report.ran}, passed=${report.passed}, failed=${report.failed}, skipped=${report.skipped}\n`
    );
  }
  return resolveExitCode(report);
}

type ResultsCliArgs = {
  test?: string;
  limit: number;
  json: boolean;
  help?: boolean;
  errors: string[];
};

function parseResultsArgs(args: string[]): ResultsCliArgs {
  const result: ResultsCliArgs = { limit: 20, json: false, errors: [] };
  const tokens = args[0] === 'list' ? args.slice(1) : args;

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    if (token === '--help' || token === '-h') {
      result.help = true;
      continue;
    }
    if (token === '--json' || token === '-j') {
      result.json = true;
      continue;
    }
    if (token === '--test' || token === '-t') {
      const value = tokens[index + 1];
      if (!value || !AUDIO_TESTS.some(test => test === value)) {
        result.errors.push(`--test must be one of: ${AUDIO_TESTS.join(', ')}`);
      } else {
        result.test = value;
        index += 1;
      }
      continue;
    }
    if (token === '--limit' || token === '-l') {
      const value = Number(tokens[index + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        result.errors.push('--limit must be a positive integer');
      } else {
        result.limit = value;
        index += 1;
      }
      continue;
    }
    result.errors.push(`Unknown option: ${token}`);
  }
  return result;
}

async function runResultsCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseResultsArgs(args);
  if (parsed.help) {
    io.stdout.write(`${RESULTS_USAGE}\n`);
    return 0;
  }
  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    return 1;
  }

  const page = listEvents({ detector: 'audio-loopback', test: parsed.test, limit: parsed.limit });
  if (parsed.json) {
    io.stdout.write(`${JSON.stringify(page, null, 2)}\n`);
    return 0;
  }

  if (page.items.length === 0) {
    io.stdout.write('No results recorded\n');
    return 0;
  }
  for (const event of page.items) {
    io.stdout.write(`#${event.id} ${new Date(event.ts).toISOString()} ${event.severity} ${event.message}\n`);
  }
  io.stdout.write(`Showing ${page.items.length} of ${page.total}\n`);
  return 0;
}

function buildPrometheusMetrics(): string {
  const sections = [
    getLogLevelPrometheusMetrics(),
    metrics.exportVerdictCountersForPrometheus(),
    ...AUDIO_TESTS.map(test =>
      metrics.exportHistogramForPrometheus(`audio.${test}.elapsed_ms`, {
        metricName: `loopback_audio_${test}_elapsed_ms`,
        help: `Capture time spent in the ${test} test`
      })
    )
  ];
  return sections.filter(section => section.length > 0).join('\n');
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [action = 'get', ...rest] = args;

  if (action === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }
  if (['help', '--help', '-h'].includes(action)) {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  // `log-level <level>` is shorthand for `log-level set <level>`
  const requested = action === 'set' ? rest[0] : action;
  if (!requested || requested.startsWith('-')) {
    io.stderr.write(requested ? `Unknown option: ${requested}\n` : 'Missing value for log level\n');
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  try {
    io.stdout.write(`Log level set to ${setLogLevel(requested)}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

export const __test__ = {
  parseRunArgs,
  watchVerification,
  parseResultsArgs,
  setHarnessFactory(factory: HarnessFactory | null) {
    harnessFactory = factory ?? createHarness;
  }
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Loopback CLI failed');
      process.exit(1);
    }
  );
}
