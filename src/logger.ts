import pino from 'pino';
import config from 'config';
import metrics, { type PrometheusLogLevelOptions } from './metrics/index.js';

const DEFAULT_LEVEL = 'info';
const DEFAULT_NAME = 'audio-loopback-verifier';

const LOG_LEVELS: ReadonlySet<string> = new Set([...Object.keys(pino.levels.values), 'silent']);

function readSetting(key: string, fallback: string) {
  return config.has(key) ? config.get<string>(key) : fallback;
}

/** First message-like argument handed to a log call. */
function messageOf(args: readonly unknown[]): string | undefined {
  for (const value of args) {
    if (typeof value === 'string') {
      return value.length > 0 ? value : undefined;
    }
    if (typeof value === 'object' && value !== null && 'msg' in value && typeof value.msg === 'string') {
      return value.msg;
    }
  }
  return undefined;
}

const logger = pino({
  name: readSetting('app.name', DEFAULT_NAME),
  level: readSetting('logging.level', DEFAULT_LEVEL),
  serializers: {
    err: pino.stdSerializers.err
  },
  hooks: {
    logMethod(args, method, level) {
      metrics.incrementLogLevel(pino.levels.labels[level] ?? String(level), { message: messageOf(args) });
      return method.apply(this, args);
    }
  }
});

let activeLevel = logger.level;
let previousLevel: string | null = null;
metrics.recordLogLevelChange(activeLevel);
metrics.onReset(() => {
  metrics.recordLogLevelChange(activeLevel, previousLevel);
});

function isLogLevel(value: string): value is pino.LevelWithSilent {
  return LOG_LEVELS.has(value);
}

export function getLogLevel(): string {
  return activeLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(LOG_LEVELS).sort();
}

/** Returns the level now active. */
export function setLogLevel(requested: string): string {
  const next = requested.trim().toLowerCase();
  if (!isLogLevel(next)) {
    throw new Error(`Unknown log level "${next}" (available: ${getAvailableLogLevels().join(', ')})`);
  }
  if (next === activeLevel) {
    return activeLevel;
  }

  previousLevel = activeLevel;
  logger.level = next;
  activeLevel = logger.level;
  metrics.recordLogLevelChange(activeLevel, previousLevel);
  logger.info({ level: activeLevel, previous: previousLevel }, 'Log level updated');
  return activeLevel;
}

export function getLogLevelPrometheusMetrics(options?: PrometheusLogLevelOptions) {
  return metrics.exportLogLevelCountersForPrometheus(options);
}

export default logger;
