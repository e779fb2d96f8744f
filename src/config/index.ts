import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { PCM_FORMAT_NAMES, type PcmFormatName } from '../audio/format.js';
import logger from '../logger.js';
import { parsePortId } from '../utils/port.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type AudioConfig = {
  port: string;
  device: string;
  timeoutMs: number;
  channels: number;
  rates: number[];
  formats: PcmFormatName[];
  frequencies: number[];
  dumpDirectory: string | null;
};

export type VerifierConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  audio: AudioConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array' | 'null';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minItems?: number;
};

const MAX_PLAYBACK_CHANNELS = 8;

const verifierConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'audio'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']
        }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    audio: {
      type: 'object',
      required: ['port', 'device', 'timeoutMs', 'channels', 'rates', 'formats', 'frequencies'],
      additionalProperties: false,
      properties: {
        port: { type: 'string' },
        device: { type: 'string' },
        timeoutMs: { type: 'number', minimum: 1 },
        channels: { type: 'number', minimum: 1, maximum: MAX_PLAYBACK_CHANNELS },
        rates: { type: 'array', minItems: 1, items: { type: 'number', minimum: 1 } },
        formats: {
          type: 'array',
          minItems: 1,
          items: { type: 'string', enum: [...PCM_FORMAT_NAMES] }
        },
        frequencies: { type: 'array', minItems: 1, items: { type: 'number', minimum: 1 } },
        dumpDirectory: { type: ['string', 'null'] }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type TypeCheck = (schema: JsonSchema, value: unknown, at: string) => string[];

function checkObject(schema: JsonSchema, value: unknown, at: string): string[] {
  if (!isRecord(value)) {
    return [`${at} must be an object`];
  }
  const properties = schema.properties ?? {};
  const missing = (schema.required ?? []).filter(key => !(key in value)).map(key => `${at}.${key} is required`);
  const extras = Object.keys(value).filter(key => !Object.hasOwn(properties, key));
  const additional = schema.additionalProperties;
  const extraErrors =
    additional === false
      ? extras.map(key => `${at}.${key} is not allowed`)
      : typeof additional === 'object'
        ? extras.flatMap(key => checkSchema(additional, value[key], `${at}.${key}`))
        : [];
  const nested = Object.entries(properties)
    .filter(([key]) => key in value)
    .flatMap(([key, child]) => checkSchema(child, value[key], `${at}.${key}`));
  return [...missing, ...extraErrors, ...nested];
}

function checkArray(schema: JsonSchema, value: unknown, at: string): string[] {
  if (!Array.isArray(value)) {
    return [`${at} must be an array`];
  }
  const errors: string[] = [];
  if (schema.minItems !== undefined && value.length < schema.minItems) {
    errors.push(`${at} must contain at least ${schema.minItems} item(s)`);
  }
  const { items } = schema;
  if (items) {
    value.forEach((item, index) => errors.push(...checkSchema(items, item, `${at}[${index}]`)));
  }
  return errors;
}

function checkNumber(schema: JsonSchema, value: unknown, at: string): string[] {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return [`${at} must be a number`];
  }
  const errors: string[] = [];
  if (schema.minimum !== undefined && value < schema.minimum) {
    errors.push(`${at} must be >= ${schema.minimum}`);
  }
  if (schema.maximum !== undefined && value > schema.maximum) {
    errors.push(`${at} must be <= ${schema.maximum}`);
  }
  return errors;
}

function checkString(schema: JsonSchema, value: unknown, at: string): string[] {
  if (typeof value !== 'string') {
    return [`${at} must be a string`];
  }
  if (schema.enum && !schema.enum.includes(value)) {
    return [`${at} must be one of ${schema.enum.join(', ')}`];
  }
  return [];
}

const TYPE_CHECKS: Record<JsonType, TypeCheck> = {
  object: checkObject,
  array: checkArray,
  number: checkNumber,
  string: checkString,
  boolean: (_schema, value, at) => (typeof value === 'boolean' ? [] : [`${at} must be a boolean`]),
  null: (_schema, value, at) => (value === null ? [] : [`${at} must be null`])
};

/** A value passes when any listed type accepts it; otherwise the first type's errors are reported. */
function checkSchema(schema: JsonSchema, value: unknown, at: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const outcomes = types.map(type => TYPE_CHECKS[type](schema, value, at));
  return outcomes.some(errors => errors.length === 0) ? [] : outcomes[0] ?? [];
}

export function validateConfig(config: unknown): asserts config is VerifierConfig {
  const errors = checkSchema(verifierConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  if (isRecord(config) && isRecord(config.audio)) {
    validateLogicalAudioConfig(config.audio);
  }
}

export function parseConfig(contents: string): VerifierConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): VerifierConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Resolves the layered `config` directory for the current NODE_ENV and validates it. */
export function loadVerifierConfig(): VerifierConfig {
  const resolved: unknown = config.util.toObject();
  validateConfig(resolved);
  return resolved;
}

function duplicateMessages(list: readonly unknown[], at: string): string[] {
  return list.flatMap((entry, index) =>
    list.indexOf(entry) < index ? [`${at}[${index}] duplicates ${String(entry)}`] : []
  );
}

/** Checks that the schema cannot express. */
function validateLogicalAudioConfig(audio: Record<string, unknown>) {
  const { port, channels, rates, formats } = audio;
  const messages: string[] = [];

  if (typeof port === 'string' && !parsePortId(port)) {
    messages.push(`config.audio.port "${port}" must look like hdmi:<name> or dp:<name>`);
  }
  if (typeof channels === 'number' && !Number.isInteger(channels)) {
    messages.push('config.audio.channels must be an integer');
  }
  if (Array.isArray(rates)) {
    rates.forEach((rate, index) => {
      if (typeof rate === 'number' && !Number.isInteger(rate)) {
        messages.push(`config.audio.rates[${index}] must be an integer`);
      }
    });
    messages.push(...duplicateMessages(rates, 'config.audio.rates'));
  }
  if (Array.isArray(formats)) {
    messages.push(...duplicateMessages(formats, 'config.audio.formats'));
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: VerifierConfig;
  next: VerifierConfig;
};

const RELOAD_DEBOUNCE_MS = 100;

/**
 * Holds the active configuration file and swaps it on reload. A reload that fails
 * leaves the previous configuration in place.
 */
export class ConfigManager extends EventEmitter {
  private readonly filePath: string;
  private active: VerifierConfig;
  private watchers = 0;
  private stopWatching: (() => void) | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    this.active = loadConfigFromFile(this.filePath);
  }

  getConfig(): VerifierConfig {
    return this.active;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): VerifierConfig {
    const previous = this.active;
    const next = loadConfigFromFile(this.filePath);
    this.active = next;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  /** Reloads on file changes until every returned disposer has been called. */
  watch(): () => void {
    this.watchers += 1;
    this.stopWatching ??= this.startWatching();

    let disposed = false;
    return () => {
      if (disposed) {
        return;
      }
      disposed = true;
      this.watchers -= 1;
      if (this.watchers === 0) {
        this.stopWatching?.();
        this.stopWatching = null;
      }
    };
  }

  private startWatching(): () => void {
    let pending: NodeJS.Timeout | undefined;
    const watcher = fs.watch(this.filePath, { persistent: false }, () => {
      clearTimeout(pending);
      pending = setTimeout(() => this.reloadFromWatch(), RELOAD_DEBOUNCE_MS);
    });
    return () => {
      clearTimeout(pending);
      watcher.close();
    };
  }

  private reloadFromWatch() {
    try {
      this.reload();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (this.listenerCount('error') === 0) {
        logger.warn({ err, path: this.filePath }, 'Configuration reload failed');
        return;
      }
      this.emit('error', err);
    }
  }
}

export { verifierConfigSchema };
