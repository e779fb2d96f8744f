import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import type { EventPayload, EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';

export interface EventLog {
  info(obj: Record<string, unknown>, message: string): void;
}

type EventSink = (event: EventRecord) => void;

interface EventBusDependencies {
  store: EventSink;
  log: EventLog;
  metrics?: MetricsRegistry;
}

function toEpochMs(ts: EventPayload['ts']): number {
  if (ts instanceof Date) {
    return ts.getTime();
  }
  return ts ?? Date.now();
}

export function toEventRecord({ ts, meta, ...fields }: EventPayload): EventRecord {
  return { ts: toEpochMs(ts), ...fields, meta };
}

/**
 * Fans verdict events out to the result store, the metrics registry and the log.
 * Other subscribers may listen on the `event` channel for the stamped record.
 */
class EventBus extends EventEmitter {
  constructor({ store, log, metrics: registry = metrics }: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    const sinks: EventSink[] = [
      store,
      event => registry.recordEvent(event),
      ({ detector, source, severity, meta, message }) => log.info({ detector, source, severity, meta }, message)
    ];
    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      for (const sink of sinks) {
        sink(event);
      }
    });
  }

  emitEvent(payload: EventPayload): boolean {
    return this.emit(EVENT_CHANNEL, toEventRecord(payload));
  }
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
