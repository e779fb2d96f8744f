/** How loudly a stored result should be surfaced. Failed verdicts are `critical`. */
export type EventSeverity = 'info' | 'warning' | 'critical';

type EventMeta = Record<string, unknown>;

interface EventFields {
  /** Port id of the connector under test, e.g. `hdmi:HDMI-A-1`. */
  source: string;
  /** Producer of the event; the verifier itself uses `audio-loopback`. */
  detector: string;
  severity: EventSeverity;
  message: string;
}

/** What callers hand to the bus. A missing `ts` is stamped on emit. */
export interface EventPayload extends EventFields {
  ts?: number | Date;
  meta?: EventMeta;
}

/** A payload once the bus has fixed its timestamp in epoch milliseconds. */
export interface EventRecord extends EventFields {
  ts: number;
  meta: EventMeta | undefined;
}
