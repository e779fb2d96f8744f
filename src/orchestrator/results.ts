import type { InfoFrameCheckResult, InfoFrameFailure } from '../infoframe/audio.js';

export type AudioTestName = 'frequency' | 'flatline';

export type AudioFailureName =
  | 'rate-mismatch'
  | 'streak-timeout'
  | 'missing-falling-edge'
  | 'alignment-mismatch'
  | InfoFrameFailure;

export type AudioTestFailure = {
  name: AudioFailureName;
  reason: string;
  channel?: number;
};

export type AudioTestResult = {
  test: AudioTestName;
  success: boolean;
  failures: AudioTestFailure[];
  elapsedMs: number;
  receivedPages: number;
  /** Retained raw capture, only kept when the run failed. */
  dumpPath: string | null;
  infoFrame?: InfoFrameCheckResult;
};
