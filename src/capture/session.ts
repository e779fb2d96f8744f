import type { Port } from '../utils/port.js';

/** Frames per channel in one fixture audio page. */
export const PAGE_FRAMES = 128;
export const MAX_CAPTURE_CHANNELS = 8;

export type StreamMode = 'stop-when-overflow' | 'ring-buffer';

export type AudioPage = {
  /** Sequence number assigned by the fixture. */
  pageCount: number;
  /** Interleaved S32_LE samples for every capture channel. */
  samples: Int32Array;
};

export interface AudioStream {
  receive(): Promise<AudioPage>;
  stop(): Promise<void>;
}

export type CapturedAudioFile = {
  path: string;
};

export type ReportedAudioFormat = {
  /** 0 when the receiver cannot tell. */
  rate: number;
  channels: number;
};

export type RawInfoFrame = {
  version: number;
  payload: Uint8Array;
};

export type InfoFrameKind = 'avi' | 'audio' | 'mpeg' | 'vendor';

/** Client of the loopback capture fixture. */
export interface CaptureSession {
  startCapturingAudio(port: Port, saveToFile: boolean): Promise<void>;
  getAudioFormat(port: Port): Promise<ReportedAudioFormat>;
  /** One entry per capture channel: the playback channel it carries, or -1. */
  getAudioChannelMapping(port: Port): Promise<number[]>;
  openRealtimeStream(mode: StreamMode): Promise<AudioStream>;
  stopCapturingAudio(port: Port): Promise<CapturedAudioFile | null>;
  getLastInfoFrame?(port: Port, kind: InfoFrameKind): Promise<RawInfoFrame | null>;
}

export type CaptureFormat =
  | { kind: 'unknown' }
  | {
      kind: 'known';
      encoding: 'S32_LE';
      channels: number;
      rate: number;
      rateSource: 'fixture' | 'playback-fallback';
    };
