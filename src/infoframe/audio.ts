import type { CaptureSession, RawInfoFrame } from '../capture/session.js';
import { getPcmFormat, type PcmFormatName } from '../audio/format.js';
import type { Port } from '../utils/port.js';

export const AUDIO_INFOFRAME_VERSION = 1;
export const AUDIO_INFOFRAME_MIN_PAYLOAD = 5;

export const AUDIO_CODING_TYPES = [
  'unspecified',
  'pcm',
  'ac3',
  'mpeg1',
  'mp3',
  'mpeg2',
  'aac-lc',
  'dts',
  'atrac',
  'dsd',
  'e-ac3',
  'dts-hd',
  'mlp',
  'dst',
  'wma-pro',
  'extension'
] as const;

export type AudioCodingType = (typeof AUDIO_CODING_TYPES)[number];

const SAMPLING_FREQUENCIES = [null, 32000, 44100, 48000, 88200, 96000, 176400, 192000] as const;
const SAMPLE_SIZES = [null, 16, 20, 24] as const;

/** Audio InfoFrame fields; `null` marks a field the source left unspecified. */
export type AudioInfoFrame = {
  codingType: AudioCodingType;
  channelCount: number | null;
  samplingFrequency: number | null;
  sampleSize: number | null;
};

export type ParseResult = { ok: true; infoFrame: AudioInfoFrame } | { ok: false; reason: string };

export function parseAudioInfoFrame(version: number, payload: Uint8Array): ParseResult {
  if (version !== AUDIO_INFOFRAME_VERSION) {
    return { ok: false, reason: `unsupported audio InfoFrame version ${version}` };
  }
  if (payload.length < AUDIO_INFOFRAME_MIN_PAYLOAD) {
    return { ok: false, reason: `audio InfoFrame payload too short (${payload.length} bytes)` };
  }

  const channelCode = payload[0] & 0x7;
  return {
    ok: true,
    infoFrame: {
      codingType: AUDIO_CODING_TYPES[payload[0] >> 4],
      channelCount: channelCode === 0 ? null : channelCode + 1,
      samplingFrequency: SAMPLING_FREQUENCIES[(payload[1] >> 2) & 0x7],
      sampleSize: SAMPLE_SIZES[payload[1] & 0x3]
    }
  };
}

/**
 * Packs the first data bytes of an audio InfoFrame. Values with no code
 * (e.g. a 32-bit sample size) are written as unspecified.
 */
export function buildAudioInfoFrame(infoFrame: AudioInfoFrame): RawInfoFrame {
  const payload = new Uint8Array(10);
  const codingType = AUDIO_CODING_TYPES.indexOf(infoFrame.codingType);
  const channelCode =
    infoFrame.channelCount !== null && infoFrame.channelCount >= 2 && infoFrame.channelCount <= 8
      ? infoFrame.channelCount - 1
      : 0;
  const frequencyCode = Math.max(0, SAMPLING_FREQUENCIES.findIndex(value => value === infoFrame.samplingFrequency));
  const sizeCode = Math.max(0, SAMPLE_SIZES.findIndex(value => value === infoFrame.sampleSize));

  payload[0] = (codingType << 4) | channelCode;
  payload[1] = (frequencyCode << 2) | sizeCode;
  return { version: AUDIO_INFOFRAME_VERSION, payload };
}

export type InfoFrameField = keyof AudioInfoFrame;

export type InfoFrameMismatch = {
  field: InfoFrameField;
  expected: string | number;
  observed: string | number;
};

export type InfoFrameFailure = 'infoframe-missing' | 'infoframe-parse' | 'infoframe-mismatch';

export type InfoFrameCheckResult =
  | { status: 'skipped'; reason: string }
  | { status: 'passed'; observed: AudioInfoFrame; checked: InfoFrameField[] }
  | {
      status: 'failed';
      failure: InfoFrameFailure;
      reason: string;
      observed: AudioInfoFrame | null;
      mismatches: InfoFrameMismatch[];
    };

export type ExpectedAudio = {
  format: PcmFormatName;
  channels: number;
  rate: number;
};

export function expectedInfoFrame(playback: ExpectedAudio): AudioInfoFrame {
  return {
    codingType: 'pcm',
    channelCount: playback.channels,
    samplingFrequency: playback.rate,
    sampleSize: getPcmFormat(playback.format).width
  };
}

/** Compares every field the observed frame specifies against what was played. */
export function compareAudioInfoFrame(
  observed: AudioInfoFrame,
  expected: AudioInfoFrame
): { checked: InfoFrameField[]; mismatches: InfoFrameMismatch[] } {
  const checked: InfoFrameField[] = [];
  const mismatches: InfoFrameMismatch[] = [];

  if (observed.codingType !== 'unspecified') {
    checked.push('codingType');
    if (observed.codingType !== expected.codingType) {
      mismatches.push({ field: 'codingType', expected: expected.codingType, observed: observed.codingType });
    }
  }

  const numericFields = ['channelCount', 'samplingFrequency', 'sampleSize'] as const;
  for (const field of numericFields) {
    const value = observed[field];
    const wanted = expected[field];
    if (value === null) {
      continue;
    }
    checked.push(field);
    if (value !== wanted) {
      mismatches.push({ field, expected: wanted ?? 'unspecified', observed: value });
    }
  }

  return { checked, mismatches };
}

export async function checkAudioInfoFrame(
  session: CaptureSession,
  port: Port,
  playback: ExpectedAudio
): Promise<InfoFrameCheckResult> {
  if (!session.getLastInfoFrame) {
    return { status: 'skipped', reason: 'fixture cannot report the last InfoFrame' };
  }

  const raw = await session.getLastInfoFrame(port, 'audio');
  if (!raw) {
    if (playback.channels <= 2) {
      return { status: 'skipped', reason: 'no audio InfoFrame received' };
    }
    return {
      status: 'failed',
      failure: 'infoframe-missing',
      reason: 'no audio InfoFrame received',
      observed: null,
      mismatches: []
    };
  }

  const parsed = parseAudioInfoFrame(raw.version, raw.payload);
  if (!parsed.ok) {
    return { status: 'failed', failure: 'infoframe-parse', reason: parsed.reason, observed: null, mismatches: [] };
  }

  const { checked, mismatches } = compareAudioInfoFrame(parsed.infoFrame, expectedInfoFrame(playback));
  if (mismatches.length > 0) {
    return {
      status: 'failed',
      failure: 'infoframe-mismatch',
      reason: mismatches
        .map(mismatch => `${mismatch.field}: got ${mismatch.observed}, expected ${mismatch.expected}`)
        .join('; '),
      observed: parsed.infoFrame,
      mismatches
    };
  }

  return { status: 'passed', observed: parsed.infoFrame, checked };
}
