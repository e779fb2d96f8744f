export type VerifierErrorCode =
  | 'UNSUPPORTED_CONFIGURATION'
  | 'CHANNEL_MAPPING'
  | 'CAPTURE_STREAM'
  | 'PLAYBACK_THREAD'
  | 'DIAGNOSTIC_DUMP'
  | 'INVALID_STATE';

export class VerifierError extends Error {
  readonly code: VerifierErrorCode;

  constructor(code: VerifierErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedConfigurationError extends VerifierError {
  constructor(message: string) {
    super('UNSUPPORTED_CONFIGURATION', message);
  }
}

export class ChannelMappingError extends VerifierError {
  constructor(
    message: string,
    readonly mapping: readonly number[]
  ) {
    super('CHANNEL_MAPPING', message);
  }
}

export class CaptureStreamError extends VerifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CAPTURE_STREAM', message, options);
  }
}

export class PlaybackThreadError extends VerifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PLAYBACK_THREAD', message, options);
  }
}

export class DiagnosticDumpError extends VerifierError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DIAGNOSTIC_DUMP', message, options);
  }
}

export class InvalidStateError extends VerifierError {
  constructor(message: string) {
    super('INVALID_STATE', message);
  }
}

export function toError(input: unknown): Error {
  return input instanceof Error ? input : new Error(String(input));
}
