import { PlaybackThreadError, toError } from '../errors.js';
import type { PlaybackDriver } from './driver.js';

export type PlaybackThreadState = 'idle' | 'running' | 'finished' | 'failed';

/**
 * Runs the driver's playback loop alongside the capture consumer. The loop
 * ends when the driver's fill callback returns non-zero; `join` waits for
 * that and surfaces any failure.
 */
export class PlaybackThread {
  private task: Promise<void> | null = null;
  private failure: Error | null = null;
  private currentState: PlaybackThreadState = 'idle';

  constructor(private readonly driver: PlaybackDriver) {}

  get state(): PlaybackThreadState {
    return this.currentState;
  }

  start() {
    if (this.task) {
      throw new PlaybackThreadError('Playback thread already started');
    }

    let pending: Promise<void>;
    try {
      pending = this.driver.run();
    } catch (error) {
      this.currentState = 'failed';
      throw new PlaybackThreadError('Failed to start audio playback thread', { cause: error });
    }

    this.currentState = 'running';
    this.task = pending.then(
      () => {
        this.currentState = 'finished';
      },
      error => {
        this.currentState = 'failed';
        this.failure = toError(error);
      }
    );
  }

  /** Resolves once the playback loop has ended, whatever the outcome. */
  settled(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  async join(): Promise<void> {
    if (!this.task) {
      return;
    }
    await this.task;
    this.task = null;
    if (this.failure) {
      const failure = this.failure;
      this.failure = null;
      throw new PlaybackThreadError(`Audio playback thread failed: ${failure.message}`, { cause: failure });
    }
  }
}
