export const MIN_STREAK = 3;

/**
 * Streak shared by all channels: a window where every channel matches adds
 * one per channel, any miss drops the whole streak back to zero.
 */
export class CombinedStreak {
  private value = 0;
  readonly target: number;

  constructor(
    readonly channels: number,
    minStreak = MIN_STREAK
  ) {
    this.target = minStreak * channels;
  }

  get count() {
    return this.value;
  }

  get reached() {
    return this.value >= this.target;
  }

  record(matches: readonly boolean[]): boolean {
    if (matches.length === this.channels && matches.every(Boolean)) {
      this.value += this.channels;
    } else {
      this.value = 0;
    }
    return this.reached;
  }

  reset() {
    this.value = 0;
  }
}
