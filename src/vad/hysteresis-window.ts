/**
 * Majority-of-recent-frames debounce: a single spurious high-probability frame cannot
 * confirm voice, but `minVoiced` of the last `size` frames agreeing can.
 */

export interface HysteresisWindowConfig {
  /** Frames kept (W). */
  size: number;
  /** Voiced frames needed to confirm (K). */
  minVoiced: number;
}

export class HysteresisWindow {
  private readonly decisions: boolean[] = [];
  private voiced = 0;
  private readonly size: number;
  private readonly minVoiced: number;

  constructor(config: HysteresisWindowConfig = { size: 5, minVoiced: 3 }) {
    this.size = config.size;
    this.minVoiced = config.minVoiced;
  }

  /**
   * Record `probability >= threshold` and report whether voice is confirmed.
   * With fewer than `minVoiced` frames recorded confirmation is impossible.
   */
  update(probability: number, threshold: number): boolean {
    const isVoice = probability >= threshold;
    this.decisions.push(isVoice);
    if (isVoice) this.voiced++;
    while (this.decisions.length > this.size) {
      if (this.decisions.shift()) this.voiced--;
    }
    return this.voiced >= this.minVoiced;
  }

  get voicedCount(): number {
    return this.voiced;
  }

  get length(): number {
    return this.decisions.length;
  }

  /** Oldest first. */
  snapshot(): boolean[] {
    return [...this.decisions];
  }
}
