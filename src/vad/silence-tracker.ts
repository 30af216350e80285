/**
 * Counts consecutive silent frames to find the end of an utterance.
 *
 * `speech_ended` is edge-triggered: a latch is armed by a voice-confirmed frame and
 * disarmed when the end fires, so the event is reported once per utterance even though
 * the silence run keeps climbing. The latch starts disarmed; silence before any
 * confirmed voice ends nothing.
 */

/** How one frame was classified by the tracker. */
export type SilenceOutcome = "voice" | "silence" | "ended" | "ambiguous";

export class SilenceTracker {
  private run = 0;
  private armed = false;

  constructor(private readonly endFrames = 16) {}

  update(probability: number, thresholdLow: number, voiceConfirmed: boolean): SilenceOutcome {
    if (voiceConfirmed) {
      this.run = 0;
      this.armed = true;
      return "voice";
    }
    if (probability <= thresholdLow) {
      this.run++;
      if (this.armed && this.run >= this.endFrames) {
        this.armed = false;
        return "ended";
      }
      return "silence";
    }
    // Ambiguous zone: neither voice nor silence.
    this.run = 0;
    return "ambiguous";
  }

  get silenceRun(): number {
    return this.run;
  }

  /** True while an utterance is open and its end has not been reported yet. */
  get awaitingEnd(): boolean {
    return this.armed;
  }
}
