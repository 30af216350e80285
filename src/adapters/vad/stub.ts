/**
 * Stub classifier for testing or when no backend is configured.
 * Reports every frame as silence.
 */

import type { ClassifierFrame, IFrameClassifier } from "./types";

export class StubClassifier implements IFrameClassifier {
  readonly name = "stub";
  readonly concurrencySafe = true;

  async load(): Promise<void> {}

  classify(_frame: ClassifierFrame): number {
    return 0;
  }
}
