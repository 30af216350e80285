/**
 * Frame classifier factory: returns a backend based on config.
 */

import type { AppConfig } from "../../config";
import type { IFrameClassifier } from "./types";
import { StubClassifier } from "./stub";
import { EnergyClassifier } from "./energy";
import { WebRtcClassifier } from "./webrtc";
import { RemoteClassifier } from "./remote";

export type { IFrameClassifier, ClassifierFrame } from "./types";
export { StubClassifier } from "./stub";
export { EnergyClassifier } from "./energy";
export { WebRtcClassifier } from "./webrtc";
export { RemoteClassifier } from "./remote";

export function createClassifier(config: AppConfig): IFrameClassifier {
  const { provider, webrtcMode, webrtcFrameMs, energyRms, remoteUrl, remoteTimeoutMs, remoteConcurrent } = config.vad;
  if (provider === "webrtc") {
    return new WebRtcClassifier({ mode: webrtcMode, frameMs: webrtcFrameMs });
  }
  if (provider === "energy") {
    return new EnergyClassifier({ rmsThreshold: energyRms });
  }
  if (provider === "remote") {
    // Without a URL the backend fails to load and VAD reports ModelUnavailable.
    return new RemoteClassifier({ baseUrl: remoteUrl ?? "", timeoutMs: remoteTimeoutMs, concurrent: remoteConcurrent });
  }
  return new StubClassifier();
}
