export { FrameClassifierAdapter } from "./frame-classifier";
export { detectOnce } from "./detector";
export type { DetectResult } from "./detector";
export { HysteresisWindow } from "./hysteresis-window";
export { SilenceTracker } from "./silence-tracker";
export type { SilenceOutcome } from "./silence-tracker";
export { VadSession, resolveThresholds } from "./session";
export type { FrameEvent, SessionSnapshot, Thresholds } from "./session";
export { KeyedLock } from "./keyed-lock";
export { SessionRegistry } from "./registry";
export type { ProcessFrameInput, SessionEndResult, SessionRegistryConfig, SessionStartResult } from "./registry";
