export { isSensorActive, checkSensorLiveness, staleThresholdFor, DEFAULT_LIVENESS_CONFIG } from './sensor-liveness';
export type { LivenessConfig, LivenessReason, LivenessResult } from './types';
