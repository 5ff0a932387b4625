/**
 * Sensor liveness type definitions
 */

/**
 * Liveness timing settings
 */
export interface LivenessConfig {
  /** Seconds after a sensor assignment during which it counts as active */
  SENSOR_GRACE_PERIOD_SEC: number;

  /** Stale threshold as a multiple of the update interval */
  STALE_INTERVAL_MULTIPLIER: number;

  /** Broadcasts dated further ahead of the local clock than this are not trusted */
  MAX_CLOCK_SKEW_SEC: number;
}

/**
 * Why a sensor counts as active or inactive
 */
export type LivenessReason =
  | 'no_sensor'
  | 'grace_period'
  | 'fresh'
  | 'never_seen'
  | 'future_timestamp'
  | 'stale';

/**
 * Liveness verdict with diagnostics for logging
 */
export interface LivenessResult {
  active: boolean;
  reason: LivenessReason;
  /** Seconds since the last broadcast, null when never seen or dated ahead of the clock */
  silenceSec: number | null;
}
