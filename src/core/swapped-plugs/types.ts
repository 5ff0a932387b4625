/**
 * Swapped plug detection type definitions
 */

import type { RelayId } from '$types/common';

/**
 * Where the temperature stood when a relay was first seen on
 */
export interface RelayBaseline {
  /** Unix seconds of the first tick that saw the relay confirmed on */
  since: number;
  temperature: number;
}

/**
 * Baseline per relay, null while the relay is off
 */
export type RelayBaselines = Record<RelayId, RelayBaseline | null>;

/**
 * Thresholds for judging a relay's effect
 */
export interface SwappedPlugLimits {
  /** Seconds a relay must have been on before its effect is judged */
  minOnSec: number;
  /** Temperature change in the wrong direction that counts as swapped */
  minDrift: number;
}
