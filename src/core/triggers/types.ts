/**
 * Trigger arming type definitions
 *
 * Every notification has an "armed" flag. Firing disarms it so the same
 * condition cannot notify twice; a later, opposite condition re-arms it.
 */

import type { RelayId } from '$types/common';
import type { TriggerEventName } from '@events/types';

/**
 * Arming flags, all true at startup
 */
export interface TriggerFlags {
  belowLimitArmed: boolean;
  aboveLimitArmed: boolean;
  inRangeArmed: boolean;
  heatingBlockedArmed: boolean;
  coolingBlockedArmed: boolean;
  heatingSafetyOffArmed: boolean;
  coolingSafetyOffArmed: boolean;
  swappedPlugsArmed: boolean;
}

export type TriggerFlagName = keyof TriggerFlags;

/**
 * State change for one flag, computed by the pure decision functions and
 * applied by the registry
 */
export type TriggerTransition =
  | { kind: 'fire'; flag: TriggerFlagName; eventName: TriggerEventName; relayId?: RelayId }
  | { kind: 'arm'; flag: TriggerFlagName };

/**
 * A fire transition that found its flag armed
 */
export interface FiredTrigger {
  eventName: TriggerEventName;
  relayId?: RelayId;
}

/**
 * Per-relay inputs for the sensor safety triggers
 */
export interface SafetyTriggerInput {
  relayId: RelayId;
  /** Relay known on, or an "on" command in flight */
  isOn: boolean;
  /** Policy would have requested "on" with a live sensor */
  wantsOn: boolean;
}

/**
 * Mutable owner of the arming flags
 */
export interface TriggerRegistry {
  /**
   * Disarm a flag if armed
   * @returns True when the flag was armed (the caller emits the event)
   */
  fire(flag: TriggerFlagName): boolean;
  /** Re-arm a flag; idempotent */
  arm(flag: TriggerFlagName): void;
  isArmed(flag: TriggerFlagName): boolean;
  /** Copy of the current flags */
  snapshot(): TriggerFlags;
}
