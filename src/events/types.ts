/**
 * Trigger event types
 *
 * Trigger events are the notifications the controller emits when the
 * temperature crosses a limit, a sensor problem stops a relay, or a relay
 * drives the temperature the wrong way. Each event fires once per crossing;
 * the arming registry suppresses repeats.
 */

import type { RelayId, TemperatureUnit } from '$types/common';

/**
 * Event names, also used as keys of the per-event notification toggles
 */
export const EVENT_NAMES = {
  TEMP_BELOW_LOW_LIMIT: 'temp_below_low_limit',
  TEMP_ABOVE_HIGH_LIMIT: 'temp_above_high_limit',
  TEMP_IN_RANGE: 'temp_in_range',
  HEATING_BLOCKED: 'heating_blocked',
  COOLING_BLOCKED: 'cooling_blocked',
  HEATING_SAFETY_OFF: 'heating_safety_off',
  COOLING_SAFETY_OFF: 'cooling_safety_off',
  SWAPPED_PLUGS: 'swapped_plugs',
} as const;

export type TriggerEventName = typeof EVENT_NAMES[keyof typeof EVENT_NAMES];

/**
 * All event names, in declaration order
 */
export const ALL_EVENT_NAMES: readonly TriggerEventName[] = [
  EVENT_NAMES.TEMP_BELOW_LOW_LIMIT,
  EVENT_NAMES.TEMP_ABOVE_HIGH_LIMIT,
  EVENT_NAMES.TEMP_IN_RANGE,
  EVENT_NAMES.HEATING_BLOCKED,
  EVENT_NAMES.COOLING_BLOCKED,
  EVENT_NAMES.HEATING_SAFETY_OFF,
  EVENT_NAMES.COOLING_SAFETY_OFF,
  EVENT_NAMES.SWAPPED_PLUGS,
];

/**
 * Notification emitted when an armed trigger fires
 */
export interface TriggerEvent {
  eventName: TriggerEventName;

  /** Relay concerned (safety and swapped-plug events only) */
  relayId?: RelayId;

  /** Latest reading, null when the sensor has nothing to report */
  temperature: number | null;

  lowLimit: number;
  highLimit: number;
  unit: TemperatureUnit;

  /** Unix seconds */
  timestamp: number;
}

/**
 * Downstream consumer of trigger events (notification delivery)
 */
export interface EventSink {
  emit(event: TriggerEvent): void;
}
