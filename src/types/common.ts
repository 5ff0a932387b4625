/**
 * Common type definitions used throughout the project
 */

/**
 * One of the two controlled smart plugs
 */
export type RelayId = 'heating' | 'cooling';

/**
 * Command sent to a smart plug
 */
export type RelayAction = 'on' | 'off';

/**
 * Policy output per relay ("unchanged" inside the dead band)
 */
export type DesiredAction = RelayAction | 'unchanged';

/**
 * Both relays, in the order the controller processes them
 */
export const RELAY_IDS: readonly RelayId[] = ['heating', 'cooling'];

/**
 * Display unit for temperatures; limits and readings share it
 */
export type TemperatureUnit = 'F' | 'C';

/**
 * Temperature sample from the assigned sensor
 */
export interface TemperatureReading {
  /** Temperature in the configured unit */
  value: number;
  /** Unix seconds when the sensor broadcast the value */
  observedAt: number;
}

/**
 * Last known on/off state per relay, as confirmed by the plugs
 */
export interface RelayKnownStates {
  heating: boolean;
  cooling: boolean;
}

/**
 * Controller status, logged whenever it changes
 */
export const CONTROL_STATUS = {
  DISABLED: 'disabled',
  SAFETY_SHUTDOWN: 'safety_shutdown',
  NO_READING: 'no_reading',
  HEATING: 'heating',
  COOLING: 'cooling',
  IDLE: 'idle',
} as const;

export type ControlStatus = typeof CONTROL_STATUS[keyof typeof CONTROL_STATUS];

/**
 * Opaque timer handle returned by TimerAPI.set
 */
export type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Timer abstraction used by the log sinks
 */
export interface TimerAPI {
  /**
   * Set a timer
   * @param intervalMs - Interval in milliseconds
   * @param repeat - Whether to repeat the timer
   * @param callback - Function to call when timer fires
   */
  set(intervalMs: number, repeat: boolean, callback: () => void): TimerHandle;
  /** Cancel a timer created by set() */
  clear(handle: TimerHandle): void;
}
