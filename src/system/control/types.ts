/**
 * Control module type definitions
 */

import type { AppConstants } from '$types/config';
import type { TriggerRegistry } from '@core/triggers';
import type { EventSink } from '@events';
import type { ActuatorChannel } from '@hardware/actuator';
import type { RelayDispatcher } from '@hardware/relay';
import type { SensorFeed } from '@hardware/sensors';
import type { Logger } from '@logging';
import type { ConfigStore } from '@system/config-store';
import type { ControllerState } from '@system/state/types';

/**
 * Everything one control tick needs
 */
export interface Controller {
  state: ControllerState;
  logger: Logger;
  configStore: ConfigStore;
  sensorFeed: SensorFeed;
  channel: ActuatorChannel;
  dispatcher: RelayDispatcher;
  registry: TriggerRegistry;
  events: EventSink;
  constants: Pick<
    AppConstants,
    | 'SENSOR_GRACE_PERIOD_SEC'
    | 'STALE_INTERVAL_MULTIPLIER'
    | 'MAX_CLOCK_SKEW_SEC'
    | 'MAX_CONSECUTIVE_ERRORS'
    | 'SWAPPED_PLUG_MIN_ON_SEC'
    | 'SWAPPED_PLUG_MIN_DRIFT'
    | 'LOG_LEVELS'
  >;
  /** Current Unix time in seconds */
  timeSource: () => number;
}

/**
 * Periodic driver of the control tick
 */
export interface ControlLoop {
  /** Run a tick now, then one every tick period; no-op when running */
  start(): void;
  stop(): void;
  /** Period the loop is scheduled at, 0 before the first start */
  getPeriodMs(): number;
}
