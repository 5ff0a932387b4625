/**
 * Shared type barrel
 */

export { RELAY_IDS, CONTROL_STATUS } from './common';
export type {
  RelayId,
  RelayAction,
  DesiredAction,
  TemperatureUnit,
  TemperatureReading,
  RelayKnownStates,
  ControlStatus,
  TimerHandle,
  TimerAPI,
} from './common';

export type {
  UserConfig,
  NotificationToggles,
  AppConstants,
  ProcessSettings,
} from './config';

export {
  ValidationError,
  ConfigValidationError,
  ConfigLoadError,
  ActuatorError,
  LivenessValidationError,
  GateValidationError,
  SensorFeedError,
  errorMessage,
} from './errors';
