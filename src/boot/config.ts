import { config as loadDotenv } from 'dotenv';

import { parseLogLevel } from '@logging/helpers';
import type { AppConstants, ProcessSettings, UserConfig } from '../types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION DEFAULTS
//   Values used for any field missing from the JSON config file.
//   The file is edited by the user (or the dashboard) and
//   reloaded on every control tick.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: UserConfig = {
  // controlEnabled
  //   Role: Master switch. When false both plugs are driven OFF and no
  //         temperature notifications are raised.
  //   Critical: Boolean only.
  //   Recommended: false until plugs and sensor are set up.
  controlEnabled: false,

  // enableHeating / enableCooling
  //   Role: Per-relay enable. A disabled relay is always commanded OFF.
  //   Critical: Boolean only.
  //   Recommended: Enable only the relays that have a plug attached.
  enableHeating: true,
  enableCooling: true,

  // heatingPlug / coolingPlug
  //   Role: Host or IP of the smart plug driving each relay.
  //   Critical: null or a non-empty string; the two must differ.
  //   Recommended: A DHCP reservation so the address does not move.
  heatingPlug: null,
  coolingPlug: null,

  // lowLimit / highLimit
  //   Role: Target band. Heat at or below lowLimit, cool at or above highLimit.
  //   Critical: Inside LIMIT_RANGE for the unit.
  //   Recommended: A band of at least MIN_LIMIT_GAP_WARNING; lowLimit < highLimit.
  lowLimit: 66,
  highLimit: 68,

  // unit
  //   Role: Unit of the limits and of the sensor readings.
  //   Critical: 'F' or 'C'.
  //   Recommended: Whatever the hydrometer reports.
  unit: 'F',

  // assignedSensorId
  //   Role: Hydrometer (by color) whose readings drive the relays.
  //   Critical: null or a non-empty string.
  //   Recommended: Set together with sensorAssignedAt.
  assignedSensorId: null,

  // sensorAssignedAt
  //   Role: Unix seconds of the assignment; starts the 15 min grace period.
  //   Critical: null or a non-negative timestamp.
  //   Recommended: Written by whatever assigns the sensor.
  sensorAssignedAt: null,

  // updateIntervalSec
  //   Role: Expected hydrometer broadcast cadence. A sensor silent for two
  //         intervals is stale and forces a safety shutdown.
  //   Critical: Integer in [MIN_UPDATE_INTERVAL_SEC, MAX_UPDATE_INTERVAL_SEC].
  //   Recommended: 120 s.
  updateIntervalSec: 120,

  // rateLimitWindowSec
  //   Role: Minimum time between identical commands to the same plug.
  //   Critical: 0 to MAX_RATE_LIMIT_WINDOW_SEC.
  //   Recommended: 10 s.
  rateLimitWindowSec: 10,

  // notifications
  //   Role: Per-event delivery toggles. A disabled event still arms and
  //         fires, it just is not delivered.
  //   Critical: Booleans only.
  //   Recommended: All on.
  notifications: {
    temp_below_low_limit: true,
    temp_above_high_limit: true,
    temp_in_range: true,
    heating_blocked: true,
    cooling_blocked: true,
    heating_safety_off: true,
    cooling_safety_off: true,
    swapped_plugs: true,
  },
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: AppConstants = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; every *_LOG_LEVEL setting uses these.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // SENSOR_GRACE_PERIOD_SEC
  //   Role: Time after sensor assignment during which liveness is not checked.
  //   Critical: Fixed at 15 minutes.
  SENSOR_GRACE_PERIOD_SEC: 900,

  // STALE_INTERVAL_MULTIPLIER
  //   Role: Stale threshold = multiplier × updateIntervalSec.
  //   Critical: 2 (the sensor may miss exactly one broadcast).
  STALE_INTERVAL_MULTIPLIER: 2,

  // MAX_CLOCK_SKEW_SEC
  //   Role: A broadcast dated further ahead of the local clock is treated as
  //         never seen, so a bad timestamp cannot keep a sensor fresh.
  //   Recommended: 60 s.
  MAX_CLOCK_SKEW_SEC: 60,

  // MAX_CONSECUTIVE_ERRORS
  //   Role: Consecutive config or sensor read failures before escalating to CRITICAL.
  //   Recommended: 3.
  MAX_CONSECUTIVE_ERRORS: 3,

  // SWAPPED_PLUG_MIN_ON_SEC
  //   Role: How long a relay must have been on before a wrong-way
  //         temperature move flags the plugs as swapped.
  //   Recommended: 600 s.
  SWAPPED_PLUG_MIN_ON_SEC: 600,

  // SWAPPED_PLUG_MIN_DRIFT
  //   Role: Wrong-way change (per unit) that counts as swapped plugs.
  //   Recommended: 1.5°F, 0.8°C.
  SWAPPED_PLUG_MIN_DRIFT: {
    F: 1.5,
    C: 0.8,
  },

  // ═══════════════════════════════════════════════════════════════
  // VALIDATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  MIN_UPDATE_INTERVAL_SEC: 5,
  MAX_UPDATE_INTERVAL_SEC: 3600,
  MAX_RATE_LIMIT_WINDOW_SEC: 600,

  // MIN_LIMIT_GAP_WARNING
  //   Role: Bands narrower than this (in the configured unit) get a warning.
  MIN_LIMIT_GAP_WARNING: 0.5,

  // LIMIT_RANGE
  //   Role: Hard bounds for lowLimit/highLimit per unit.
  LIMIT_RANGE: {
    F: { min: 32, max: 120 },
    C: { min: 0, max: 50 },
  },

  // ═══════════════════════════════════════════════════════════════
  // HARDWARE CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // SWITCH_ID
  //   Role: Switch component on the plug; single-outlet plugs use 0.
  SWITCH_ID: 0,

  // ACTUATOR_RETRY_DELAYS_MS
  //   Role: Delay before each attempt of one plug command; length = attempts.
  //   Recommended: [0, 1000, 2000].
  ACTUATOR_RETRY_DELAYS_MS: [0, 1000, 2000],
};

// ─────────────────────────────────────────────────────────────
// PROCESS SETTINGS
//   Read once at startup from the environment (and .env).
// ─────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG_PATH = 'config/fermentation.json';
export const DEFAULT_SENSOR_PATH = 'data/sensors.json';

type Env = Readonly<Record<string, string | undefined>>;

function readString(env: Env, key: string): string | null {
  const value = env[key];
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Parse a boolean environment value ("true", "1", "yes", "on")
 * @internal
 */
export function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const value = readString(env, key);
  if (value === null) return fallback;
  return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Parse an integer environment value, falling back on anything below min
 * @internal
 */
export function readInteger(env: Env, key: string, fallback: number, min = 1): number {
  const value = readString(env, key);
  if (value === null) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

/**
 * Build process settings from environment variables
 *
 * @param env - Environment (process.env after dotenv)
 * @returns Process settings with defaults applied
 */
export function loadProcessSettings(env: Env): ProcessSettings {
  const levels = APP_CONSTANTS.LOG_LEVELS;

  return {
    CONFIG_PATH: readString(env, 'FERMENT_CONFIG_PATH') ?? DEFAULT_CONFIG_PATH,
    SENSOR_PATH: readString(env, 'FERMENT_SENSOR_PATH') ?? DEFAULT_SENSOR_PATH,

    ACTUATOR_TIMEOUT_MS: readInteger(env, 'FERMENT_ACTUATOR_TIMEOUT_MS', 5000),
    PLUG_USER: readString(env, 'PLUG_USER'),
    PLUG_PASSWORD: readString(env, 'PLUG_PASSWORD'),

    SLACK_ENABLED: readBoolean(env, 'SLACK_ENABLED', false),
    SLACK_WEBHOOK_URL: readString(env, 'SLACK_WEBHOOK_URL'),
    SLACK_LOG_LEVEL: parseLogLevel(env.SLACK_LOG_LEVEL, levels.WARNING, levels),
    SLACK_BUFFER_SIZE: readInteger(env, 'SLACK_BUFFER_SIZE', 10),
    SLACK_RETRY_DELAY_SEC: readInteger(env, 'SLACK_RETRY_DELAY_SEC', 30),

    CONSOLE_ENABLED: readBoolean(env, 'CONSOLE_ENABLED', true),
    CONSOLE_LOG_LEVEL: parseLogLevel(env.CONSOLE_LOG_LEVEL, levels.INFO, levels),
    CONSOLE_BUFFER_SIZE: readInteger(env, 'CONSOLE_BUFFER_SIZE', 150),
    CONSOLE_INTERVAL_MS: readInteger(env, 'CONSOLE_INTERVAL_MS', 50),

    GLOBAL_LOG_LEVEL: parseLogLevel(env.LOG_LEVEL, levels.INFO, levels),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readInteger(env, 'LOG_AUTO_DEMOTE_HOURS', 24, 0),
  };
}

/**
 * Load .env into process.env and read the process settings
 *
 * @param envFile - Optional .env path (defaults to ./.env)
 * @returns Process settings
 */
export function loadEnvironment(envFile?: string): ProcessSettings {
  loadDotenv(envFile !== undefined ? { path: envFile } : {});
  return loadProcessSettings(process.env);
}
