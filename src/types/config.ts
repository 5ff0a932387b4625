/**
 * Type definitions for the fermentation controller configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { TriggerEventName } from '@events/types';
import type { TemperatureUnit } from './common';

/**
 * Per-event delivery toggles
 * Trigger arming always runs; a false toggle only suppresses delivery.
 */
export type NotificationToggles = Readonly<Record<TriggerEventName, boolean>>;

/**
 * User-editable control settings
 * Persisted as JSON on disk and reloaded on every control tick
 */
export interface UserConfig {
  // ───────── MASTER SWITCH ─────────
  readonly controlEnabled: boolean;

  // ───────── RELAYS ─────────
  readonly enableHeating: boolean;
  readonly enableCooling: boolean;
  readonly heatingPlug: string | null;
  readonly coolingPlug: string | null;

  // ───────── THRESHOLDS ─────────
  readonly lowLimit: number;
  readonly highLimit: number;
  readonly unit: TemperatureUnit;

  // ───────── SENSOR ─────────
  readonly assignedSensorId: string | null;
  readonly sensorAssignedAt: number | null;
  readonly updateIntervalSec: number;

  // ───────── COMMANDS ─────────
  readonly rateLimitWindowSec: number;

  // ───────── NOTIFICATIONS ─────────
  readonly notifications: NotificationToggles;
}

/**
 * Process-level settings
 * Loaded once at startup from the environment (.env via dotenv)
 */
export interface ProcessSettings {
  // ───────── FILES ─────────
  readonly CONFIG_PATH: string;
  readonly SENSOR_PATH: string;

  // ───────── ACTUATORS ─────────
  readonly ACTUATOR_TIMEOUT_MS: number;
  readonly PLUG_USER: string | null;
  readonly PLUG_PASSWORD: string | null;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_WEBHOOK_URL: string | null;
  readonly SLACK_LOG_LEVEL: LogLevel;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface AppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── CONTROL CONSTANTS ─────────
  readonly SENSOR_GRACE_PERIOD_SEC: number;
  readonly STALE_INTERVAL_MULTIPLIER: number;
  readonly MAX_CLOCK_SKEW_SEC: number;
  readonly MAX_CONSECUTIVE_ERRORS: number;
  readonly SWAPPED_PLUG_MIN_ON_SEC: number;
  readonly SWAPPED_PLUG_MIN_DRIFT: Readonly<Record<TemperatureUnit, number>>;

  // ───────── VALIDATION CONSTANTS ─────────
  readonly MIN_UPDATE_INTERVAL_SEC: number;
  readonly MAX_UPDATE_INTERVAL_SEC: number;
  readonly MAX_RATE_LIMIT_WINDOW_SEC: number;
  readonly MIN_LIMIT_GAP_WARNING: number;
  readonly LIMIT_RANGE: Readonly<Record<TemperatureUnit, { readonly min: number; readonly max: number }>>;

  // ───────── HARDWARE CONSTANTS ─────────
  readonly SWITCH_ID: number;
  readonly ACTUATOR_RETRY_DELAYS_MS: readonly number[];
}
