/**
 * Trigger event formatting
 */

import { fmtTemp } from '@logging/helpers';
import type { LogLevel, LogLevels } from '@logging/types';
import { EVENT_NAMES } from './types';
import type { TriggerEvent } from './types';

/**
 * Render a trigger event as a one-line notification
 * @param event - Event to format
 * @returns Notification text
 */
export function formatTriggerEvent(event: TriggerEvent): string {
  const temp = fmtTemp(event.temperature, event.unit);
  const low = fmtTemp(event.lowLimit, event.unit);
  const high = fmtTemp(event.highLimit, event.unit);

  switch (event.eventName) {
    case EVENT_NAMES.TEMP_BELOW_LOW_LIMIT:
      return '🥶 Temperature ' + temp + ' is at or below low limit ' + low;
    case EVENT_NAMES.TEMP_ABOVE_HIGH_LIMIT:
      return '🔥 Temperature ' + temp + ' is at or above high limit ' + high;
    case EVENT_NAMES.TEMP_IN_RANGE:
      return '✅ Temperature ' + temp + ' is back in range (' + low + ' to ' + high + ')';
    case EVENT_NAMES.HEATING_BLOCKED:
      return 'Heating ON blocked: sensor inactive (last temperature ' + temp + ')';
    case EVENT_NAMES.COOLING_BLOCKED:
      return 'Cooling ON blocked: sensor inactive (last temperature ' + temp + ')';
    case EVENT_NAMES.HEATING_SAFETY_OFF:
      return 'Heating forced OFF: sensor inactive (last temperature ' + temp + ')';
    case EVENT_NAMES.COOLING_SAFETY_OFF:
      return 'Cooling forced OFF: sensor inactive (last temperature ' + temp + ')';
    case EVENT_NAMES.SWAPPED_PLUGS:
      return event.relayId === 'cooling'
        ? '🔀 Cooling is on but temperature rose to ' + temp + ', heating and cooling plugs may be swapped'
        : '🔀 Heating is on but temperature fell to ' + temp + ', heating and cooling plugs may be swapped';
  }
}

/**
 * Log level an event is delivered at
 *
 * Safety shutdowns and swapped plugs are CRITICAL, limit crossings and
 * blocked commands are WARNING, the in-range recovery is INFO.
 *
 * @param event - Event to classify
 * @param logLevels - Log level constants object
 * @returns Log level for the event
 */
export function eventLogLevel(event: TriggerEvent, logLevels: LogLevels): LogLevel {
  switch (event.eventName) {
    case EVENT_NAMES.HEATING_SAFETY_OFF:
    case EVENT_NAMES.COOLING_SAFETY_OFF:
    case EVENT_NAMES.SWAPPED_PLUGS:
      return logLevels.CRITICAL;
    case EVENT_NAMES.TEMP_IN_RANGE:
      return logLevels.INFO;
    default:
      return logLevels.WARNING;
  }
}

/**
 * Limits and unit copied onto every event
 */
export interface EventContext {
  lowLimit: number;
  highLimit: number;
  unit: TriggerEvent['unit'];
}

/**
 * Build a trigger event from a fired trigger
 *
 * @param fired - Event name and optional relay
 * @param temperature - Latest temperature, null when unavailable
 * @param context - Limits and unit at the time of firing
 * @param timestamp - Unix seconds
 * @returns Trigger event
 */
export function buildTriggerEvent(
  fired: Pick<TriggerEvent, 'eventName' | 'relayId'>,
  temperature: number | null,
  context: EventContext,
  timestamp: number
): TriggerEvent {
  const event: TriggerEvent = {
    eventName: fired.eventName,
    temperature: temperature,
    lowLimit: context.lowLimit,
    highLimit: context.highLimit,
    unit: context.unit,
    timestamp: timestamp
  };
  if (fired.relayId) {
    event.relayId = fired.relayId;
  }
  return event;
}
