/**
 * Logger-backed event sink
 *
 * Delivers trigger events through the logger, so they reach the console and
 * (at WARNING and above by default) Slack. Per-event toggles are read on every
 * emit because the user config is reloaded each tick.
 */

import type { NotificationToggles } from '$types/config';
import type { Logger, LogLevels } from '@logging/types';
import { formatTriggerEvent, eventLogLevel } from './helpers';
import type { EventSink, TriggerEvent } from './types';

/**
 * Create an event sink that writes notifications to the logger
 *
 * @param logger - Logger instance
 * @param getToggles - Returns the current per-event delivery toggles
 * @param logLevels - Log level constants object
 * @returns Event sink
 */
export function createLoggerEventSink(
  logger: Logger,
  getToggles: () => NotificationToggles,
  logLevels: LogLevels
): EventSink {
  function emit(event: TriggerEvent): void {
    const message = formatTriggerEvent(event);

    if (!getToggles()[event.eventName]) {
      logger.debug('Notification suppressed (' + event.eventName + '): ' + message);
      return;
    }

    logger.log(eventLogLevel(event, logLevels), message);
  }

  return {
    emit: emit
  };
}
