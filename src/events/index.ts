export { EVENT_NAMES, ALL_EVENT_NAMES } from './types';
export type { TriggerEventName, TriggerEvent, EventSink } from './types';
export { formatTriggerEvent, eventLogLevel, buildTriggerEvent } from './helpers';
export type { EventContext } from './helpers';
export { createLoggerEventSink } from './event-sink';
