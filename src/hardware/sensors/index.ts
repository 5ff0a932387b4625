export { createFileSensorFeed } from './sensors';
export { EMPTY_SAMPLE, isValidTemperature, parseSensorEntry } from './helpers';
export { EXTERNAL_SENSOR_KEY } from './types';
export type { SensorFeed, SensorSample } from './types';
