export { now, sleep } from './time';
export { elapsedSec, parseTimestamp, formatDuration } from './helpers';
export { createNodeTimer } from './timer';
