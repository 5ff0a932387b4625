export { createConsoleSink, colorize } from './console-sink';
