export { run, runTick } from './control';
export { createControlLoop, tickPeriodMs } from './loop';
export {
  reloadConfig,
  readSample,
  checkLiveness,
  processSafetyShutdown,
  processSensorRecovery,
  processTemperatureTriggers,
  processRelayDecisions,
  processSwappedPlugs,
  requestAllOff,
  setStatus
} from './helpers';
export type { ControlLoop, Controller } from './types';
