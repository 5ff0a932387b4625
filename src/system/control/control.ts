/**
 * Control tick
 *
 * One synchronous pass: reload config, read the sensor, check liveness,
 * evaluate the policy, hand relay requests to the dispatcher and check the
 * relays push the temperature the right way. Actuator
 * I/O happens on the channel's worker; the tick never waits for it.
 */

import { CONTROL_STATUS } from '$types/common';
import type { ControlStatus } from '$types/common';
import { errorMessage } from '$types/errors';
import { evaluate } from '@core/threshold-policy';
import { describeDisarmed, mergeAfterReload } from '@core/triggers';

import type { Controller } from './types';

import {
  checkLiveness,
  processRelayDecisions,
  processSafetyShutdown,
  processSensorRecovery,
  processSwappedPlugs,
  processTemperatureTriggers,
  readSample,
  recordReading,
  reloadConfig,
  requestAllOff,
  setStatus,
  settleErrors
} from './helpers';

/**
 * Run one control tick
 *
 * @param controller - Controller
 * @param t - Tick timestamp in seconds (defaults to the controller clock)
 * @returns Status after the tick, null if the tick failed
 */
export function runTick(controller: Controller, t: number = controller.timeSource()): ControlStatus | null {
  const state = controller.state;
  const logger = controller.logger;

  try {
    state.tickFailed = false;
    state.tickCount++;
    state.lastTickAt = t;

    const config = reloadConfig(controller);

    if (!config.controlEnabled) {
      requestAllOff(controller, t);
      setStatus(controller, CONTROL_STATUS.DISABLED, config);
      settleErrors(controller);
      return CONTROL_STATUS.DISABLED;
    }

    const sample = readSample(controller, config);
    if (sample.reading !== null) {
      recordReading(controller, sample.reading);
    }

    const liveness = checkLiveness(controller, config, sample, t);
    logger.debug(
      'Tick ' + state.tickCount + ': sensor=' + String(config.assignedSensorId) +
      ' reading=' + (sample.reading !== null ? sample.reading.value : 'none') +
      ' liveness=' + liveness.reason +
      ' disarmed=' + describeDisarmed(controller.registry.snapshot())
    );

    if (!liveness.active) {
      processSafetyShutdown(controller, config, sample, liveness, t);
      setStatus(controller, CONTROL_STATUS.SAFETY_SHUTDOWN, config);
      settleErrors(controller);
      return CONTROL_STATUS.SAFETY_SHUTDOWN;
    }

    processSensorRecovery(controller, config);

    if (sample.reading === null) {
      setStatus(controller, CONTROL_STATUS.NO_READING, config);
      settleErrors(controller);
      return CONTROL_STATUS.NO_READING;
    }

    // Flags as re-armed above, not as they were at reload
    const current = mergeAfterReload(config, controller.registry.snapshot());
    const evaluated = evaluate(sample.reading, current, controller.dispatcher.knownStates());
    processTemperatureTriggers(controller, evaluated);
    processRelayDecisions(controller, evaluated, t);
    processSwappedPlugs(controller, config, sample.reading, t);

    setStatus(controller, evaluated.status, config);
    settleErrors(controller);
    return evaluated.status;
  } catch (err: unknown) {
    logger.critical('Control tick failed: ' + errorMessage(err));
    return null;
  }
}

/**
 * Run one tick on the controller clock (loop entry point)
 */
export function run(controller: Controller): void {
  runTick(controller);
}
