/**
 * Control tick steps
 */

import type { ControlStatus, RelayAction, RelayId, TemperatureReading } from '$types/common';
import { RELAY_IDS } from '$types/common';
import { errorMessage } from '$types/errors';
import { checkSensorLiveness, staleThresholdFor } from '@core/sensor-liveness';
import type { LivenessResult } from '@core/sensor-liveness';
import { decideRelayAction } from '@core/threshold-policy';
import type { ControlConfig, EvaluationResult } from '@core/threshold-policy';
import {
  SAFETY_REARM,
  adoptFlags,
  applyTransitions,
  decideSafetyTriggerEvents,
  mergeAfterReload
} from '@core/triggers';
import type { SafetyTriggerInput } from '@core/triggers';
import {
  SWAPPED_PLUGS_REARM,
  createEmptyBaselines,
  decideSwappedPlugEvents,
  detectSwappedPlug,
  updateBaselines
} from '@core/swapped-plugs';
import { buildTriggerEvent } from '@events/helpers';
import { EMPTY_SAMPLE } from '@hardware/sensors';
import type { SensorSample } from '@hardware/sensors';
import { fmtTemp } from '@logging';
import { formatDuration } from '@utils/time';

import type { Controller } from './types';

/**
 * Record a failed read and log it, escalating after repeated failures
 */
function recordError(controller: Controller, message: string): void {
  const state = controller.state;
  if (!state.tickFailed) {
    state.tickFailed = true;
    state.consecutiveErrors++;
  }

  if (state.consecutiveErrors === controller.constants.MAX_CONSECUTIVE_ERRORS) {
    controller.logger.critical(message + ' (' + state.consecutiveErrors + ' ticks in a row)');
  } else if (message !== state.lastError) {
    controller.logger.warning(message);
  }
  state.lastError = message;
}

/**
 * Clear the error streak after a tick without read failures
 */
export function settleErrors(controller: Controller): void {
  const state = controller.state;
  if (state.tickFailed) {
    return;
  }
  if (state.consecutiveErrors > 0) {
    controller.logger.info('Recovered after ' + state.consecutiveErrors + ' failed tick(s)');
  }
  state.consecutiveErrors = 0;
  state.lastError = null;
}

/**
 * Reload the user configuration and overlay the live arming flags
 *
 * A failed load keeps the last good configuration.
 *
 * @returns Config for this tick
 */
export function reloadConfig(controller: Controller): ControlConfig {
  const state = controller.state;

  try {
    const loaded = controller.configStore.load();
    if (loaded.config.heatingPlug !== state.config.heatingPlug || loaded.config.coolingPlug !== state.config.coolingPlug) {
      // Rewired plugs get a fresh swapped-plug check
      applyTransitions(controller.registry, SWAPPED_PLUGS_REARM);
      state.relayBaselines = createEmptyBaselines();
    }
    state.config = loaded.config;

    const warnings = loaded.warnings.join('; ');
    if (warnings !== state.configWarnings && warnings.length > 0) {
      for (const warning of loaded.warnings) {
        controller.logger.warning('Config: ' + warning);
      }
    }
    state.configWarnings = warnings;
  } catch (err: unknown) {
    recordError(controller, errorMessage(err) + ', keeping last good configuration');
  }

  const config = state.config;
  controller.channel.configure({ heating: config.heatingPlug, cooling: config.coolingPlug });
  controller.dispatcher.setRateLimitWindow(config.rateLimitWindowSec);

  return mergeAfterReload(config, controller.registry.snapshot());
}

/**
 * Read the assigned sensor; a feed failure counts as no broadcast
 */
export function readSample(controller: Controller, config: ControlConfig): SensorSample {
  try {
    return controller.sensorFeed.read(config.assignedSensorId);
  } catch (err: unknown) {
    recordError(controller, errorMessage(err));
    return EMPTY_SAMPLE;
  }
}

/**
 * Run the liveness guard for this tick
 */
export function checkLiveness(controller: Controller, config: ControlConfig, sample: SensorSample, t: number): LivenessResult {
  const constants = controller.constants;
  return checkSensorLiveness(
    config.assignedSensorId,
    sample.lastBroadcastAt,
    config.sensorAssignedAt,
    t,
    staleThresholdFor(config.updateIntervalSec, constants),
    constants
  );
}

/**
 * Send one relay request, isolating failures to that relay
 */
export function requestRelay(controller: Controller, relayId: RelayId, action: RelayAction, t: number): void {
  try {
    controller.dispatcher.request(relayId, action, t);
  } catch (err: unknown) {
    controller.logger.critical('Failed to dispatch ' + relayId + ' ' + action.toUpperCase() + ': ' + errorMessage(err));
  }
}

/**
 * Drive both relays off and forget their on-baselines
 */
export function requestAllOff(controller: Controller, t: number): void {
  controller.state.relayBaselines = createEmptyBaselines();
  for (const relayId of RELAY_IDS) {
    requestRelay(controller, relayId, 'off', t);
  }
}

/**
 * Whether a relay is on or about to be
 */
function isOnOrTurningOn(controller: Controller, relayId: RelayId): boolean {
  const relay = controller.dispatcher.getState(relayId);
  return relay.knownOn || (relay.pending && relay.pendingAction === 'on');
}

/**
 * Why an inactive sensor is inactive, for the shutdown warning
 */
function describeSilence(liveness: LivenessResult): string {
  if (liveness.reason === 'future_timestamp') {
    return 'last broadcast dated ahead of the clock';
  }
  return liveness.silenceSec === null ? 'never heard' : 'silent for ' + formatDuration(liveness.silenceSec);
}

/**
 * Force both relays off for an inactive sensor and raise safety triggers
 *
 * Relays that are on get a safety-off notification; relays the policy
 * would have switched on get a blocked notification.
 */
export function processSafetyShutdown(
  controller: Controller,
  config: ControlConfig,
  sample: SensorSample,
  liveness: LivenessResult,
  t: number
): void {
  const reading = sample.reading;
  const wanted = reading !== null ? decideRelayAction(reading.value, config) : null;

  const inputs: SafetyTriggerInput[] = RELAY_IDS.map(function(relayId) {
    return {
      relayId: relayId,
      isOn: isOnOrTurningOn(controller, relayId),
      wantsOn: wanted !== null && wanted[relayId] === 'on'
    };
  });

  if (controller.state.sensorActive) {
    controller.logger.warning('Sensor ' + String(config.assignedSensorId) + ' inactive (' + describeSilence(liveness) + '), turning relays off');
  }
  controller.state.sensorActive = false;

  const fired = applyTransitions(controller.registry, decideSafetyTriggerEvents(inputs));
  for (const trigger of fired) {
    controller.events.emit(buildTriggerEvent(trigger, reading !== null ? reading.value : null, config, t));
  }

  requestAllOff(controller, t);
}

/**
 * Re-arm the safety triggers once the sensor is live
 */
export function processSensorRecovery(controller: Controller, config: ControlConfig): void {
  if (!controller.state.sensorActive) {
    controller.logger.info('Sensor ' + String(config.assignedSensorId) + ' active again');
  }
  controller.state.sensorActive = true;
  applyTransitions(controller.registry, SAFETY_REARM);
}

/**
 * Keep the evaluation's flags and deliver its events
 */
export function processTemperatureTriggers(controller: Controller, result: EvaluationResult): void {
  adoptFlags(controller.registry, result.flags);
  for (const event of result.triggerEvents) {
    controller.events.emit(event);
  }
}

/**
 * Request the desired action on each relay
 */
export function processRelayDecisions(controller: Controller, result: EvaluationResult, t: number): void {
  const desired = { heating: result.desiredHeating, cooling: result.desiredCooling };

  for (const relayId of RELAY_IDS) {
    const action = desired[relayId];
    if (action !== 'unchanged') {
      requestRelay(controller, relayId, action, t);
    }
  }
}

/**
 * Track how long each relay has been on and alert on swapped plugs
 *
 * Uses the confirmed relay states, so a relay gets its baseline on the
 * first tick after the plug reported it on.
 */
export function processSwappedPlugs(controller: Controller, config: ControlConfig, reading: TemperatureReading, t: number): void {
  const state = controller.state;
  const constants = controller.constants;

  state.relayBaselines = updateBaselines(state.relayBaselines, controller.dispatcher.knownStates(), reading.value, t);
  const suspect = detectSwappedPlug(state.relayBaselines, reading.value, t, {
    minOnSec: constants.SWAPPED_PLUG_MIN_ON_SEC,
    minDrift: constants.SWAPPED_PLUG_MIN_DRIFT[config.unit]
  });

  const fired = applyTransitions(controller.registry, decideSwappedPlugEvents(suspect));
  for (const trigger of fired) {
    controller.events.emit(buildTriggerEvent(trigger, reading.value, config, t));
  }
}

/**
 * Record the latest reading
 */
export function recordReading(controller: Controller, reading: TemperatureReading): void {
  controller.state.lastTemperature = reading.value;
  controller.state.lastReadingAt = reading.observedAt;
}

/**
 * Update the controller status, logging changes
 */
export function setStatus(controller: Controller, status: ControlStatus, config: ControlConfig): void {
  const previous = controller.state.status;
  if (previous === status) {
    return;
  }

  controller.state.status = status;
  controller.logger.info(
    'Status: ' + (previous ?? 'starting') + ' → ' + status +
    ' (' + fmtTemp(controller.state.lastTemperature, config.unit) +
    ', band ' + fmtTemp(config.lowLimit, config.unit) + ' to ' + fmtTemp(config.highLimit, config.unit) + ')'
  );
}
