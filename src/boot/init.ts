/**
 * Controller initialization
 */

import { APP_CONSTANTS, USER_CONFIG } from './config';
import { RELAY_IDS } from '$types/common';
import type { RelayId } from '$types/common';
import type { ProcessSettings, UserConfig } from '$types/config';
import { ConfigValidationError, errorMessage } from '$types/errors';
import { createTriggerRegistry } from '@core/triggers';
import { createLoggerEventSink } from '@events';
import { createActuatorChannel, ShellyRPCClient } from '@hardware/actuator';
import type { ShellyClientConfig, SwitchClientFactory } from '@hardware/actuator';
import { createRelayDispatcher } from '@hardware/relay';
import type { RelayDispatcher } from '@hardware/relay';
import { createFileSensorFeed } from '@hardware/sensors';
import { createLogger, createConsoleSink, createSlackSink, fmtTemp } from '@logging';
import { createFileConfigStore } from '@system/config-store';
import type { LoadedConfig } from '@system/config-store';
import { createInitialState } from '@system/state';
import { createNodeTimer, now } from '@utils/time';

import type { ConsoleAPI, InitMessage, Logger, SinkWithLevel } from '@logging';
import type { Controller, InitDependencies, Runtime } from './types';

export const VERSION = '1.0.0';

/**
 * Basic auth for the plugs, when a password is set
 * Shelly Gen2 devices use the fixed user "admin".
 */
export function plugAuth(settings: ProcessSettings): ShellyClientConfig['auth'] {
  if (settings.PLUG_PASSWORD === null) {
    return undefined;
  }
  return { user: settings.PLUG_USER ?? 'admin', password: settings.PLUG_PASSWORD };
}

/**
 * Shelly RPC client factory for the configured timeout and credentials
 */
export function createPlugClientFactory(settings: ProcessSettings): SwitchClientFactory {
  return function(address: string) {
    return new ShellyRPCClient({
      address: address,
      timeout: settings.ACTUATOR_TIMEOUT_MS,
      auth: plugAuth(settings)
    });
  };
}

/**
 * Production dependencies
 */
export function createDefaultDependencies(settings: ProcessSettings): InitDependencies {
  return {
    timeSource: now,
    timer: createNodeTimer(),
    consoleApi: console,
    clientFactory: createPlugClientFactory(settings)
  };
}

/**
 * Load the startup configuration, printing why it failed
 * @internal
 */
function loadStartupConfig(path: string, load: () => LoadedConfig, consoleApi: ConsoleAPI): LoadedConfig | null {
  try {
    return load();
  } catch (err: unknown) {
    consoleApi.warn('INIT FAIL: Invalid configuration in ' + path);
    if (err instanceof ConfigValidationError) {
      err.errors.forEach(function(message) {
        consoleApi.warn('  ' + message);
      });
    } else {
      consoleApi.warn('  ' + errorMessage(err));
    }
    return null;
  }
}

/**
 * Wait for every sink to report in
 * @internal
 */
function initializeLogger(logger: Logger): Promise<InitMessage[]> {
  return new Promise(function(resolve) {
    logger.initialize(function(_success: boolean, messages: InitMessage[]) {
      resolve(messages);
    });
  });
}

/**
 * Query both plugs and seed the dispatcher's known states
 * @internal
 */
async function syncRelayStates(controller: Controller): Promise<Record<RelayId, boolean | null>> {
  const observed: Record<RelayId, boolean | null> = { heating: null, cooling: null };

  for (const relayId of RELAY_IDS) {
    const isOn = await controller.channel.queryState(relayId);
    if (isOn !== null) {
      controller.dispatcher.syncState(relayId, isOn);
    }
    observed[relayId] = isOn;
  }

  return observed;
}

/**
 * One banner field per relay
 * @internal
 */
function describeRelay(relayId: RelayId, config: UserConfig, observed: boolean | null): string {
  const enabled = relayId === 'heating' ? config.enableHeating : config.enableCooling;
  const plug = relayId === 'heating' ? config.heatingPlug : config.coolingPlug;

  if (!enabled) return relayId + ' disabled';
  if (plug === null) return relayId + ' no plug';
  if (observed === null) return relayId + ' @' + plug + ' unknown';
  return relayId + ' @' + plug + ' ' + (observed ? 'ON' : 'OFF');
}

function logBanner(logger: Logger, config: UserConfig, observed: Record<RelayId, boolean | null>): void {
  logger.info('🚀 Fermentation Controller v' + VERSION);
  logger.info(
    '🎯 ' + fmtTemp(config.lowLimit, config.unit) + ' to ' + fmtTemp(config.highLimit, config.unit) +
    ' | 📡 ' + (config.assignedSensorId ?? 'no sensor') +
    ' | ⏱️ ' + config.updateIntervalSec + 's'
  );
  logger.info('🔌 ' + describeRelay('heating', config, observed.heating) + ' | ' + describeRelay('cooling', config, observed.cooling));

  if (!config.controlEnabled) {
    logger.warning('Control is disabled, both relays stay off');
  }
}

/**
 * Build and start the controller
 *
 * Loads the configuration (a bad file aborts startup), wires the logger,
 * actuator channel, dispatcher and sensor feed, then reads both plugs once so
 * the first tick knows their state.
 *
 * @param settings - Process settings
 * @param deps - Clock, timers, console and plug clients
 * @returns Runtime, or null if the configuration is invalid
 */
export async function initialize(
  settings: ProcessSettings,
  deps: InitDependencies = createDefaultDependencies(settings)
): Promise<Runtime | null> {
  const t = deps.timeSource();
  const LOG_LEVELS = APP_CONSTANTS.LOG_LEVELS;

  const configStore = createFileConfigStore(settings.CONFIG_PATH, USER_CONFIG);
  const loaded = loadStartupConfig(settings.CONFIG_PATH, configStore.load, deps.consoleApi);
  if (loaded === null) {
    return null;
  }
  const config = loaded.config;

  // Setup logging
  const consoleSink = createConsoleSink(deps.timer, deps.consoleApi, {
    bufferSize: settings.CONSOLE_BUFFER_SIZE,
    drainInterval: settings.CONSOLE_INTERVAL_MS,
    colors: true
  });

  const slackSink = createSlackSink(deps.timer, {
    enabled: settings.SLACK_ENABLED,
    webhookUrl: settings.SLACK_WEBHOOK_URL,
    bufferSize: settings.SLACK_BUFFER_SIZE,
    retryDelayMs: settings.SLACK_RETRY_DELAY_SEC * 1000,
    maxRetries: 5
  }, deps.post);

  const sinks: SinkWithLevel[] = [];
  if (settings.CONSOLE_ENABLED) {
    sinks.push({ sink: consoleSink, minLevel: settings.CONSOLE_LOG_LEVEL });
  }
  if (settings.SLACK_ENABLED) {
    sinks.push({ sink: slackSink, minLevel: settings.SLACK_LOG_LEVEL });
  }

  const logger = createLogger({
    level: settings.GLOBAL_LOG_LEVEL,
    demoteHours: settings.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.timeSource,
    sinks: sinks
  }, LOG_LEVELS);

  // Actuators
  const channel = createActuatorChannel({
    clientFactory: deps.clientFactory,
    logger: logger,
    switchId: APP_CONSTANTS.SWITCH_ID,
    retryDelaysMs: APP_CONSTANTS.ACTUATOR_RETRY_DELAYS_MS,
    sleep: deps.sleep
  });
  channel.configure({ heating: config.heatingPlug, cooling: config.coolingPlug });

  const dispatcher: RelayDispatcher = createRelayDispatcher({
    channel: channel,
    logger: logger,
    timeSource: deps.timeSource,
    rateLimitWindowSec: config.rateLimitWindowSec
  });
  channel.onResult(dispatcher.onResult);

  // Initialize state
  const state = createInitialState(t, config);
  state.configWarnings = loaded.warnings.join('; ');

  const controller: Controller = {
    state: state,
    logger: logger,
    configStore: configStore,
    sensorFeed: createFileSensorFeed(settings.SENSOR_PATH),
    channel: channel,
    dispatcher: dispatcher,
    registry: createTriggerRegistry(),
    events: createLoggerEventSink(logger, function() {
      return state.config.notifications;
    }, LOG_LEVELS),
    constants: APP_CONSTANTS,
    timeSource: deps.timeSource
  };

  const messages = await initializeLogger(logger);
  const observed = await syncRelayStates(controller);

  // Log startup message FIRST
  logBanner(logger, config, observed);

  for (const warning of loaded.warnings) {
    logger.warning('Config: ' + warning);
  }

  // Sink warnings bypass the logger; a failed sink may be the one that would carry them
  for (const message of messages) {
    if (!message.success) {
      deps.consoleApi.warn('⚠️ [WARNING]  ' + message.message);
    }
  }

  return {
    controller: controller,
    settings: settings,
    flushLogs: consoleSink.flush
  };
}
