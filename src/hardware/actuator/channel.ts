/**
 * Smart plug command channel
 *
 * Runs relay commands against the plugs on a single async worker so the
 * control tick never waits on the network. Each command is:
 * 1. Sent with Switch.Set
 * 2. Verified with Switch.GetStatus
 * 3. Retried on transport failure or mismatch (delays from config)
 *
 * The outcome goes to every result listener, tagged with the command token.
 */

import type { RelayId } from '$types/common';
import { errorMessage } from '$types/errors';
import type { Logger } from '@logging/types';
import { sleep as defaultSleep } from '@utils/time/time';

import type {
  ActuatorChannel,
  ActuatorCommand,
  ActuatorResult,
  ActuatorResultListener,
  PlugAddresses,
  SwitchClient,
  SwitchClientFactory
} from './types';

export interface ActuatorChannelOptions {
  clientFactory: SwitchClientFactory;
  logger: Logger;
  /** Switch component id on the plug (0 for single-outlet plugs) */
  switchId: number;
  /** Delay before each attempt; its length is the attempt count */
  retryDelaysMs: readonly number[];
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Create a queue-backed actuator channel
 *
 * @param options - Client factory, logger and retry schedule
 * @returns Actuator channel
 */
export function createActuatorChannel(options: ActuatorChannelOptions): ActuatorChannel {
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger;
  const queue: ActuatorCommand[] = [];
  const listeners: ActuatorResultListener[] = [];
  const clients = new Map<string, SwitchClient>();
  let idleWaiters: Array<() => void> = [];
  let addresses: PlugAddresses = { heating: null, cooling: null };
  let busy = false;

  function clientFor(address: string): SwitchClient {
    let client = clients.get(address);
    if (!client) {
      client = options.clientFactory(address);
      clients.set(address, client);
    }
    return client;
  }

  function configure(next: PlugAddresses): void {
    addresses = { heating: next.heating, cooling: next.cooling };
  }

  function isConfigured(relayId: RelayId): boolean {
    return addresses[relayId] !== null;
  }

  /**
   * Run one command with verification and retries
   */
  async function execute(command: ActuatorCommand): Promise<ActuatorResult> {
    const address = addresses[command.relayId];
    const base = { relayId: command.relayId, action: command.action, token: command.token };

    if (address === null) {
      return { ...base, success: false, error: 'No plug address configured for ' + command.relayId };
    }

    const client = clientFor(address);
    const wantOn = command.action === 'on';
    const attempts = options.retryDelaysMs.length;
    let lastError = 'No attempts made';
    let observedOn: boolean | undefined;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const delay = options.retryDelaysMs[attempt] ?? 0;
      if (delay > 0) {
        await sleep(delay);
      }

      try {
        await client.setSwitch(options.switchId, wantOn);
        const status = await client.getSwitchStatus(options.switchId);
        observedOn = status.output;

        if (status.output === wantOn) {
          return { ...base, success: true, observedOn: status.output };
        }
        lastError = 'State mismatch after ' + command.action + ': expected output=' + wantOn + ', got output=' + status.output;
      } catch (err: unknown) {
        lastError = errorMessage(err);
      }

      logger.debug(command.relayId + ' plug ' + command.action.toUpperCase() + ' attempt ' + (attempt + 1) + '/' + attempts + ' failed: ' + lastError);
    }

    const failure: ActuatorResult = { ...base, success: false, error: lastError };
    if (observedOn !== undefined) {
      failure.observedOn = observedOn;
    }
    return failure;
  }

  function deliver(result: ActuatorResult): void {
    for (const listener of listeners) {
      try {
        listener(result);
      } catch (err: unknown) {
        logger.critical('Actuator result listener failed: ' + errorMessage(err));
      }
    }
  }

  function settleIdle(): void {
    if (busy || queue.length > 0) {
      return;
    }
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  async function drain(): Promise<void> {
    let command = queue.shift();
    while (command !== undefined) {
      deliver(await execute(command));
      command = queue.shift();
    }
  }

  function pump(): void {
    if (busy) {
      return;
    }
    busy = true;
    void drain()
      .catch(function(err: unknown) {
        logger.critical('Actuator worker crashed: ' + errorMessage(err));
        queue.length = 0;
      })
      .finally(function() {
        busy = false;
        settleIdle();
      });
  }

  function submit(command: ActuatorCommand): void {
    queue.push(command);
    pump();
  }

  function onResult(listener: ActuatorResultListener): void {
    listeners.push(listener);
  }

  async function queryState(relayId: RelayId): Promise<boolean | null> {
    const address = addresses[relayId];
    if (address === null) {
      return null;
    }

    try {
      const status = await clientFor(address).getSwitchStatus(options.switchId);
      return status.output;
    } catch (err: unknown) {
      logger.warning('Cannot read ' + relayId + ' plug state: ' + errorMessage(err));
      return null;
    }
  }

  function idle(): Promise<void> {
    return new Promise(function(resolve) {
      idleWaiters.push(resolve);
      settleIdle();
    });
  }

  return {
    configure: configure,
    isConfigured: isConfigured,
    submit: submit,
    onResult: onResult,
    queryState: queryState,
    idle: idle
  };
}
