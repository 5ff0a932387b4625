/**
 * Unit tests for the relay command dispatcher
 */

import type { Mock } from 'vitest';

import { createMockLogger } from '$test-utils';
import type { MockLogger } from '$test-utils';
import type { ActuatorChannel, ActuatorCommand } from '@hardware/actuator';
import { createRelayDispatcher } from './relay';
import type { RelayDispatcher } from './types';

interface FakeChannel extends ActuatorChannel {
  submit: Mock<ActuatorChannel['submit']>;
  configured: { heating: boolean; cooling: boolean };
}

function createFakeChannel(): FakeChannel {
  const channel: FakeChannel = {
    configured: { heating: true, cooling: true },
    configure: vi.fn(),
    isConfigured: (relayId) => channel.configured[relayId],
    submit: vi.fn<ActuatorChannel['submit']>(),
    onResult: vi.fn(),
    queryState: vi.fn(() => Promise.resolve(null)),
    idle: () => Promise.resolve()
  };
  return channel;
}

describe('createRelayDispatcher', () => {
  let channel: FakeChannel;
  let logger: MockLogger;
  let clock: number;
  let dispatcher: RelayDispatcher;

  beforeEach(() => {
    channel = createFakeChannel();
    logger = createMockLogger();
    clock = 1000;
    dispatcher = createRelayDispatcher({
      channel: channel,
      logger: logger,
      timeSource: () => clock,
      rateLimitWindowSec: 10
    });
  });

  function lastCommand(): ActuatorCommand {
    const call = channel.submit.mock.calls[channel.submit.mock.calls.length - 1];
    if (!call) {
      throw new Error('nothing submitted');
    }
    return call[0];
  }

  describe('request', () => {
    it('should submit a command with a fresh token', () => {
      expect(dispatcher.request('heating', 'on')).toBe('sent');

      expect(channel.submit).toHaveBeenCalledWith({ relayId: 'heating', action: 'on', token: 1 });
      expect(dispatcher.getState('heating')).toEqual({
        knownOn: false,
        pending: true,
        pendingAction: 'on',
        pendingSince: 1000,
        lastCommandAt: 1000,
        lastCommandAction: 'on',
        inFlightToken: 1,
        nextToken: 2
      });
      expect(logger.info).toHaveBeenCalledWith('Turning heating ON');
    });

    it('should use an explicit timestamp when given', () => {
      dispatcher.request('cooling', 'on', 2000);

      expect(dispatcher.getState('cooling').lastCommandAt).toBe(2000);
    });

    it('should refuse an off for a relay already off', () => {
      expect(dispatcher.request('heating', 'off')).toBe('redundant');
      expect(channel.submit).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith('heating OFF not sent: redundant');
    });

    it('should refuse a duplicate while the command is in flight', () => {
      dispatcher.request('heating', 'on');

      expect(dispatcher.request('heating', 'on')).toBe('pending_duplicate');
      expect(channel.submit).toHaveBeenCalledTimes(1);
    });

    it('should let an opposite action supersede the in-flight one', () => {
      dispatcher.request('heating', 'on');

      expect(dispatcher.request('heating', 'off')).toBe('sent');
      expect(lastCommand()).toEqual({ relayId: 'heating', action: 'off', token: 2 });
      expect(dispatcher.getState('heating').inFlightToken).toBe(2);
    });

    it('should keep tokens independent per relay', () => {
      dispatcher.request('heating', 'on');
      dispatcher.request('cooling', 'on');

      expect(lastCommand()).toEqual({ relayId: 'cooling', action: 'on', token: 1 });
    });

    it('should refuse an unconfigured relay and warn only once', () => {
      channel.configured.cooling = false;

      expect(dispatcher.request('cooling', 'on')).toBe('unconfigured');
      expect(dispatcher.request('cooling', 'on')).toBe('unconfigured');

      expect(channel.submit).not.toHaveBeenCalled();
      expect(logger.warning).toHaveBeenCalledTimes(1);
      expect(logger.warning).toHaveBeenCalledWith('No plug configured for cooling, cannot turn it ON');
    });

    it('should warn again after the plug was configured and removed', () => {
      channel.configured.cooling = false;
      dispatcher.request('cooling', 'on');
      channel.configured.cooling = true;
      dispatcher.request('cooling', 'on');
      channel.configured.cooling = false;
      dispatcher.request('cooling', 'off');

      expect(logger.warning).toHaveBeenCalledTimes(2);
    });
  });

  describe('onResult', () => {
    it('should confirm the state on success', () => {
      dispatcher.request('heating', 'on');

      dispatcher.onResult({ relayId: 'heating', action: 'on', token: 1, success: true, observedOn: true });

      const state = dispatcher.getState('heating');
      expect(state.knownOn).toBe(true);
      expect(state.pending).toBe(false);
      expect(state.pendingAction).toBeNull();
      expect(state.inFlightToken).toBeNull();
      expect(dispatcher.knownStates()).toEqual({ heating: true, cooling: false });
    });

    it('should fall back to the action when no output was observed', () => {
      dispatcher.request('cooling', 'on');

      dispatcher.onResult({ relayId: 'cooling', action: 'on', token: 1, success: true });

      expect(dispatcher.getState('cooling').knownOn).toBe(true);
    });

    it('should leave knownOn alone on failure and allow a retry', () => {
      dispatcher.request('heating', 'on');

      dispatcher.onResult({ relayId: 'heating', action: 'on', token: 1, success: false, error: '10.0.0.1: fetch failed' });

      expect(dispatcher.getState('heating').knownOn).toBe(false);
      expect(dispatcher.getState('heating').pending).toBe(false);
      expect(logger.warning).toHaveBeenCalledWith('Failed to turn heating ON: 10.0.0.1: fetch failed');

      // Inside the rate-limit window the same action stays blocked
      clock = 1005;
      expect(dispatcher.request('heating', 'on')).toBe('rate_limited');

      clock = 1010;
      expect(dispatcher.request('heating', 'on')).toBe('sent');
      expect(lastCommand().token).toBe(2);
    });

    it('should discard and count results for superseded commands', () => {
      dispatcher.request('heating', 'on');
      dispatcher.request('heating', 'off');

      dispatcher.onResult({ relayId: 'heating', action: 'on', token: 1, success: true, observedOn: true });

      expect(dispatcher.getStaleResultCount()).toBe(1);
      expect(dispatcher.getState('heating')).toMatchObject({ knownOn: false, pending: true, inFlightToken: 2 });
      expect(logger.debug).toHaveBeenCalledWith('Discarding stale heating result (token 1, in flight 2)');

      dispatcher.onResult({ relayId: 'heating', action: 'off', token: 2, success: true, observedOn: false });

      expect(dispatcher.getState('heating')).toMatchObject({ knownOn: false, pending: false });
      expect(dispatcher.getStaleResultCount()).toBe(1);
    });

    it('should discard a result when nothing is in flight', () => {
      dispatcher.onResult({ relayId: 'cooling', action: 'on', token: 7, success: true, observedOn: true });

      expect(dispatcher.getStaleResultCount()).toBe(1);
      expect(dispatcher.getState('cooling').knownOn).toBe(false);
    });
  });

  describe('syncState', () => {
    it('should seed knownOn from the plug', () => {
      dispatcher.syncState('cooling', true);

      expect(dispatcher.knownStates()).toEqual({ heating: false, cooling: true });
      expect(dispatcher.request('cooling', 'on')).toBe('redundant');
    });
  });

  describe('setRateLimitWindow', () => {
    it('should apply the new window to later requests', () => {
      dispatcher.request('heating', 'on');
      dispatcher.onResult({ relayId: 'heating', action: 'on', token: 1, success: false, error: 'offline' });

      dispatcher.setRateLimitWindow(0);

      expect(dispatcher.request('heating', 'on')).toBe('sent');
    });
  });

  describe('getState', () => {
    it('should return a copy', () => {
      const snapshot = dispatcher.getState('heating');
      dispatcher.request('heating', 'on');

      expect(snapshot.pending).toBe(false);
    });
  });
});
