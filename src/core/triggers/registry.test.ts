import {
  TRIGGER_FLAG_NAMES,
  createArmedFlags,
  createTriggerRegistry,
  mergeAfterReload,
  pickFlags,
  applyTransitions,
  adoptFlags,
  describeDisarmed
} from './registry';
import type { TriggerFlags } from './types';
import type { UserConfig } from '$types/config';

function makeUserConfig(): UserConfig {
  return {
    controlEnabled: true,
    enableHeating: true,
    enableCooling: false,
    heatingPlug: '192.168.1.50',
    coolingPlug: null,
    lowLimit: 66,
    highLimit: 70,
    unit: 'F',
    assignedSensorId: 'red',
    sensorAssignedAt: 1000,
    updateIntervalSec: 120,
    rateLimitWindowSec: 10,
    notifications: {
      temp_below_low_limit: true,
      temp_above_high_limit: true,
      temp_in_range: true,
      heating_blocked: true,
      cooling_blocked: true,
      heating_safety_off: true,
      cooling_safety_off: true,
      swapped_plugs: true
    }
  };
}

describe('trigger registry', () => {
  describe('createTriggerRegistry', () => {
    it('should start with every flag armed', () => {
      const registry = createTriggerRegistry();
      for (const name of TRIGGER_FLAG_NAMES) {
        expect(registry.isArmed(name)).toBe(true);
      }
    });

    it('should fire an armed flag exactly once', () => {
      const registry = createTriggerRegistry();

      expect(registry.fire('belowLimitArmed')).toBe(true);
      expect(registry.fire('belowLimitArmed')).toBe(false);
      expect(registry.isArmed('belowLimitArmed')).toBe(false);
    });

    it('should fire again after re-arming', () => {
      const registry = createTriggerRegistry();
      registry.fire('aboveLimitArmed');

      registry.arm('aboveLimitArmed');

      expect(registry.fire('aboveLimitArmed')).toBe(true);
    });

    it('should treat arm as idempotent', () => {
      const registry = createTriggerRegistry();
      registry.arm('inRangeArmed');
      registry.arm('inRangeArmed');
      expect(registry.isArmed('inRangeArmed')).toBe(true);
    });

    it('should start from the given flags without aliasing them', () => {
      const initial: TriggerFlags = { ...createArmedFlags(), inRangeArmed: false };
      const registry = createTriggerRegistry(initial);

      registry.arm('inRangeArmed');

      expect(initial.inRangeArmed).toBe(false);
      expect(registry.isArmed('inRangeArmed')).toBe(true);
    });

    it('should return snapshots that do not alias internal state', () => {
      const registry = createTriggerRegistry();
      const snapshot = registry.snapshot();

      registry.fire('heatingBlockedArmed');

      expect(snapshot.heatingBlockedArmed).toBe(true);
      expect(registry.snapshot().heatingBlockedArmed).toBe(false);
    });
  });

  describe('mergeAfterReload', () => {
    it('should overlay every flag and keep other fields', () => {
      const fresh = makeUserConfig();
      const flags: TriggerFlags = {
        belowLimitArmed: false,
        aboveLimitArmed: true,
        inRangeArmed: false,
        heatingBlockedArmed: true,
        coolingBlockedArmed: false,
        heatingSafetyOffArmed: false,
        coolingSafetyOffArmed: true,
        swappedPlugsArmed: false
      };

      const merged = mergeAfterReload(fresh, flags);

      expect(pickFlags(merged)).toEqual(flags);
      expect(merged.lowLimit).toBe(66);
      expect(merged.heatingPlug).toBe('192.168.1.50');
      expect(merged.notifications).toBe(fresh.notifications);
    });

    it('should ignore flag values carried by the fresh object', () => {
      const fresh = { ...makeUserConfig(), belowLimitArmed: true };
      const merged = mergeAfterReload(fresh, { ...createArmedFlags(), belowLimitArmed: false });

      expect(merged.belowLimitArmed).toBe(false);
    });

    it('should not mutate the fresh config', () => {
      const fresh = makeUserConfig();
      mergeAfterReload(fresh, createArmedFlags());
      expect('belowLimitArmed' in fresh).toBe(false);
    });
  });

  describe('applyTransitions', () => {
    it('should report only fires that found their flag armed', () => {
      const registry = createTriggerRegistry({ ...createArmedFlags(), aboveLimitArmed: false });

      const fired = applyTransitions(registry, [
        { kind: 'fire', flag: 'belowLimitArmed', eventName: 'temp_below_low_limit' },
        { kind: 'fire', flag: 'aboveLimitArmed', eventName: 'temp_above_high_limit' },
        { kind: 'arm', flag: 'aboveLimitArmed' }
      ]);

      expect(fired).toEqual([{ eventName: 'temp_below_low_limit' }]);
      expect(registry.isArmed('aboveLimitArmed')).toBe(true);
    });

    it('should carry the relay of safety fires', () => {
      const registry = createTriggerRegistry();

      const fired = applyTransitions(registry, [
        { kind: 'fire', flag: 'coolingSafetyOffArmed', eventName: 'cooling_safety_off', relayId: 'cooling' }
      ]);

      expect(fired).toEqual([{ eventName: 'cooling_safety_off', relayId: 'cooling' }]);
    });
  });

  describe('adoptFlags', () => {
    it('should copy the given flags into the registry', () => {
      const registry = createTriggerRegistry({ ...createArmedFlags(), heatingBlockedArmed: false });
      const target: TriggerFlags = { ...createArmedFlags(), belowLimitArmed: false, inRangeArmed: false };

      adoptFlags(registry, target);

      expect(registry.snapshot()).toEqual(target);
    });
  });

  describe('describeDisarmed', () => {
    it('should list disarmed flags', () => {
      expect(describeDisarmed({ ...createArmedFlags(), belowLimitArmed: false, inRangeArmed: false }))
        .toBe('belowLimitArmed, inRangeArmed');
    });

    it('should report none when all are armed', () => {
      expect(describeDisarmed(createArmedFlags())).toBe('none');
    });
  });
});
