import { decideTriggerEvents, decideSafetyTriggerEvents, SAFETY_REARM } from './triggers';
import type { TriggerLimits } from './triggers';
import { createArmedFlags, createTriggerRegistry, applyTransitions } from './registry';
import type { FiredTrigger } from './types';

const LIMITS: TriggerLimits = {
  enableHeating: true,
  enableCooling: true,
  lowLimit: 74,
  highLimit: 75
};

describe('triggers', () => {
  describe('decideTriggerEvents', () => {
    it('should fire below-limit at or under the low limit', () => {
      expect(decideTriggerEvents(74, LIMITS, createArmedFlags())).toEqual([
        { kind: 'fire', flag: 'belowLimitArmed', eventName: 'temp_below_low_limit' },
        { kind: 'arm', flag: 'aboveLimitArmed' },
        { kind: 'arm', flag: 'inRangeArmed' }
      ]);
    });

    it('should fire above-limit at or over the high limit', () => {
      expect(decideTriggerEvents(75, LIMITS, createArmedFlags())).toEqual([
        { kind: 'fire', flag: 'aboveLimitArmed', eventName: 'temp_above_high_limit' },
        { kind: 'arm', flag: 'belowLimitArmed' },
        { kind: 'arm', flag: 'inRangeArmed' }
      ]);
    });

    it('should stay quiet in range when no limit has fired', () => {
      expect(decideTriggerEvents(74.5, LIMITS, createArmedFlags())).toEqual([]);
    });

    it('should fire in-range after a limit has fired', () => {
      const flags = { ...createArmedFlags(), belowLimitArmed: false };
      expect(decideTriggerEvents(74.5, LIMITS, flags)).toEqual([
        { kind: 'fire', flag: 'inRangeArmed', eventName: 'temp_in_range' }
      ]);
    });

    it('should do nothing while both relays are disabled', () => {
      const limits = { ...LIMITS, enableHeating: false, enableCooling: false };
      expect(decideTriggerEvents(60, limits, createArmedFlags())).toEqual([]);
    });

    it('should run with only one relay enabled', () => {
      const limits = { ...LIMITS, enableHeating: false };
      expect(decideTriggerEvents(80, limits, createArmedFlags())).toHaveLength(3);
    });
  });

  describe('rising temperature scenario', () => {
    it('should notify below once and above once for 71 to 76', () => {
      const registry = createTriggerRegistry();
      const fired: FiredTrigger[] = [];

      for (const t of [71, 72, 73, 74, 75, 76]) {
        fired.push(...applyTransitions(registry, decideTriggerEvents(t, LIMITS, registry.snapshot())));
      }

      expect(fired).toEqual([
        { eventName: 'temp_below_low_limit' },
        { eventName: 'temp_above_high_limit' }
      ]);
    });

    it('should notify in-range once while oscillating inside the band', () => {
      const registry = createTriggerRegistry();
      const fired: FiredTrigger[] = [];

      for (const t of [73, 74.2, 74.8, 74.4, 74.6]) {
        fired.push(...applyTransitions(registry, decideTriggerEvents(t, LIMITS, registry.snapshot())));
      }

      expect(fired).toEqual([
        { eventName: 'temp_below_low_limit' },
        { eventName: 'temp_in_range' }
      ]);
    });

    it('should notify again after the temperature leaves and returns', () => {
      const registry = createTriggerRegistry();
      const fired: FiredTrigger[] = [];

      for (const t of [73, 74.5, 76, 74.5]) {
        fired.push(...applyTransitions(registry, decideTriggerEvents(t, LIMITS, registry.snapshot())));
      }

      expect(fired.map((f) => f.eventName)).toEqual([
        'temp_below_low_limit',
        'temp_in_range',
        'temp_above_high_limit',
        'temp_in_range'
      ]);
    });
  });

  describe('decideSafetyTriggerEvents', () => {
    it('should fire safety-off for a relay that is on', () => {
      expect(decideSafetyTriggerEvents([{ relayId: 'cooling', isOn: true, wantsOn: true }])).toEqual([
        { kind: 'fire', flag: 'coolingSafetyOffArmed', eventName: 'cooling_safety_off', relayId: 'cooling' }
      ]);
    });

    it('should fire blocked for an off relay the policy wanted on', () => {
      expect(decideSafetyTriggerEvents([{ relayId: 'heating', isOn: false, wantsOn: true }])).toEqual([
        { kind: 'fire', flag: 'heatingBlockedArmed', eventName: 'heating_blocked', relayId: 'heating' }
      ]);
    });

    it('should fire nothing for an idle relay', () => {
      expect(decideSafetyTriggerEvents([
        { relayId: 'heating', isOn: false, wantsOn: false },
        { relayId: 'cooling', isOn: false, wantsOn: false }
      ])).toEqual([]);
    });

    it('should handle both relays in order', () => {
      const transitions = decideSafetyTriggerEvents([
        { relayId: 'heating', isOn: true, wantsOn: false },
        { relayId: 'cooling', isOn: false, wantsOn: true }
      ]);
      expect(transitions.map((t) => t.flag)).toEqual(['heatingSafetyOffArmed', 'coolingBlockedArmed']);
    });
  });

  describe('SAFETY_REARM', () => {
    it('should re-arm all four safety flags', () => {
      const registry = createTriggerRegistry({
        ...createArmedFlags(),
        heatingBlockedArmed: false,
        coolingBlockedArmed: false,
        heatingSafetyOffArmed: false,
        coolingSafetyOffArmed: false,
        belowLimitArmed: false
      });

      applyTransitions(registry, SAFETY_REARM);

      expect(registry.snapshot()).toEqual({ ...createArmedFlags(), belowLimitArmed: false });
    });
  });
});
