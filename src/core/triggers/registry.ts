/**
 * Trigger arming registry
 *
 * Owns the arming flags for the lifetime of the process. Flags live
 * in memory only; a config reload overlays them onto the fresh config so
 * they survive the reload.
 */

import type { UserConfig } from '$types/config';
import type { FiredTrigger, TriggerFlagName, TriggerFlags, TriggerRegistry, TriggerTransition } from './types';

/**
 * Flag names in a fixed order
 */
export const TRIGGER_FLAG_NAMES: readonly TriggerFlagName[] = [
  'belowLimitArmed',
  'aboveLimitArmed',
  'inRangeArmed',
  'heatingBlockedArmed',
  'coolingBlockedArmed',
  'heatingSafetyOffArmed',
  'coolingSafetyOffArmed',
  'swappedPlugsArmed',
];

/**
 * Flags with every trigger armed
 * @returns Fresh flags object
 */
export function createArmedFlags(): TriggerFlags {
  return {
    belowLimitArmed: true,
    aboveLimitArmed: true,
    inRangeArmed: true,
    heatingBlockedArmed: true,
    coolingBlockedArmed: true,
    heatingSafetyOffArmed: true,
    coolingSafetyOffArmed: true,
    swappedPlugsArmed: true,
  };
}

/**
 * Create a trigger registry
 *
 * @param initial - Starting flags (defaults to all armed)
 * @returns Registry instance
 */
export function createTriggerRegistry(initial?: TriggerFlags): TriggerRegistry {
  const flags: TriggerFlags = initial ? { ...initial } : createArmedFlags();

  function fire(flag: TriggerFlagName): boolean {
    if (!flags[flag]) {
      return false;
    }
    flags[flag] = false;
    return true;
  }

  function arm(flag: TriggerFlagName): void {
    flags[flag] = true;
  }

  function isArmed(flag: TriggerFlagName): boolean {
    return flags[flag];
  }

  function snapshot(): TriggerFlags {
    return { ...flags };
  }

  return {
    fire: fire,
    arm: arm,
    isArmed: isArmed,
    snapshot: snapshot
  };
}

/**
 * Overlay the live flags onto a freshly loaded config
 *
 * Only the flag fields are taken from currentFlags; every other field
 * comes from fresh unchanged.
 *
 * @param fresh - Config just read from disk
 * @param currentFlags - Flags held in memory
 * @returns Combined config
 */
export function mergeAfterReload<C extends UserConfig>(fresh: C, currentFlags: TriggerFlags): C & TriggerFlags {
  return {
    ...fresh,
    belowLimitArmed: currentFlags.belowLimitArmed,
    aboveLimitArmed: currentFlags.aboveLimitArmed,
    inRangeArmed: currentFlags.inRangeArmed,
    heatingBlockedArmed: currentFlags.heatingBlockedArmed,
    coolingBlockedArmed: currentFlags.coolingBlockedArmed,
    heatingSafetyOffArmed: currentFlags.heatingSafetyOffArmed,
    coolingSafetyOffArmed: currentFlags.coolingSafetyOffArmed,
    swappedPlugsArmed: currentFlags.swappedPlugsArmed,
  };
}

/**
 * Extract the flag fields from any object carrying them
 * @param source - Flags, or a config merged with flags
 * @returns Plain flags object
 */
export function pickFlags(source: TriggerFlags): TriggerFlags {
  return {
    belowLimitArmed: source.belowLimitArmed,
    aboveLimitArmed: source.aboveLimitArmed,
    inRangeArmed: source.inRangeArmed,
    heatingBlockedArmed: source.heatingBlockedArmed,
    coolingBlockedArmed: source.coolingBlockedArmed,
    heatingSafetyOffArmed: source.heatingSafetyOffArmed,
    coolingSafetyOffArmed: source.coolingSafetyOffArmed,
    swappedPlugsArmed: source.swappedPlugsArmed,
  };
}

/**
 * Apply transitions in order
 *
 * @param registry - Registry to mutate
 * @param transitions - Transitions from the decision functions
 * @returns Fires that found their flag armed, in order
 */
export function applyTransitions(registry: TriggerRegistry, transitions: readonly TriggerTransition[]): FiredTrigger[] {
  const fired: FiredTrigger[] = [];

  for (const transition of transitions) {
    if (transition.kind === 'arm') {
      registry.arm(transition.flag);
      continue;
    }

    if (registry.fire(transition.flag)) {
      fired.push(transition.relayId
        ? { eventName: transition.eventName, relayId: transition.relayId }
        : { eventName: transition.eventName });
    }
  }

  return fired;
}

/**
 * List the disarmed flags for debug logging
 * @param flags - Flags to describe
 * @returns Comma-separated disarmed flag names, or "none"
 */
export function describeDisarmed(flags: TriggerFlags): string {
  const disarmed = TRIGGER_FLAG_NAMES.filter(function(name) {
    return !flags[name];
  });
  return disarmed.length > 0 ? disarmed.join(', ') : 'none';
}

/**
 * Bring a registry in line with flags computed elsewhere (e.g. evaluate())
 *
 * @param registry - Registry to update
 * @param flags - Flags to adopt
 */
export function adoptFlags(registry: TriggerRegistry, flags: TriggerFlags): void {
  for (const name of TRIGGER_FLAG_NAMES) {
    if (flags[name]) {
      registry.arm(name);
    } else {
      registry.fire(name);
    }
  }
}
