export { decideTriggerEvents, decideSafetyTriggerEvents, SAFETY_REARM } from './triggers';
export type { TriggerLimits } from './triggers';
export {
  TRIGGER_FLAG_NAMES,
  createArmedFlags,
  createTriggerRegistry,
  mergeAfterReload,
  pickFlags,
  applyTransitions,
  adoptFlags,
  describeDisarmed
} from './registry';
export type {
  TriggerFlags,
  TriggerFlagName,
  TriggerTransition,
  FiredTrigger,
  SafetyTriggerInput,
  TriggerRegistry
} from './types';
