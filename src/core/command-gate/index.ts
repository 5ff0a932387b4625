export { checkCommand, shouldSend } from './command-gate';
export { GATE_REASONS } from './types';
export type { GateReason, GateRefusal, GateDecision, GateRelayState } from './types';
