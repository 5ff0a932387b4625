export { decideRelayAction, evaluate } from './threshold-policy';
export { decideHeating, decideCooling, deriveStatus } from './helpers';
export type { ControlConfig, PolicyLimits, RelayDecision, EvaluationResult } from './types';
