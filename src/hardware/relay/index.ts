export { createRelayDispatcher } from './relay';
export { createRelayState } from './helpers';
export type { RelayDispatcher, RelayDispatcherOptions, RelayState, RequestOutcome } from './types';
