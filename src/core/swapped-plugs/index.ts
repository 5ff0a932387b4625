export { updateBaselines, detectSwappedPlug, decideSwappedPlugEvents, SWAPPED_PLUGS_REARM } from './swapped-plugs';
export { createEmptyBaselines, wrongWayDrift } from './helpers';
export type { RelayBaseline, RelayBaselines, SwappedPlugLimits } from './types';
