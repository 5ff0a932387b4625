export { createInitialState } from './state';
export type { ControllerState } from './types';
