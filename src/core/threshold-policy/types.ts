/**
 * Threshold control policy type definitions
 */

import type { ControlStatus, DesiredAction } from '$types/common';
import type { UserConfig } from '$types/config';
import type { TriggerEvent } from '@events/types';
import type { TriggerFlags } from '../triggers/types';

/**
 * Combined, read-only view used at evaluation time
 * User settings from disk with the in-memory arming flags overlaid
 */
export type ControlConfig = UserConfig & Readonly<TriggerFlags>;

/**
 * Settings the relay decision reads
 */
export type PolicyLimits = Pick<UserConfig, 'enableHeating' | 'enableCooling' | 'lowLimit' | 'highLimit'>;

/**
 * Desired action per relay
 */
export interface RelayDecision {
  heating: DesiredAction;
  cooling: DesiredAction;
}

/**
 * Full result of evaluating one reading
 */
export interface EvaluationResult {
  desiredHeating: DesiredAction;
  desiredCooling: DesiredAction;

  /** Events whose flag was armed, in firing order */
  triggerEvents: TriggerEvent[];

  /** Flags after applying this evaluation's transitions */
  flags: TriggerFlags;

  status: ControlStatus;
}
