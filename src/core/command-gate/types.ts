/**
 * Command gate type definitions
 *
 * The gate decides whether a relay command goes out to the plug or is
 * dropped as redundant, duplicate or too frequent.
 */

import type { RelayAction } from '$types/common';

/**
 * Reasons a gate decision can carry
 */
export const GATE_REASONS = {
  /** Plug already reports the requested state */
  REDUNDANT: 'redundant',
  /** Same action already in flight */
  PENDING_DUPLICATE: 'pending_duplicate',
  /** Opposite action in flight; the new one replaces it */
  SUPERSEDED: 'superseded',
  /** Same action sent too recently */
  RATE_LIMITED: 'rate_limited',
} as const;

export type GateReason = typeof GATE_REASONS[keyof typeof GATE_REASONS];

/**
 * Reasons that block a command
 */
export type GateRefusal = Exclude<GateReason, typeof GATE_REASONS.SUPERSEDED>;

/**
 * Outcome of a gate check
 */
export type GateDecision =
  | { send: true; reason: typeof GATE_REASONS.SUPERSEDED | null }
  | { send: false; reason: GateRefusal };

/**
 * Relay bookkeeping the gate reads
 */
export interface GateRelayState {
  /** Last state confirmed by the plug */
  knownOn: boolean;

  /** Whether a command is awaiting its result */
  pending: boolean;

  /** Action of the in-flight command, null when none */
  pendingAction: RelayAction | null;

  /** Unix seconds of the last command sent, null before the first */
  lastCommandAt: number | null;

  /** Action of the last command sent */
  lastCommandAction: RelayAction | null;
}
