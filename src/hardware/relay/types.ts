/**
 * Relay dispatcher types
 */

import type { RelayAction, RelayId, RelayKnownStates } from '$types/common';
import type { GateRelayState } from '@core/command-gate';
import type { ActuatorChannel, ActuatorResult } from '@hardware/actuator';
import type { Logger } from '@logging/types';

/**
 * Full bookkeeping for one relay
 */
export interface RelayState extends GateRelayState {
  /** Unix seconds when the in-flight command was sent */
  pendingSince: number | null;

  /** Token of the in-flight command, null when none */
  inFlightToken: number | null;

  /** Token the next command will carry */
  nextToken: number;
}

/**
 * What request() did with a command
 */
export type RequestOutcome =
  | 'sent'
  | 'redundant'
  | 'pending_duplicate'
  | 'rate_limited'
  | 'unconfigured';

export interface RelayDispatcherOptions {
  channel: ActuatorChannel;
  logger: Logger;
  /** Current Unix time in seconds */
  timeSource: () => number;
  rateLimitWindowSec: number;
}

/**
 * Owns both relay states; the only writer of RelayState
 */
export interface RelayDispatcher {
  request(relayId: RelayId, action: RelayAction, now?: number): RequestOutcome;
  onResult(result: ActuatorResult): void;
  /** Seed knownOn from a plug status query */
  syncState(relayId: RelayId, isOn: boolean): void;
  getState(relayId: RelayId): Readonly<RelayState>;
  knownStates(): RelayKnownStates;
  setRateLimitWindow(seconds: number): void;
  getStaleResultCount(): number;
}
