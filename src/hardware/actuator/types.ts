/**
 * Actuator type definitions
 *
 * Commands and results exchanged with the smart plugs, plus the Shelly Gen2
 * RPC payloads the channel reads.
 */

import type { RelayAction, RelayId } from '$types/common';

// ═══════════════════════════════════════════════════════════════
// JSON
// ═══════════════════════════════════════════════════════════════

type JSONPrimitive = string | number | boolean | null;
type JSONArray = JSONValue[];
interface JSONObject { [key: string]: JSONValue }

/** Any JSON-compatible value (used by RPC client) */
export type JSONValue = JSONPrimitive | JSONArray | JSONObject;

// ═══════════════════════════════════════════════════════════════
// SWITCH API
// ═══════════════════════════════════════════════════════════════

/**
 * Switch status from Switch.GetStatus
 */
export interface SwitchStatus {
  id: number;
  output: boolean;
  /** Active power in watts, when the plug meters it */
  apower?: number;
}

/**
 * Result of Switch.Set
 */
export interface SwitchSetResult {
  was_on: boolean;
}

/**
 * The subset of the plug RPC API the channel uses
 */
export interface SwitchClient {
  setSwitch(id: number, on: boolean): Promise<SwitchSetResult>;
  getSwitchStatus(id: number): Promise<SwitchStatus>;
}

export type SwitchClientFactory = (address: string) => SwitchClient;

// ═══════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════

/**
 * Command queued for a plug
 * The token ties the eventual result back to this request.
 */
export interface ActuatorCommand {
  relayId: RelayId;
  action: RelayAction;
  token: number;
}

/**
 * Outcome of an ActuatorCommand
 */
export interface ActuatorResult {
  relayId: RelayId;
  action: RelayAction;
  token: number;
  success: boolean;
  /** Output state read back from the plug, when it answered */
  observedOn?: boolean;
  error?: string;
}

export type ActuatorResultListener = (result: ActuatorResult) => void;

/**
 * Plug address (host or IP) per relay, null when not configured
 */
export type PlugAddresses = Record<RelayId, string | null>;

/**
 * Asynchronous command channel to the plugs
 *
 * Commands run one at a time in submission order; results are delivered to
 * listeners in completion order.
 */
export interface ActuatorChannel {
  /** Replace the plug addresses (config reload) */
  configure(addresses: PlugAddresses): void;
  isConfigured(relayId: RelayId): boolean;
  /** Queue a command; never blocks */
  submit(command: ActuatorCommand): void;
  onResult(listener: ActuatorResultListener): void;
  /** Read the plug output, null when unconfigured or unreachable */
  queryState(relayId: RelayId): Promise<boolean | null>;
  /** Resolves once the queue is empty and no command is running */
  idle(): Promise<void>;
}
