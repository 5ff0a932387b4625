export { createActuatorChannel } from './channel';
export type { ActuatorChannelOptions } from './channel';
export { ShellyRPCClient, parseRpcResponse, parseSwitchStatus, parseSwitchSetResult } from './client';
export type { ShellyClientConfig, RPCRequest } from './client';
export type {
  ActuatorChannel,
  ActuatorCommand,
  ActuatorResult,
  ActuatorResultListener,
  PlugAddresses,
  SwitchClient,
  SwitchClientFactory,
  SwitchStatus,
  SwitchSetResult,
  JSONValue
} from './types';
