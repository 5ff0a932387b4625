/**
 * Boot type definitions
 */

import type { TimerAPI } from '$types/common';
import type { ProcessSettings } from '$types/config';
import type { SwitchClientFactory } from '@hardware/actuator';
import type { ConsoleAPI, HttpPost } from '@logging';
import type { Controller } from '@system/control/types';

/**
 * Collaborators initialize() builds on
 * Defaults are the real clock, Node timers, console and Shelly RPC clients.
 */
export interface InitDependencies {
  /** Current Unix time in seconds */
  timeSource: () => number;
  timer: TimerAPI;
  consoleApi: ConsoleAPI;
  clientFactory: SwitchClientFactory;
  /** Slack transport, defaults to fetch */
  post?: HttpPost;
  /** Sleep between actuator attempts */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * A started controller and the handles the CLI needs around it
 */
export interface Runtime {
  controller: Controller;
  settings: ProcessSettings;
  /** Write out buffered console lines (before exit) */
  flushLogs(): void;
}

// Re-export Controller from control module
export type { Controller } from '@system/control/types';
