/**
 * Logging type definitions
 */

// ═══════════════════════════════════════════════════════════════
// LEVELS
// ═══════════════════════════════════════════════════════════════

/**
 * Numeric log level, ordered by severity (DEBUG | INFO | WARNING | CRITICAL)
 */
export type LogLevel = 0 | 1 | 2 | 3;

/**
 * Level table handed to the pure helpers so they need no config import
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Start every sink; the callback gets one message per sink */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Uptime in hours after which INFO is dropped outside DEBUG (0 disables) */
  demoteHours: number;
}

/**
 * A sink and the lowest level it accepts
 */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Current Unix time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

/**
 * Output for already-filtered, already-formatted lines
 * The level is passed along for sinks that style by severity.
 */
export interface LogSink {
  write(formattedMessage: string, level: LogLevel): void;
  initialize?(callback: (success: boolean, message: string) => void): void;
}

export interface ConsoleSink extends LogSink {
  /** Start the drain timer */
  initialize(callback: (success: boolean, message: string) => void): void;
  getBufferSize(): number;
  /** Write out everything still buffered (before process exit) */
  flush(): void;
}

export interface ConsoleSinkConfig {
  /** Lines held before new ones are dropped */
  bufferSize: number;
  /** Milliseconds between drained lines */
  drainInterval: number;
  colors: boolean;
}

/**
 * The part of console the sink writes to
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

export interface SlackSink extends LogSink {
  write(formattedMessage: string): void;
  /** Check the webhook URL */
  initialize(callback: (success: boolean, message: string) => void): void;
  isInitialized(): boolean;
  getBufferSize(): number;
}

export interface SlackSinkConfig {
  enabled: boolean;
  /** Incoming webhook URL, null when not configured */
  webhookUrl: string | null;
  /** Retry buffer size; the oldest message is dropped when full */
  bufferSize: number;
  /** First retry delay; doubles per failure up to the cap */
  retryDelayMs: number;
  maxRetries: number;
}

/**
 * JSON POST used by the Slack sink
 * Resolves on a 2xx response, rejects otherwise
 */
export type HttpPost = (url: string, body: string) => Promise<void>;

// ═══════════════════════════════════════════════════════════════
// FILTERING & STARTUP
// ═══════════════════════════════════════════════════════════════

export interface FilterContext {
  currentLevel: LogLevel;
  /** Seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}

/**
 * One sink's startup report
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
