/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, webhook)
 * - Filter context
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing constants
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks */
  initialize(callback: (success: boolean, messages: InitMessage[]) => void): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string): void;
  /** Optional initialization (e.g. start drain timer) */
  initialize?(callback: (success: boolean, message: string) => void): void;
}

/**
 * Console sink interface
 */
export interface ConsoleSink extends LogSink {
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Get current buffer size */
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages in buffer before dropping */
  bufferSize: number;
  /** Interval between drains (ms), 0 writes through immediately */
  drainInterval: number;
  /** Messages written per drain */
  drainBatch: number;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * HTTP poster used by the webhook sink
 * Resolves true when the receiver accepted the payload
 */
export type HttpPoster = (url: string, body: string) => Promise<boolean>;

/**
 * Webhook sink interface
 * Buffers undelivered alerts and retries with exponential backoff
 */
export interface WebhookSink extends LogSink {
  initialize(callback: (success: boolean, message: string) => void): void;
  /** Get current retry buffer size */
  getBufferSize(): number;
  /** Resolves once in-flight deliveries have settled */
  flush(): Promise<void>;
}

/**
 * Webhook sink configuration
 */
export interface WebhookSinkConfig {
  /** Target URL, null disables delivery */
  url: string | null;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (doubles per failure, capped at 60s) */
  retryDelayMs: number;
  /** Maximum delivery attempts before dropping a message */
  maxRetries: number;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message returned by sinks
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
