import type { TimerAPI, TimeSource } from '$types/common';
import type { EngineConfigInput, LoggingConfig } from '$types/config';
import type { Logger, ConsoleAPI, HttpPoster } from '@logging';
import type { ActuatorPort } from '@hardware/actuator';
import type { HeatingEngine } from '@system/engine';
import type { RuntimeStateStore } from '@system/persistence';

/**
 * What initialize() needs; omitted collaborators use Node timers,
 * the wall clock, the global console and fetch
 */
export interface InitOptions {
  engine: EngineConfigInput;
  logging?: Partial<LoggingConfig>;
  port: ActuatorPort;
  /** JSON file for runtime state, ignored when store is given */
  stateFile?: string | null;
  store?: RuntimeStateStore;
  timerApi?: TimerAPI;
  timeSource?: TimeSource;
  consoleApi?: ConsoleAPI;
  poster?: HttpPoster;
}

export interface HeatingApp {
  engine: HeatingEngine;
  logger: Logger;
  /** Shut the engine down */
  stop(): Promise<void>;
}
