/**
 * Actuator type definitions
 */

/**
 * Commanded actuator state
 */
export type ActuatorAction = 'on' | 'off';

/**
 * Outbound port to whatever switches heaters, valves and the central plant
 * A rejection means the command was not applied
 */
export interface ActuatorPort {
  turnOn(ref: string): Promise<void>;
  turnOff(ref: string): Promise<void>;
}

/**
 * Serialized, time-bounded command issuer shared by zones and coordinators
 */
export interface ActuatorCommander {
  /** Queue a command; failures are logged, never thrown */
  command(ref: string, action: ActuatorAction, reason: string): void;
  /** Last action queued per reference */
  lastCommanded(ref: string): ActuatorAction | null;
  /** Resolves once all queued commands have settled */
  whenIdle(): Promise<void>;
}

/**
 * Commander configuration
 */
export interface ActuatorCommanderConfig {
  /** Upper bound for one port call (ms), 0 disables */
  timeoutMs: number;
}

/**
 * Entry in the in-memory port's history
 */
export interface ActuatorHistoryEntry {
  ref: string;
  action: ActuatorAction;
  at: number;
}
