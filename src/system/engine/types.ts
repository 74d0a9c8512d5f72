/**
 * Heating engine type definitions
 */

import type { PowerState, TimerAPI, TimeSource } from '$types/common';
import type { ZoneConfig } from '$types/config';
import type { Logger } from '@logging';
import type { ActuatorPort } from '@hardware/actuator';
import type { CentralHeaterSnapshot, CoordinatorRegistry } from '@core/central-heater';
import type { SensorEvent, EngineEvent } from '@events/types';
import type { ZoneSnapshot } from '@system/zone';
import type { RuntimeStateStore } from '@system/persistence';

export type EngineEventListener = (event: EngineEvent) => void;

/**
 * Engine collaborators
 */
export interface HeatingEngineDependencies {
  port: ActuatorPort;
  timerApi: TimerAPI;
  timeSource: TimeSource;
  logger: Logger;
  /** Runtime state persistence, none when omitted */
  store?: RuntimeStateStore;
  /** Central heater registry, a private one when omitted */
  registry?: CoordinatorRegistry;
}

/**
 * Multi-zone heating engine
 */
export interface HeatingEngine {
  /** Restore persisted state, start every zone and the poll timer */
  start(): Promise<void>;
  /**
   * Feed a sensor sample
   * @returns false when the sample was older than the last accepted one
   */
  dispatch(event: SensorEvent): boolean;
  /** Re-evaluate every zone */
  tick(): void;

  // ───────── COMMANDS ─────────
  /** User commands; each activates the manual override */
  setTarget(zoneId: string, temperature: number): void;
  setPreset(zoneId: string, name: string): void;
  setPower(zoneId: string, powerState: PowerState): void;
  resetManualOverride(zoneId: string): void;

  // ───────── ZONE LIFECYCLE ─────────
  addZone(config: ZoneConfig): void;
  removeZone(zoneId: string): void;
  reconfigureZone(config: ZoneConfig): void;

  // ───────── STATE ─────────
  getZone(zoneId: string): ZoneSnapshot;
  zones(): ZoneSnapshot[];
  centralHeaters(): CentralHeaterSnapshot[];
  onEvent(listener: EngineEventListener): () => void;

  /** Resolves once queued actuator commands and state writes have settled */
  whenIdle(): Promise<void>;
  /** Cancel timers, switch zone heaters off, save state */
  shutdown(): Promise<void>;
}
