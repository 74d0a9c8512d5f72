/**
 * Central heater coordination type definitions
 */

import type { TimerAPI, TimeSource } from '$types/common';
import type { Logger } from '@logging';
import type { ActuatorCommander } from '@hardware/actuator';

/**
 * Protective delays a subscribing zone asks for (s)
 */
export interface CentralHeaterTiming {
  onDelaySec: number;
  offDelaySec: number;
}

/**
 * Published coordinator state
 */
export interface CentralHeaterSnapshot {
  ref: string;
  /** Zone ids currently requesting heat, sorted */
  demand: string[];
  commandedOn: boolean;
  /** Due time (s) of the pending on-timer, null if none */
  onDueAt: number | null;
  /** Due time (s) of the pending off-timer, null if none */
  offDueAt: number | null;
  /** Zone whose heater stays on until the off-timer fires, null if none */
  heldBy: string | null;
  /** Delays in effect (maximum across subscribers) */
  timing: CentralHeaterTiming;
  subscribers: number;
}

/**
 * Shared demand aggregation for one central heater
 */
export interface CentralHeaterCoordinator {
  readonly ref: string;
  /** Add or update a subscribing zone and its delays */
  subscribe(zoneId: string, timing: CentralHeaterTiming): void;
  /** Remove a subscriber, withdrawing its demand first */
  unsubscribe(zoneId: string): void;
  /** Zone starts requesting heat (idempotent) */
  register(zoneId: string): void;
  /**
   * Zone stops requesting heat (idempotent)
   *
   * When the zone was the last demand and an off-timer starts, release is
   * kept and called once the central heater is commanded off, or when
   * another zone starts demand first. It is dropped without a call when the
   * zone demands heat again or unsubscribes.
   *
   * @returns True when release was kept
   */
  deregister(zoneId: string, release?: () => void): boolean;
  hasDemand(zoneId: string): boolean;
  isCommandedOn(): boolean;
  /** True when neither timer is pending */
  isSettled(): boolean;
  subscriberCount(): number;
  snapshot(): CentralHeaterSnapshot;
  /** Cancel pending timers without commanding anything */
  dispose(): void;
}

/**
 * Coordinator collaborators
 */
export interface CoordinatorDependencies {
  commander: ActuatorCommander;
  timerApi: TimerAPI;
  timeSource: TimeSource;
  logger: Logger;
  /** Called whenever the coordinator becomes settled */
  onSettled?: () => void;
}

/**
 * Reference-counted coordinators keyed by central heater reference
 */
export interface CoordinatorRegistry {
  /** Get or create the coordinator for ref and subscribe the zone */
  acquire(ref: string, zoneId: string, timing: CentralHeaterTiming): CentralHeaterCoordinator;
  /** Unsubscribe the zone; the coordinator is dropped once unused and settled */
  release(ref: string, zoneId: string): void;
  get(ref: string): CentralHeaterCoordinator | null;
  refs(): string[];
  /** Dispose every coordinator and forget them */
  disposeAll(): void;
}
