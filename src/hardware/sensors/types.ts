/**
 * Sensor sample type definitions
 */

import type { SensorValue } from '$types/common';

/**
 * Last accepted sample of one entity
 */
export interface SensorSample {
  readonly value: SensorValue;
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Source timestamp (s) used for ordering */
  readonly timestamp: number;
}

/**
 * Read access to the latest samples
 */
export interface SensorReader {
  get(entityId: string): SensorSample | null;
}

/**
 * Latest-sample store with out-of-order rejection
 */
export interface SensorStore extends SensorReader {
  /**
   * Accept a sample unless it is older than the last accepted one
   * @returns false when the sample was discarded
   */
  accept(entityId: string, value: SensorValue, timestamp: number, attributes?: Record<string, unknown>): boolean;
  /** Forget an entity */
  remove(entityId: string): void;
  /** Number of entities with a sample */
  size(): number;
}
