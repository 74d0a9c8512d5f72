/**
 * Latest-sample store
 *
 * Samples are point values. A sample older than the last accepted one for
 * the same entity is discarded; equal timestamps replace the stored sample.
 */

import type { SensorValue } from '$types/common';
import type { SensorSample, SensorStore } from './types';

/**
 * Create an empty sensor store
 */
export function createSensorStore(): SensorStore {
  const samples = new Map<string, SensorSample>();

  function accept(
    entityId: string,
    value: SensorValue,
    timestamp: number,
    attributes?: Record<string, unknown>
  ): boolean {
    const previous = samples.get(entityId);
    if (previous !== undefined && timestamp < previous.timestamp) {
      return false;
    }

    samples.set(entityId, {
      value: value,
      attributes: attributes === undefined ? {} : { ...attributes },
      timestamp: timestamp
    });
    return true;
  }

  function get(entityId: string): SensorSample | null {
    const sample = samples.get(entityId);
    return sample === undefined ? null : sample;
  }

  return {
    accept: accept,
    get: get,
    remove: function(entityId: string) {
      samples.delete(entityId);
    },
    size: function() {
      return samples.size;
    }
  };
}
