/**
 * Heating engine helper functions
 */

import { zoneEntities } from '@system/zone';

import type { ZoneConfig } from '$types/config';

/**
 * Map each entity to the ids of the zones that listen to it
 */
export function buildEntityIndex(configs: Iterable<ZoneConfig>): Map<string, string[]> {
  const index = new Map<string, string[]>();
  for (const config of configs) {
    for (const entityId of zoneEntities(config)) {
      const zoneIds = index.get(entityId);
      if (zoneIds === undefined) {
        index.set(entityId, [config.id]);
      } else {
        zoneIds.push(config.id);
      }
    }
  }
  return index;
}
