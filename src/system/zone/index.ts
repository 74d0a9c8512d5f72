export { createZoneController } from './zone-controller';
export { readNumeric, readBinary, zoneEntities, buildSnapshot, sanitizePersistedState } from './helpers';
export type {
  BlockReason,
  DegradedReason,
  ZoneRuntimeState,
  ZoneSnapshot,
  PersistedZoneState,
  ZoneHandover,
  ZoneControllerDependencies,
  ZoneController
} from './types';
