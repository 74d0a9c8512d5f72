/**
 * Runtime state persistence type definitions
 */

import type { PersistedZoneState } from '@system/zone';

export const PERSISTED_STATE_VERSION = 1;

/**
 * Everything written to the store, keyed by zone id
 */
export interface PersistedEngineState {
  version: typeof PERSISTED_STATE_VERSION;
  zones: Record<string, PersistedZoneState>;
}

/**
 * Storage for runtime values kept across restarts
 * A store that cannot be read yields null; write failures reject
 */
export interface RuntimeStateStore {
  load(): Promise<PersistedEngineState | null>;
  save(state: PersistedEngineState): Promise<void>;
}
