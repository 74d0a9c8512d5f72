export { PERSISTED_STATE_VERSION } from './types';
export { parsePersistedState, createMemoryStateStore } from './persistence';
export { createJsonFileStateStore } from './file-store';
export type { PersistedEngineState, RuntimeStateStore } from './types';
