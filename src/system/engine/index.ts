export { createHeatingEngine } from './engine';
export { buildEntityIndex } from './helpers';
export type { HeatingEngine, HeatingEngineDependencies, EngineEventListener } from './types';
