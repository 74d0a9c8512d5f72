export { createCentralHeaterCoordinator, effectiveTiming } from './coordinator';
export { createCoordinatorRegistry } from './registry';
export type {
  CentralHeaterTiming,
  CentralHeaterSnapshot,
  CentralHeaterCoordinator,
  CoordinatorDependencies,
  CoordinatorRegistry
} from './types';
