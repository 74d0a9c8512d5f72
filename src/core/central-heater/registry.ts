/**
 * Coordinator registry
 *
 * One coordinator per central heater reference, created on first acquire
 * and dropped once its last subscriber is released and no timer is
 * pending. A pending off-timer completes before the coordinator goes.
 */

import { createCentralHeaterCoordinator } from './coordinator';
import type {
  CentralHeaterCoordinator,
  CentralHeaterTiming,
  CoordinatorDependencies,
  CoordinatorRegistry
} from './types';

export function createCoordinatorRegistry(deps: Omit<CoordinatorDependencies, 'onSettled'>): CoordinatorRegistry {
  const coordinators = new Map<string, CentralHeaterCoordinator>();

  function prune(ref: string): void {
    const coordinator = coordinators.get(ref);
    if (coordinator === undefined) {
      return;
    }
    if (coordinator.subscriberCount() === 0 && coordinator.isSettled()) {
      coordinators.delete(ref);
      deps.logger.debug("Central heater " + ref + " coordinator released");
    }
  }

  function acquire(ref: string, zoneId: string, timing: CentralHeaterTiming): CentralHeaterCoordinator {
    let coordinator = coordinators.get(ref);
    if (coordinator === undefined) {
      coordinator = createCentralHeaterCoordinator(ref, {
        commander: deps.commander,
        timerApi: deps.timerApi,
        timeSource: deps.timeSource,
        logger: deps.logger,
        onSettled: function() {
          prune(ref);
        }
      });
      coordinators.set(ref, coordinator);
    }
    coordinator.subscribe(zoneId, timing);
    return coordinator;
  }

  function release(ref: string, zoneId: string): void {
    const coordinator = coordinators.get(ref);
    if (coordinator === undefined) {
      return;
    }
    coordinator.unsubscribe(zoneId);
    prune(ref);
  }

  return {
    acquire: acquire,
    release: release,
    get: function(ref: string) {
      const coordinator = coordinators.get(ref);
      return coordinator === undefined ? null : coordinator;
    },
    refs: function() {
      return Array.from(coordinators.keys()).sort();
    },
    disposeAll: function() {
      for (const coordinator of coordinators.values()) {
        coordinator.dispose();
      }
      coordinators.clear();
    }
  };
}
