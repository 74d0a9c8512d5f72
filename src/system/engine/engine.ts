/**
 * Heating engine
 *
 * Owns the zone controllers, the shared sensor store, the actuator
 * commander and the central heater registry. Sensor events for entities a
 * zone listens to are stored and routed to those zones; a repeating poll timer
 * re-evaluates every zone so timeouts and delays take effect without new
 * events. A failure inside one zone is logged and never reaches another.
 */

import { createPrefixedLogger } from '@logging';
import { createActuatorCommander } from '@hardware/actuator';
import { createSensorStore } from '@hardware/sensors';
import { createCoordinatorRegistry } from '@core/central-heater';
import { createSerialQueue } from '@utils/time';
import { assertValidEngineConfig, assertZoneFits } from '@validation';
import { ConfigurationError, ZoneNotFoundError } from '$types/errors';
import { EVENT_NAMES } from '@events/types';
import { createZoneController } from '@system/zone';
import { PERSISTED_STATE_VERSION } from '@system/persistence';
import { buildEntityIndex } from './helpers';

import type { PowerState } from '$types/common';
import type { EngineConfig, ZoneConfig } from '$types/config';
import type { ValidationIssue } from '@validation';
import type { CentralHeaterSnapshot } from '@core/central-heater';
import type { SensorEvent, EngineEvent, ZoneAlertKind } from '@events/types';
import type { ZoneController, ZoneSnapshot, ZoneHandover, PersistedZoneState } from '@system/zone';
import type { PersistedEngineState } from '@system/persistence';
import type { HeatingEngine, HeatingEngineDependencies, EngineEventListener } from './types';

/**
 * Create the engine
 *
 * @param config - Engine configuration, validated here
 * @param deps - Port, clock, timers, logger and optional store/registry
 * @throws {ConfigurationError} When the configuration is rejected
 */
export function createHeatingEngine(config: EngineConfig, deps: HeatingEngineDependencies): HeatingEngine {
  const logger = deps.logger;
  logWarnings(assertValidEngineConfig(config), "");

  const commander = createActuatorCommander(deps.port, deps.timerApi, logger, {
    timeoutMs: config.commandTimeoutMs
  });
  const sensors = createSensorStore();
  const registry = deps.registry !== undefined
    ? deps.registry
    : createCoordinatorRegistry({
      commander: commander,
      timerApi: deps.timerApi,
      timeSource: deps.timeSource,
      logger: logger
    });
  const store = deps.store;
  const saveQueue = createSerialQueue(function(_label: string, err: unknown) {
    logger.warning("State save failed: " + describe(err));
  });

  const controllers = new Map<string, ZoneController>();
  const listeners = new Set<EngineEventListener>();
  let entityIndex = new Map<string, string[]>();
  let saved: Record<string, PersistedZoneState> = {};
  let started = false;
  let stopped = false;
  let pollTimer: number | null = null;
  let saveTimer: number | null = null;

  // ═══════════════════════════════════════════════════════════════
  // EVENTS
  // ═══════════════════════════════════════════════════════════════

  function logWarnings(warnings: ValidationIssue[], prefix: string): void {
    for (const warning of warnings) {
      logger.warning(prefix + "Config " + warning.field + ": " + warning.message);
    }
  }

  function emit(event: EngineEvent): void {
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        logger.warning("Event listener failed: " + describe(err));
      }
    }
  }

  function emitState(zoneId: string, snapshot: ZoneSnapshot): void {
    emit({ type: EVENT_NAMES.STATE, zoneId: zoneId, snapshot: snapshot, timestamp: deps.timeSource() });
  }

  function emitAlert(zoneId: string, alert: ZoneAlertKind, message: string): void {
    emit({ type: EVENT_NAMES.ALERT, zoneId: zoneId, alert: alert, message: message, timestamp: deps.timeSource() });
  }

  // ═══════════════════════════════════════════════════════════════
  // PERSISTENCE
  // ═══════════════════════════════════════════════════════════════

  function collectState(): PersistedEngineState {
    const zones: Record<string, PersistedZoneState> = {};
    for (const controller of controllers.values()) {
      zones[controller.id] = controller.persistedState();
    }
    return { version: PERSISTED_STATE_VERSION, zones: zones };
  }

  function saveNow(): void {
    if (store === undefined) {
      return;
    }
    const state = collectState();
    saveQueue.enqueue("save state", function() {
      return store.save(state);
    });
  }

  function scheduleSave(): void {
    if (store === undefined || stopped || saveTimer !== null) {
      return;
    }
    if (config.stateSaveDelayMs <= 0) {
      saveNow();
      return;
    }
    saveTimer = deps.timerApi.set(config.stateSaveDelayMs, false, function() {
      saveTimer = null;
      saveNow();
    });
  }

  async function loadState(): Promise<void> {
    if (store === undefined) {
      return;
    }
    try {
      const loaded = await store.load();
      saved = loaded === null ? {} : loaded.zones;
    } catch (err) {
      logger.warning("State load failed, starting from defaults: " + describe(err));
      saved = {};
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // ZONES
  // ═══════════════════════════════════════════════════════════════

  function configs(): ZoneConfig[] {
    return Array.from(controllers.values()).map(function(controller) {
      return controller.config;
    });
  }

  function reindex(): void {
    const previous = entityIndex;
    entityIndex = buildEntityIndex(configs());
    for (const entityId of previous.keys()) {
      if (!entityIndex.has(entityId)) {
        sensors.remove(entityId);
      }
    }
  }

  function createZone(zoneConfig: ZoneConfig): ZoneController {
    const zoneId = zoneConfig.id;
    return createZoneController(zoneConfig, {
      sensors: sensors,
      commander: commander,
      registry: registry,
      timeSource: deps.timeSource,
      logger: createPrefixedLogger(logger, "[" + zoneId + "] "),
      onSnapshot: function(snapshot: ZoneSnapshot) {
        emitState(zoneId, snapshot);
      },
      onAlert: function(alert: ZoneAlertKind, message: string) {
        emitAlert(zoneId, alert, message);
      },
      onPersistableChange: scheduleSave
    });
  }

  function startZone(controller: ZoneController): void {
    const restored = saved[controller.id];
    if (restored !== undefined) {
      controller.restore(restored);
    }
    isolated(controller.id, "start", function() {
      controller.start();
    });
  }

  function isolated(zoneId: string, what: string, action: () => void): void {
    try {
      action();
    } catch (err) {
      logger.critical("[" + zoneId + "] " + what + " failed: " + describe(err));
    }
  }

  function controllerFor(zoneId: string): ZoneController {
    const controller = controllers.get(zoneId);
    if (controller === undefined) {
      throw new ZoneNotFoundError(zoneId);
    }
    return controller;
  }

  function addZone(zoneConfig: ZoneConfig): void {
    if (stopped) {
      throw new ConfigurationError("Engine is shut down");
    }
    if (controllers.has(zoneConfig.id)) {
      throw new ConfigurationError("Zone " + zoneConfig.id + " already exists", [
        { field: 'id', message: "Duplicate zone id " + zoneConfig.id }
      ]);
    }
    logWarnings(assertZoneFits(zoneConfig, configs()), "[" + zoneConfig.id + "] ");

    const controller = createZone(zoneConfig);
    controllers.set(zoneConfig.id, controller);
    reindex();
    if (started) {
      startZone(controller);
      logger.info("Zone " + zoneConfig.id + " added");
      scheduleSave();
    }
  }

  function removeZone(zoneId: string): void {
    const controller = controllerFor(zoneId);

    controllers.delete(zoneId);
    reindex();
    delete saved[zoneId];
    controller.stop(true);
    logger.info("Zone " + zoneId + " removed");
    scheduleSave();
  }

  function reconfigureZone(zoneConfig: ZoneConfig): void {
    const previous = controllerFor(zoneConfig.id);
    logWarnings(assertZoneFits(zoneConfig, configs()), "[" + zoneConfig.id + "] ");

    const persisted = previous.persistedState();
    const handover: ZoneHandover = previous.handover();

    previous.stop(previous.config.heater !== zoneConfig.heater);

    const controller = createZone(zoneConfig);
    controller.restore(persisted);
    controllers.set(zoneConfig.id, controller);
    reindex();

    if (started) {
      isolated(zoneConfig.id, "start", function() {
        controller.start(handover);
      });
    }
    logger.info("Zone " + zoneConfig.id + " reconfigured");
    scheduleSave();
  }

  // ═══════════════════════════════════════════════════════════════
  // RUNTIME
  // ═══════════════════════════════════════════════════════════════

  async function start(): Promise<void> {
    if (started || stopped) {
      return;
    }
    await loadState();
    started = true;

    for (const controller of controllers.values()) {
      startZone(controller);
    }

    pollTimer = deps.timerApi.set(config.pollIntervalSec * 1000, true, tick);
    logger.info(
      "Engine started: " + controllers.size + " zone(s), poll " + config.pollIntervalSec + "s" +
      (store === undefined ? "" : ", state persistence on")
    );
  }

  function dispatch(event: SensorEvent): boolean {
    const zoneIds = entityIndex.get(event.entityId);
    if (zoneIds === undefined) {
      logger.debug("Ignored sample for unused entity " + event.entityId);
      return true;
    }
    if (!sensors.accept(event.entityId, event.value, event.timestamp, event.attributes)) {
      logger.debug("Discarded out-of-order sample for " + event.entityId + " at " + event.timestamp);
      return false;
    }
    if (!started || stopped) {
      return true;
    }

    for (const zoneId of zoneIds) {
      const controller = controllers.get(zoneId);
      if (controller !== undefined) {
        isolated(zoneId, "sensor update", function() {
          controller.handleSensorUpdate(event.entityId);
        });
      }
    }
    return true;
  }

  function tick(): void {
    if (!started || stopped) {
      return;
    }
    for (const controller of controllers.values()) {
      isolated(controller.id, "poll", function() {
        controller.evaluate("poll");
      });
    }
  }

  function whenIdle(): Promise<void> {
    return Promise.all([commander.whenIdle(), saveQueue.whenIdle()]).then(function() {
      return undefined;
    });
  }

  async function shutdown(): Promise<void> {
    if (stopped) {
      return;
    }
    stopped = true;

    if (pollTimer !== null) {
      deps.timerApi.clear(pollTimer);
      pollTimer = null;
    }
    if (saveTimer !== null) {
      deps.timerApi.clear(saveTimer);
      saveTimer = null;
    }

    registry.disposeAll();
    for (const controller of controllers.values()) {
      isolated(controller.id, "stop", function() {
        controller.stop(true);
      });
    }

    if (started) {
      saveNow();
    }
    await whenIdle();
    logger.info("Engine stopped");
  }

  for (const zoneConfig of config.zones) {
    controllers.set(zoneConfig.id, createZone(zoneConfig));
  }
  reindex();

  return {
    start: start,
    dispatch: dispatch,
    tick: tick,
    setTarget: function(zoneId: string, temperature: number) {
      controllerFor(zoneId).setTarget(temperature, 'user');
    },
    setPreset: function(zoneId: string, name: string) {
      controllerFor(zoneId).setPreset(name, 'user');
    },
    setPower: function(zoneId: string, powerState: PowerState) {
      controllerFor(zoneId).setPower(powerState, 'user');
    },
    resetManualOverride: function(zoneId: string) {
      controllerFor(zoneId).resetManualOverride();
    },
    addZone: addZone,
    removeZone: removeZone,
    reconfigureZone: reconfigureZone,
    getZone: function(zoneId: string) {
      return controllerFor(zoneId).snapshot();
    },
    zones: function() {
      return Array.from(controllers.values()).map(function(controller) {
        return controller.snapshot();
      });
    },
    centralHeaters: function() {
      const snapshots: CentralHeaterSnapshot[] = [];
      for (const ref of registry.refs()) {
        const coordinator = registry.get(ref);
        if (coordinator !== null) {
          snapshots.push(coordinator.snapshot());
        }
      }
      return snapshots;
    },
    onEvent: function(listener: EngineEventListener) {
      listeners.add(listener);
      return function() {
        listeners.delete(listener);
      };
    },
    whenIdle: whenIdle,
    shutdown: shutdown
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
