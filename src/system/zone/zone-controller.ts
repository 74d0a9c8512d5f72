/**
 * Zone controller
 *
 * Owns one zone's runtime state and turns temperature, gating sensors and
 * commands into an OFF / IDLE / HEATING decision:
 *
 * - powerState off -> OFF, heater off, overriding every other input
 * - IDLE -> HEATING when current <= target - hysteresisLow and nothing blocks
 * - HEATING -> IDLE when current >= target + hysteresisHigh or a block appears
 * - temperature stale beyond the timeout -> IDLE, heater off, degraded
 *
 * Entering and leaving HEATING registers and withdraws demand with the
 * zone's central heater coordinator. The zone heater itself is commanded
 * directly; when the zone was the last demand it stays on until the
 * coordinator has switched the central heater off.
 */

import { fmtTemp } from '@logging';
import { parseNumericState, parseBinaryState } from '@hardware/sensors';
import { formatDuration } from '@utils/time';
import { SensorUnavailableError } from '$types/errors';
import { calculateThresholds, decideHeating, checkMinOff } from '@core/thermostat';
import { applyPreset, applyTarget } from '@core/presets';
import {
  createManualOverrideState,
  recordCommand,
  resetManualOverride,
  expireManualOverride
} from '@core/manual-override';
import { evaluateAutoOnOff, resolvePowerChange } from '@core/auto-on-off';
import { resolveOutdoorTemperature } from '@core/sensor-fusion';
import {
  createSensorHealthState,
  updateSensorHealth,
  effectiveTemperature,
  isSampleExpired
} from '@core/sensor-health';
import {
  createWindowState,
  recordTemperatureSample,
  updateWindowDetection,
  windowBlock
} from '@core/window-detection';
import { createMotionState, recordMotion, updateMotionGating } from '@core/motion-gating';
import { readBinary, buildSnapshot, sanitizePersistedState } from './helpers';

import type { PowerState, CommandOrigin, TemperatureReading } from '$types/common';
import type { ZoneConfig } from '$types/config';
import type { SensorSample } from '@hardware/sensors';
import type { CentralHeaterCoordinator } from '@core/central-heater';
import type { WindowEvent } from '@core/window-detection';
import type { ZoneAlertKind } from '@events/types';
import type {
  ZoneController,
  ZoneControllerDependencies,
  ZoneRuntimeState,
  ZoneSnapshot,
  ZoneHandover,
  PersistedZoneState,
  BlockReason,
  DegradedReason
} from './types';

function createRuntimeState(config: ZoneConfig, nowSec: number): ZoneRuntimeState {
  return {
    targetTemperature: config.presets[config.initialPreset],
    activePreset: config.initialPreset,
    mode: 'off',
    powerState: 'off',
    currentTemperature: null,
    manualOverride: createManualOverrideState(),
    sensorHealth: createSensorHealthState(nowSec),
    window: createWindowState(),
    motion: createMotionState(nowSec),
    blockedBy: [],
    degradedReasons: [],
    heaterOn: false,
    lastHeaterOffTime: null,
    heaterHeld: false,
    outdoor: { value: null, source: 'none', degraded: true },
    autoDecision: { action: 'none', reason: 'disabled', outdoorTemp: null, suppressed: false },
    lastEvaluated: nowSec
  };
}

/**
 * Create a zone controller
 * The configuration must already be validated
 */
export function createZoneController(config: ZoneConfig, deps: ZoneControllerDependencies): ZoneController {
  const logger = deps.logger;
  const state = createRuntimeState(config, deps.timeSource());
  const healthConfig = {
    timeoutSec: config.sensorTimeoutSec,
    stuckSec: config.sensorStuckSec,
    stuckEpsilon: 0.05
  };

  let coordinator: CentralHeaterCoordinator | null = null;
  let started = false;
  let stopped = false;
  let lastPublished: string | null = null;
  let minOffLogged = false;
  let lastTempSample: SensorSample | null = null;

  // ═══════════════════════════════════════════════════════════════
  // NOTIFICATIONS
  // ═══════════════════════════════════════════════════════════════

  function alert(kind: ZoneAlertKind, message: string): void {
    if (deps.onAlert !== undefined) {
      deps.onAlert(kind, message);
    }
  }

  function persistableChanged(): void {
    if (deps.onPersistableChange !== undefined) {
      deps.onPersistableChange();
    }
  }

  function snapshot(): ZoneSnapshot {
    return buildSnapshot(config, state, deps.sensors, coordinator === null ? null : coordinator.snapshot());
  }

  function publish(): void {
    const current = snapshot();
    const serialized = JSON.stringify(current);
    if (serialized === lastPublished) {
      return;
    }
    lastPublished = serialized;
    if (deps.onSnapshot !== undefined) {
      deps.onSnapshot(current);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // ACTUATION
  // ═══════════════════════════════════════════════════════════════

  function heaterOn(reason: string): void {
    if (state.heaterOn) {
      return;
    }
    state.heaterOn = true;
    deps.commander.command(config.heater, 'on', reason);
  }

  function heaterOff(reason: string, nowSec: number): void {
    if (!state.heaterOn) {
      return;
    }
    state.heaterOn = false;
    state.lastHeaterOffTime = nowSec;
    deps.commander.command(config.heater, 'off', reason);
  }

  function releaseHold(): void {
    if (!state.heaterHeld) {
      return;
    }
    state.heaterHeld = false;
    if (state.mode !== 'heating') {
      heaterOff("central heater off", deps.timeSource());
    }
  }

  function enterHeating(current: number, onAt: number): void {
    state.mode = 'heating';
    state.heaterHeld = false;
    minOffLogged = false;
    logger.info("Heating ON (" + fmtTemp(current) + " <= " + fmtTemp(onAt) + ")");
    heaterOn("heat demand");
    if (coordinator !== null) {
      coordinator.register(config.id);
    }
  }

  function leaveHeating(nowSec: number, reason: string, mayHold: boolean): void {
    if (state.mode === 'heating') {
      logger.info("Heating OFF (" + reason + ")");
    }
    if (coordinator !== null) {
      const release = mayHold && state.heaterOn ? releaseHold : undefined;
      if (coordinator.deregister(config.id, release)) {
        state.heaterHeld = true;
        logger.debug("Heater kept on until central heater " + coordinator.ref + " is off");
      }
    }
    if (!state.heaterHeld) {
      heaterOff(reason, nowSec);
    }
  }

  function enterIdle(nowSec: number, reason: string): void {
    leaveHeating(nowSec, reason, true);
    state.mode = 'idle';
  }

  function enterOff(nowSec: number): void {
    if (state.mode !== 'off') {
      logger.info("Zone OFF");
    }
    state.heaterHeld = false;
    leaveHeating(nowSec, "power off", false);
    state.mode = 'off';
  }

  // ═══════════════════════════════════════════════════════════════
  // EVALUATION STEPS
  // ═══════════════════════════════════════════════════════════════

  function setDegraded(reason: DegradedReason, active: boolean): void {
    const index = state.degradedReasons.indexOf(reason);
    if (active && index === -1) {
      state.degradedReasons.push(reason);
    } else if (!active && index !== -1) {
      state.degradedReasons.splice(index, 1);
    }
  }

  function updateOutdoor(): void {
    const wasDegraded = state.degradedReasons.indexOf('outdoor_unavailable') !== -1;
    state.outdoor = resolveOutdoorTemperature({
      primary: deps.sensors.get(config.outdoorSensor),
      backup: config.backupOutdoorSensor === undefined ? null : deps.sensors.get(config.backupOutdoorSensor),
      weather: config.weatherEntity === undefined ? null : deps.sensors.get(config.weatherEntity)
    });
    setDegraded('outdoor_unavailable', state.outdoor.degraded);

    if (state.outdoor.degraded && !wasDegraded) {
      logger.warning("Outdoor temperature unavailable, auto on/off paused");
      alert('outdoor_unavailable', "No outdoor temperature from any source");
    } else if (!state.outdoor.degraded && wasDegraded) {
      logger.info("Outdoor temperature from " + state.outdoor.source + ": " + fmtTemp(state.outdoor.value));
      alert('outdoor_recovered', "Outdoor temperature available from " + state.outdoor.source);
    }
  }

  function applyAutoOnOff(): void {
    state.autoDecision = evaluateAutoOnOff(state.outdoor.value, config.autoOnOff, state.manualOverride.active);
    const change = resolvePowerChange(state.autoDecision, state.powerState);
    if (!change.apply) {
      return;
    }

    const comparison = change.powerState === 'on'
      ? fmtTemp(state.outdoor.value) + " < " + fmtTemp(config.autoOnOff.onTemp)
      : fmtTemp(state.outdoor.value) + " > " + fmtTemp(config.autoOnOff.offTemp);
    const message = "Auto power " + change.powerState.toUpperCase() + " (outdoor " + comparison + ")";
    logger.info(message);
    alert('auto_power', message);

    state.powerState = change.powerState;
    persistableChanged();
  }

  function updateTemperature(nowSec: number): TemperatureReading {
    // Only a newly arrived sample counts as a reading
    const sample = deps.sensors.get(config.tempSensor);
    let raw: TemperatureReading = null;
    if (sample !== null && sample !== lastTempSample) {
      lastTempSample = sample;
      if (isSampleExpired(sample.timestamp, nowSec, config.sensorTimeoutSec)) {
        logger.debug("Ignoring " + config.tempSensor + " sample from " + sample.timestamp + ", older than the sensor timeout");
      } else {
        raw = parseNumericState(sample.value);
      }
    }
    const health = updateSensorHealth(raw, nowSec, state.sensorHealth, healthConfig);

    if (health.staleDuration !== undefined) {
      logger.warning(
        "Temperature sensor " + config.tempSensor + " silent for " + formatDuration(health.staleDuration) + ", heating stopped"
      );
      alert('temperature_stale', "No valid temperature for " + formatDuration(health.staleDuration));
    }
    if (health.recovered === true) {
      logger.info("Temperature sensor " + config.tempSensor + " recovered: " + fmtTemp(raw));
      alert('temperature_recovered', "Temperature sensor recovered");
    }
    if (health.stuckDuration !== undefined) {
      logger.warning(
        "Temperature sensor " + config.tempSensor + " unchanged for " + formatDuration(health.stuckDuration)
      );
      alert('temperature_stuck', "Temperature unchanged for " + formatDuration(health.stuckDuration));
    }
    if (health.unstuck === true) {
      logger.info("Temperature sensor " + config.tempSensor + " moving again");
    }

    setDegraded('temperature_stale', health.staleFired);
    setDegraded('temperature_stuck', health.stuckFired);
    state.currentTemperature = effectiveTemperature(health);
    return state.currentTemperature;
  }

  function logWindowEvent(event: WindowEvent): void {
    if (event.type === 'opened') {
      logger.warning("Window open (" + event.cause + ", slope " + event.slopePerHour.toFixed(2) + "C/h), heating blocked");
      alert('window_opened', "Window open (" + event.cause + ")");
    } else {
      const recovery = state.window.recoveryUntil;
      logger.info(
        "Window closed (" + event.cause + ")" +
        (recovery === null ? "" : ", heating resumes in " + formatDuration(config.windowDetection.recoverySec))
      );
      alert('window_closed', "Window closed (" + event.cause + ")");
    }
  }

  function updateBlocks(nowSec: number, current: TemperatureReading): BlockReason[] {
    const blocks: BlockReason[] = [];

    const doorWindowOpen = readBinary(deps.sensors, config.doorWindowSensor);
    const windowEvent = updateWindowDetection(state.window, nowSec, doorWindowOpen, current, config.windowDetection);
    if (windowEvent !== null) {
      logWindowEvent(windowEvent);
    }
    const windowReason = windowBlock(state.window, nowSec);
    if (windowReason !== null) {
      blocks.push(windowReason);
    }

    const motion = updateMotionGating(state.motion, nowSec, config.motionGating);
    if (motion.changed) {
      if (motion.blocking) {
        logger.info("No motion for " + formatDuration(motion.absentSec) + ", heating blocked");
      } else {
        logger.info("Motion detected, heating allowed");
      }
    }
    if (motion.blocking) {
      blocks.push('motion_absent');
    }

    return blocks;
  }

  function readCurrentTemperature(nowSec: number): number | null {
    const current = updateTemperature(nowSec);
    if (state.sensorHealth.staleFired) {
      throw new SensorUnavailableError(config.tempSensor, nowSec - state.sensorHealth.lastReadTime);
    }
    return current;
  }

  function decide(nowSec: number, current: number | null): void {
    const thresholds = calculateThresholds(state.targetTemperature, config.hysteresisLow, config.hysteresisHigh);
    const heating = state.mode === 'heating';
    const wantsHeat = decideHeating(current, heating, thresholds);

    if (heating) {
      if (!wantsHeat) {
        enterIdle(nowSec, fmtTemp(current) + " >= " + fmtTemp(thresholds.offAtOrAbove));
      } else if (state.blockedBy.length > 0) {
        enterIdle(nowSec, "blocked by " + state.blockedBy.join(", "));
      }
      return;
    }

    if (state.mode === 'off') {
      logger.info("Zone ON, target " + fmtTemp(state.targetTemperature));
      enterIdle(nowSec, "power on");
    }

    if (!wantsHeat || current === null || state.blockedBy.length > 0) {
      return;
    }

    const minOff = checkMinOff(nowSec, state.lastHeaterOffTime, config.minOffSec);
    if (!minOff.allow) {
      state.blockedBy.push('min_off');
      if (!minOffLogged && minOff.remainingSec !== undefined) {
        logger.debug("Heat demand waiting " + formatDuration(minOff.remainingSec) + " for minimum off time");
        minOffLogged = true;
      }
      return;
    }

    enterHeating(current, thresholds.onAtOrBelow);
  }

  function evaluateInner(nowSec: number): void {
    if (expireManualOverride(state.manualOverride, nowSec, config.manualOverrideTimeoutSec)) {
      logger.info("Manual override expired after " + formatDuration(config.manualOverrideTimeoutSec));
      alert('manual_override_expired', "Manual override expired");
      persistableChanged();
    }

    updateOutdoor();
    applyAutoOnOff();

    let current: number | null = null;
    try {
      current = readCurrentTemperature(nowSec);
    } catch (err) {
      if (!(err instanceof SensorUnavailableError)) {
        throw err;
      }
      state.blockedBy = updateBlocks(nowSec, null);
      if (state.powerState === 'off') {
        enterOff(nowSec);
      } else {
        enterIdle(nowSec, "temperature unavailable");
      }
      return;
    }

    state.blockedBy = updateBlocks(nowSec, current);

    if (state.powerState === 'off') {
      enterOff(nowSec);
      return;
    }

    decide(nowSec, current);
  }

  function evaluate(reason: string): void {
    if (!started || stopped) {
      return;
    }

    const nowSec = deps.timeSource();
    try {
      evaluateInner(nowSec);
      setDegraded('evaluation_failed', false);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.critical("Evaluation failed (" + reason + "): " + message);
      alert('evaluation_failed', message);
      setDegraded('evaluation_failed', true);
      try {
        if (state.mode === 'heating') {
          enterIdle(nowSec, "evaluation failed");
        }
      } catch (recoveryErr) {
        logger.critical("Fail-safe heater off failed: " + String(recoveryErr));
      }
    }
    state.lastEvaluated = nowSec;
    publish();
  }

  // ═══════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════

  function noteCommand(origin: CommandOrigin): void {
    if (recordCommand(state.manualOverride, origin, deps.timeSource())) {
      logger.info("Manual override active, auto on/off suspended");
    }
  }

  function setTarget(temperature: number, origin: CommandOrigin): void {
    applyTarget(state, config, temperature);
    noteCommand(origin);
    logger.info("Target set to " + fmtTemp(temperature));
    persistableChanged();
    evaluate("target");
  }

  function setPreset(name: string, origin: CommandOrigin): void {
    applyPreset(state, config.presets, name);
    noteCommand(origin);
    logger.info("Preset " + name + ", target " + fmtTemp(state.targetTemperature));
    persistableChanged();
    evaluate("preset");
  }

  function setPower(powerState: PowerState, origin: CommandOrigin): void {
    noteCommand(origin);
    if (state.powerState !== powerState) {
      state.powerState = powerState;
      logger.info("Power " + powerState.toUpperCase() + " (" + origin + ")");
    }
    persistableChanged();
    evaluate("power");
  }

  function resetOverride(): void {
    if (resetManualOverride(state.manualOverride)) {
      logger.info("Manual override cleared, auto on/off resumed");
    }
    persistableChanged();
    evaluate("override reset");
  }

  // ═══════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════

  function start(handover?: ZoneHandover): void {
    if (started) {
      return;
    }
    started = true;
    const nowSec = deps.timeSource();

    if (config.centralHeater !== undefined) {
      coordinator = deps.registry.acquire(config.centralHeater, config.id, {
        onDelaySec: config.centralHeaterOnDelaySec,
        offDelaySec: config.centralHeaterOffDelaySec
      });
    }

    if (handover !== undefined && handover.tempSensor === config.tempSensor) {
      lastTempSample = handover.lastTempSample;
      state.sensorHealth = { ...handover.sensorHealth };
      state.currentTemperature = effectiveTemperature(state.sensorHealth);
      setDegraded('temperature_stale', state.sensorHealth.staleFired);
      setDegraded('temperature_stuck', state.sensorHealth.stuckFired);
    }

    if (handover !== undefined && handover.heater === config.heater) {
      state.heaterOn = handover.heaterOn;
      state.lastHeaterOffTime = handover.lastHeaterOffTime;
      if (state.heaterOn && handover.heating && state.powerState === 'on') {
        state.mode = 'heating';
        if (coordinator !== null) {
          coordinator.register(config.id);
        }
      } else {
        heaterOff("zone reconfigured", nowSec);
      }
    } else {
      state.heaterOn = false;
      state.lastHeaterOffTime = nowSec;
      deps.commander.command(config.heater, 'off', "startup");
    }

    logger.info(
      "Zone started: power " + state.powerState.toUpperCase() + ", target " + fmtTemp(state.targetTemperature) +
      (config.centralHeater === undefined ? "" : ", central heater " + config.centralHeater)
    );
    evaluate("start");
  }

  function stop(commandHeaterOff: boolean): void {
    if (stopped) {
      return;
    }
    stopped = true;
    const nowSec = deps.timeSource();

    if (coordinator !== null) {
      deps.registry.release(coordinator.ref, config.id);
      coordinator = null;
    }
    if (commandHeaterOff) {
      state.heaterOn = false;
      state.lastHeaterOffTime = nowSec;
      deps.commander.command(config.heater, 'off', "zone stopped");
    }
  }

  function handleSensorUpdate(entityId: string): void {
    if (!started || stopped) {
      return;
    }
    const nowSec = deps.timeSource();
    const sample = deps.sensors.get(entityId);

    if (entityId === config.tempSensor && sample !== null) {
      const value = parseNumericState(sample.value);
      if (value !== null) {
        recordTemperatureSample(state.window, value, nowSec);
      }
    }
    if (entityId === config.motionSensor) {
      recordMotion(state.motion, sample === null ? null : parseBinaryState(sample.value), nowSec);
    }

    evaluate("sensor " + entityId);
  }

  function restore(saved: PersistedZoneState): void {
    if (started) {
      return;
    }
    const values = sanitizePersistedState(saved, config);
    state.powerState = values.powerState;
    state.targetTemperature = values.targetTemperature;
    state.activePreset = values.activePreset;
    if (values.manualOverride) {
      state.manualOverride.active = true;
      state.manualOverride.since = deps.timeSource();
    }
    logger.debug(
      "Restored power " + values.powerState + ", target " + fmtTemp(values.targetTemperature) +
      ", preset " + (values.activePreset === null ? "none" : values.activePreset) +
      ", override " + (values.manualOverride ? "on" : "off")
    );
  }

  return {
    id: config.id,
    config: config,
    start: start,
    evaluate: evaluate,
    handleSensorUpdate: handleSensorUpdate,
    setTarget: setTarget,
    setPreset: setPreset,
    setPower: setPower,
    resetManualOverride: resetOverride,
    restore: restore,
    persistedState: function(): PersistedZoneState {
      return {
        powerState: state.powerState,
        targetTemperature: state.targetTemperature,
        activePreset: state.activePreset,
        manualOverride: state.manualOverride.active
      };
    },
    handover: function(): ZoneHandover {
      return {
        heater: config.heater,
        heaterOn: state.heaterOn,
        heating: state.mode === 'heating',
        lastHeaterOffTime: state.lastHeaterOffTime,
        tempSensor: config.tempSensor,
        lastTempSample: lastTempSample,
        sensorHealth: { ...state.sensorHealth }
      };
    },
    snapshot: snapshot,
    stop: stop
  };
}
