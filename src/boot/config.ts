import { LOG_LEVELS } from '@logging';

import type {
  ZoneConfig,
  ZoneConfigInput,
  EngineConfig,
  EngineConfigInput,
  LoggingConfig
} from '$types/config';

// ─────────────────────────────────────────────────────────────
// ZONE DEFAULTS
//   Everything a zone falls back to when its configuration
//   leaves a setting out. Identity and entity references have
//   no default.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_ZONE_CONFIG = {
  // presets
  //   Role: Target temperature (°C) applied when a preset is selected.
  //   Critical: Each value within minTemp..maxTemp (error otherwise).
  //   Recommended: home 21–23 °C, sleep 2 °C below home, away 16–18 °C.
  presets: { home: 23, sleep: 21, away: 18 },

  // initialPreset
  //   Role: Preset whose temperature is the target of a fresh zone.
  //   Critical: One of home, sleep, away.
  //   Recommended: home.
  initialPreset: 'home',

  // minTemp / maxTemp
  //   Role: Bounds for any target temperature (°C).
  //   Critical: -10–40 °C each, minTemp < maxTemp.
  //   Recommended: minTemp 5–16 °C, maxTemp 20–32 °C.
  minTemp: 5,
  maxTemp: 30,

  // hysteresisLow / hysteresisHigh
  //   Role: Heating starts at target - hysteresisLow and stops at target + hysteresisHigh (°C).
  //   Critical: 0–5 °C each.
  //   Recommended: 0.1–1 °C; 0.3 °C keeps radiators from short cycling.
  hysteresisLow: 0.3,
  hysteresisHigh: 0.3,

  // autoOnOff
  //   Role: Force zone power ON below onTemp and OFF above offTemp outdoors (°C).
  //   Critical: onTemp < offTemp when enabled.
  //   Recommended: onTemp 8–12 °C, offTemp 16–20 °C.
  autoOnOff: { enabled: false, onTemp: 10, offTemp: 18 },

  // manualOverrideTimeoutSec
  //   Role: A user command suspends auto on/off for this long (s).
  //   Critical: 0–604800 s.
  //   Recommended: 0 (until reset) or a few hours.
  manualOverrideTimeoutSec: 0,

  // centralHeaterOnDelaySec / centralHeaterOffDelaySec
  //   Role: Delay before the shared central heater follows demand (s).
  //   Critical: on 0–600 s, off 0–1800 s.
  //   Recommended: on 5–60 s so valves can open first, off 30–300 s for pump overrun.
  centralHeaterOnDelaySec: 10,
  centralHeaterOffDelaySec: 120,

  // sensorTimeoutSec
  //   Role: A zone temperature sensor silent this long stops heating (s).
  //   Critical: 1–86400 s.
  //   Recommended: 60–1800 s; 600 s tolerates sensors that report on change only.
  sensorTimeoutSec: 600,

  // sensorStuckSec
  //   Role: Warn when the temperature has not moved for this long (s).
  //   Critical: 0–86400 s, 0 disables.
  //   Recommended: 0 unless the sensor is known to freeze.
  sensorStuckSec: 0,

  // minOffSec
  //   Role: Minimum rest between two heating cycles of the zone heater (s).
  //   Critical: 0–3600 s.
  //   Recommended: 0–900 s depending on the heater.
  minOffSec: 0,

  // windowDetection
  //   Role: Block heating while a window is open, optionally detected from a temperature drop.
  //   Critical: slopeThreshold 0.5–10 °C/h, recoverySec 0–7200 s.
  //   Recommended: slope detection only for rooms without a contact sensor.
  windowDetection: { enabled: true, slopeDetection: false, slopeThreshold: 0.5, recoverySec: 600 },

  // motionGating
  //   Role: Block heating after no motion for absenceSec (s).
  //   Critical: absenceSec 60–86400 s, requires motionSensor.
  //   Recommended: 1800–7200 s.
  motionGating: { enabled: false, absenceSec: 1800 }
} as const;

// ─────────────────────────────────────────────────────────────
// APP CONSTANTS
//   Engine-wide settings and internal limits
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS = {
  // POLL_INTERVAL_SEC
  //   Role: Periodic re-evaluation of every zone, so timeouts and delays take effect without events.
  //   Critical: 1–3600 s.
  //   Recommended: 10–120 s.
  POLL_INTERVAL_SEC: 30,

  // COMMAND_TIMEOUT_MS
  //   Role: Upper bound for a single actuator call.
  //   Critical: 100–60000 ms.
  //   Recommended: 5000–10000 ms.
  COMMAND_TIMEOUT_MS: 10000,

  // STATE_SAVE_DELAY_MS
  //   Role: Debounce before runtime state is written to the store.
  //   Critical: 0–60000 ms, 0 writes on every change.
  //   Recommended: 1000–5000 ms.
  STATE_SAVE_DELAY_MS: 2000,

  // LOG_LEVELS
  //   Role: Internal mapping of log level names to numeric values.
  //   Critical: Do not change; used throughout logging.
  LOG_LEVELS: LOG_LEVELS
} as const;

// ─────────────────────────────────────────────────────────────
// LOGGING DEFAULTS
// ─────────────────────────────────────────────────────────────

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: LOG_LEVELS.INFO,
  demoteHours: 0,
  consoleBufferSize: 150,
  consoleDrainMs: 0,
  webhookUrl: null,
  webhookLevel: LOG_LEVELS.WARNING,
  webhookBufferSize: 10,
  webhookRetryDelayMs: 30000,
  webhookMaxRetries: 5
};

// ─────────────────────────────────────────────────────────────
// BUILDERS
// ─────────────────────────────────────────────────────────────

function pick<T>(value: T | undefined, fallback: T): T {
  return value !== undefined ? value : fallback;
}

/**
 * Complete a user supplied zone configuration with defaults
 * Unset and undefined fields take the default; the result still needs validation
 */
export function buildZoneConfig(input: ZoneConfigInput): ZoneConfig {
  const defaults = DEFAULT_ZONE_CONFIG;
  const presets = input.presets || {};
  const auto = input.autoOnOff || {};
  const windowDetection = input.windowDetection || {};
  const motion = input.motionGating || {};

  return {
    id: input.id,
    name: pick(input.name, input.id),
    heater: input.heater,
    centralHeater: input.centralHeater,
    tempSensor: input.tempSensor,
    outdoorSensor: input.outdoorSensor,
    backupOutdoorSensor: input.backupOutdoorSensor,
    weatherEntity: input.weatherEntity,
    humiditySensor: input.humiditySensor,
    doorWindowSensor: input.doorWindowSensor,
    motionSensor: input.motionSensor,
    presets: {
      home: pick(presets.home, defaults.presets.home),
      sleep: pick(presets.sleep, defaults.presets.sleep),
      away: pick(presets.away, defaults.presets.away)
    },
    initialPreset: pick(input.initialPreset, defaults.initialPreset),
    minTemp: pick(input.minTemp, defaults.minTemp),
    maxTemp: pick(input.maxTemp, defaults.maxTemp),
    hysteresisLow: pick(input.hysteresisLow, defaults.hysteresisLow),
    hysteresisHigh: pick(input.hysteresisHigh, defaults.hysteresisHigh),
    autoOnOff: {
      enabled: pick(auto.enabled, defaults.autoOnOff.enabled),
      onTemp: pick(auto.onTemp, defaults.autoOnOff.onTemp),
      offTemp: pick(auto.offTemp, defaults.autoOnOff.offTemp)
    },
    manualOverrideTimeoutSec: pick(input.manualOverrideTimeoutSec, defaults.manualOverrideTimeoutSec),
    centralHeaterOnDelaySec: pick(input.centralHeaterOnDelaySec, defaults.centralHeaterOnDelaySec),
    centralHeaterOffDelaySec: pick(input.centralHeaterOffDelaySec, defaults.centralHeaterOffDelaySec),
    sensorTimeoutSec: pick(input.sensorTimeoutSec, defaults.sensorTimeoutSec),
    sensorStuckSec: pick(input.sensorStuckSec, defaults.sensorStuckSec),
    minOffSec: pick(input.minOffSec, defaults.minOffSec),
    windowDetection: {
      enabled: pick(windowDetection.enabled, defaults.windowDetection.enabled),
      slopeDetection: pick(windowDetection.slopeDetection, defaults.windowDetection.slopeDetection),
      slopeThreshold: pick(windowDetection.slopeThreshold, defaults.windowDetection.slopeThreshold),
      recoverySec: pick(windowDetection.recoverySec, defaults.windowDetection.recoverySec)
    },
    motionGating: {
      enabled: pick(motion.enabled, defaults.motionGating.enabled),
      absenceSec: pick(motion.absenceSec, defaults.motionGating.absenceSec)
    }
  };
}

/**
 * Complete engine settings and every zone with defaults
 */
export function buildEngineConfig(input: EngineConfigInput): EngineConfig {
  return {
    pollIntervalSec: pick(input.pollIntervalSec, APP_CONSTANTS.POLL_INTERVAL_SEC),
    commandTimeoutMs: pick(input.commandTimeoutMs, APP_CONSTANTS.COMMAND_TIMEOUT_MS),
    stateSaveDelayMs: pick(input.stateSaveDelayMs, APP_CONSTANTS.STATE_SAVE_DELAY_MS),
    zones: input.zones.map(buildZoneConfig)
  };
}
