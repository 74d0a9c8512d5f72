/**
 * Type definitions for zone and engine configuration
 */

import type { LogLevel } from '@logging';
import type { PresetName } from './common';

// ═══════════════════════════════════════════════════════════════
// ZONE CONFIGURATION
// Immutable per zone until the zone is reconfigured
// ═══════════════════════════════════════════════════════════════

/**
 * Preset temperature table (°C)
 */
export interface PresetTable {
  readonly home: number;
  readonly sleep: number;
  readonly away: number;
}

/**
 * Outdoor temperature driven power forcing
 */
export interface AutoOnOffConfig {
  readonly enabled: boolean;
  /** Force power ON below this outdoor temperature (°C) */
  readonly onTemp: number;
  /** Force power OFF above this outdoor temperature (°C) */
  readonly offTemp: number;
}

/**
 * Open window gating and detection
 */
export interface WindowDetectionConfig {
  /** Door/window sensor open blocks heating */
  readonly enabled: boolean;
  /** Also detect an open window from a rapid temperature drop */
  readonly slopeDetection: boolean;
  /** Cooling rate (°C per hour, positive) that starts a detection */
  readonly slopeThreshold: number;
  /** Heating stays blocked this long after a window closes (s) */
  readonly recoverySec: number;
}

/**
 * Absence-of-motion gating
 */
export interface MotionGatingConfig {
  readonly enabled: boolean;
  /** No motion for this long blocks heating (s) */
  readonly absenceSec: number;
}

/**
 * Complete zone configuration
 */
export interface ZoneConfig {
  // ───────── IDENTITY & ACTUATORS ─────────
  readonly id: string;
  readonly name: string;
  readonly heater: string;
  readonly centralHeater?: string;

  // ───────── SENSORS ─────────
  readonly tempSensor: string;
  readonly outdoorSensor: string;
  readonly backupOutdoorSensor?: string;
  readonly weatherEntity?: string;
  readonly humiditySensor?: string;
  readonly doorWindowSensor?: string;
  readonly motionSensor?: string;

  // ───────── TARGETS ─────────
  readonly presets: PresetTable;
  readonly initialPreset: PresetName;
  readonly minTemp: number;
  readonly maxTemp: number;
  readonly hysteresisLow: number;
  readonly hysteresisHigh: number;

  // ───────── AUTOMATION ─────────
  readonly autoOnOff: AutoOnOffConfig;
  readonly manualOverrideTimeoutSec: number;

  // ───────── CENTRAL HEATER TIMING ─────────
  readonly centralHeaterOnDelaySec: number;
  readonly centralHeaterOffDelaySec: number;

  // ───────── SAFETY ─────────
  readonly sensorTimeoutSec: number;
  readonly sensorStuckSec: number;
  readonly minOffSec: number;
  readonly windowDetection: WindowDetectionConfig;
  readonly motionGating: MotionGatingConfig;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Zone configuration as supplied by a user: identity and mandatory
 * references required, everything else falls back to defaults
 */
export type ZoneConfigInput =
  Pick<ZoneConfig, 'id' | 'heater' | 'tempSensor' | 'outdoorSensor'> &
  Partial<Mutable<Omit<ZoneConfig, 'id' | 'heater' | 'tempSensor' | 'outdoorSensor' |
    'presets' | 'autoOnOff' | 'windowDetection' | 'motionGating'>>> & {
    presets?: Partial<PresetTable>;
    autoOnOff?: Partial<AutoOnOffConfig>;
    windowDetection?: Partial<WindowDetectionConfig>;
    motionGating?: Partial<MotionGatingConfig>;
  };

// ═══════════════════════════════════════════════════════════════
// ENGINE CONFIGURATION
// ═══════════════════════════════════════════════════════════════

/**
 * Engine-wide settings
 */
export interface EngineConfig {
  /** Periodic re-evaluation interval (s) */
  readonly pollIntervalSec: number;
  /** Upper bound for a single actuator call (ms) */
  readonly commandTimeoutMs: number;
  /** Debounce before runtime state is written to the store (ms) */
  readonly stateSaveDelayMs: number;
  readonly zones: readonly ZoneConfig[];
}

/**
 * Engine settings as supplied by a user
 */
export interface EngineConfigInput {
  pollIntervalSec?: number;
  commandTimeoutMs?: number;
  stateSaveDelayMs?: number;
  zones: ZoneConfigInput[];
}

// ═══════════════════════════════════════════════════════════════
// LOGGING CONFIGURATION
// ═══════════════════════════════════════════════════════════════

/**
 * Logging settings used at bootstrap
 */
export interface LoggingConfig {
  readonly level: LogLevel;
  /** Hours after which INFO messages are suppressed (0 disables) */
  readonly demoteHours: number;
  readonly consoleBufferSize: number;
  /** Console drain interval (ms), 0 writes immediately */
  readonly consoleDrainMs: number;
  /** Webhook receiving alerts, null disables the webhook sink */
  readonly webhookUrl: string | null;
  readonly webhookLevel: LogLevel;
  readonly webhookBufferSize: number;
  readonly webhookRetryDelayMs: number;
  readonly webhookMaxRetries: number;
}
