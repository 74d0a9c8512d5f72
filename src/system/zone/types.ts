/**
 * Zone controller type definitions
 */

import type {
  TemperatureReading,
  PowerState,
  ZoneMode,
  HvacAction,
  PresetName,
  CommandOrigin,
  TimeSource
} from '$types/common';
import type { ZoneConfig } from '$types/config';
import type { Logger } from '@logging';
import type { ActuatorCommander } from '@hardware/actuator';
import type { SensorReader, SensorSample } from '@hardware/sensors';
import type { TargetState } from '@core/presets';
import type { ManualOverrideState } from '@core/manual-override';
import type { SensorHealthState } from '@core/sensor-health';
import type { WindowState } from '@core/window-detection';
import type { MotionState } from '@core/motion-gating';
import type { OutdoorReading, OutdoorSource } from '@core/sensor-fusion';
import type { AutoOnOffDecision } from '@core/auto-on-off';
import type { CentralHeaterSnapshot, CoordinatorRegistry } from '@core/central-heater';
import type { ZoneAlertKind } from '@events/types';

/**
 * Conditions that keep a zone from heating
 * min_off only prevents a new heating cycle from starting
 */
export type BlockReason = 'window_open' | 'window_recovery' | 'motion_absent' | 'min_off';

/**
 * Conditions reported as degraded operation
 */
export type DegradedReason = 'temperature_stale' | 'temperature_stuck' | 'outdoor_unavailable' | 'evaluation_failed';

/**
 * Mutable runtime state, owned by exactly one controller
 */
export interface ZoneRuntimeState extends TargetState {
  mode: ZoneMode;
  powerState: PowerState;
  currentTemperature: TemperatureReading;
  manualOverride: ManualOverrideState;

  // ───────── SAFETY ─────────
  sensorHealth: SensorHealthState;
  window: WindowState;
  motion: MotionState;
  blockedBy: BlockReason[];
  degradedReasons: DegradedReason[];

  // ───────── ACTUATOR ─────────
  heaterOn: boolean;
  lastHeaterOffTime: number | null;
  /** Heater left on after demand ended, until the central heater is off */
  heaterHeld: boolean;

  // ───────── OUTDOOR ─────────
  outdoor: OutdoorReading;
  autoDecision: AutoOnOffDecision;

  lastEvaluated: number;
}

/**
 * Published zone state
 */
export interface ZoneSnapshot {
  zoneId: string;
  name: string;
  mode: ZoneMode;
  hvacAction: HvacAction;
  powerState: PowerState;
  currentTemperature: TemperatureReading;
  targetTemperature: number;
  activePreset: PresetName | null;
  manualOverride: boolean;
  manualOverrideSince: number | null;
  degraded: boolean;
  degradedReasons: DegradedReason[];
  blockedBy: BlockReason[];
  heatOnThreshold: number;
  heatOffThreshold: number;
  outdoorTemperature: TemperatureReading;
  outdoorSource: OutdoorSource;
  autoOnOff: AutoOnOffDecision;
  humidity: TemperatureReading;
  doorWindowOpen: boolean | null;
  motionActive: boolean | null;
  windowOpen: boolean;
  windowRecoveryUntil: number | null;
  temperatureSlope: number;
  centralHeater: CentralHeaterSnapshot | null;
}

/**
 * Runtime values kept across restarts
 */
export interface PersistedZoneState {
  powerState: PowerState;
  targetTemperature: number;
  activePreset: PresetName | null;
  manualOverride: boolean;
}

/**
 * State handed from a replaced controller to its successor
 * Each part applies only while the successor keeps the same entity
 */
export interface ZoneHandover {
  heater: string;
  heaterOn: boolean;
  heating: boolean;
  lastHeaterOffTime: number | null;

  tempSensor: string;
  lastTempSample: SensorSample | null;
  sensorHealth: SensorHealthState;
}

/**
 * Zone controller collaborators
 */
export interface ZoneControllerDependencies {
  sensors: SensorReader;
  commander: ActuatorCommander;
  registry: CoordinatorRegistry;
  timeSource: TimeSource;
  /** Logger already prefixed with the zone id */
  logger: Logger;
  onSnapshot?: (snapshot: ZoneSnapshot) => void;
  onAlert?: (alert: ZoneAlertKind, message: string) => void;
  /** Called when a persisted value changed */
  onPersistableChange?: () => void;
}

/**
 * Per-zone OFF / IDLE / HEATING state machine
 */
export interface ZoneController {
  readonly id: string;
  readonly config: ZoneConfig;
  /** Subscribe to the central heater, command the heater to a known state, evaluate */
  start(handover?: ZoneHandover): void;
  /** Re-evaluate; never throws */
  evaluate(reason: string): void;
  /** React to a sample the engine accepted for one of this zone's entities */
  handleSensorUpdate(entityId: string): void;
  setTarget(temperature: number, origin: CommandOrigin): void;
  setPreset(name: string, origin: CommandOrigin): void;
  setPower(powerState: PowerState, origin: CommandOrigin): void;
  resetManualOverride(): void;
  /** Load persisted values; only before start() */
  restore(saved: PersistedZoneState): void;
  persistedState(): PersistedZoneState;
  handover(): ZoneHandover;
  snapshot(): ZoneSnapshot;
  /** Withdraw from the central heater and optionally switch the heater off */
  stop(commandHeaterOff: boolean): void;
}
