/**
 * Scenario files
 *
 * A scenario is an engine configuration plus a timeline of sensor samples
 * and user commands, each stamped with a simulated time in seconds.
 */

import * as fs from 'fs'

import { isRecord } from '@hardware/sensors'
import { isPresetName } from '@core/presets'

import type { SensorValue, PowerState } from '$types/common'
import type { EngineConfigInput, ZoneConfigInput, PresetTable } from '$types/config'
import type { PersistedZoneState } from '@system/zone'

export interface SensorStep {
  kind: 'sensor'
  at: number
  entity: string
  value: SensorValue
}

export interface CommandStep {
  kind: 'command'
  at: number
  zone: string
  command: 'setPower' | 'setTarget' | 'setPreset' | 'resetOverride'
  value?: PowerState | number | string
}

export interface FailureStep {
  kind: 'fail'
  at: number
  ref: string
  /** null restores the actuator */
  reason: string | null
}

export type ScenarioStep = SensorStep | CommandStep | FailureStep

export interface Scenario {
  name: string
  description: string
  engine: EngineConfigInput
  /** Runtime state present in the store before start */
  savedState: Record<string, PersistedZoneState>
  steps: ScenarioStep[]
  /** Simulated end time (s) */
  until: number
}

export class ScenarioError extends Error {
  readonly problems: string[]

  constructor(source: string, problems: string[]) {
    super(`Invalid scenario ${source}:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`)
    this.name = 'ScenarioError'
    this.problems = problems
  }
}

const STRING_FIELDS = [
  'name',
  'centralHeater',
  'backupOutdoorSensor',
  'weatherEntity',
  'humiditySensor',
  'doorWindowSensor',
  'motionSensor',
] as const

const NUMBER_FIELDS = [
  'minTemp',
  'maxTemp',
  'hysteresisLow',
  'hysteresisHigh',
  'manualOverrideTimeoutSec',
  'centralHeaterOnDelaySec',
  'centralHeaterOffDelaySec',
  'sensorTimeoutSec',
  'sensorStuckSec',
  'minOffSec',
] as const

const COMMANDS = ['setPower', 'setTarget', 'setPreset', 'resetOverride'] as const

// ─────────────────────────────────────────────────────────────
// FIELD READERS
// ─────────────────────────────────────────────────────────────

function readString(record: Record<string, unknown>, key: string, where: string, problems: string[]): string | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string' || value === '') {
    problems.push(`${where}.${key} must be a non-empty string`)
    return undefined
  }
  return value
}

function readNumber(record: Record<string, unknown>, key: string, where: string, problems: string[]): number | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    problems.push(`${where}.${key} must be a number`)
    return undefined
  }
  return value
}

function readBoolean(record: Record<string, unknown>, key: string, where: string, problems: string[]): boolean | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') {
    problems.push(`${where}.${key} must be true or false`)
    return undefined
  }
  return value
}

function requireString(record: Record<string, unknown>, key: string, where: string, problems: string[]): string {
  const value = readString(record, key, where, problems)
  if (value === undefined) {
    if (record[key] === undefined) problems.push(`${where}.${key} is required`)
    return ''
  }
  return value
}

function readSection(
  record: Record<string, unknown>,
  key: string,
  where: string,
  problems: string[]
): Record<string, unknown> | undefined {
  const value = record[key]
  if (value === undefined) return undefined
  if (!isRecord(value)) {
    problems.push(`${where}.${key} must be an object`)
    return undefined
  }
  return value
}

// ─────────────────────────────────────────────────────────────
// ZONES
// ─────────────────────────────────────────────────────────────

function parseZone(value: unknown, where: string, problems: string[]): ZoneConfigInput | null {
  if (!isRecord(value)) {
    problems.push(`${where} must be an object`)
    return null
  }

  const zone: ZoneConfigInput = {
    id: requireString(value, 'id', where, problems),
    heater: requireString(value, 'heater', where, problems),
    tempSensor: requireString(value, 'tempSensor', where, problems),
    outdoorSensor: requireString(value, 'outdoorSensor', where, problems),
  }

  for (const key of STRING_FIELDS) {
    const field = readString(value, key, where, problems)
    if (field !== undefined) zone[key] = field
  }
  for (const key of NUMBER_FIELDS) {
    const field = readNumber(value, key, where, problems)
    if (field !== undefined) zone[key] = field
  }

  const initialPreset = value.initialPreset
  if (initialPreset !== undefined) {
    if (typeof initialPreset === 'string' && isPresetName(initialPreset)) {
      zone.initialPreset = initialPreset
    } else {
      problems.push(`${where}.initialPreset must be home, sleep or away`)
    }
  }

  const presets = readSection(value, 'presets', where, problems)
  if (presets !== undefined) {
    const table: { -readonly [K in keyof PresetTable]?: number } = {}
    for (const name of ['home', 'sleep', 'away'] as const) {
      const temperature = readNumber(presets, name, `${where}.presets`, problems)
      if (temperature !== undefined) table[name] = temperature
    }
    zone.presets = table
  }

  const auto = readSection(value, 'autoOnOff', where, problems)
  if (auto !== undefined) {
    zone.autoOnOff = {
      enabled: readBoolean(auto, 'enabled', `${where}.autoOnOff`, problems),
      onTemp: readNumber(auto, 'onTemp', `${where}.autoOnOff`, problems),
      offTemp: readNumber(auto, 'offTemp', `${where}.autoOnOff`, problems),
    }
  }

  const windowDetection = readSection(value, 'windowDetection', where, problems)
  if (windowDetection !== undefined) {
    const at = `${where}.windowDetection`
    zone.windowDetection = {
      enabled: readBoolean(windowDetection, 'enabled', at, problems),
      slopeDetection: readBoolean(windowDetection, 'slopeDetection', at, problems),
      slopeThreshold: readNumber(windowDetection, 'slopeThreshold', at, problems),
      recoverySec: readNumber(windowDetection, 'recoverySec', at, problems),
    }
  }

  const motion = readSection(value, 'motionGating', where, problems)
  if (motion !== undefined) {
    zone.motionGating = {
      enabled: readBoolean(motion, 'enabled', `${where}.motionGating`, problems),
      absenceSec: readNumber(motion, 'absenceSec', `${where}.motionGating`, problems),
    }
  }

  return zone
}

// ─────────────────────────────────────────────────────────────
// STEPS
// ─────────────────────────────────────────────────────────────

function isSensorValue(value: unknown): value is SensorValue {
  return value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean'
}

function isCommand(value: unknown): value is CommandStep['command'] {
  return COMMANDS.some((command) => command === value)
}

function parseStep(value: unknown, where: string, problems: string[]): ScenarioStep | null {
  if (!isRecord(value)) {
    problems.push(`${where} must be an object`)
    return null
  }

  const at = readNumber(value, 'at', where, problems)
  if (at === undefined || at < 0) {
    problems.push(`${where}.at must be a time in seconds >= 0`)
    return null
  }

  if (value.sensor !== undefined) {
    const entity = readString(value, 'sensor', where, problems)
    if (entity === undefined) return null
    const sample = value.value
    if (!isSensorValue(sample)) {
      problems.push(`${where}.value must be a number, string, boolean or null`)
      return null
    }
    return { kind: 'sensor', at, entity, value: sample }
  }

  const command = value.command
  if (command !== undefined) {
    if (!isCommand(command)) {
      problems.push(`${where}.command must be one of ${COMMANDS.join(', ')}`)
      return null
    }
    const zone = readString(value, 'zone', where, problems)
    if (zone === undefined) {
      problems.push(`${where}.zone is required`)
      return null
    }
    const arg = value.value
    if (command === 'setPower') {
      if (arg !== 'on' && arg !== 'off') {
        problems.push(`${where}.value must be "on" or "off"`)
        return null
      }
      return { kind: 'command', at, zone, command, value: arg }
    }
    if (command === 'setTarget') {
      if (typeof arg !== 'number') {
        problems.push(`${where}.value must be a temperature`)
        return null
      }
      return { kind: 'command', at, zone, command, value: arg }
    }
    if (command === 'setPreset') {
      if (typeof arg !== 'string') {
        problems.push(`${where}.value must be a preset name`)
        return null
      }
      return { kind: 'command', at, zone, command, value: arg }
    }
    return { kind: 'command', at, zone, command }
  }

  if (value.fail !== undefined) {
    const ref = readString(value, 'fail', where, problems)
    if (ref === undefined) return null
    const reason = value.reason === null ? null : readString(value, 'reason', where, problems)
    return { kind: 'fail', at, ref, reason: reason === undefined ? 'simulated failure' : reason }
  }

  problems.push(`${where} needs one of sensor, command or fail`)
  return null
}

function parseSavedState(value: unknown, problems: string[]): Record<string, PersistedZoneState> {
  const saved: Record<string, PersistedZoneState> = {}
  if (value === undefined) return saved
  if (!isRecord(value)) {
    problems.push('savedState must be an object keyed by zone id')
    return saved
  }
  for (const zoneId of Object.keys(value)) {
    const entry = value[zoneId]
    const where = `savedState.${zoneId}`
    if (!isRecord(entry)) {
      problems.push(`${where} must be an object`)
      continue
    }
    const powerState = entry.powerState
    const target = readNumber(entry, 'targetTemperature', where, problems)
    if ((powerState !== 'on' && powerState !== 'off') || target === undefined) {
      problems.push(`${where} needs powerState "on"/"off" and targetTemperature`)
      continue
    }
    const preset = entry.activePreset
    saved[zoneId] = {
      powerState,
      targetTemperature: target,
      activePreset: typeof preset === 'string' && isPresetName(preset) ? preset : null,
      manualOverride: entry.manualOverride === true,
    }
  }
  return saved
}

// ─────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────

/**
 * Validate parsed JSON as a scenario
 * Steps are returned sorted by time, keeping file order for equal times
 *
 * @param data - Parsed JSON
 * @param source - Name used in error messages
 * @throws ScenarioError listing every problem found
 */
export function parseScenario(data: unknown, source: string): Scenario {
  const problems: string[] = []
  if (!isRecord(data)) {
    throw new ScenarioError(source, ['scenario must be a JSON object'])
  }

  const engineSection = readSection(data, 'engine', 'scenario', problems)
  const zones: ZoneConfigInput[] = []
  const engine: EngineConfigInput = { zones }
  if (engineSection === undefined) {
    problems.push('scenario.engine is required')
  } else {
    engine.pollIntervalSec = readNumber(engineSection, 'pollIntervalSec', 'engine', problems)
    engine.commandTimeoutMs = readNumber(engineSection, 'commandTimeoutMs', 'engine', problems)
    engine.stateSaveDelayMs = readNumber(engineSection, 'stateSaveDelayMs', 'engine', problems)
    const rawZones = engineSection.zones
    if (!Array.isArray(rawZones) || rawZones.length === 0) {
      problems.push('engine.zones must be a non-empty array')
    } else {
      rawZones.forEach((raw: unknown, index: number) => {
        const zone = parseZone(raw, `engine.zones[${index}]`, problems)
        if (zone !== null) zones.push(zone)
      })
    }
  }

  const steps: ScenarioStep[] = []
  if (!Array.isArray(data.steps)) {
    problems.push('scenario.steps must be an array')
  } else {
    data.steps.forEach((raw: unknown, index: number) => {
      const step = parseStep(raw, `steps[${index}]`, problems)
      if (step !== null) steps.push(step)
    })
  }

  const lastStep = steps.reduce((latest, step) => Math.max(latest, step.at), 0)
  const until = readNumber(data, 'until', 'scenario', problems)
  if (until !== undefined && until < lastStep) {
    problems.push(`scenario.until (${until}) is before the last step (${lastStep})`)
  }

  const savedState = parseSavedState(data.savedState, problems)

  if (problems.length > 0) {
    throw new ScenarioError(source, problems)
  }

  return {
    name: readString(data, 'name', 'scenario', problems) || source,
    description: readString(data, 'description', 'scenario', problems) || '',
    engine,
    savedState,
    // Array.prototype.sort is stable
    steps: steps.slice().sort((a, b) => a.at - b.at),
    until: until !== undefined ? until : lastStep,
  }
}

/**
 * Read and parse a scenario file
 */
export function loadScenario(filePath: string): Scenario {
  const text = fs.readFileSync(filePath, 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new ScenarioError(filePath, [`not valid JSON: ${error instanceof Error ? error.message : String(error)}`])
  }
  return parseScenario(data, filePath)
}

/**
 * Replace the end time with a command-line value in seconds
 * Steps after the new end time are dropped
 */
export function withUntil(scenario: Scenario, value: string): Scenario {
  const until = Number(value)
  if (value.trim() === '' || !Number.isFinite(until) || until < 0) {
    throw new Error(`--until must be a number of seconds (got ${value})`)
  }
  return {
    ...scenario,
    steps: scenario.steps.filter((step) => step.at <= until),
    until,
  }
}
