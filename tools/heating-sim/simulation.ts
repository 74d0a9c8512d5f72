/**
 * Scenario runner
 * Drives the engine on a simulated clock with an in-memory actuator port
 */

import { createHeatingEngine } from '@system/engine'
import { createMemoryActuatorPort } from '@hardware/actuator'
import { createMemoryStateStore, PERSISTED_STATE_VERSION } from '@system/persistence'
import { buildEngineConfig } from '@boot/config'
import { createSimulatedClock } from '@utils/time'

import type { Logger } from '@logging'
import type { ActuatorHistoryEntry } from '@hardware/actuator'
import type { CentralHeaterSnapshot } from '@core/central-heater'
import type { EngineEvent } from '@events/types'
import type { ZoneSnapshot } from '@system/zone'
import type { RuntimeStateStore } from '@system/persistence'
import type { SimulatedClock } from '@utils/time'
import type { HeatingEngine } from '@system/engine'
import type { Scenario, ScenarioStep } from './scenario'

export interface SimulationOptions {
  /** Logger bound to the simulation clock, see createClockedLogger */
  logger: Logger
  clock?: SimulatedClock
  /** Overrides the in-memory store seeded from the scenario */
  store?: RuntimeStateStore
  onEvent?: (event: EngineEvent) => void
}

export interface SimulationResult {
  /** Every actuator command applied, stamped with simulated seconds */
  timeline: ActuatorHistoryEntry[]
  zones: ZoneSnapshot[]
  centralHeaters: CentralHeaterSnapshot[]
  /** Steps that threw, as "t=<s> <message>" */
  rejected: string[]
  endedAt: number
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function applyStep(engine: HeatingEngine, step: ScenarioStep, failFor: (ref: string, reason: string | null) => void): void {
  switch (step.kind) {
    case 'sensor':
      engine.dispatch({ entityId: step.entity, value: step.value, timestamp: step.at })
      return
    case 'fail':
      failFor(step.ref, step.reason)
      return
    case 'command':
      switch (step.command) {
        case 'setPower':
          engine.setPower(step.zone, step.value === 'on' ? 'on' : 'off')
          return
        case 'setTarget':
          engine.setTarget(step.zone, typeof step.value === 'number' ? step.value : Number.NaN)
          return
        case 'setPreset':
          engine.setPreset(step.zone, String(step.value))
          return
        case 'resetOverride':
          engine.resetManualOverride(step.zone)
          return
      }
  }
}

/**
 * Advance timer by timer so actuator commands are applied at the time they were issued
 */
async function advanceTo(clock: SimulatedClock, engine: HeatingEngine, seconds: number): Promise<void> {
  let due = clock.nextDueAt()
  while (due !== null && due <= seconds) {
    clock.advanceTo(due)
    await engine.whenIdle()
    due = clock.nextDueAt()
  }
  clock.advanceTo(seconds)
  await engine.whenIdle()
}

/**
 * Run a scenario to its end time and shut the engine down
 */
export async function runScenario(scenario: Scenario, options: SimulationOptions): Promise<SimulationResult> {
  const clock = options.clock || createSimulatedClock()
  const port = createMemoryActuatorPort(clock.now)
  const store = options.store || createMemoryStateStore(
    Object.keys(scenario.savedState).length > 0
      ? { version: PERSISTED_STATE_VERSION, zones: scenario.savedState }
      : null
  )

  const engine = createHeatingEngine(buildEngineConfig(scenario.engine), {
    port,
    timerApi: clock.timerApi,
    timeSource: clock.now,
    logger: options.logger,
    store,
  })
  if (options.onEvent) engine.onEvent(options.onEvent)

  const rejected: string[] = []
  await engine.start()
  await engine.whenIdle()

  for (const step of scenario.steps) {
    await advanceTo(clock, engine, step.at)
    try {
      applyStep(engine, step, port.failFor)
    } catch (error) {
      options.logger.warning(`Step rejected: ${describe(error)}`)
      rejected.push(`t=${step.at} ${describe(error)}`)
    }
    await engine.whenIdle()
  }

  await advanceTo(clock, engine, scenario.until)

  const result: SimulationResult = {
    timeline: port.history.slice(),
    zones: engine.zones(),
    centralHeaters: engine.centralHeaters(),
    rejected,
    endedAt: clock.now(),
  }

  await engine.shutdown()
  return result
}
