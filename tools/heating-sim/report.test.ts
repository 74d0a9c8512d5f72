import chalk from 'chalk'

import { createRecordingLogger } from '$test-utils'

import { formatSummary, formatTimeline, stamp } from './report'
import { parseScenario } from './scenario'
import { runScenario } from './simulation'

import type { SimulationResult } from './simulation'

async function runDen(): Promise<SimulationResult> {
  const scenario = parseScenario({
    engine: {
      zones: [{
        id: 'den',
        heater: 'switch.den_trv',
        tempSensor: 'sensor.den_temp',
        outdoorSensor: 'sensor.outdoor_temp',
        centralHeater: 'switch.boiler',
      }],
    },
    steps: [
      { at: 0, sensor: 'sensor.outdoor_temp', value: 5 },
      { at: 0, command: 'setPower', zone: 'den', value: 'on' },
      { at: 10, sensor: 'sensor.den_temp', value: 20 },
    ],
    until: 30,
  }, 'inline')
  return runScenario(scenario, { logger: createRecordingLogger() })
}

describe('report', () => {
  let level: typeof chalk.level

  beforeEach(() => {
    level = chalk.level
    chalk.level = 0
  })

  afterEach(() => {
    chalk.level = level
  })

  it('should stamp seconds at a fixed width', () => {
    expect(stamp(0)).toBe('t=     0s')
    expect(stamp(89.6)).toBe('t=    90s')
    expect(stamp(123456)).toBe('t=123456s')
  })

  it('should list actuator commands in order', async () => {
    expect(formatTimeline(await runDen())).toEqual([
      '  t=     0s  OFF  switch.den_trv',
      '  t=    10s  ON   switch.den_trv',
      '  t=    20s  ON   switch.boiler',
    ])
  })

  it('should note an empty timeline', () => {
    const result: SimulationResult = { timeline: [], zones: [], centralHeaters: [], rejected: [], endedAt: 0 }
    expect(formatTimeline(result)).toEqual(['  (no actuator commands)'])
  })

  it('should summarise zones, central heaters and rejected steps', async () => {
    const result = await runDen()
    result.rejected.push("t=5 Zone 'cellar' is not configured")

    expect(formatSummary(result)).toEqual([
      '  ' + 'den'.padEnd(12) + ' HEATING  20.0C -> 23.0C (home)  [manual override]',
      '  switch.boiler ON       demand: den',
      "  rejected t=5 Zone 'cellar' is not configured",
    ])
  })
})
