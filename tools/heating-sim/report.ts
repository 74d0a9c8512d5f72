/**
 * Simulator output
 * Clock-stamped log lines and the end-of-run summary
 */

import chalk from 'chalk'

import { createAppLogger } from '@boot/init'
import { DEFAULT_LOGGING_CONFIG } from '@boot/config'
import { fmtTemp } from '@logging'

import type { Logger, ConsoleAPI, LogLevel } from '@logging'
import type { SimulatedClock } from '@utils/time'
import type { SimulationResult } from './simulation'

/**
 * Seconds as a fixed-width "t=   30s" stamp
 */
export function stamp(seconds: number): string {
  return `t=${String(Math.round(seconds)).padStart(6)}s`
}

function colorize(line: string): string {
  if (line.includes('[CRITICAL]')) return chalk.red(line)
  if (line.includes('[WARNING]')) return chalk.yellow(line)
  if (line.includes('[DEBUG]')) return chalk.gray(line)
  return line
}

/**
 * Logger whose console lines carry the simulated time
 */
export function createClockedLogger(
  clock: SimulatedClock,
  options: { level: LogLevel; webhookUrl: string | null },
  out: ConsoleAPI = console
): Logger {
  const consoleApi: ConsoleAPI = {
    log: (message: string) => out.log(`${chalk.gray(stamp(clock.now()))} ${colorize(message)}`),
    warn: (message: string) => out.warn(`${chalk.gray(stamp(clock.now()))} ${chalk.yellow(message)}`),
  }
  return createAppLogger(
    { ...DEFAULT_LOGGING_CONFIG, level: options.level, webhookUrl: options.webhookUrl },
    clock.timerApi,
    clock.now,
    consoleApi
  )
}

/**
 * Actuator timeline, one line per applied command
 */
export function formatTimeline(result: SimulationResult): string[] {
  if (result.timeline.length === 0) {
    return ['  (no actuator commands)']
  }
  return result.timeline.map((entry) => {
    const action = entry.action === 'on' ? chalk.green('ON ') : chalk.red('OFF')
    return `  ${stamp(entry.at)}  ${action}  ${entry.ref}`
  })
}

/**
 * Final zone and central heater state
 */
export function formatSummary(result: SimulationResult): string[] {
  const lines: string[] = []

  for (const zone of result.zones) {
    const flags: string[] = []
    if (zone.blockedBy.length > 0) flags.push(`blocked: ${zone.blockedBy.join(', ')}`)
    if (zone.degradedReasons.length > 0) flags.push(`degraded: ${zone.degradedReasons.join(', ')}`)
    if (zone.manualOverride) flags.push('manual override')

    lines.push(
      `  ${chalk.bold(zone.zoneId.padEnd(12))} ${zone.mode.toUpperCase().padEnd(8)}` +
      ` ${fmtTemp(zone.currentTemperature)} -> ${fmtTemp(zone.targetTemperature)}` +
      (zone.activePreset === null ? '' : ` (${zone.activePreset})`) +
      (flags.length === 0 ? '' : chalk.yellow(`  [${flags.join('; ')}]`))
    )
  }

  for (const heater of result.centralHeaters) {
    const demand = heater.demand.length === 0 ? 'no demand' : `demand: ${heater.demand.join(', ')}`
    lines.push(`  ${chalk.bold(heater.ref.padEnd(12))} ${heater.commandedOn ? 'ON ' : 'OFF'}      ${demand}`)
  }

  for (const rejected of result.rejected) {
    lines.push(chalk.red(`  rejected ${rejected}`))
  }

  return lines
}
