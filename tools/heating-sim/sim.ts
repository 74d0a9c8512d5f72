#!/usr/bin/env node
/**
 * Heating scenario simulator
 * Runs a JSON scenario against the engine on a simulated clock
 */

import * as path from 'path'

import chalk from 'chalk'
import { program } from 'commander'

import { parseLogLevel } from '@logging'
import { createJsonFileStateStore } from '@system/persistence'
import { createSimulatedClock } from '@utils/time'

import { loadEnvFile, loadSimConfig } from './config'
import { createClockedLogger, formatSummary, formatTimeline, stamp } from './report'
import { loadScenario, withUntil } from './scenario'
import { runScenario } from './simulation'

loadEnvFile()

program
  .name('heating-sim')
  .description('Run a heating scenario on a simulated clock and print the actuator timeline')
  .argument('[scenario]', 'Scenario JSON file (default: HEATING_SCENARIO or the bundled example)')
  .option('-l, --level <level>', 'Log level (debug, info, warning, critical)')
  .option('-u, --until <seconds>', 'Run until this simulated time')
  .option('-s, --state <file>', 'Load and save runtime state in a JSON file')
  .option('-e, --events', 'Print published zone events')
  .option('-q, --quiet', 'Only print the timeline and summary')
  .parse(process.argv)

async function main(): Promise<void> {
  const options = program.opts()
  const config = loadSimConfig(process.env)

  let level = options.quiet ? parseLogLevel('critical') : config.logLevel
  if (typeof options.level === 'string') {
    level = parseLogLevel(options.level)
    if (level === null) {
      throw new Error(`Unknown log level: ${options.level}`)
    }
  }
  if (level === null) level = config.logLevel

  const scenarioPath = path.resolve(program.args[0] || config.scenarioPath)
  const loaded = loadScenario(scenarioPath)
  const scenario = typeof options.until === 'string' ? withUntil(loaded, options.until) : loaded

  const clock = createSimulatedClock()
  const logger = createClockedLogger(clock, { level, webhookUrl: config.webhookUrl })
  const statePath = typeof options.state === 'string' ? options.state : config.stateFile
  const store = statePath ? createJsonFileStateStore(path.resolve(statePath), logger) : undefined

  console.log(chalk.blue(`▶ ${scenario.name}`))
  if (scenario.description) console.log(chalk.gray(`  ${scenario.description}`))
  console.log()

  const result = await runScenario(scenario, {
    logger,
    clock,
    store,
    onEvent: options.events
      ? (event) => {
          const detail = event.type === 'zone_alert'
            ? `${event.alert}: ${event.message}`
            : `${event.snapshot.mode} ${event.snapshot.hvacAction}`
          console.log(chalk.cyan(`${stamp(event.timestamp)} [${event.zoneId}] ${detail}`))
        }
      : undefined,
  })

  console.log()
  console.log(chalk.bold('Actuator timeline'))
  formatTimeline(result).forEach((line) => console.log(line))
  console.log()
  console.log(chalk.bold(`State at ${stamp(result.endedAt)}`))
  formatSummary(result).forEach((line) => console.log(line))

  if (result.rejected.length > 0) {
    process.exitCode = 1
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)))
  process.exit(1)
})
