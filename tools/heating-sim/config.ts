/**
 * Simulator configuration
 * Reads environment variables, optionally from a .env file
 */

import * as path from 'path'

import * as dotenv from 'dotenv'

import { parseLogLevel } from '@logging'

import type { LogLevel } from '@logging'

export interface SimConfig {
  logLevel: LogLevel
  webhookUrl: string | null
  stateFile: string | null
  scenarioPath: string
}

export const DEFAULT_SCENARIO = path.resolve(__dirname, 'scenarios/shared-central-heater.json')

/**
 * Load .env from the project root
 * ? override:false keeps values already set in the environment
 */
export function loadEnvFile(): void {
  dotenv.config({
    path: path.resolve(__dirname, '../../.env'),
    override: false,
  })
}

/**
 * Build the simulator configuration from environment variables
 * @throws Error listing every invalid variable
 */
export function loadSimConfig(env: NodeJS.ProcessEnv): SimConfig {
  const errors: string[] = []

  let logLevel: LogLevel = 1
  if (env.HEATING_LOG_LEVEL) {
    const parsed = parseLogLevel(env.HEATING_LOG_LEVEL)
    if (parsed === null) {
      errors.push(`HEATING_LOG_LEVEL must be debug, info, warning or critical (got ${env.HEATING_LOG_LEVEL})`)
    } else {
      logLevel = parsed
    }
  }

  const webhookUrl = env.HEATING_WEBHOOK_URL || null
  if (webhookUrl !== null && !/^https?:\/\//.test(webhookUrl)) {
    errors.push('HEATING_WEBHOOK_URL must start with http:// or https://')
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((error) => `  - ${error}`).join('\n')}`)
  }

  return {
    logLevel,
    webhookUrl,
    stateFile: env.HEATING_STATE_FILE || null,
    scenarioPath: env.HEATING_SCENARIO || DEFAULT_SCENARIO,
  }
}
