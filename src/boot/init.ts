/**
 * Application initialization
 *
 * Builds the logger from the logging settings, completes and validates the
 * engine configuration, wires the state store and starts the engine.
 */

import { APP_CONSTANTS, DEFAULT_LOGGING_CONFIG, buildEngineConfig } from './config';
import { createLogger, createConsoleSink, createWebhookSink, createFetchPoster } from '@logging';
import { createHeatingEngine } from '@system/engine';
import { createJsonFileStateStore } from '@system/persistence';
import { createNodeTimerApi, now } from '@utils/time';
import { validateEngineConfig } from '@validation';

import type { TimerAPI, TimeSource } from '$types/common';
import type { LoggingConfig } from '$types/config';
import type { Logger, ConsoleAPI, HttpPoster, SinkWithLevel, InitMessage } from '@logging';
import type { HeatingEngine } from '@system/engine';
import type { RuntimeStateStore } from '@system/persistence';
import type { HeatingApp, InitOptions } from './types';

const WEBHOOK_TIMEOUT_MS = 5000;

/**
 * Logger with a console sink and, when a URL is set, a webhook sink
 */
export function createAppLogger(
  config: LoggingConfig,
  timerApi: TimerAPI,
  timeSource: TimeSource,
  consoleApi: ConsoleAPI,
  poster?: HttpPoster
): Logger {
  const sinks: SinkWithLevel[] = [{
    sink: createConsoleSink(timerApi, consoleApi, {
      bufferSize: config.consoleBufferSize,
      drainInterval: config.consoleDrainMs,
      drainBatch: 20
    }),
    minLevel: config.level
  }];

  if (config.webhookUrl !== null) {
    sinks.push({
      sink: createWebhookSink(poster !== undefined ? poster : createFetchPoster(WEBHOOK_TIMEOUT_MS), timerApi, {
        url: config.webhookUrl,
        bufferSize: config.webhookBufferSize,
        retryDelayMs: config.webhookRetryDelayMs,
        maxRetries: config.webhookMaxRetries
      }),
      minLevel: config.webhookLevel
    });
  }

  return createLogger({
    level: config.level,
    demoteHours: config.demoteHours
  }, {
    timeSource: timeSource,
    sinks: sinks
  }, APP_CONSTANTS.LOG_LEVELS);
}

function initLogger(logger: Logger, consoleApi: ConsoleAPI): Promise<void> {
  return new Promise(function(resolve) {
    logger.initialize(function(_success: boolean, messages: InitMessage[]) {
      // Sink warnings go straight to the console while sinks may be unusable
      for (let i = 0; i < messages.length; i++) {
        if (!messages[i].success) {
          consoleApi.warn('⚠️ [WARNING]  ' + messages[i].message);
        }
      }
      resolve();
    });
  });
}

/**
 * Validate configuration, start logging and the engine
 *
 * @returns The running application, null when the configuration is invalid
 */
export async function initialize(options: InitOptions): Promise<HeatingApp | null> {
  const consoleApi: ConsoleAPI = options.consoleApi !== undefined ? options.consoleApi : console;
  const timerApi = options.timerApi !== undefined ? options.timerApi : createNodeTimerApi();
  const timeSource = options.timeSource !== undefined ? options.timeSource : now;

  const engineConfig = buildEngineConfig(options.engine);
  const validation = validateEngineConfig(engineConfig);
  if (!validation.valid) {
    consoleApi.warn("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      consoleApi.warn("  [" + err.field + "]: " + err.message);
    });
    return null;
  }

  const loggingConfig: LoggingConfig = Object.assign({}, DEFAULT_LOGGING_CONFIG, options.logging);
  const logger = createAppLogger(loggingConfig, timerApi, timeSource, consoleApi, options.poster);
  await initLogger(logger, consoleApi);

  logger.info(
    "Heating controller starting: " + engineConfig.zones.length + " zone(s), poll " +
    engineConfig.pollIntervalSec + "s, webhook " + (loggingConfig.webhookUrl === null ? "off" : "on")
  );

  let store: RuntimeStateStore | undefined = options.store;
  if (store === undefined && options.stateFile !== undefined && options.stateFile !== null) {
    store = createJsonFileStateStore(options.stateFile, logger);
  }

  const engine: HeatingEngine = createHeatingEngine(engineConfig, {
    port: options.port,
    timerApi: timerApi,
    timeSource: timeSource,
    logger: logger,
    store: store
  });
  await engine.start();

  return {
    engine: engine,
    logger: logger,
    stop: function() {
      return engine.shutdown();
    }
  };
}
