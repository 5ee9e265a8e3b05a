import type { Logger } from "pino"

import { ensureKeeperConfigFile } from "../config/keeper-config.js"
import { resolveStoreConfig } from "../persistence/config.js"
import { openPersistenceDatabase } from "../persistence/database.js"
import { resolveSchedulerConfig } from "../scheduler/config.js"
import { startSchedulerKernel } from "../scheduler/kernel.js"
import { createKeeperComponents } from "./components.js"
import { createReminderTaskHandler } from "./reminder-handler.js"

/**
 * Keeps process lifetime tied to OS signals so the scheduler can shut down cleanly in local
 * terminals, supervisors, and containerized runtimes.
 *
 * @returns First shutdown signal received by the process.
 */
export const waitForShutdownSignal = async (): Promise<NodeJS.Signals> => {
  return await new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off("SIGINT", onSignal)
      process.off("SIGTERM", onSignal)
      resolve(signal)
    }

    process.on("SIGINT", onSignal)
    process.on("SIGTERM", onSignal)
  })
}

export type RunServeOptions = {
  homeDirectory?: string
  environment?: NodeJS.ProcessEnv
  waitForShutdown?: () => Promise<string>
}

/**
 * Runs keeper in serve mode: opens the store and fires due tasks until a shutdown signal.
 *
 * @param logger Command-scoped logger for runtime telemetry.
 * @param options Home, environment and shutdown overrides used by tests and embedding.
 */
export const runServe = async (logger: Logger, options: RunServeOptions = {}): Promise<void> => {
  const environment = options.environment ?? process.env
  const { config, configPath, created } = await ensureKeeperConfigFile(options.homeDirectory)

  if (created) {
    logger.info({ configPath }, "Created default keeper config file")
  }

  const schedulerConfig = resolveSchedulerConfig(environment)
  const storeConfig = resolveStoreConfig(environment)
  const keeperHome = storeConfig.keeperHome ?? config.keeperHome

  const database = openPersistenceDatabase({
    keeperHome,
    busyTimeoutMs: storeConfig.busyTimeoutMs,
  })

  try {
    const components = createKeeperComponents(database, {
      catchUpPolicy: schedulerConfig.catchUpPolicy,
      catchUpGraceMs: schedulerConfig.catchUpGraceMs,
      timezone: schedulerConfig.timezone,
    })

    const kernel = await startSchedulerKernel({
      logger,
      scheduler: components.taskScheduler,
      handler: createReminderTaskHandler({
        conversationLog: components.conversationLog,
        defaultSessionId: config.defaultSessionId,
        logger,
      }),
      config: schedulerConfig,
    })

    logger.info(
      {
        command: "serve",
        configPath,
        keeperHome,
        catchUpPolicy: schedulerConfig.catchUpPolicy,
        timezone: schedulerConfig.timezone,
      },
      "Keeper started"
    )

    const signal = await (options.waitForShutdown ?? waitForShutdownSignal)()

    logger.info({ signal }, "Shutdown signal received")

    await kernel.stop()
  } finally {
    database.close()
  }

  logger.info("Keeper stopped")
}
