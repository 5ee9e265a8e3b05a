#!/usr/bin/env node
import { parseCommand } from "./cli/command.js"
import { runCommand } from "./cli/runner.js"
import { createComponentLogger, logger } from "./logging/logger.js"
import { describeError } from "./persistence/errors.js"
import { runMigrate } from "./runtime/migrate.js"
import { runServe } from "./runtime/serve.js"
import { getAppVersion } from "./version.js"

const main = async (): Promise<void> => {
  const parsed = parseCommand(process.argv.slice(2))
  const commandLogger = createComponentLogger(parsed.command)

  logger.info({ version: getAppVersion(), command: parsed.command }, "Keeper starting")

  await runCommand(parsed, commandLogger, {
    migrate: (scopedLogger, { target }) => runMigrate(scopedLogger, { target }),
    serve: (scopedLogger) => runServe(scopedLogger),
  })
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, "Keeper runtime failed")
  process.exitCode = 1
})
