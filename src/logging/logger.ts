import pino, { type Logger } from "pino"

import { buildLoggerOptions, resolveRuntimeEnv, type RuntimeEnv } from "./options.js"

type CreateLoggerInput = {
  env?: RuntimeEnv
  logLevel?: string
  serviceName?: string
  prettyLogs?: boolean
  environment?: NodeJS.ProcessEnv
}

export const createLogger = (input: CreateLoggerInput = {}): Logger => {
  const environment = input.environment ?? process.env

  return pino(
    buildLoggerOptions({
      env: input.env ?? resolveRuntimeEnv(environment.NODE_ENV),
      logLevel: input.logLevel,
      serviceName: input.serviceName,
      prettyLogs: input.prettyLogs ?? environment.KEEPER_PRETTY_LOGS === "1",
    })
  )
}

export const logger = createLogger()

/** Child logger tagged with `component`. */
export const createComponentLogger = (component: string, parent: Logger = logger): Logger => {
  return parent.child({ component })
}
