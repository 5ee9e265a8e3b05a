import { z } from "zod"

import type { CatchUpPolicy } from "./schedule.js"

export type SchedulerConfig = {
  enabled: boolean
  tickMs: number
  batchSize: number
  catchUpPolicy: CatchUpPolicy
  catchUpGraceMs: number
  timezone: string
}

const schedulerConfigSchema = z.object({
  KEEPER_SCHEDULER_ENABLED: z.string().optional(),
  KEEPER_SCHEDULER_TICK_MS: z.string().optional(),
  KEEPER_SCHEDULER_BATCH_SIZE: z.string().optional(),
  KEEPER_SCHEDULER_CATCH_UP: z
    .enum(["fire_once", "skip"], {
      errorMap: () => ({ message: "must be one of fire_once, skip" }),
    })
    .optional(),
  KEEPER_SCHEDULER_CATCH_UP_GRACE_MS: z.string().optional(),
  KEEPER_SCHEDULER_TIMEZONE: z.string().min(1).optional(),
})

const isValidTimezone = (timezone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone })
    return true
  } catch {
    return false
  }
}

/**
 * Resolves scheduler loop configuration from environment so cadence and catch-up behavior can
 * be tuned operationally without source changes.
 *
 * @param environment Environment source, defaulting to process.env.
 * @returns Normalized scheduler runtime configuration.
 */
export const resolveSchedulerConfig = (
  environment: NodeJS.ProcessEnv = process.env
): SchedulerConfig => {
  const parsed = schedulerConfigSchema.safeParse(environment)

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid scheduler config: ${detail}`)
  }

  const enabledRaw = parsed.data.KEEPER_SCHEDULER_ENABLED
  const enabled = enabledRaw == null ? true : enabledRaw !== "0"

  const tickMsRaw = parsed.data.KEEPER_SCHEDULER_TICK_MS
  const tickMs = tickMsRaw == null ? 30_000 : Number(tickMsRaw)
  if (!Number.isInteger(tickMs) || tickMs < 1_000) {
    throw new Error("Invalid scheduler config: KEEPER_SCHEDULER_TICK_MS must be an integer >= 1000")
  }

  const batchSizeRaw = parsed.data.KEEPER_SCHEDULER_BATCH_SIZE
  const batchSize = batchSizeRaw == null ? 20 : Number(batchSizeRaw)
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error("Invalid scheduler config: KEEPER_SCHEDULER_BATCH_SIZE must be an integer >= 1")
  }

  // A slot missed by less than one tick is ordinary polling lag.
  const graceRaw = parsed.data.KEEPER_SCHEDULER_CATCH_UP_GRACE_MS
  const catchUpGraceMs = graceRaw == null ? tickMs : Number(graceRaw)
  if (!Number.isInteger(catchUpGraceMs) || catchUpGraceMs < 0) {
    throw new Error(
      "Invalid scheduler config: KEEPER_SCHEDULER_CATCH_UP_GRACE_MS must be an integer >= 0"
    )
  }

  const timezone = parsed.data.KEEPER_SCHEDULER_TIMEZONE ?? "UTC"
  if (!isValidTimezone(timezone)) {
    throw new Error(
      `Invalid scheduler config: KEEPER_SCHEDULER_TIMEZONE is not a known timezone (${timezone})`
    )
  }

  return {
    enabled,
    tickMs,
    batchSize,
    catchUpPolicy: parsed.data.KEEPER_SCHEDULER_CATCH_UP ?? "fire_once",
    catchUpGraceMs,
    timezone,
  }
}
