import { z } from "zod"

import { DEFAULT_BUSY_TIMEOUT_MS } from "./database.js"

export type StoreConfig = {
  keeperHome: string | null
  busyTimeoutMs: number
}

const storeConfigSchema = z.object({
  KEEPER_HOME: z.string().min(1).optional(),
  KEEPER_DB_BUSY_TIMEOUT_MS: z.string().optional(),
})

/**
 * Resolves store overrides from environment. A null `keeperHome` leaves the choice to the
 * persistent config file.
 *
 * @param environment Environment source, defaulting to process.env.
 * @returns Normalized store configuration.
 */
export const resolveStoreConfig = (environment: NodeJS.ProcessEnv = process.env): StoreConfig => {
  const parsed = storeConfigSchema.safeParse(environment)

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid store config: ${detail}`)
  }

  const busyTimeoutRaw = parsed.data.KEEPER_DB_BUSY_TIMEOUT_MS
  const busyTimeoutMs = busyTimeoutRaw == null ? DEFAULT_BUSY_TIMEOUT_MS : Number(busyTimeoutRaw)
  if (!Number.isInteger(busyTimeoutMs) || busyTimeoutMs < 0) {
    throw new Error("Invalid store config: KEEPER_DB_BUSY_TIMEOUT_MS must be an integer >= 0")
  }

  return {
    keeperHome: parsed.data.KEEPER_HOME ?? null,
    busyTimeoutMs,
  }
}
