import { randomUUID } from "node:crypto"

import { z } from "zod"

import { InvalidInputError } from "../persistence/errors.js"
import type {
  createMemoryFactsRepository,
  MemoryFactRecord,
  MemoryFactRevisionRecord,
} from "../persistence/repositories.js"
import { mergeFact, type FactMergeOptions } from "./merge.js"

const observationSchema = z.object({
  key: z.string().min(1, "key must be a non-empty string"),
  value: z.string(),
  confidence: z
    .number()
    .min(0, "confidence must be >= 0")
    .max(1, "confidence must be <= 1"),
})

type MemoryFactsRepository = Pick<
  ReturnType<typeof createMemoryFactsRepository>,
  "getByKey" | "list" | "mergeByKey" | "listRevisions"
>

type MemoryFactStoreDependencies = {
  repository: MemoryFactsRepository
  now?: () => number
  createId?: () => string
}

export type ListFactsOptions = {
  prefix?: string
}

/**
 * Creates the memory fact store that carries context across sessions under a
 * confidence-gated merge policy.
 *
 * @param dependencies Fact repository plus clock and id overrides for tests.
 * @returns Fact store operations.
 */
export const createMemoryFactStore = (dependencies: MemoryFactStoreDependencies) => {
  const now = dependencies.now ?? Date.now
  const createId = dependencies.createId ?? randomUUID

  return {
    /**
     * Records an observation. Returns the fact that is authoritative afterwards, which is the
     * unchanged stored fact when the observation lost on confidence.
     */
    observe: (
      key: string,
      value: string,
      confidence: number,
      options: FactMergeOptions = {}
    ): MemoryFactRecord => {
      const validated = observationSchema.safeParse({ key, value, confidence })
      if (!validated.success) {
        const detail = validated.error.issues.map((issue) => issue.message).join("; ")
        throw new InvalidInputError(`Invalid memory observation: ${detail}`)
      }

      const incoming = {
        id: createId(),
        ...validated.data,
        observedAt: now(),
      }

      const result = dependencies.repository.mergeByKey(
        key,
        (existing) => mergeFact(existing, incoming, options),
        createId()
      )

      return result.fact
    },
    get: (key: string): MemoryFactRecord | null => {
      return dependencies.repository.getByKey(key)
    },
    list: (options: ListFactsOptions = {}): MemoryFactRecord[] => {
      return dependencies.repository.list(options.prefix)
    },
    /** Superseded values for `key`, oldest first. The current value is not included. */
    history: (key: string): MemoryFactRevisionRecord[] => {
      return dependencies.repository.listRevisions(key)
    },
  }
}

export type MemoryFactStore = ReturnType<typeof createMemoryFactStore>
