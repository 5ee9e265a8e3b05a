import type { FactMergeResult, MemoryFactRecord } from "../persistence/repositories.js"

export type IncomingFact = {
  /** Id used only when no fact exists yet for the key. */
  id: string
  key: string
  value: string
  confidence: number
  observedAt: number
}

export type FactMergeOptions = {
  override?: boolean
}

/**
 * Resolves a new observation against the current fact for the same key.
 *
 * A stored fact is only replaced by an observation of equal or higher confidence, unless the
 * caller overrides. Replacements keep the stored fact id so references to it stay valid.
 *
 * @param existing Current fact for the key, or null.
 * @param incoming New observation.
 * @param options Explicit override for deliberate downgrades.
 * @returns Merge outcome with the fact that is authoritative afterwards.
 */
export const mergeFact = (
  existing: MemoryFactRecord | null,
  incoming: IncomingFact,
  options: FactMergeOptions = {}
): FactMergeResult => {
  if (!existing) {
    return {
      outcome: "inserted",
      fact: {
        id: incoming.id,
        key: incoming.key,
        value: incoming.value,
        confidence: incoming.confidence,
        updatedAt: incoming.observedAt,
      },
    }
  }

  if (options.override !== true && incoming.confidence < existing.confidence) {
    return {
      outcome: "kept",
      fact: existing,
    }
  }

  return {
    outcome: "replaced",
    previous: existing,
    fact: {
      id: existing.id,
      key: existing.key,
      value: incoming.value,
      confidence: incoming.confidence,
      updatedAt: incoming.observedAt,
    },
  }
}
