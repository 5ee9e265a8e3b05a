import { describe, expect, it } from "vitest"

import { mergeFact } from "../../src/memory/merge.js"

const stored = {
  id: "fact-1",
  key: "user.name",
  value: "Sam",
  confidence: 0.8,
  updatedAt: 1_000,
}

const observation = (confidence: number) => ({
  id: "fact-new",
  key: "user.name",
  value: "Samantha",
  confidence,
  observedAt: 2_000,
})

describe("mergeFact", () => {
  it("inserts when no fact exists for the key", () => {
    expect(mergeFact(null, observation(0.3))).toEqual({
      outcome: "inserted",
      fact: {
        id: "fact-new",
        key: "user.name",
        value: "Samantha",
        confidence: 0.3,
        updatedAt: 2_000,
      },
    })
  })

  it("keeps the stored fact against a less confident observation", () => {
    expect(mergeFact(stored, observation(0.5))).toEqual({ outcome: "kept", fact: stored })
  })

  it("replaces on equal confidence and keeps the stored id", () => {
    expect(mergeFact(stored, observation(0.8))).toEqual({
      outcome: "replaced",
      previous: stored,
      fact: {
        id: "fact-1",
        key: "user.name",
        value: "Samantha",
        confidence: 0.8,
        updatedAt: 2_000,
      },
    })
  })

  it("replaces a more confident fact only when overridden", () => {
    // Arrange
    const incoming = observation(0.2)

    // Act
    const result = mergeFact(stored, incoming, { override: true })

    // Assert
    expect(result.outcome).toBe("replaced")
    expect(result.fact).toMatchObject({ id: "fact-1", value: "Samantha", confidence: 0.2 })
  })
})
