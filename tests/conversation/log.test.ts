import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"

import { afterEach, describe, expect, it } from "vitest"

import { createConversationLog } from "../../src/conversation/log.js"
import {
  createMessagesRepository,
  InvalidInputError,
  openPersistenceDatabase,
  type StoreDatabase,
} from "../../src/persistence/index.js"

const TEMP_PREFIX = path.join(tmpdir(), "keeper-conversation-")
const cleanupPaths: string[] = []
const openDatabases: StoreDatabase[] = []

afterEach(async () => {
  for (const database of openDatabases.splice(0)) {
    database.close()
  }

  await Promise.all(
    cleanupPaths.splice(0).map(async (directory) => rm(directory, { recursive: true, force: true }))
  )
})

const createSequence = (prefix: string) => {
  let counter = 0
  return () => {
    counter += 1
    return `${prefix}-${counter}`
  }
}

const openLog = async (options: { now: () => number; pageSize?: number }) => {
  const tempRoot = await mkdtemp(TEMP_PREFIX)
  cleanupPaths.push(tempRoot)
  const db = openPersistenceDatabase({ dbPath: path.join(tempRoot, "state.db") })
  openDatabases.push(db)

  return createConversationLog({
    repository: createMessagesRepository(db),
    now: options.now,
    createId: createSequence("message"),
    pageSize: options.pageSize,
  })
}

describe("createConversationLog", () => {
  it("appends messages and reads them back in order", async () => {
    // Arrange
    let nowValue = 1_000
    const log = await openLog({ now: () => nowValue })

    // Act
    log.append("session-1", "user", "hello")
    nowValue = 2_000
    log.append("session-1", "assistant", "hi there")
    const messages = [...log.read("session-1")]

    // Assert
    expect(messages).toEqual([
      {
        messageId: "message-1",
        sessionId: "session-1",
        role: "user",
        content: "hello",
        ts: 1_000,
      },
      {
        messageId: "message-2",
        sessionId: "session-1",
        role: "assistant",
        content: "hi there",
        ts: 2_000,
      },
    ])
  })

  it("orders messages with equal timestamps by insertion", async () => {
    // Arrange
    const log = await openLog({ now: () => 5_000 })

    // Act
    log.append("session-1", "user", "first")
    log.append("session-1", "tool", "second")
    log.append("session-1", "assistant", "third")
    const contents = [...log.read("session-1")].map((message) => message.content)

    // Assert
    expect(contents).toEqual(["first", "second", "third"])
  })

  it("never stamps a message before the newest one in its session", async () => {
    // Arrange
    const readings = [2_000, 1_500]
    const log = await openLog({ now: () => readings.shift() ?? 0 })

    // Act
    log.append("session-1", "user", "later")
    const clamped = log.append("session-1", "user", "clock stepped back")

    // Assert
    expect(clamped.ts).toBe(2_000)
    expect([...log.read("session-1")].map((message) => message.content)).toEqual([
      "later",
      "clock stepped back",
    ])
  })

  it("keeps sessions isolated", async () => {
    // Arrange
    const log = await openLog({ now: () => 1_000 })

    // Act
    log.append("session-1", "user", "one")
    log.append("session-2", "user", "two")
    const messages = [...log.read("session-2")]

    // Assert
    expect(messages.map((message) => message.content)).toEqual(["two"])
  })

  it("treats since as an exclusive lower bound and honors limit", async () => {
    // Arrange
    let nowValue = 1_000
    const log = await openLog({ now: () => nowValue })
    for (const content of ["a", "b", "c", "d"]) {
      log.append("session-1", "user", content)
      nowValue += 1_000
    }

    // Act
    const sinceSecond = [...log.read("session-1", { since: 2_000 })]
    const limited = [...log.read("session-1", { since: 1_000, limit: 2 })]

    // Assert
    expect(sinceSecond.map((message) => message.content)).toEqual(["c", "d"])
    expect(limited.map((message) => message.content)).toEqual(["b", "c"])
  })

  it("returns an empty sequence for an unknown session", async () => {
    const log = await openLog({ now: () => 1_000 })

    expect([...log.read("missing")]).toEqual([])
  })

  it("pages through sessions longer than one page", async () => {
    // Arrange
    const log = await openLog({ now: () => 1_000, pageSize: 2 })
    for (const content of ["m1", "m2", "m3", "m4", "m5"]) {
      log.append("session-1", "user", content)
    }

    // Act
    const contents = [...log.read("session-1")].map((message) => message.content)

    // Assert
    expect(contents).toEqual(["m1", "m2", "m3", "m4", "m5"])
  })

  it("reads the store afresh on every iteration", async () => {
    // Arrange
    const log = await openLog({ now: () => 1_000 })
    log.append("session-1", "user", "before")
    const messages = log.read("session-1")
    const firstPass = [...messages].length

    // Act
    log.append("session-1", "user", "after")
    const secondPass = [...messages].map((message) => message.content)

    // Assert
    expect(firstPass).toBe(1)
    expect(secondPass).toEqual(["before", "after"])
  })

  it("looks messages up by id", async () => {
    // Arrange
    const log = await openLog({ now: () => 1_000 })
    const appended = log.append("session-1", "tool", "{\"ok\":true}")

    // Act
    const found = log.get(appended.messageId)
    const missing = log.get("message-404")

    // Assert
    expect(found).toEqual(appended)
    expect(missing).toBeNull()
  })

  it("rejects an empty session id", async () => {
    const log = await openLog({ now: () => 1_000 })

    expect(() => log.append("", "user", "hello")).toThrow(InvalidInputError)
  })

  it("rejects a negative limit", async () => {
    const log = await openLog({ now: () => 1_000 })

    expect(() => log.read("session-1", { limit: -1 })).toThrow("Invalid read options")
  })
})
