import { describe, expect, it, vi } from "vitest"

import type { MessageRecord, TaskRecord, TaskRunRecord } from "../../src/persistence/index.js"
import { createReminderTaskHandler } from "../../src/runtime/reminder-handler.js"

const createLoggerStub = () => ({
  info: vi.fn(),
  warn: vi.fn(),
})

const run: TaskRunRecord = {
  id: "run-1",
  taskId: "task-1",
  scheduledFor: 1_000,
  claimedAt: 1_000,
  finishedAt: null,
  ok: null,
  detail: null,
}

const buildTask = (payload: TaskRecord["payload"]): TaskRecord => ({
  id: "task-1",
  title: "Stretch",
  schedule: "every 1h",
  payload,
  enabled: true,
  lastRun: null,
  nextRun: 1_000,
  createdAt: 0,
  updatedAt: 0,
})

const createConversationLogStub = () => ({
  append: vi.fn(
    (sessionId: string, role: MessageRecord["role"], content: string): MessageRecord => ({
      messageId: "message-1",
      sessionId,
      role,
      content,
      ts: 1_000,
    })
  ),
})

describe("createReminderTaskHandler", () => {
  it("appends the payload message to the payload session", async () => {
    // Arrange
    const conversationLog = createConversationLogStub()
    const handler = createReminderTaskHandler({
      conversationLog,
      defaultSessionId: "scheduler",
      logger: createLoggerStub(),
    })

    // Act
    const result = await handler(
      buildTask({ sessionId: "session-7", message: "Time to stretch" }),
      run
    )

    // Assert
    expect(conversationLog.append).toHaveBeenCalledWith(
      "session-7",
      "assistant",
      "Task due: Time to stretch"
    )
    expect(result).toEqual({ ok: true, detail: "message-1" })
  })

  it("falls back to the task title and the default session", async () => {
    // Arrange
    const conversationLog = createConversationLogStub()
    const handler = createReminderTaskHandler({
      conversationLog,
      defaultSessionId: "scheduler",
      logger: createLoggerStub(),
    })

    // Act
    await handler(buildTask(null), run)

    // Assert
    expect(conversationLog.append).toHaveBeenCalledWith("scheduler", "assistant", "Task due: Stretch")
  })

  it("reports an invalid payload as a failed outcome", async () => {
    // Arrange
    const conversationLog = createConversationLogStub()
    const logger = createLoggerStub()
    const handler = createReminderTaskHandler({
      conversationLog,
      defaultSessionId: "scheduler",
      logger,
    })

    // Act
    const result = await handler(buildTask({ sessionId: 42 }), run)

    // Assert
    expect(result).toEqual({
      ok: false,
      detail: "invalid_payload: sessionId: Expected string, received number",
    })
    expect(conversationLog.append).not.toHaveBeenCalled()
    expect(logger.warn).toHaveBeenCalledOnce()
  })
})
