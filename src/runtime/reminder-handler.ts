import type { Logger } from "pino"
import { z } from "zod"

import type { ConversationLog } from "../conversation/log.js"
import type { TaskHandler } from "../scheduler/kernel.js"

const reminderPayloadSchema = z
  .object({
    sessionId: z.string().min(1, "sessionId must be a non-empty string").optional(),
    message: z.string().min(1, "message must be a non-empty string").optional(),
  })
  .passthrough()

type ReminderTaskHandlerDependencies = {
  conversationLog: Pick<ConversationLog, "append">
  defaultSessionId: string
  logger: Pick<Logger, "info" | "warn">
}

/**
 * Surfaces a due task as an assistant message in its session.
 *
 * @param dependencies Conversation log, fallback session and logger.
 * @returns Task handler whose outcome detail is the appended message id.
 */
export const createReminderTaskHandler = (
  dependencies: ReminderTaskHandlerDependencies
): TaskHandler => {
  return async (task, run) => {
    const payload = reminderPayloadSchema.safeParse(task.payload ?? {})

    if (!payload.success) {
      const detail = payload.error.issues
        .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
        .join("; ")
      dependencies.logger.warn({ taskId: task.id, runId: run.id, detail }, "Invalid reminder payload")
      return { ok: false, detail: `invalid_payload: ${detail}` }
    }

    const sessionId = payload.data.sessionId ?? dependencies.defaultSessionId
    const message = dependencies.conversationLog.append(
      sessionId,
      "assistant",
      `Task due: ${payload.data.message ?? task.title}`
    )

    dependencies.logger.info(
      { taskId: task.id, runId: run.id, sessionId, messageId: message.messageId },
      "Reminder delivered"
    )

    return { ok: true, detail: message.messageId }
  }
}
