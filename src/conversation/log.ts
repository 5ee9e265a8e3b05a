import { randomUUID } from "node:crypto"

import { z } from "zod"

import { InvalidInputError } from "../persistence/errors.js"
import type {
  createMessagesRepository,
  MessageCursor,
  MessageRecord,
  MessageRole,
} from "../persistence/repositories.js"

const appendInputSchema = z.object({
  sessionId: z.string().min(1, "sessionId must be a non-empty string"),
  role: z.enum(["user", "assistant", "tool"]),
  content: z.string(),
})

const readOptionsSchema = z.object({
  since: z.number().int().optional(),
  limit: z.number().int().min(0, "limit must be >= 0").optional(),
})

export type ReadMessagesOptions = z.infer<typeof readOptionsSchema>

type MessagesRepository = Pick<
  ReturnType<typeof createMessagesRepository>,
  "append" | "getById" | "listPage" | "toRecord"
>

type ConversationLogDependencies = {
  repository: MessagesRepository
  now?: () => number
  createId?: () => string
  pageSize?: number
}

const DEFAULT_PAGE_SIZE = 200

const formatIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`)
    .join("; ")
}

/**
 * Creates the append-only conversation log. Corrections are new messages; nothing is updated
 * or deleted.
 *
 * @param dependencies Message repository plus clock, id and paging overrides.
 * @returns Conversation log operations.
 */
export const createConversationLog = (dependencies: ConversationLogDependencies) => {
  const now = dependencies.now ?? Date.now
  const createId = dependencies.createId ?? randomUUID
  const pageSize = dependencies.pageSize ?? DEFAULT_PAGE_SIZE

  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidInputError("Conversation log pageSize must be an integer >= 1")
  }

  const readPages = function* (
    sessionId: string,
    options: ReadMessagesOptions
  ): Generator<MessageRecord, void, undefined> {
    const since = options.since ?? Number.MIN_SAFE_INTEGER
    let remaining = options.limit ?? Number.POSITIVE_INFINITY
    let cursor: MessageCursor | null = null

    while (remaining > 0) {
      const page = dependencies.repository.listPage(
        sessionId,
        since,
        cursor,
        Math.min(pageSize, remaining)
      )

      for (const row of page) {
        yield dependencies.repository.toRecord(row)
      }

      const last = page.at(-1)
      if (!last || page.length < Math.min(pageSize, remaining)) {
        return
      }

      remaining -= page.length
      cursor = { ts: last.ts, seq: last.seq }
    }
  }

  return {
    append: (sessionId: string, role: MessageRole, content: string): MessageRecord => {
      const validated = appendInputSchema.safeParse({ sessionId, role, content })
      if (!validated.success) {
        throw new InvalidInputError(`Invalid message: ${formatIssues(validated.error)}`)
      }

      return dependencies.repository.append({
        messageId: createId(),
        ...validated.data,
        ts: now(),
      })
    },
    /**
     * Returns the session's messages ordered by timestamp, ties in insertion order. The result
     * is lazy and restartable: every iteration reads the store afresh, one page at a time.
     */
    read: (sessionId: string, options: ReadMessagesOptions = {}): Iterable<MessageRecord> => {
      const validated = readOptionsSchema.safeParse(options)
      if (!validated.success) {
        throw new InvalidInputError(`Invalid read options: ${formatIssues(validated.error)}`)
      }

      const readOptions = validated.data

      return {
        [Symbol.iterator]: () => readPages(sessionId, readOptions),
      }
    },
    get: (messageId: string): MessageRecord | null => {
      return dependencies.repository.getById(messageId)
    },
  }
}

export type ConversationLog = ReturnType<typeof createConversationLog>
