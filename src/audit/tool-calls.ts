import { randomUUID } from "node:crypto"

import { z } from "zod"

import { ImmutableRecordError, InvalidInputError, NotFoundError } from "../persistence/errors.js"
import type {
  createToolCallsRepository,
  JsonObject,
  ToolCallRecord,
} from "../persistence/repositories.js"

const beginInputSchema = z.object({
  sessionId: z.string().min(1, "sessionId must be a non-empty string"),
  tool: z.string().min(1, "tool must be a non-empty string"),
  args: z.record(z.string(), z.unknown()),
})

type ToolCallsRepository = Pick<
  ReturnType<typeof createToolCallsRepository>,
  "insert" | "complete" | "getById" | "listBySession" | "listIncomplete"
>

type ToolCallAuditLogDependencies = {
  repository: ToolCallsRepository
  now?: () => number
  createId?: () => string
}

export type ListIncompleteOptions = {
  /** Only calls started at or before this instant. Defaults to now. */
  olderThan?: number
}

/**
 * Creates the tool call audit log. A call is written once when it starts and completed at most
 * once; a call that never completes keeps an unknown outcome instead of being treated as failed.
 *
 * @param dependencies Tool call repository plus clock and id overrides.
 * @returns Audit log operations.
 */
export const createToolCallAuditLog = (dependencies: ToolCallAuditLogDependencies) => {
  const now = dependencies.now ?? Date.now
  const createId = dependencies.createId ?? randomUUID

  return {
    begin: (sessionId: string, tool: string, args: JsonObject = {}): ToolCallRecord => {
      const validated = beginInputSchema.safeParse({ sessionId, tool, args })
      if (!validated.success) {
        const detail = validated.error.issues.map((issue) => issue.message).join("; ")
        throw new InvalidInputError(`Invalid tool call: ${detail}`)
      }

      const record = {
        callId: createId(),
        sessionId,
        tool,
        args,
        ts: now(),
      }

      dependencies.repository.insert(record)

      return {
        ...record,
        result: null,
        ok: null,
        outcome: "unknown",
        elapsedMs: null,
      }
    },
    /**
     * Stores the outcome of a started call. `elapsedMs` defaults to the time since `begin`.
     */
    complete: (
      callId: string,
      ok: boolean,
      result: unknown,
      elapsedMs?: number
    ): ToolCallRecord => {
      const existing = dependencies.repository.getById(callId)
      if (!existing) {
        throw new NotFoundError("Tool call", callId)
      }

      if (existing.ok !== null) {
        throw new ImmutableRecordError(`Tool call ${callId} is already completed`)
      }

      if (elapsedMs !== undefined && (!Number.isInteger(elapsedMs) || elapsedMs < 0)) {
        throw new InvalidInputError("elapsedMs must be a non-negative integer")
      }

      const elapsed = elapsedMs ?? Math.max(0, now() - existing.ts)
      const completed = dependencies.repository.complete(callId, ok, result, elapsed)
      if (!completed) {
        throw new ImmutableRecordError(`Tool call ${callId} is already completed`)
      }

      const stored = dependencies.repository.getById(callId)
      if (!stored) {
        throw new NotFoundError("Tool call", callId)
      }

      return stored
    },
    get: (callId: string): ToolCallRecord | null => {
      return dependencies.repository.getById(callId)
    },
    listBySession: (sessionId: string): ToolCallRecord[] => {
      return dependencies.repository.listBySession(sessionId)
    },
    listIncomplete: (options: ListIncompleteOptions = {}): ToolCallRecord[] => {
      return dependencies.repository.listIncomplete(options.olderThan ?? now())
    },
  }
}

export type ToolCallAuditLog = ReturnType<typeof createToolCallAuditLog>
