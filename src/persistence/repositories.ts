import { z } from "zod"

import type { StoreDatabase } from "./database.js"
import { withStore } from "./errors.js"

export type JsonObject = Record<string, unknown>

export type MessageRole = "user" | "assistant" | "tool"
export type ToolCallOutcome = "success" | "failure" | "unknown"

export type MessageRecord = {
  messageId: string
  sessionId: string
  role: MessageRole
  content: string
  ts: number
}

/** Message row plus its insertion sequence, used as the ordering tie-breaker. */
export type MessagePageRow = MessageRecord & {
  seq: number
}

export type MessageCursor = {
  ts: number
  seq: number
}

export type MemoryFactRecord = {
  id: string
  key: string
  value: string
  confidence: number
  updatedAt: number
}

export type MemoryFactRevisionRecord = {
  id: string
  factId: string
  key: string
  value: string
  confidence: number
  observedAt: number
  supersededAt: number
}

export type FactMergeResult =
  | { outcome: "inserted"; fact: MemoryFactRecord }
  | { outcome: "replaced"; fact: MemoryFactRecord; previous: MemoryFactRecord }
  | { outcome: "kept"; fact: MemoryFactRecord }

export type TaskRecord = {
  id: string
  title: string
  schedule: string
  payload: JsonObject | null
  enabled: boolean
  lastRun: number | null
  nextRun: number | null
  createdAt: number
  updatedAt: number
}

export type TaskRunRecord = {
  id: string
  taskId: string
  scheduledFor: number | null
  claimedAt: number
  finishedAt: number | null
  ok: boolean | null
  detail: string | null
}

export type TaskClaimDecision =
  | { kind: "claim"; nextRun: number | null; runId: string; scheduledFor?: number }
  | { kind: "realign"; nextRun: number }
  | { kind: "reject"; reason: "disabled" | "not_due" }

export type TaskClaimWrite =
  | { status: "claimed"; task: TaskRecord; run: TaskRunRecord }
  | { status: "skipped"; task: TaskRecord }
  | { status: "conflict"; task: TaskRecord }
  | { status: "disabled"; task: TaskRecord }

export type ToolCallRecord = {
  callId: string
  sessionId: string
  tool: string
  args: JsonObject
  result: unknown
  ok: boolean | null
  outcome: ToolCallOutcome
  elapsedMs: number | null
  ts: number
}

export type ArtifactRecord = {
  id: string
  type: string
  path: string
  metadata: JsonObject | null
  ts: number
}

type TaskRow = Omit<TaskRecord, "payload" | "enabled"> & {
  payload: string | null
  enabled: number
}

type TaskRunRow = Omit<TaskRunRecord, "ok"> & {
  ok: number | null
}

type ToolCallRow = Omit<ToolCallRecord, "args" | "result" | "ok" | "outcome"> & {
  args: string
  result: string | null
  ok: number | null
}

type ArtifactRow = Omit<ArtifactRecord, "metadata"> & {
  metadata: string | null
}

const jsonObjectSchema = z.record(z.string(), z.unknown())

const parseJson = (source: string, context: string): unknown => {
  try {
    return JSON.parse(source)
  } catch {
    throw new Error(`Stored ${context} is not valid JSON`)
  }
}

const parseJsonObject = (source: string | null, context: string): JsonObject | null => {
  if (source === null) {
    return null
  }

  const validated = jsonObjectSchema.safeParse(parseJson(source, context))
  if (!validated.success) {
    throw new Error(`Stored ${context} is not a JSON object`)
  }

  return validated.data
}

const toNullableBoolean = (value: number | null): boolean | null => {
  return value === null ? null : value === 1
}

const toFlag = (value: boolean): number => {
  return value ? 1 : 0
}

const toTaskRecord = (row: TaskRow): TaskRecord => {
  return {
    ...row,
    payload: parseJsonObject(row.payload, `payload of task ${row.id}`),
    enabled: row.enabled === 1,
  }
}

const toTaskRunRecord = (row: TaskRunRow): TaskRunRecord => {
  return {
    ...row,
    ok: toNullableBoolean(row.ok),
  }
}

const resolveToolCallOutcome = (ok: boolean | null): ToolCallOutcome => {
  if (ok === null) {
    return "unknown"
  }

  return ok ? "success" : "failure"
}

const toToolCallRecord = (row: ToolCallRow): ToolCallRecord => {
  const ok = toNullableBoolean(row.ok)

  return {
    callId: row.callId,
    sessionId: row.sessionId,
    tool: row.tool,
    args: parseJsonObject(row.args, `args of tool call ${row.callId}`) ?? {},
    result: row.result === null ? null : parseJson(row.result, `result of tool call ${row.callId}`),
    ok,
    outcome: resolveToolCallOutcome(ok),
    elapsedMs: row.elapsedMs,
    ts: row.ts,
  }
}

const toArtifactRecord = (row: ArtifactRow): ArtifactRecord => {
  return {
    ...row,
    metadata: parseJsonObject(row.metadata, `metadata of artifact ${row.id}`),
  }
}

const toMessageRecord = (row: MessagePageRow): MessageRecord => {
  return {
    messageId: row.messageId,
    sessionId: row.sessionId,
    role: row.role,
    content: row.content,
    ts: row.ts,
  }
}

const MESSAGE_COLUMNS = `message_id as messageId,
      session_id as sessionId,
      role,
      content,
      ts,
      rowid as seq`

/**
 * Keeps conversation turns append-only. The insert stamps `ts` no earlier than the newest
 * message of the same session inside one immediate transaction, so a committed prefix can never
 * be reordered by a later append.
 *
 * @param database Open SQLite database instance.
 * @returns Repository for conversation message rows.
 */
export const createMessagesRepository = (database: StoreDatabase) => {
  const lastTsStatement = database.prepare<[string], { lastTs: number | null }>(
    "SELECT MAX(ts) as lastTs FROM messages WHERE session_id = ?"
  )

  const insertStatement = database.prepare<MessageRecord>(
    `INSERT INTO messages (message_id, session_id, role, content, ts)
     VALUES (@messageId, @sessionId, @role, @content, @ts)`
  )

  const firstPageStatement = database.prepare<[string, number, number], MessagePageRow>(
    `SELECT ${MESSAGE_COLUMNS}
     FROM messages
     WHERE session_id = ?
       AND ts > ?
     ORDER BY ts ASC, rowid ASC
     LIMIT ?`
  )

  const nextPageStatement = database.prepare<
    [string, number, number, number, number, number],
    MessagePageRow
  >(
    `SELECT ${MESSAGE_COLUMNS}
     FROM messages
     WHERE session_id = ?
       AND ts > ?
       AND (ts > ? OR (ts = ? AND rowid > ?))
     ORDER BY ts ASC, rowid ASC
     LIMIT ?`
  )

  const getStatement = database.prepare<[string], MessagePageRow>(
    `SELECT ${MESSAGE_COLUMNS}
     FROM messages
     WHERE message_id = ?`
  )

  const appendTransaction = database.transaction((record: MessageRecord): MessageRecord => {
    const lastTs = lastTsStatement.get(record.sessionId)?.lastTs ?? null
    const stamped: MessageRecord = {
      ...record,
      ts: lastTs !== null && lastTs > record.ts ? lastTs : record.ts,
    }

    insertStatement.run(stamped)
    return stamped
  })

  return {
    append: (record: MessageRecord): MessageRecord => {
      return withStore("messages.append", () => appendTransaction.immediate(record))
    },
    getById: (messageId: string): MessageRecord | null => {
      return withStore("messages.get", () => {
        const row = getStatement.get(messageId)
        return row ? toMessageRecord(row) : null
      })
    },
    /**
     * Reads one keyset page. Passing the cursor of the previous page's last row continues after
     * it; `since` is an exclusive lower bound on `ts`.
     */
    listPage: (
      sessionId: string,
      since: number,
      cursor: MessageCursor | null,
      pageSize: number
    ): MessagePageRow[] => {
      return withStore("messages.read", () => {
        if (!cursor) {
          return firstPageStatement.all(sessionId, since, pageSize)
        }

        return nextPageStatement.all(
          sessionId,
          since,
          cursor.ts,
          cursor.ts,
          cursor.seq,
          pageSize
        )
      })
    },
    toRecord: toMessageRecord,
  }
}

const FACT_COLUMNS = `id,
      key,
      value,
      confidence,
      updated_at as updatedAt`

/**
 * Holds the current fact per key plus an append-only archive of superseded values, so facts are
 * replaced as whole rows and never hard-deleted.
 *
 * @param database Open SQLite database instance.
 * @returns Repository for memory fact persistence.
 */
export const createMemoryFactsRepository = (database: StoreDatabase) => {
  const getByKeyStatement = database.prepare<[string], MemoryFactRecord>(
    `SELECT ${FACT_COLUMNS}
     FROM memory_facts
     WHERE key = ?`
  )

  const listStatement = database.prepare<[], MemoryFactRecord>(
    `SELECT ${FACT_COLUMNS}
     FROM memory_facts
     ORDER BY key ASC`
  )

  const listByPrefixStatement = database.prepare<[string, string], MemoryFactRecord>(
    `SELECT ${FACT_COLUMNS}
     FROM memory_facts
     WHERE substr(key, 1, length(?)) = ?
     ORDER BY key ASC`
  )

  const insertStatement = database.prepare<MemoryFactRecord>(
    `INSERT INTO memory_facts (id, key, value, confidence, updated_at)
     VALUES (@id, @key, @value, @confidence, @updatedAt)`
  )

  const replaceStatement = database.prepare<MemoryFactRecord>(
    `UPDATE memory_facts
     SET value = @value,
         confidence = @confidence,
         updated_at = @updatedAt
     WHERE id = @id
       AND key = @key`
  )

  const insertRevisionStatement = database.prepare<MemoryFactRevisionRecord>(
    `INSERT INTO memory_fact_revisions
      (id, fact_id, key, value, confidence, observed_at, superseded_at)
     VALUES
      (@id, @factId, @key, @value, @confidence, @observedAt, @supersededAt)`
  )

  const listRevisionsStatement = database.prepare<[string], MemoryFactRevisionRecord>(
    `SELECT
      id,
      fact_id as factId,
      key,
      value,
      confidence,
      observed_at as observedAt,
      superseded_at as supersededAt
     FROM memory_fact_revisions
     WHERE key = ?
     ORDER BY superseded_at ASC, rowid ASC`
  )

  const mergeTransaction = database.transaction(
    (
      key: string,
      resolve: (existing: MemoryFactRecord | null) => FactMergeResult,
      revisionId: string
    ): FactMergeResult => {
      const existing = getByKeyStatement.get(key) ?? null
      const result = resolve(existing)

      if (result.outcome === "inserted") {
        insertStatement.run(result.fact)
      }

      if (result.outcome === "replaced") {
        insertRevisionStatement.run({
          id: revisionId,
          factId: result.previous.id,
          key: result.previous.key,
          value: result.previous.value,
          confidence: result.previous.confidence,
          observedAt: result.previous.updatedAt,
          supersededAt: result.fact.updatedAt,
        })
        replaceStatement.run(result.fact)
      }

      return result
    }
  )

  return {
    getByKey: (key: string): MemoryFactRecord | null => {
      return withStore("memory.get", () => getByKeyStatement.get(key) ?? null)
    },
    list: (prefix?: string): MemoryFactRecord[] => {
      return withStore("memory.list", () => {
        if (prefix === undefined || prefix.length === 0) {
          return listStatement.all()
        }

        return listByPrefixStatement.all(prefix, prefix)
      })
    },
    /**
     * Reads the current fact and writes the resolved outcome in one immediate transaction, so
     * two concurrent observers cannot both act on the same stale fact.
     */
    mergeByKey: (
      key: string,
      resolve: (existing: MemoryFactRecord | null) => FactMergeResult,
      revisionId: string
    ): FactMergeResult => {
      return withStore("memory.observe", () =>
        mergeTransaction.immediate(key, resolve, revisionId)
      )
    },
    listRevisions: (key: string): MemoryFactRevisionRecord[] => {
      return withStore("memory.history", () => listRevisionsStatement.all(key))
    },
  }
}

const TASK_COLUMNS = `id,
      title,
      schedule,
      payload,
      enabled,
      last_run as lastRun,
      next_run as nextRun,
      created_at as createdAt,
      updated_at as updatedAt`

const TASK_RUN_COLUMNS = `id,
      task_id as taskId,
      scheduled_for as scheduledFor,
      claimed_at as claimedAt,
      finished_at as finishedAt,
      ok,
      detail`

/**
 * Persists scheduled tasks and their run history. Claiming is a compare-and-swap on `next_run`
 * inside an immediate transaction, which is the only cross-process mutual exclusion point in
 * the store.
 *
 * @param database Open SQLite database instance.
 * @returns Repository for task and task run records.
 */
export const createTasksRepository = (database: StoreDatabase) => {
  const insertStatement = database.prepare<TaskRow>(
    `INSERT INTO tasks
      (id, title, schedule, payload, enabled, last_run, next_run, created_at, updated_at)
     VALUES
      (@id, @title, @schedule, @payload, @enabled, @lastRun, @nextRun, @createdAt, @updatedAt)`
  )

  const getByIdStatement = database.prepare<[string], TaskRow>(
    `SELECT ${TASK_COLUMNS}
     FROM tasks
     WHERE id = ?`
  )

  const listStatement = database.prepare<[], TaskRow>(
    `SELECT ${TASK_COLUMNS}
     FROM tasks
     ORDER BY created_at ASC, rowid ASC`
  )

  const listDueStatement = database.prepare<[number, number], TaskRow>(
    `SELECT ${TASK_COLUMNS}
     FROM tasks
     WHERE enabled = 1
       AND next_run IS NOT NULL
       AND next_run <= ?
     ORDER BY next_run ASC, rowid ASC
     LIMIT ?`
  )

  const setEnabledStatement = database.prepare<[number, number | null, number, string]>(
    `UPDATE tasks
     SET enabled = ?,
         next_run = ?,
         updated_at = ?
     WHERE id = ?`
  )

  const claimStatement = database.prepare<
    [number, number | null, number, number, string, number]
  >(
    `UPDATE tasks
     SET last_run = ?,
         next_run = ?,
         enabled = ?,
         updated_at = ?
     WHERE id = ?
       AND enabled = 1
       AND next_run = ?`
  )

  const realignStatement = database.prepare<[number, number, string, number]>(
    `UPDATE tasks
     SET next_run = ?,
         updated_at = ?
     WHERE id = ?
       AND enabled = 1
       AND next_run = ?`
  )

  const insertRunStatement = database.prepare<TaskRunRow>(
    `INSERT INTO task_runs
      (id, task_id, scheduled_for, claimed_at, finished_at, ok, detail)
     VALUES
      (@id, @taskId, @scheduledFor, @claimedAt, @finishedAt, @ok, @detail)`
  )

  const getRunStatement = database.prepare<[string], TaskRunRow>(
    `SELECT ${TASK_RUN_COLUMNS}
     FROM task_runs
     WHERE id = ?`
  )

  const latestOpenRunStatement = database.prepare<[string], TaskRunRow>(
    `SELECT ${TASK_RUN_COLUMNS}
     FROM task_runs
     WHERE task_id = ?
       AND finished_at IS NULL
     ORDER BY claimed_at DESC, rowid DESC
     LIMIT 1`
  )

  const finishRunStatement = database.prepare<[number, number, string | null, string]>(
    `UPDATE task_runs
     SET finished_at = ?,
         ok = ?,
         detail = ?
     WHERE id = ?
       AND finished_at IS NULL`
  )

  const listRunsStatement = database.prepare<[string], TaskRunRow>(
    `SELECT ${TASK_RUN_COLUMNS}
     FROM task_runs
     WHERE task_id = ?
     ORDER BY claimed_at DESC, rowid DESC`
  )

  const readTask = (id: string): TaskRecord | null => {
    const row = getByIdStatement.get(id)
    return row ? toTaskRecord(row) : null
  }

  const requireTask = (id: string): TaskRecord => {
    const task = readTask(id)
    if (!task) {
      throw new Error(`Task ${id} vanished inside its own transaction`)
    }

    return task
  }

  const claimTransaction = database.transaction(
    (
      id: string,
      claimedAt: number,
      decide: (task: TaskRecord) => TaskClaimDecision
    ): TaskClaimWrite | null => {
      const task = readTask(id)
      if (!task) {
        return null
      }

      const decision = decide(task)

      if (decision.kind === "reject") {
        return decision.reason === "disabled"
          ? { status: "disabled", task }
          : { status: "conflict", task }
      }

      const expectedNextRun = task.nextRun
      if (expectedNextRun === null) {
        return { status: "conflict", task }
      }

      if (decision.kind === "realign") {
        const realigned = realignStatement.run(decision.nextRun, claimedAt, id, expectedNextRun)
        if (realigned.changes < 1) {
          return { status: "conflict", task: requireTask(id) }
        }

        return { status: "skipped", task: requireTask(id) }
      }

      const stillEnabled = decision.nextRun !== null
      const claimed = claimStatement.run(
        claimedAt,
        decision.nextRun,
        toFlag(stillEnabled),
        claimedAt,
        id,
        expectedNextRun
      )

      if (claimed.changes < 1) {
        return { status: "conflict", task: requireTask(id) }
      }

      const run: TaskRunRecord = {
        id: decision.runId,
        taskId: id,
        scheduledFor: decision.scheduledFor ?? expectedNextRun,
        claimedAt,
        finishedAt: null,
        ok: null,
        detail: null,
      }
      insertRunStatement.run({ ...run, ok: null })

      return { status: "claimed", task: requireTask(id), run }
    }
  )

  return {
    insert: (record: TaskRecord): void => {
      withStore("tasks.create", () => {
        insertStatement.run({
          ...record,
          payload: record.payload === null ? null : JSON.stringify(record.payload),
          enabled: toFlag(record.enabled),
        })
      })
    },
    getById: (id: string): TaskRecord | null => {
      return withStore("tasks.get", () => readTask(id))
    },
    list: (): TaskRecord[] => {
      return withStore("tasks.list", () => listStatement.all().map(toTaskRecord))
    },
    listDue: (timestamp: number, limit: number): TaskRecord[] => {
      return withStore("tasks.pollDue", () =>
        listDueStatement.all(timestamp, limit).map(toTaskRecord)
      )
    },
    setEnabled: (
      id: string,
      enabled: boolean,
      nextRun: number | null,
      updatedAt: number
    ): boolean => {
      return withStore("tasks.setEnabled", () => {
        const result = setEnabledStatement.run(toFlag(enabled), nextRun, updatedAt, id)
        return result.changes > 0
      })
    },
    /**
     * Evaluates `decide` against the freshly read task and applies its outcome atomically.
     *
     * @returns Claim outcome, or null when the task does not exist.
     */
    claim: (
      id: string,
      claimedAt: number,
      decide: (task: TaskRecord) => TaskClaimDecision
    ): TaskClaimWrite | null => {
      return withStore("tasks.claim", () => claimTransaction.immediate(id, claimedAt, decide))
    },
    getRun: (runId: string): TaskRunRecord | null => {
      return withStore("tasks.getRun", () => {
        const row = getRunStatement.get(runId)
        return row ? toTaskRunRecord(row) : null
      })
    },
    findLatestOpenRun: (taskId: string): TaskRunRecord | null => {
      return withStore("tasks.findOpenRun", () => {
        const row = latestOpenRunStatement.get(taskId)
        return row ? toTaskRunRecord(row) : null
      })
    },
    finishRun: (
      runId: string,
      ok: boolean,
      detail: string | null,
      finishedAt: number
    ): boolean => {
      return withStore("tasks.recordOutcome", () => {
        const result = finishRunStatement.run(finishedAt, toFlag(ok), detail, runId)
        return result.changes > 0
      })
    },
    listRuns: (taskId: string): TaskRunRecord[] => {
      return withStore("tasks.listRuns", () =>
        listRunsStatement.all(taskId).map(toTaskRunRecord)
      )
    },
  }
}

const TOOL_CALL_COLUMNS = `call_id as callId,
      session_id as sessionId,
      tool,
      args,
      result,
      ok,
      elapsed_ms as elapsedMs,
      ts`

/**
 * Records tool invocations as write-once rows. `ok IS NULL` marks a call whose outcome was never
 * reported, which readers must treat as unknown rather than failed.
 *
 * @param database Open SQLite database instance.
 * @returns Repository for tool call audit rows.
 */
export const createToolCallsRepository = (database: StoreDatabase) => {
  const insertStatement = database.prepare<{
    callId: string
    sessionId: string
    tool: string
    args: string
    ts: number
  }>(
    `INSERT INTO tool_calls (call_id, session_id, tool, args, result, ok, elapsed_ms, ts)
     VALUES (@callId, @sessionId, @tool, @args, NULL, NULL, NULL, @ts)`
  )

  const completeStatement = database.prepare<[string, number, number, string]>(
    `UPDATE tool_calls
     SET result = ?,
         ok = ?,
         elapsed_ms = ?
     WHERE call_id = ?
       AND ok IS NULL`
  )

  const getStatement = database.prepare<[string], ToolCallRow>(
    `SELECT ${TOOL_CALL_COLUMNS}
     FROM tool_calls
     WHERE call_id = ?`
  )

  const listBySessionStatement = database.prepare<[string], ToolCallRow>(
    `SELECT ${TOOL_CALL_COLUMNS}
     FROM tool_calls
     WHERE session_id = ?
     ORDER BY ts ASC, rowid ASC`
  )

  const listIncompleteStatement = database.prepare<[number], ToolCallRow>(
    `SELECT ${TOOL_CALL_COLUMNS}
     FROM tool_calls
     WHERE ok IS NULL
       AND ts <= ?
     ORDER BY ts ASC, rowid ASC`
  )

  return {
    insert: (record: {
      callId: string
      sessionId: string
      tool: string
      args: JsonObject
      ts: number
    }): void => {
      withStore("toolCalls.begin", () => {
        insertStatement.run({ ...record, args: JSON.stringify(record.args) })
      })
    },
    /**
     * Fills the outcome of a call that has none yet.
     *
     * @returns False when the call does not exist or was already completed.
     */
    complete: (callId: string, ok: boolean, result: unknown, elapsedMs: number): boolean => {
      return withStore("toolCalls.complete", () => {
        const outcome = completeStatement.run(
          JSON.stringify(result ?? null),
          toFlag(ok),
          elapsedMs,
          callId
        )
        return outcome.changes > 0
      })
    },
    getById: (callId: string): ToolCallRecord | null => {
      return withStore("toolCalls.get", () => {
        const row = getStatement.get(callId)
        return row ? toToolCallRecord(row) : null
      })
    },
    listBySession: (sessionId: string): ToolCallRecord[] => {
      return withStore("toolCalls.list", () =>
        listBySessionStatement.all(sessionId).map(toToolCallRecord)
      )
    },
    listIncomplete: (startedAtOrBefore: number): ToolCallRecord[] => {
      return withStore("toolCalls.listIncomplete", () =>
        listIncompleteStatement.all(startedAtOrBefore).map(toToolCallRecord)
      )
    },
  }
}

const ARTIFACT_COLUMNS = `id,
      type,
      path,
      metadata,
      ts`

/**
 * Catalogs generated files independently of sessions and tasks.
 *
 * @param database Open SQLite database instance.
 * @returns Repository for artifact catalog rows.
 */
export const createArtifactsRepository = (database: StoreDatabase) => {
  const insertStatement = database.prepare<ArtifactRow>(
    `INSERT INTO artifacts (id, type, path, metadata, ts)
     VALUES (@id, @type, @path, @metadata, @ts)`
  )

  const getStatement = database.prepare<[string], ArtifactRow>(
    `SELECT ${ARTIFACT_COLUMNS}
     FROM artifacts
     WHERE id = ?`
  )

  const listStatement = database.prepare<[], ArtifactRow>(
    `SELECT ${ARTIFACT_COLUMNS}
     FROM artifacts
     ORDER BY ts ASC, rowid ASC`
  )

  const listByTypeStatement = database.prepare<[string], ArtifactRow>(
    `SELECT ${ARTIFACT_COLUMNS}
     FROM artifacts
     WHERE type = ?
     ORDER BY ts ASC, rowid ASC`
  )

  return {
    insert: (record: ArtifactRecord): void => {
      withStore("artifacts.register", () => {
        insertStatement.run({
          ...record,
          metadata: record.metadata === null ? null : JSON.stringify(record.metadata),
        })
      })
    },
    getById: (id: string): ArtifactRecord | null => {
      return withStore("artifacts.get", () => {
        const row = getStatement.get(id)
        return row ? toArtifactRecord(row) : null
      })
    },
    list: (type?: string): ArtifactRecord[] => {
      return withStore("artifacts.list", () => {
        const rows = type === undefined ? listStatement.all() : listByTypeStatement.all(type)
        return rows.map(toArtifactRecord)
      })
    },
  }
}
