import { randomUUID } from "node:crypto"

import { z } from "zod"

import {
  ConflictingClaimError,
  ImmutableRecordError,
  InvalidInputError,
  NotFoundError,
} from "../persistence/errors.js"
import type {
  createTasksRepository,
  TaskClaimDecision,
  TaskClaimWrite,
  TaskRecord,
  TaskRunRecord,
} from "../persistence/repositories.js"
import {
  parseSchedule,
  resolveLatestSlot,
  resolveNextRun,
  type CatchUpPolicy,
  type Schedule,
} from "./schedule.js"

export const taskCreateInputSchema = z.object({
  title: z.string().refine((value) => value.trim().length > 0, "title must not be blank"),
  schedule: z.string().refine((value) => value.trim().length > 0, "schedule must not be blank"),
  payload: z.record(z.string(), z.unknown()).nullable().optional(),
  enabled: z.boolean().optional().default(true),
})

export type TaskCreateInput = z.input<typeof taskCreateInputSchema>

export type ClaimResult = TaskClaimWrite

export type ClaimedTask = {
  task: TaskRecord
  run: TaskRunRecord
}

export type ListTasksOptions = {
  /** Case-insensitive substring of the title. Blank matches every task. */
  titleContains?: string
}

export type PollDueOptions = {
  limit?: number
}

export type RecordOutcomeOptions = {
  /** Run to complete. Defaults to the task's most recent run without an outcome. */
  runId?: string
}

type TasksRepository = Pick<
  ReturnType<typeof createTasksRepository>,
  | "insert"
  | "getById"
  | "list"
  | "listDue"
  | "setEnabled"
  | "claim"
  | "getRun"
  | "findLatestOpenRun"
  | "finishRun"
  | "listRuns"
>

export const DEFAULT_CATCH_UP_GRACE_MS = 60_000

type TaskSchedulerDependencies = {
  repository: TasksRepository
  catchUpPolicy?: CatchUpPolicy
  /** Under `skip`, how late the latest due slot may be and still fire. */
  catchUpGraceMs?: number
  timezone?: string
  now?: () => number
  createId?: () => string
}

/**
 * Decides what a claim at `now` does to `task`. Pure, so the catch-up policy can be tested
 * without a store.
 *
 * Under `skip` the firing is moved to the latest slot at or before `now`; the older slots are
 * dropped. That slot fires when it is at most `graceMs` old, otherwise `nextRun` is realigned
 * without firing.
 */
export const resolveClaimDecision = (
  task: TaskRecord,
  schedule: Schedule,
  now: number,
  policy: CatchUpPolicy,
  runId: string,
  graceMs = DEFAULT_CATCH_UP_GRACE_MS
): TaskClaimDecision => {
  if (!task.enabled) {
    return { kind: "reject", reason: "disabled" }
  }

  if (task.nextRun === null || task.nextRun > now) {
    return { kind: "reject", reason: "not_due" }
  }

  const nextRun = resolveNextRun(schedule, task.nextRun, now)

  if (policy === "fire_once") {
    return { kind: "claim", nextRun, runId }
  }

  const latestSlot = resolveLatestSlot(schedule, task.nextRun, now)
  if (nextRun !== null && now - latestSlot > graceMs) {
    return { kind: "realign", nextRun }
  }

  return { kind: "claim", nextRun, runId, scheduledFor: latestSlot }
}

const describeLostClaim = (result: Exclude<ClaimResult, { status: "claimed" }>): string => {
  switch (result.status) {
    case "disabled":
      return `Task ${result.task.id} is disabled`
    case "skipped":
      return `Task ${result.task.id} skipped missed firings; next run at ${String(result.task.nextRun)}`
    case "conflict":
      return `Task ${result.task.id} is not due or was claimed by another poller; next run at ${String(result.task.nextRun)}`
  }
}

/**
 * Creates the task scheduler. Polling is read-only; claiming is the single atomic step that
 * decides which poller runs a firing.
 *
 * @param dependencies Task repository, catch-up policy, cron timezone and test overrides.
 * @returns Task scheduler operations.
 */
export const createTaskScheduler = (dependencies: TaskSchedulerDependencies) => {
  const now = dependencies.now ?? Date.now
  const createId = dependencies.createId ?? randomUUID
  const policy = dependencies.catchUpPolicy ?? "fire_once"
  const graceMs = dependencies.catchUpGraceMs ?? DEFAULT_CATCH_UP_GRACE_MS

  if (!Number.isInteger(graceMs) || graceMs < 0) {
    throw new InvalidInputError("Task scheduler catchUpGraceMs must be an integer >= 0")
  }
  const scheduleOptions = { timezone: dependencies.timezone ?? "UTC" }

  const requireTask = (id: string): TaskRecord => {
    const task = dependencies.repository.getById(id)
    if (!task) {
      throw new NotFoundError("Task", id)
    }

    return task
  }

  const claimTask = (id: string, timestamp = now()): ClaimResult => {
    const result = dependencies.repository.claim(id, timestamp, (task) =>
      resolveClaimDecision(
        task,
        parseSchedule(task.schedule, scheduleOptions),
        timestamp,
        policy,
        createId(),
        graceMs
      )
    )

    if (!result) {
      throw new NotFoundError("Task", id)
    }

    return result
  }

  return {
    create: (input: TaskCreateInput): TaskRecord => {
      const validated = taskCreateInputSchema.safeParse(input)
      if (!validated.success) {
        const detail = validated.error.issues.map((issue) => issue.message).join("; ")
        throw new InvalidInputError(`Invalid task: ${detail}`)
      }

      const createdAt = now()
      const schedule = parseSchedule(validated.data.schedule, scheduleOptions)
      const nextRun = schedule.nextAfter(createdAt)
      if (nextRun === null) {
        throw new InvalidInputError(
          `Schedule "${schedule.spec}" does not produce a future run`
        )
      }

      const record: TaskRecord = {
        id: createId(),
        title: validated.data.title,
        schedule: validated.data.schedule,
        payload: validated.data.payload ?? null,
        enabled: validated.data.enabled,
        lastRun: null,
        nextRun,
        createdAt,
        updatedAt: createdAt,
      }

      dependencies.repository.insert(record)
      return record
    },
    /**
     * Re-enables a task. A missing or past `nextRun` is recomputed from now, so enabling never
     * makes a task due for a slot that passed while it was disabled.
     */
    enable: (id: string): TaskRecord => {
      const task = requireTask(id)
      const timestamp = now()

      if (task.enabled && task.nextRun !== null) {
        return task
      }

      const nextRun =
        task.nextRun !== null && task.nextRun > timestamp
          ? task.nextRun
          : parseSchedule(task.schedule, scheduleOptions).nextAfter(timestamp)

      if (nextRun === null) {
        throw new InvalidInputError(`Task ${id} has no future run to enable`)
      }

      dependencies.repository.setEnabled(id, true, nextRun, timestamp)
      return requireTask(id)
    },
    disable: (id: string): TaskRecord => {
      const task = requireTask(id)
      if (!task.enabled) {
        return task
      }

      dependencies.repository.setEnabled(id, false, task.nextRun, now())
      return requireTask(id)
    },
    get: (id: string): TaskRecord | null => {
      return dependencies.repository.getById(id)
    },
    list: (options: ListTasksOptions = {}): TaskRecord[] => {
      const tasks = dependencies.repository.list()
      const query = options.titleContains?.trim().toLowerCase() ?? ""
      if (query.length === 0) {
        return tasks
      }

      return tasks.filter((task) => task.title.toLowerCase().includes(query))
    },
    /** Read-only scan of enabled tasks with `nextRun <= now`, earliest first. */
    pollDue: (timestamp = now(), options: PollDueOptions = {}): TaskRecord[] => {
      // SQLite treats a negative LIMIT as unbounded.
      return dependencies.repository.listDue(timestamp, options.limit ?? -1)
    },
    claimTask,
    claim: (id: string, timestamp = now()): boolean => {
      return claimTask(id, timestamp).status === "claimed"
    },
    claimOrThrow: (id: string, timestamp = now()): ClaimedTask => {
      const result = claimTask(id, timestamp)
      if (result.status !== "claimed") {
        throw new ConflictingClaimError(id, describeLostClaim(result))
      }

      return {
        task: result.task,
        run: result.run,
      }
    },
    /**
     * Stores the outcome of a firing. `nextRun` was already advanced by the claim and is left
     * untouched.
     */
    recordOutcome: (
      id: string,
      ok: boolean,
      detail: string | null = null,
      options: RecordOutcomeOptions = {}
    ): TaskRunRecord => {
      requireTask(id)

      const run = options.runId
        ? dependencies.repository.getRun(options.runId)
        : dependencies.repository.findLatestOpenRun(id)

      if (!run || run.taskId !== id) {
        throw new NotFoundError("Open run of task", options.runId ?? id)
      }

      if (run.finishedAt !== null) {
        throw new ImmutableRecordError(`Run ${run.id} of task ${id} already has an outcome`)
      }

      const finished = dependencies.repository.finishRun(run.id, ok, detail, now())
      if (!finished) {
        throw new ImmutableRecordError(`Run ${run.id} of task ${id} already has an outcome`)
      }

      const stored = dependencies.repository.getRun(run.id)
      if (!stored) {
        throw new NotFoundError("Task run", run.id)
      }

      return stored
    },
    listRuns: (id: string): TaskRunRecord[] => {
      requireTask(id)
      return dependencies.repository.listRuns(id)
    },
  }
}

export type TaskScheduler = ReturnType<typeof createTaskScheduler>
