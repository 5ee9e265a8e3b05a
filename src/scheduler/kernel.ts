import type { Logger } from "pino"

import { ConflictingClaimError, describeError } from "../persistence/errors.js"
import type { TaskRecord, TaskRunRecord } from "../persistence/repositories.js"
import type { SchedulerConfig } from "./config.js"
import type { TaskScheduler } from "./task-scheduler.js"

export type TaskHandlerResult = {
  ok: boolean
  detail: string | null
}

/** Executes the body of one claimed firing. Bodies must tolerate at-least-once delivery. */
export type TaskHandler = (task: TaskRecord, run: TaskRunRecord) => Promise<TaskHandlerResult>

export type SchedulerKernelHandle = {
  stop: () => Promise<void>
}

type SchedulerLogger = Pick<Logger, "info" | "error">

type SchedulerKernelDependencies = {
  logger: SchedulerLogger
  scheduler: Pick<TaskScheduler, "pollDue" | "claimOrThrow" | "recordOutcome">
  handler: TaskHandler
  config: Pick<SchedulerConfig, "enabled" | "tickMs" | "batchSize">
  now?: () => number
}

/**
 * Starts the scheduler loop: every tick polls due tasks, claims them one at a time, runs the
 * handler for each won claim and records the outcome. Several kernels may share one store; the
 * claim decides which of them runs a firing.
 *
 * @param dependencies Scheduler configuration, task scheduler, handler and logger.
 * @returns Handle used by runtime orchestrators to stop the loop.
 */
export const startSchedulerKernel = async (
  dependencies: SchedulerKernelDependencies
): Promise<SchedulerKernelHandle> => {
  if (!dependencies.config.enabled) {
    dependencies.logger.info("Scheduler kernel disabled by configuration")
    return {
      stop: async () => {
        dependencies.logger.info("Scheduler kernel stop requested while disabled")
      },
    }
  }

  const now = dependencies.now ?? Date.now

  let stopped = false
  let runningTick = false

  const runClaimed = async (task: TaskRecord, run: TaskRunRecord): Promise<void> => {
    let result: TaskHandlerResult

    try {
      result = await dependencies.handler(task, run)
    } catch (error) {
      dependencies.logger.error(
        { taskId: task.id, runId: run.id, error: describeError(error) },
        "Task handler failed"
      )
      result = { ok: false, detail: describeError(error) }
    }

    try {
      dependencies.scheduler.recordOutcome(task.id, result.ok, result.detail, { runId: run.id })
    } catch (error) {
      dependencies.logger.error(
        { taskId: task.id, runId: run.id, error: describeError(error) },
        "Recording task outcome failed"
      )
    }
  }

  const runTick = async (): Promise<void> => {
    if (stopped || runningTick) {
      return
    }

    runningTick = true

    try {
      const due = dependencies.scheduler.pollDue(now(), { limit: dependencies.config.batchSize })

      for (const candidate of due) {
        if (stopped) {
          break
        }

        let claimed: { task: TaskRecord; run: TaskRunRecord }
        try {
          claimed = dependencies.scheduler.claimOrThrow(candidate.id, now())
        } catch (error) {
          if (error instanceof ConflictingClaimError) {
            dependencies.logger.info(
              { taskId: candidate.id, reason: error.message },
              "Scheduler kernel did not claim due task"
            )
            continue
          }

          throw error
        }

        dependencies.logger.info(
          {
            taskId: claimed.task.id,
            runId: claimed.run.id,
            scheduledFor: claimed.run.scheduledFor,
            nextRun: claimed.task.nextRun,
          },
          "Scheduler kernel claimed task"
        )

        await runClaimed(claimed.task, claimed.run)
      }
    } catch (error) {
      dependencies.logger.error({ error: describeError(error) }, "Scheduler kernel tick failed")
    } finally {
      runningTick = false
    }
  }

  dependencies.logger.info(
    {
      tickMs: dependencies.config.tickMs,
      batchSize: dependencies.config.batchSize,
    },
    "Scheduler kernel started"
  )

  await runTick()

  const timer = setInterval(() => {
    void runTick()
  }, dependencies.config.tickMs)

  return {
    stop: async () => {
      stopped = true
      clearInterval(timer)
      dependencies.logger.info("Scheduler kernel stopped")
    },
  }
}
