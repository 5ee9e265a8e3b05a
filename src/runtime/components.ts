import { createArtifactRegistry } from "../artifacts/registry.js"
import { createToolCallAuditLog } from "../audit/tool-calls.js"
import { createConversationLog } from "../conversation/log.js"
import { createMemoryFactStore } from "../memory/fact-store.js"
import { createMonotonicClock } from "../persistence/clock.js"
import type { StoreDatabase } from "../persistence/database.js"
import {
  createArtifactsRepository,
  createMemoryFactsRepository,
  createMessagesRepository,
  createTasksRepository,
  createToolCallsRepository,
} from "../persistence/repositories.js"
import type { CatchUpPolicy } from "../scheduler/schedule.js"
import { createTaskScheduler } from "../scheduler/task-scheduler.js"

export type KeeperComponentsOptions = {
  catchUpPolicy?: CatchUpPolicy
  catchUpGraceMs?: number
  timezone?: string
  now?: () => number
}

/**
 * Wires every component onto one shared database handle and one monotonic clock.
 *
 * @param database Open, migrated store.
 * @param options Scheduler policy and clock overrides.
 * @returns The six components of the core.
 */
export const createKeeperComponents = (
  database: StoreDatabase,
  options: KeeperComponentsOptions = {}
) => {
  const now = createMonotonicClock(options.now)

  return {
    conversationLog: createConversationLog({
      repository: createMessagesRepository(database),
      now,
    }),
    memoryFacts: createMemoryFactStore({
      repository: createMemoryFactsRepository(database),
      now,
    }),
    taskScheduler: createTaskScheduler({
      repository: createTasksRepository(database),
      catchUpPolicy: options.catchUpPolicy,
      catchUpGraceMs: options.catchUpGraceMs,
      timezone: options.timezone,
      now,
    }),
    toolCalls: createToolCallAuditLog({
      repository: createToolCallsRepository(database),
      now,
    }),
    artifacts: createArtifactRegistry({
      repository: createArtifactsRepository(database),
      now,
    }),
  }
}

export type KeeperComponents = ReturnType<typeof createKeeperComponents>
