export {
  applyMigrations,
  DEFAULT_BUSY_TIMEOUT_MS,
  getSchemaRevision,
  openPersistenceDatabase,
  resolvePersistenceDatabasePath,
} from "./database.js"
export type { ApplyMigrationsOptions, PersistenceDatabaseOptions, StoreDatabase } from "./database.js"
export { createMonotonicClock } from "./clock.js"
export { resolveStoreConfig } from "./config.js"
export type { StoreConfig } from "./config.js"
export {
  ConflictingClaimError,
  describeError,
  ImmutableRecordError,
  InvalidInputError,
  MigrationError,
  NotFoundError,
  StoreError,
  StoreUnavailableError,
  toStoreError,
} from "./errors.js"
export type { StoreErrorCode } from "./errors.js"
export { SQL_MIGRATIONS } from "./migrations.js"
export {
  createArtifactsRepository,
  createMemoryFactsRepository,
  createMessagesRepository,
  createTasksRepository,
  createToolCallsRepository,
} from "./repositories.js"
export type {
  ArtifactRecord,
  FactMergeResult,
  JsonObject,
  MemoryFactRecord,
  MemoryFactRevisionRecord,
  MessageRecord,
  MessageRole,
  TaskRecord,
  TaskRunRecord,
  ToolCallOutcome,
  ToolCallRecord,
} from "./repositories.js"
