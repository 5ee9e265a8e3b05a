export type StoreErrorCode =
  | "store_unavailable"
  | "migration_failed"
  | "not_found"
  | "conflicting_claim"
  | "invalid_input"
  | "immutable_record"

/**
 * Base class for every failure the persistence core surfaces, so callers can branch on `code`
 * instead of parsing driver messages.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode

  constructor(code: StoreErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "StoreError"
    this.code = code
  }
}

/** Transient store failure. Callers decide whether and how to retry. */
export class StoreUnavailableError extends StoreError {
  readonly operation: string

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super("store_unavailable", `Store unavailable during ${operation}: ${message}`, options)
    this.name = "StoreUnavailableError"
    this.operation = operation
  }
}

export class MigrationError extends StoreError {
  readonly migrationId: string | null

  constructor(migrationId: string | null, message: string, options?: ErrorOptions) {
    super("migration_failed", message, options)
    this.name = "MigrationError"
    this.migrationId = migrationId
  }
}

export class NotFoundError extends StoreError {
  readonly entity: string
  readonly id: string

  constructor(entity: string, id: string) {
    super("not_found", `${entity} not found: ${id}`)
    this.name = "NotFoundError"
    this.entity = entity
    this.id = id
  }
}

/** Another poller claimed the task first. Expected under concurrency; move on. */
export class ConflictingClaimError extends StoreError {
  readonly taskId: string

  constructor(taskId: string, message: string) {
    super("conflicting_claim", message)
    this.name = "ConflictingClaimError"
    this.taskId = taskId
  }
}

export class InvalidInputError extends StoreError {
  constructor(message: string) {
    super("invalid_input", message)
    this.name = "InvalidInputError"
  }
}

export class ImmutableRecordError extends StoreError {
  constructor(message: string) {
    super("immutable_record", message)
    this.name = "ImmutableRecordError"
  }
}

/**
 * Extracts a log-safe message from any thrown value.
 */
export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}

const TRANSIENT_SQLITE_CODES = new Set([
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_CANTOPEN",
  "SQLITE_FULL",
  "SQLITE_PROTOCOL",
  "SQLITE_READONLY_DBMOVED",
])

const readErrorCode = (error: Error): string | null => {
  if (!("code" in error)) {
    return null
  }

  return typeof error.code === "string" ? error.code : null
}

/**
 * Detects driver failures that describe store availability rather than a bad statement.
 *
 * @param error Value thrown by the SQLite driver.
 * @returns True when the failure is transient from the caller's perspective.
 */
export const isTransientStoreFailure = (error: unknown): error is Error => {
  if (!(error instanceof Error)) {
    return false
  }

  const code = readErrorCode(error)
  if (code) {
    if (TRANSIENT_SQLITE_CODES.has(code)) {
      return true
    }

    for (const prefix of TRANSIENT_SQLITE_CODES) {
      if (code.startsWith(`${prefix}_`)) {
        return true
      }
    }

    return code.startsWith("SQLITE_IOERR")
  }

  // better-sqlite3 raises a TypeError once the handle has been closed.
  return error instanceof TypeError && error.message.includes("database connection is not open")
}

/**
 * Maps driver errors into the store taxonomy while leaving typed errors and programming errors
 * untouched.
 *
 * @param error Value thrown by the operation.
 * @param operation Operation label included in the surfaced message.
 * @returns Error to rethrow.
 */
export const toStoreError = (error: unknown, operation: string): unknown => {
  if (error instanceof StoreError) {
    return error
  }

  if (isTransientStoreFailure(error)) {
    return new StoreUnavailableError(operation, error.message, { cause: error })
  }

  return error
}

/**
 * Runs one store operation and rethrows failures through {@link toStoreError}.
 *
 * @param operation Operation label, e.g. `conversation.append`.
 * @param run Synchronous store work.
 * @returns Result of `run`.
 */
export const withStore = <T>(operation: string, run: () => T): T => {
  try {
    return run()
  } catch (error) {
    throw toStoreError(error, operation)
  }
}
