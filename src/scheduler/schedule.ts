import cronParser from "cron-parser"
import rrulePackage from "rrule"

import { describeError, InvalidInputError } from "../persistence/errors.js"

export type ScheduleKind = "interval" | "oneshot" | "cron" | "rrule"

type RecurringEvaluator = {
  nextAfter: (t: number) => number | null
  /** Latest occurrence at or before `t`, or null when none is known. */
  latestAtOrBefore: (t: number) => number | null
}

export type Schedule =
  | { kind: "interval"; spec: string; intervalMs: number; nextAfter: (t: number) => number }
  | { kind: "oneshot"; spec: string; at: number; nextAfter: (t: number) => number | null }
  | ({ kind: "cron"; spec: string; timezone: string } & RecurringEvaluator)
  | ({ kind: "rrule"; spec: string } & RecurringEvaluator)

export type ParseScheduleOptions = {
  /** IANA zone cron fields are evaluated in. */
  timezone?: string
}

export type CatchUpPolicy = "fire_once" | "skip"

const UNIT_MS = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
} as const

const INTERVAL_PATTERN = /^@?every\s+(\d+)\s*([smhd])$/i
const RRULE_PATTERN = /^(?:RRULE:|DTSTART[:;])/i
const DTSTART_PATTERN = /(?:^|\n)\s*DTSTART[:;]/i
const RRULE_FREQ_PATTERN = /(?:^|[\n:;])FREQ=(?:YEARLY|MONTHLY|WEEKLY|DAILY|HOURLY|MINUTELY|SECONDLY)(?:;|\s|$)/i
const ONESHOT_PATTERN =
  /^(?:at\s+)?(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?))?\s*(Z|[+-]\d{2}:?\d{2})?$/i

const isUnit = (value: string): value is keyof typeof UNIT_MS => {
  return value in UNIT_MS
}

const parseInterval = (spec: string, match: RegExpExecArray): Schedule => {
  const amount = Number(match[1])
  const unit = (match[2] ?? "").toLowerCase()

  if (!isUnit(unit) || !Number.isSafeInteger(amount) || amount < 1) {
    throw new InvalidInputError(`Invalid interval schedule "${spec}": amount must be >= 1`)
  }

  const intervalMs = amount * UNIT_MS[unit]

  return {
    kind: "interval",
    spec,
    intervalMs,
    nextAfter: (t) => t + intervalMs,
  }
}

const normalizeOffset = (zone: string | undefined): string => {
  if (!zone) {
    return "Z"
  }

  if (zone.toUpperCase() === "Z") {
    return "Z"
  }

  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`
}

const offsetMinutes = (zone: string): number => {
  if (zone === "Z") {
    return 0
  }

  const sign = zone.startsWith("-") ? -1 : 1
  return sign * (Number(zone.slice(1, 3)) * 60 + Number(zone.slice(4, 6)))
}

// Date.parse rolls impossible dates over (Feb 30 becomes Mar 2), so the wall clock is checked.
const matchesWallClock = (at: number, zone: string, datePart: string, timePart: string) => {
  const wall = new Date(at + offsetMinutes(zone) * 60_000)

  return (
    wall.getUTCFullYear() === Number(datePart.slice(0, 4)) &&
    wall.getUTCMonth() + 1 === Number(datePart.slice(5, 7)) &&
    wall.getUTCDate() === Number(datePart.slice(8, 10)) &&
    wall.getUTCHours() === Number(timePart.slice(0, 2)) &&
    wall.getUTCMinutes() === Number(timePart.slice(3, 5))
  )
}

const parseOneShot = (spec: string, match: RegExpExecArray): Schedule => {
  const datePart = match[1] ?? ""
  const timePart = match[2] ?? "00:00"
  const zone = normalizeOffset(match[3])
  const at = Date.parse(`${datePart}T${timePart}${zone}`)

  if (Number.isNaN(at)) {
    throw new InvalidInputError(`Invalid one-shot schedule "${spec}": not a valid timestamp`)
  }

  if (!matchesWallClock(at, zone, datePart, timePart)) {
    throw new InvalidInputError(`Invalid one-shot schedule "${spec}": not a valid calendar date`)
  }

  return {
    kind: "oneshot",
    spec,
    at,
    nextAfter: (t) => (at > t ? at : null),
  }
}

const parseCron = (spec: string, timezone: string): Schedule => {
  const fieldCount = spec.split(/\s+/).length
  if (!spec.startsWith("@") && fieldCount !== 5 && fieldCount !== 6) {
    throw new InvalidInputError(
      `Invalid cron schedule "${spec}": expected 5 or 6 fields, got ${fieldCount}`
    )
  }

  try {
    cronParser.parseExpression(spec, { tz: timezone })
  } catch (error) {
    throw new InvalidInputError(`Invalid cron schedule "${spec}": ${describeError(error)}`)
  }

  const nextAfter = (t: number): number | null => {
    let from = t

    // A match equal to `from` is possible when `from` carries milliseconds on a second boundary.
    for (let attempt = 0; attempt < 3; attempt += 1) {
      let candidate: number

      try {
        candidate = cronParser.parseExpression(spec, { currentDate: new Date(from), tz: timezone })
          .next()
          .getTime()
      } catch {
        return null
      }

      if (candidate > t) {
        return candidate
      }

      from = candidate + 1_000
    }

    return null
  }

  const latestAtOrBefore = (t: number): number | null => {
    let from = t + 1_000

    for (let attempt = 0; attempt < 3; attempt += 1) {
      let candidate: number

      try {
        candidate = cronParser.parseExpression(spec, { currentDate: new Date(from), tz: timezone })
          .prev()
          .getTime()
      } catch {
        return null
      }

      if (candidate <= t) {
        return candidate
      }

      from = candidate
    }

    return null
  }

  return {
    kind: "cron",
    spec,
    timezone,
    nextAfter,
    latestAtOrBefore,
  }
}

const startOfUtcDay = (t: number): Date => {
  const day = new Date(t)
  return new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate()))
}

/**
 * RFC 5545 recurrence, evaluated in UTC. Without a DTSTART line the rule is anchored at midnight
 * UTC of the evaluated day, so `RRULE:FREQ=DAILY;BYHOUR=9` fires at 09:00:00.
 */
const parseRecurrence = (spec: string): Schedule => {
  if (!RRULE_FREQ_PATTERN.test(spec)) {
    throw new InvalidInputError(
      `Invalid recurrence schedule "${spec}": FREQ must be one of YEARLY, MONTHLY, WEEKLY, DAILY, HOURLY, MINUTELY, SECONDLY`
    )
  }

  const pinnedStart = DTSTART_PATTERN.test(spec)
  const buildRule = (t: number) => {
    return rrulePackage.rrulestr(spec, pinnedStart ? {} : { dtstart: startOfUtcDay(t) })
  }

  try {
    buildRule(0)
  } catch (error) {
    throw new InvalidInputError(`Invalid recurrence schedule "${spec}": ${describeError(error)}`)
  }

  return {
    kind: "rrule",
    spec,
    nextAfter: (t) => {
      const next = buildRule(t).after(new Date(t), false)
      return next ? next.getTime() : null
    },
    latestAtOrBefore: (t) => {
      const previous = buildRule(t).before(new Date(t), true)
      return previous ? previous.getTime() : null
    },
  }
}

/**
 * Parses a schedule spec.
 *
 * - `every 5m`, `@every 30s`: fixed interval (units s, m, h, d)
 * - `RRULE:FREQ=DAILY;BYHOUR=9`, optionally after a `DTSTART:` line: RFC 5545 recurrence in UTC
 * - `2026-03-01T09:00:00Z`, `at 2026-03-01 09:00`: one shot, UTC when no offset is given
 * - anything else: cron expression with 5 or 6 fields
 *
 * @param spec Schedule string as stored on the task.
 * @param options Timezone for cron evaluation.
 * @returns Evaluator exposing `nextAfter`.
 */
export const parseSchedule = (spec: string, options: ParseScheduleOptions = {}): Schedule => {
  const trimmed = spec.trim()
  if (trimmed.length === 0) {
    throw new InvalidInputError("Schedule must be a non-empty string")
  }

  const intervalMatch = INTERVAL_PATTERN.exec(trimmed)
  if (intervalMatch) {
    return parseInterval(trimmed, intervalMatch)
  }

  if (RRULE_PATTERN.test(trimmed)) {
    return parseRecurrence(trimmed)
  }

  const oneShotMatch = ONESHOT_PATTERN.exec(trimmed)
  if (oneShotMatch) {
    return parseOneShot(trimmed, oneShotMatch)
  }

  return parseCron(trimmed, options.timezone ?? "UTC")
}

/**
 * Computes the run that follows `scheduledFor`, never returning an instant at or before `now`.
 *
 * The next slot is stepped from the scheduled instant so fixed cadences do not drift with late
 * claims. After an outage that slot can already be in the past; the result then jumps to the
 * first slot strictly after `now`, collapsing the missed firings.
 *
 * @param schedule Parsed schedule.
 * @param scheduledFor Instant the current firing was due, or null when unknown.
 * @param now Claim instant.
 * @returns Next due instant, or null when the schedule has no further firing.
 */
export const resolveNextRun = (
  schedule: Schedule,
  scheduledFor: number | null,
  now: number
): number | null => {
  const anchor = scheduledFor === null || scheduledFor > now ? now : scheduledFor
  const candidate = schedule.nextAfter(anchor)

  if (candidate === null || candidate > now) {
    return candidate
  }

  if (schedule.kind === "interval") {
    const steps = Math.floor((now - candidate) / schedule.intervalMs) + 1
    return candidate + steps * schedule.intervalMs
  }

  const jumped = schedule.nextAfter(now)
  return jumped !== null && jumped > now ? jumped : null
}

/**
 * Finds the most recent slot at or before `now`, starting from the due instant `scheduledFor`.
 * Slots older than the returned one were missed.
 */
export const resolveLatestSlot = (
  schedule: Schedule,
  scheduledFor: number,
  now: number
): number => {
  if (scheduledFor >= now) {
    return scheduledFor
  }

  switch (schedule.kind) {
    case "interval":
      return (
        scheduledFor + Math.floor((now - scheduledFor) / schedule.intervalMs) * schedule.intervalMs
      )
    case "oneshot":
      return scheduledFor
    case "cron":
    case "rrule": {
      const latest = schedule.latestAtOrBefore(now)
      return latest !== null && latest > scheduledFor ? latest : scheduledFor
    }
  }
}
