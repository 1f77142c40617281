/**
 * Date Projector
 *
 * Projects a yearly (month, day) onto concrete calendar days.
 *
 * Leap-day policy: a Feb 29 date falls on Feb 28 in non-leap years.
 */

import { DateTime } from 'luxon'
import type { DateKind, PartialDate } from '../contacts/types.js'

export interface ProjectionOptions {
  /** Compute the age / anniversary count when the date has a year */
  showYear: boolean
  /** IANA zone that decides calendar days; system zone when absent */
  timezone?: string
}

export interface Occurrence {
  dateKind: DateKind
  /** `yyyy-MM-dd` */
  date: string
  /** Years since the original date, or null when not shown or unknown */
  count: number | null
}

const ISO_DATE_FORMAT = 'yyyy-MM-dd'

/**
 * Next occurrence on or after the reference instant's calendar day.
 */
export function project(
  date: PartialDate,
  dateKind: DateKind,
  reference: Date,
  options: ProjectionOptions,
): Occurrence {
  const today = DateTime.fromJSDate(reference, { zone: options.timezone }).startOf('day')

  let occurrence = occurrenceInYear(date, today.year, options.timezone)
  if (occurrence.toMillis() < today.toMillis()) {
    occurrence = occurrenceInYear(date, today.year + 1, options.timezone)
  }

  return toOccurrence(date, dateKind, occurrence, options)
}

/**
 * Every occurrence whose whole day intersects [from, to), at most one per year.
 */
export function occurrencesBetween(
  date: PartialDate,
  dateKind: DateKind,
  from: Date,
  to: Date,
  options: ProjectionOptions,
): Occurrence[] {
  const start = DateTime.fromJSDate(from, { zone: options.timezone })
  const end = DateTime.fromJSDate(to, { zone: options.timezone })
  if (end.toMillis() <= start.toMillis()) return []

  const occurrences: Occurrence[] = []
  for (let year = start.year; year <= end.year; year++) {
    const dayStart = occurrenceInYear(date, year, options.timezone)
    const dayEnd = dayStart.plus({ days: 1 })
    if (dayStart.toMillis() < end.toMillis() && dayEnd.toMillis() > start.toMillis()) {
      occurrences.push(toOccurrence(date, dateKind, dayStart, options))
    }
  }
  return occurrences
}

/**
 * Start of the day on which `date` falls in `year`.
 */
export function occurrenceInYear(date: PartialDate, year: number, timezone?: string): DateTime {
  const isLeapDay = date.month === 2 && date.day === 29
  const day = isLeapDay && !DateTime.fromObject({ year }).isInLeapYear ? 28 : date.day
  return DateTime.fromObject({ year, month: date.month, day }, { zone: timezone })
}

/**
 * English ordinal: 1st, 2nd, 3rd, 4th, 11th, 12th, 13th, 21st, 111th.
 */
export function ordinal(n: number): string {
  const lastTwo = Math.abs(n) % 100
  if (lastTwo >= 11 && lastTwo <= 13) return `${n}th`

  switch (Math.abs(n) % 10) {
    case 1:
      return `${n}st`
    case 2:
      return `${n}nd`
    case 3:
      return `${n}rd`
    default:
      return `${n}th`
  }
}

function toOccurrence(
  date: PartialDate,
  dateKind: DateKind,
  day: DateTime,
  options: ProjectionOptions,
): Occurrence {
  let count: number | null = null
  if (options.showYear && date.year !== undefined) {
    const years = day.year - date.year
    // In or before the starting year there is nothing to count yet
    count = years >= 1 ? years : null
  }

  return { dateKind, date: day.toFormat(ISO_DATE_FORMAT), count }
}
