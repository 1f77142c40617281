/**
 * Contact Record Normalizer
 *
 * The only place that deals with "maybe this field exists". Raw payloads
 * come in untrusted; a typed Contact comes out. Everything except the id
 * degrades to empty instead of failing.
 *
 * @module contacts/normalizer
 */

import { DateTime } from 'luxon'
import { z } from 'zod'
import { MalformedRecordError, errorMessage } from './errors.js'
import type { Contact, PartialDate, RawContactPayload } from './types.js'

// Leap year used to check (month, day) independent of any real year
const REFERENCE_LEAP_YEAR = 2000

const idSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1))

const payloadSchema = z.object({
  id: idSchema,
  names: z.record(z.unknown()).catch({}),
  groups: z.array(z.unknown()).catch([]),
  dates: z.union([z.array(z.unknown()), z.record(z.unknown())]).catch([]),
})

const dateObjectSchema = z.object({
  month: z.coerce.number().int(),
  day: z.coerce.number().int(),
  year: z.coerce.number().int().nullish().catch(null),
})

const dateEntrySchema = z.object({
  kind: z.string().trim().min(1),
  date: z.unknown().optional(),
})

// --0315, --03-15 (vCard yearless)
const YEARLESS_PATTERN = /^--(\d{2})-?(\d{2})(?:$|T)/
// 1999-03-15, 19990315, optionally followed by a time part
const FULL_DATE_PATTERN = /^(\d{4})-?(\d{2})-?(\d{2})(?:$|T)/

export interface NormalizedBatch {
  contacts: Contact[]
  skipped: Array<{ index: number; reason: string }>
}

/**
 * Convert one raw payload into a Contact.
 *
 * @throws MalformedRecordError when the payload carries no usable id
 */
export function normalize(raw: RawContactPayload): Contact {
  const parsed = payloadSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedRecordError('Contact record has no usable id')
  }

  const { id, names, groups, dates } = parsed.data

  return {
    id,
    names: normalizeNames(names),
    groups: normalizeGroups(groups),
    significantDates: normalizeDates(dates),
  }
}

/**
 * Normalize a whole batch. Malformed records are skipped and reported,
 * as are records repeating an id already seen in the batch.
 */
export function normalizeBatch(payloads: readonly RawContactPayload[]): NormalizedBatch {
  const contacts: Contact[] = []
  const skipped: NormalizedBatch['skipped'] = []
  const seen = new Set<string>()

  payloads.forEach((payload, index) => {
    try {
      const contact = normalize(payload)
      if (seen.has(contact.id)) {
        skipped.push({ index, reason: `Duplicate contact id: ${contact.id}` })
        return
      }
      seen.add(contact.id)
      contacts.push(contact)
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err
      skipped.push({ index, reason: errorMessage(err) })
    }
  })

  return { contacts, skipped }
}

/**
 * Parse a date given either as `{ month, day, year? }` or as vCard date text.
 * Returns null when the value does not denote a valid calendar day.
 */
export function parsePartialDate(value: unknown): PartialDate | null {
  let candidate: { month: number; day: number; year?: number | null } | null = null

  if (typeof value === 'string') {
    candidate = parseDateText(value.trim())
  } else {
    const parsed = dateObjectSchema.safeParse(value)
    if (parsed.success) candidate = parsed.data
  }

  if (!candidate) return null

  const { month, day, year } = candidate
  if (!DateTime.local(REFERENCE_LEAP_YEAR, month, day).isValid) {
    return null
  }

  // Year 0 is the "year unknown" marker used by several address books
  return year && year > 0 ? { month, day, year } : { month, day }
}

function parseDateText(text: string): { month: number; day: number; year?: number } | null {
  const yearless = YEARLESS_PATTERN.exec(text)
  if (yearless) {
    return { month: Number(yearless[1]), day: Number(yearless[2]) }
  }

  const full = FULL_DATE_PATTERN.exec(text)
  if (full) {
    return { year: Number(full[1]), month: Number(full[2]), day: Number(full[3]) }
  }

  return null
}

// Keys are address-book identifiers: "constructor" is an ordinary field name

function normalizeNames(names: Record<string, unknown>): Record<string, string> {
  const result = new Map<string, string>()
  for (const [field, value] of Object.entries(names)) {
    if (typeof value !== 'string') continue
    const trimmed = value.trim()
    if (trimmed) result.set(field, trimmed)
  }
  return Object.fromEntries(result)
}

function normalizeGroups(groups: unknown[]): Set<string> {
  const result = new Set<string>()
  for (const group of groups) {
    if (typeof group !== 'string') continue
    const trimmed = group.trim()
    if (trimmed) result.add(trimmed)
  }
  return result
}

function normalizeDates(dates: unknown[] | Record<string, unknown>): Record<string, PartialDate> {
  const entries: Array<[string, unknown]> = Array.isArray(dates)
    ? dates.flatMap((entry): Array<[string, unknown]> => {
        const parsed = dateEntrySchema.safeParse(entry)
        if (!parsed.success) return []
        // `{ kind, date }` or `{ kind, month, day, year }`
        return [[parsed.data.kind, parsed.data.date ?? entry]]
      })
    : Object.entries(dates)

  const result = new Map<string, PartialDate>()
  for (const [kind, value] of entries) {
    // First occurrence of a kind wins
    if (result.has(kind)) continue
    const date = parsePartialDate(value)
    if (date) result.set(kind, date)
  }
  return Object.fromEntries(result)
}
