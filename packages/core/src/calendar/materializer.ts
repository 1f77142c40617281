/**
 * Event Materializer
 *
 * Pure functions from (contacts, config, reference time) to calendar events.
 * Event identity comes from the contact id and date kind, never from the
 * title, so renames and duplicate names keep their events.
 */

import { filterByGroup } from './group-filter.js'
import { resolveName } from './name-resolver.js'
import { occurrencesBetween, ordinal, project, type Occurrence } from './date-projector.js'
import type { Contact, DateKind } from '../contacts/types.js'
import type { CalendarEvent, ChangeSet, ContactDateSummary, SubentryConfig } from './types.js'

const KNOWN_LABELS = new Map<DateKind, string>([
  ['birthday', 'Birthday'],
  ['anniversary', 'Anniversary'],
])

export function eventKey(contactId: string, dateKind: DateKind): string {
  return `${contactId}#${dateKind}`
}

/**
 * Title-case label for a date kind: "name-day" → "Name Day".
 */
export function dateKindLabel(dateKind: DateKind): string {
  const known = KNOWN_LABELS.get(dateKind)
  if (known) return known

  return dateKind
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ')
}

export function formatTitle(name: string, dateKind: DateKind, count: number | null): string {
  const label = dateKindLabel(dateKind)
  return count === null ? `${name}'s ${label}` : `${name}'s ${ordinal(count)} ${label}`
}

/**
 * Materialize the next occurrence of every qualifying date, keyed by event key.
 */
export function materialize(
  contacts: readonly Contact[],
  config: SubentryConfig,
  reference: Date,
): Map<string, CalendarEvent> {
  const events = new Map<string, CalendarEvent>()
  const options = { showYear: config.showYear, timezone: config.timezone }

  for (const contact of orderedContacts(contacts, config)) {
    const name = resolveName(contact, config.displayNamePreference)
    for (const dateKind of qualifyingKinds(contact, config)) {
      const occurrence = project(contact.significantDates[dateKind], dateKind, reference, options)
      const event = buildEvent(contact, name, occurrence)
      events.set(event.key, event)
    }
  }

  return events
}

/**
 * Every occurrence intersecting [from, to), ordered by date then key.
 */
export function expandBetween(
  contacts: readonly Contact[],
  config: SubentryConfig,
  from: Date,
  to: Date,
): CalendarEvent[] {
  const events: CalendarEvent[] = []
  const options = { showYear: config.showYear, timezone: config.timezone }

  for (const contact of orderedContacts(contacts, config)) {
    const name = resolveName(contact, config.displayNamePreference)
    for (const dateKind of qualifyingKinds(contact, config)) {
      const date = contact.significantDates[dateKind]
      for (const occurrence of occurrencesBetween(date, dateKind, from, to, options)) {
        events.push(buildEvent(contact, name, occurrence))
      }
    }
  }

  return events.sort(compareEvents)
}

/**
 * Keys added, removed, or whose event value changed.
 */
export function diffEvents(
  previous: ReadonlyMap<string, CalendarEvent>,
  next: ReadonlyMap<string, CalendarEvent>,
): ChangeSet {
  const changes: ChangeSet = { added: [], removed: [], updated: [] }

  for (const [key, event] of next) {
    const before = previous.get(key)
    if (!before) {
      changes.added.push(key)
    } else if (!eventsEqual(before, event)) {
      changes.updated.push(key)
    }
  }

  for (const key of previous.keys()) {
    if (!next.has(key)) changes.removed.push(key)
  }

  return changes
}

export function isEmptyChangeSet(changes: ChangeSet): boolean {
  return changes.added.length === 0 && changes.removed.length === 0 && changes.updated.length === 0
}

export function eventsEqual(a: CalendarEvent, b: CalendarEvent): boolean {
  return (
    a.key === b.key &&
    a.contactId === b.contactId &&
    a.dateKind === b.dateKind &&
    a.title === b.title &&
    a.date === b.date &&
    a.allDay === b.allDay
  )
}

export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1
  if (a.key !== b.key) return a.key < b.key ? -1 : 1
  return 0
}

/**
 * Significant dates of the group-filtered contacts, for listings.
 */
export function summarizeContactDates(contacts: readonly Contact[], config: SubentryConfig): ContactDateSummary[] {
  const summaries: ContactDateSummary[] = []

  for (const contact of orderedContacts(contacts, config)) {
    const name = resolveName(contact, config.displayNamePreference)
    for (const dateKind of qualifyingKinds(contact, config)) {
      const { year, month, day } = contact.significantDates[dateKind]
      const monthDay = `${pad(month)}-${pad(day)}`
      summaries.push({
        contactId: contact.id,
        name,
        dateKind,
        date: year === undefined ? `--${monthDay}` : `${String(year).padStart(4, '0')}-${monthDay}`,
      })
    }
  }

  return summaries
}

function buildEvent(contact: Contact, name: string, occurrence: Occurrence): CalendarEvent {
  return {
    key: eventKey(contact.id, occurrence.dateKind),
    contactId: contact.id,
    dateKind: occurrence.dateKind,
    title: formatTitle(name, occurrence.dateKind, occurrence.count),
    date: occurrence.date,
    allDay: true,
  }
}

function orderedContacts(contacts: readonly Contact[], config: SubentryConfig): Contact[] {
  return filterByGroup(contacts, config.groupFilter).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
}

/**
 * Configured kinds present on the contact (in configured order), or every
 * kind the contact has (sorted) when the config lists none.
 */
function qualifyingKinds(contact: Contact, config: SubentryConfig): DateKind[] {
  const present = Object.keys(contact.significantDates)
  if (!config.dateKinds) return present.sort()

  const wanted = [...new Set(config.dateKinds)]
  return wanted.filter((kind) => present.includes(kind))
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}
