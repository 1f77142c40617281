/**
 * ICS Feed
 *
 * Renders a window of materialized events as an iCalendar document so
 * any calendar client can subscribe to a contact calendar.
 */

import { DateTime } from 'luxon'
import type { CalendarEvent } from './types.js'

export interface IcsOptions {
  calendarName: string
  /** DTSTAMP for every event; defaults to now */
  generatedAt?: Date
}

const PRODID = '-//contact-dates//contact calendar//EN'
const UID_DOMAIN = 'contact-dates'
const MAX_LINE_OCTETS = 75

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n')
}

/**
 * Fold a content line longer than 75 octets into CRLF + space continuations.
 * Splits between characters, never inside a UTF-8 sequence.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line

  const parts: string[] = []
  let current = ''
  let octets = 0
  for (const char of line) {
    const size = Buffer.byteLength(char, 'utf8')
    // Continuation lines spend one octet on the leading space
    const limit = parts.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1
    if (octets + size > limit) {
      parts.push(current)
      current = ''
      octets = 0
    }
    current += char
    octets += size
  }
  parts.push(current)

  return parts.join('\r\n ')
}

export function serializeIcs(events: readonly CalendarEvent[], options: IcsOptions): string {
  const dtstamp = DateTime.fromJSDate(options.generatedAt ?? new Date())
    .toUTC()
    .toFormat("yyyyMMdd'T'HHmmss'Z'")

  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODID}`,
    'CALSCALE:GREGORIAN',
    `X-WR-CALNAME:${escapeICalText(options.calendarName)}`,
  ]

  for (const event of events) {
    const day = DateTime.fromISO(event.date, { zone: 'utc' })
    lines.push(
      'BEGIN:VEVENT',
      `UID:${event.key}/${event.date}@${UID_DOMAIN}`,
      `DTSTAMP:${dtstamp}`,
      `DTSTART;VALUE=DATE:${day.toFormat('yyyyMMdd')}`,
      `DTEND;VALUE=DATE:${day.plus({ days: 1 }).toFormat('yyyyMMdd')}`,
      `SUMMARY:${escapeICalText(event.title)}`,
      `CATEGORIES:${escapeICalText(event.dateKind)}`,
      'TRANSP:TRANSPARENT',
      'END:VEVENT',
    )
  }

  lines.push('END:VCALENDAR')
  return lines.map(foldLine).join('\r\n') + '\r\n'
}
