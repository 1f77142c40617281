/**
 * vCard Reader
 *
 * Turns vCard 3.0/4.0 text into raw contact payloads for the normalizer.
 * Only the properties the calendar needs are read: identity, names,
 * significant dates and group membership. Date values are passed through
 * as text; the normalizer decides whether they are usable.
 */

import type { RawContactPayload } from './types.js'

export interface VCardProperty {
  /** Apple-style property group, e.g. "item1" in "item1.X-ABDATE" */
  group: string | null
  name: string
  params: Map<string, string>
  value: string
}

export type VCardContactPayload = {
  id?: string
  names: Record<string, string>
  groups: string[]
  dates: Array<{ kind: string; date: string }>
}

export type VCardRecord =
  | { kind: 'contact'; payload: VCardContactPayload }
  | { kind: 'group'; name: string; members: string[] }

const UUID_URN_PREFIX = 'urn:uuid:'

// Apple wraps its built-in labels: _$!<Anniversary>!$_
const APPLE_LABEL_PATTERN = /^_\$!<(.+)>!\$_$/

export function unfoldLines(text: string): string[] {
  const unfolded: string[] = []

  for (const line of text.split(/\r?\n/)) {
    if ((line.startsWith(' ') || line.startsWith('\t')) && unfolded.length > 0) {
      unfolded[unfolded.length - 1] += line.substring(1)
    } else if (line.length > 0) {
      unfolded.push(line)
    }
  }

  return unfolded
}

export function parseProperty(line: string): VCardProperty | null {
  const colonIdx = line.indexOf(':')
  if (colonIdx === -1) return null

  const beforeColon = line.substring(0, colonIdx)
  const value = line.substring(colonIdx + 1)

  const [qualifiedName, ...paramParts] = beforeColon.split(';')
  const dotIdx = qualifiedName.indexOf('.')
  const group = dotIdx === -1 ? null : qualifiedName.substring(0, dotIdx)
  const name = dotIdx === -1 ? qualifiedName : qualifiedName.substring(dotIdx + 1)

  const params = new Map<string, string>()
  for (const part of paramParts) {
    const eqIdx = part.indexOf('=')
    if (eqIdx === -1) {
      // vCard 2.1 bare parameter, e.g. "BDAY;TEXT:"
      params.set(part.toUpperCase(), '')
    } else {
      params.set(part.substring(0, eqIdx).toUpperCase(), part.substring(eqIdx + 1).replace(/^"(.*)"$/, '$1'))
    }
  }

  return { group, name: name.toUpperCase(), params, value }
}

/**
 * Split on a separator that is not escaped with a backslash, then unescape each part.
 */
export function splitValue(value: string, separator: ';' | ','): string[] {
  const parts: string[] = []
  let current = ''

  for (let i = 0; i < value.length; i++) {
    const ch = value[i]
    if (ch === '\\' && i + 1 < value.length) {
      current += ch + value[i + 1]
      i++
    } else if (ch === separator) {
      parts.push(current)
      current = ''
    } else {
      current += ch
    }
  }
  parts.push(current)

  return parts.map(unescapeText)
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

/**
 * Parse every card in a vCard document.
 */
export function parseVCards(text: string): VCardRecord[] {
  const records: VCardRecord[] = []
  let current: VCardProperty[] | null = null

  for (const line of unfoldLines(text)) {
    const upper = line.toUpperCase()
    if (upper === 'BEGIN:VCARD') {
      current = []
      continue
    }
    if (upper === 'END:VCARD') {
      if (current) records.push(toRecord(current))
      current = null
      continue
    }
    if (!current) continue

    const prop = parseProperty(line)
    if (prop) current.push(prop)
  }

  return records
}

/**
 * Add the name of every group card to the `groups` of its members.
 * Group cards themselves are not contacts and are dropped.
 */
export function resolveGroupMemberships(records: readonly VCardRecord[]): RawContactPayload[] {
  const membership = new Map<string, string[]>()
  for (const record of records) {
    if (record.kind !== 'group') continue
    for (const member of record.members) {
      const groups = membership.get(member) ?? []
      groups.push(record.name)
      membership.set(member, groups)
    }
  }

  const payloads: RawContactPayload[] = []
  for (const record of records) {
    if (record.kind !== 'contact') continue
    const extra = record.payload.id ? membership.get(record.payload.id) ?? [] : []
    payloads.push({
      ...record.payload,
      groups: [...record.payload.groups, ...extra.filter((g) => !record.payload.groups.includes(g))],
    })
  }

  return payloads
}

/**
 * Date kind from an Apple X-ABLabel: "_$!<Anniversary>!$_" → "anniversary",
 * "Name Day" → "name-day".
 */
export function dateKindFromLabel(label: string): string {
  const match = APPLE_LABEL_PATTERN.exec(label.trim())
  const text = match ? match[1] : label
  return text.trim().toLowerCase().replace(/\s+/g, '-')
}

function toRecord(props: VCardProperty[]): VCardRecord {
  const kind = props.find((p) => p.name === 'KIND' || p.name === 'X-ADDRESSBOOKSERVER-KIND')
  if (kind?.value.trim().toLowerCase() === 'group') {
    return {
      kind: 'group',
      name: unescapeText(props.find((p) => p.name === 'FN')?.value ?? '').trim(),
      members: props
        .filter((p) => p.name === 'MEMBER' || p.name === 'X-ADDRESSBOOKSERVER-MEMBER')
        .map((p) => stripUuidUrn(p.value.trim())),
    }
  }

  return { kind: 'contact', payload: toContactPayload(props) }
}

function toContactPayload(props: VCardProperty[]): VCardContactPayload {
  const payload: VCardContactPayload = { names: {}, groups: [], dates: [] }
  const labels = new Map<string, string>()

  for (const prop of props) {
    if (prop.group && prop.name === 'X-ABLABEL') {
      labels.set(prop.group, prop.value)
    }
  }

  for (const prop of props) {
    switch (prop.name) {
      case 'UID':
        payload.id = stripUuidUrn(prop.value.trim())
        break
      case 'FN':
        payload.names['full-name'] = unescapeText(prop.value)
        break
      case 'N': {
        const [family = '', given = ''] = splitValue(prop.value, ';').map((part) => part.trim())
        if (family) payload.names['family-name'] = family
        if (given) payload.names['given-name'] = given
        const lastFirst = [family, given].filter(Boolean).join(', ')
        if (lastFirst) payload.names['full-name-last-first'] = lastFirst
        break
      }
      case 'NICKNAME': {
        const nickname = splitValue(prop.value, ',').find((n) => n.trim())
        if (nickname) payload.names.nickname = nickname.trim()
        break
      }
      case 'BDAY':
        payload.dates.push({ kind: 'birthday', date: dateText(prop) })
        break
      case 'ANNIVERSARY':
      case 'X-ANNIVERSARY':
        payload.dates.push({ kind: 'anniversary', date: dateText(prop) })
        break
      case 'X-ABDATE': {
        const label = prop.group ? labels.get(prop.group) : undefined
        payload.dates.push({ kind: label ? dateKindFromLabel(label) : 'other', date: dateText(prop) })
        break
      }
      case 'CATEGORIES':
        for (const category of splitValue(prop.value, ',')) {
          const trimmed = category.trim()
          if (trimmed && !payload.groups.includes(trimmed)) payload.groups.push(trimmed)
        }
        break
    }
  }

  return payload
}

/**
 * Date text with Apple's placeholder year removed:
 * BDAY;X-APPLE-OMIT-YEAR=1604:1604-03-15 → --03-15
 */
function dateText(prop: VCardProperty): string {
  const value = prop.value.trim()
  const omitYear = prop.params.get('X-APPLE-OMIT-YEAR')
  if (omitYear && value.startsWith(omitYear)) {
    return `--${value.substring(omitYear.length).replace(/^-/, '')}`
  }
  return value
}

function stripUuidUrn(value: string): string {
  return value.toLowerCase().startsWith(UUID_URN_PREFIX) ? value.substring(UUID_URN_PREFIX.length) : value
}
