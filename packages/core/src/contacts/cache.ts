/**
 * Contact Cache
 *
 * Holds the last successfully normalized contact set of one calendar,
 * keyed by contact id. Replaced wholesale on every successful fetch; the
 * returned delta is what the refresh actually changed.
 *
 * @module contacts/cache
 */

import type { Contact } from './types.js'

export interface ContactCacheDelta {
  added: number
  updated: number
  removed: number
}

export class ContactCache {
  private contacts = new Map<string, { contact: Contact; fingerprint: string }>()
  private populated = false

  /**
   * Replace the cached set and report what changed.
   */
  replace(contacts: readonly Contact[]): ContactCacheDelta {
    const next = new Map<string, { contact: Contact; fingerprint: string }>()
    const delta: ContactCacheDelta = { added: 0, updated: 0, removed: 0 }

    for (const contact of contacts) {
      const fingerprint = contactFingerprint(contact)
      const previous = this.contacts.get(contact.id)
      if (!previous) {
        delta.added++
      } else if (previous.fingerprint !== fingerprint) {
        delta.updated++
      }
      next.set(contact.id, { contact, fingerprint })
    }

    for (const id of this.contacts.keys()) {
      if (!next.has(id)) delta.removed++
    }

    this.contacts = next
    this.populated = true
    return delta
  }

  /** All cached contacts, ordered by id */
  all(): Contact[] {
    return Array.from(this.contacts.values(), (entry) => entry.contact).sort((a, b) =>
      a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
    )
  }

  get(id: string): Contact | undefined {
    return this.contacts.get(id)?.contact
  }

  /** False until the first successful fetch */
  get isPopulated(): boolean {
    return this.populated
  }

  get size(): number {
    return this.contacts.size
  }
}

/**
 * Order-independent serialization of a contact, used for change detection.
 */
export function contactFingerprint(contact: Contact): string {
  return JSON.stringify([
    contact.id,
    Object.entries(contact.names).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    Array.from(contact.groups).sort(),
    Object.entries(contact.significantDates)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([kind, date]) => [kind, date.month, date.day, date.year ?? null]),
  ])
}
