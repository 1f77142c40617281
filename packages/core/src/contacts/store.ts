/**
 * Contact Store
 *
 * Persists the last successfully fetched contact set of one calendar, so a
 * restarted host serves the previous events before its first fetch returns.
 * Contacts are written in the raw payload shape and read back through the
 * normalizer like any other source.
 *
 * @module contacts/store
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { normalizeBatch } from './normalizer.js'
import { errorMessage } from './errors.js'
import type { Contact, RawContactPayload } from './types.js'

const STORE_VERSION = 1

export interface StoredContacts {
  contacts: Contact[]
  fetchedAt: Date
}

/**
 * Last-known-good contacts of one calendar. `load` resolves null when
 * nothing usable is stored.
 */
export interface ContactStore {
  load(): Promise<StoredContacts | null>
  save(contacts: readonly Contact[], fetchedAt: Date): Promise<void>
}

const storedFileSchema = z.object({
  version: z.literal(STORE_VERSION),
  fetchedAt: z.string().datetime(),
  contacts: z.array(z.record(z.unknown())),
})

export class FileContactStore implements ContactStore {
  readonly filePath: string

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async load(): Promise<StoredContacts | null> {
    let content: string
    try {
      content = await readFile(this.filePath, 'utf-8')
    } catch {
      // Missing file: first run for this calendar
      console.log(`[ContactStore] No stored contacts at ${this.filePath}, starting fresh`)
      return null
    }

    let document: unknown
    try {
      document = JSON.parse(content)
    } catch (err) {
      console.warn(`[ContactStore] Ignoring unreadable ${this.filePath}: ${errorMessage(err)}`)
      return null
    }

    const parsed = storedFileSchema.safeParse(document)
    if (!parsed.success) {
      console.warn(`[ContactStore] Ignoring ${this.filePath}: unsupported format`)
      return null
    }

    const { contacts } = normalizeBatch(parsed.data.contacts)
    console.log(`[ContactStore] Loaded ${contacts.length} contacts fetched at ${parsed.data.fetchedAt}`)

    return { contacts, fetchedAt: new Date(parsed.data.fetchedAt) }
  }

  async save(contacts: readonly Contact[], fetchedAt: Date): Promise<void> {
    const data = {
      version: STORE_VERSION,
      fetchedAt: fetchedAt.toISOString(),
      savedAt: new Date().toISOString(),
      contacts: contacts.map(toStoredPayload),
    }

    await mkdir(dirname(this.filePath), { recursive: true })
    await writeFile(this.filePath, JSON.stringify(data, null, 2))
  }
}

/**
 * The payload shape the normalizer accepts, with dates keyed by kind.
 */
export function toStoredPayload(contact: Contact): RawContactPayload {
  return {
    id: contact.id,
    names: { ...contact.names },
    groups: Array.from(contact.groups).sort(),
    dates: { ...contact.significantDates },
  }
}
