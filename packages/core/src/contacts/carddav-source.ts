/**
 * CardDAV Contact Source
 *
 * Implements ContactSource using tsdav against any CardDAV server
 * (Nextcloud, Baikal, iCloud, Google's CardDAV endpoint with an app password).
 *
 * Address books that advertise a sync token are synced incrementally
 * (RFC 6578 sync-collection): an unchanged token skips the download, a new
 * one fetches only the changed cards. A rejected token falls back to a full
 * fetch. Cards whose ETag did not change are not re-parsed.
 */

import { createDAVClient, DAVNamespaceShort, type DAVAddressBook } from 'tsdav'
import { AuthError, TransientFetchError, isContactSyncError, errorMessage } from './errors.js'
import { parseVCards, resolveGroupMemberships, type VCardRecord } from './vcard.js'
import { withTimeout } from '../utils/timeout.js'
import type { AccountCredential, ContactSource, RawContactPayload } from './types.js'

// Type for the DAV client returned by createDAVClient
type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>
type SyncResponses = Awaited<ReturnType<DAVClientInstance['syncCollection']>>

const DEFAULT_TIMEOUT_MS = 10_000

const AUTH_FAILURE_PATTERN = /\b(401|403)\b|unauthori[sz]ed|forbidden|invalid credentials/i

export interface CardDavSourceOptions {
  serverUrl: string
  /** Display name or last URL segment of the address book; all address books when omitted */
  addressBook?: string
  timeoutMs?: number
}

interface CachedCard {
  etag: string
  records: VCardRecord[]
}

interface SyncedAddressBook {
  /** Token the cards are current for; absent when the server offers none */
  syncToken?: string
  /** Keyed by card URL */
  cards: Map<string, CachedCard>
}

interface AddressBookSync {
  book: SyncedAddressBook
  parsed: number
}

export class CardDavContactSource implements ContactSource {
  readonly name: string
  private options: CardDavSourceOptions
  private timeoutMs: number
  private client: DAVClientInstance | null = null
  private clientCredential: AccountCredential | null = null
  private books = new Map<string, SyncedAddressBook>()

  constructor(options: CardDavSourceOptions) {
    this.options = options
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.name = `carddav:${options.serverUrl}`
  }

  async fetchContacts(credential: AccountCredential): Promise<RawContactPayload[]> {
    try {
      return await withTimeout(
        this.fetchAll(credential),
        this.timeoutMs,
        () => new TransientFetchError(`CardDAV fetch timed out after ${this.timeoutMs}ms`),
      )
    } catch (err) {
      // Next attempt starts from a fresh login
      this.client = null
      throw classifyFetchError(err)
    }
  }

  private async fetchAll(credential: AccountCredential): Promise<RawContactPayload[]> {
    const client = await this.getClient(credential)
    const addressBooks = this.selectAddressBooks(await client.fetchAddressBooks())

    const books = new Map<string, SyncedAddressBook>()
    let parsed = 0

    for (const addressBook of addressBooks) {
      const previous = this.books.get(addressBook.url)
      const result =
        (previous ? await this.syncDelta(client, addressBook, previous) : null) ??
        (await this.fetchFull(client, addressBook, previous))

      books.set(addressBook.url, result.book)
      parsed += result.parsed
    }

    // Address books that disappeared are dropped with this swap
    this.books = books

    const cards = Array.from(books.values()).flatMap((book) => Array.from(book.cards.values()))
    console.log(
      `[CardDAV] Fetched ${cards.length} cards from ${addressBooks.length} address book(s), ${parsed} parsed`,
    )

    return resolveGroupMemberships(cards.flatMap((card) => card.records))
  }

  /**
   * Bring a previously fetched address book up to date from its sync token.
   * Returns null when a full fetch is needed instead.
   */
  private async syncDelta(
    client: DAVClientInstance,
    addressBook: DAVAddressBook,
    previous: SyncedAddressBook,
  ): Promise<AddressBookSync | null> {
    const token = addressBook.syncToken
    if (!token || !previous.syncToken) return null
    if (token === previous.syncToken) {
      return { book: previous, parsed: 0 }
    }

    let responses: SyncResponses
    try {
      responses = await client.syncCollection({
        url: addressBook.url,
        props: { [`${DAVNamespaceShort.DAV}:getetag`]: {} },
        syncLevel: 1,
        syncToken: previous.syncToken,
      })
    } catch (err) {
      console.warn(`[CardDAV] Delta sync of ${addressBook.url} failed, performing full fetch: ${errorMessage(err)}`)
      return null
    }

    // An expired or unknown token comes back as a failed response, not a throw
    const rejected = responses.find((response) => !response.ok)
    if (rejected) {
      console.warn(`[CardDAV] Sync token of ${addressBook.url} rejected (${rejected.status}), performing full fetch`)
      return null
    }

    const cards = new Map(previous.cards)
    const changedUrls: string[] = []
    let removed = 0

    for (const response of responses) {
      if (!response.href) continue
      const url = new URL(response.href, addressBook.url).href
      if (url === addressBook.url) continue

      if (response.status === 404) {
        if (cards.delete(url)) removed++
      } else {
        changedUrls.push(url)
      }
    }

    const vcards = changedUrls.length > 0 ? await client.fetchVCards({ addressBook, objectUrls: changedUrls }) : []
    let parsed = 0
    for (const vcard of vcards) {
      if (typeof vcard.data !== 'string') continue
      cards.set(vcard.url, { etag: vcard.etag ?? '', records: parseVCards(vcard.data) })
      parsed++
    }

    console.log(`[CardDAV] Delta sync of ${addressBook.url}: ${parsed} changed, ${removed} removed`)
    return { book: { syncToken: token, cards }, parsed }
  }

  private async fetchFull(
    client: DAVClientInstance,
    addressBook: DAVAddressBook,
    previous: SyncedAddressBook | undefined,
  ): Promise<AddressBookSync> {
    const vcards = await client.fetchVCards({ addressBook })
    const cards = new Map<string, CachedCard>()
    let parsed = 0

    for (const vcard of vcards) {
      if (typeof vcard.data !== 'string') continue

      const etag = vcard.etag ?? ''
      const cached = previous?.cards.get(vcard.url)
      if (cached && etag && cached.etag === etag) {
        cards.set(vcard.url, cached)
      } else {
        cards.set(vcard.url, { etag, records: parseVCards(vcard.data) })
        parsed++
      }
    }

    return { book: { syncToken: addressBook.syncToken, cards }, parsed }
  }

  private async getClient(credential: AccountCredential): Promise<DAVClientInstance> {
    if (
      this.client &&
      this.clientCredential?.username === credential.username &&
      this.clientCredential.password === credential.password
    ) {
      return this.client
    }

    this.client = await createDAVClient({
      serverUrl: this.options.serverUrl,
      credentials: {
        username: credential.username,
        password: credential.password,
      },
      authMethod: 'Basic',
      defaultAccountType: 'carddav',
    })
    this.clientCredential = { ...credential }

    return this.client
  }

  private selectAddressBooks(addressBooks: DAVAddressBook[]): DAVAddressBook[] {
    const wanted = this.options.addressBook
    if (!wanted) return addressBooks

    const match = addressBooks.find((book) => {
      const urlParts = book.url.replace(/\/$/, '').split('/')
      return book.displayName === wanted || urlParts[urlParts.length - 1] === wanted
    })

    if (!match) {
      throw new TransientFetchError(`Address book not found: ${wanted}`)
    }
    return [match]
  }
}

/**
 * Map an arbitrary failure onto the source error taxonomy.
 */
export function classifyFetchError(err: unknown): AuthError | TransientFetchError {
  if (err instanceof AuthError || err instanceof TransientFetchError) return err
  if (isContactSyncError(err)) return new TransientFetchError(err.message, { cause: err })

  const message = errorMessage(err)
  if (AUTH_FAILURE_PATTERN.test(message)) {
    return new AuthError(`CardDAV credentials rejected: ${message}`, { cause: err })
  }
  return new TransientFetchError(`CardDAV fetch failed: ${message}`, { cause: err })
}

export function createCardDavContactSource(options: CardDavSourceOptions): CardDavContactSource {
  return new CardDavContactSource(options)
}
