/**
 * Contact Calendar Manager
 *
 * Builds one SyncCoordinator (with its own contact source and store) per
 * configured calendar and owns their lifecycle. Hosts hold an instance;
 * there is no process-wide registry.
 */

import * as path from 'node:path'
import { CardDavContactSource } from '../contacts/carddav-source.js'
import { FileContactStore, type ContactStore } from '../contacts/store.js'
import { SyncCoordinator } from './sync-coordinator.js'
import { credentialFor } from './config.js'
import type { ContactSource } from '../contacts/types.js'
import type { AccountConfig, ContactDatesConfig, CredentialStore, SubentryConfig } from './types.js'

const CONTACTS_DIR_NAME = 'contacts'

export interface ManagedCalendar {
  /** `{accountId}/{calendarId}` */
  path: string
  accountId: string
  calendarId: string
  coordinator: SyncCoordinator
}

export interface ContactCalendarManagerOptions {
  /** Source per calendar; CardDAV by default */
  createSource?: (account: AccountConfig) => ContactSource
  /** Store per calendar; a JSON file under the data directory by default, none when it returns null */
  createStore?: (account: AccountConfig, calendar: SubentryConfig) => ContactStore | null
  /** Clock handed to every coordinator */
  now?: () => Date
}

export function calendarPath(accountId: string, calendarId: string): string {
  return `${accountId}/${calendarId}`
}

/**
 * `<dataDir>/contacts/{accountId}/{calendarId}.json`
 */
export function contactStorePath(dataDir: string, accountId: string, calendarId: string): string {
  return path.join(dataDir, CONTACTS_DIR_NAME, accountId, `${calendarId}.json`)
}

export class ContactCalendarManager {
  private calendars = new Map<string, ManagedCalendar>()
  private started = false

  /**
   * @throws ConfigError when an account has no credentials
   */
  constructor(config: ContactDatesConfig, credentials: CredentialStore, options: ContactCalendarManagerOptions = {}) {
    const createSource =
      options.createSource ??
      ((account: AccountConfig) =>
        new CardDavContactSource({
          serverUrl: account.serverUrl,
          addressBook: account.addressBook,
          timeoutMs: account.timeoutMs,
        }))
    const createStore =
      options.createStore ??
      ((account: AccountConfig, calendar: SubentryConfig) =>
        new FileContactStore(contactStorePath(config.dataDir, account.id, calendar.id)))

    for (const account of config.accounts) {
      const credential = credentialFor(credentials, account.id)

      for (const calendar of account.calendars) {
        const path = calendarPath(account.id, calendar.id)
        const coordinator = new SyncCoordinator(createSource(account), {
          config: calendar,
          credential,
          refreshIntervalMs: account.refreshIntervalMs,
          store: createStore(account, calendar) ?? undefined,
          now: options.now,
        })
        this.calendars.set(path, { path, accountId: account.id, calendarId: calendar.id, coordinator })
      }
    }
  }

  /**
   * Start every coordinator. Resolves once each has finished its first cycle;
   * failed cycles are reported through status, not thrown.
   */
  async start(): Promise<void> {
    if (this.started) return
    this.started = true

    console.log(`[Calendars] Starting ${this.calendars.size} contact calendar(s)`)
    await Promise.all(Array.from(this.calendars.values(), ({ coordinator }) => coordinator.start()))
  }

  stop(): void {
    if (!this.started) return
    this.started = false

    for (const { coordinator } of this.calendars.values()) {
      coordinator.stop()
    }
    console.log('[Calendars] Stopped')
  }

  /**
   * Look up a calendar by `{accountId}/{calendarId}`.
   */
  get(path: string): ManagedCalendar | undefined {
    return this.calendars.get(path)
  }

  list(): ManagedCalendar[] {
    return Array.from(this.calendars.values())
  }

  get size(): number {
    return this.calendars.size
  }
}
