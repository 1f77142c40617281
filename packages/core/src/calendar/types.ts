/**
 * Calendar Types
 *
 * Subentry configuration, materialized events and the coordinator's
 * observable state.
 */

import type { AccountCredential, Contact, DateKind, NameField } from '../contacts/types.js'
import type { ContactStore } from '../contacts/store.js'

/**
 * One user-configured calendar derived from an account's contacts.
 * Validated before it reaches the engine and immutable during a sync cycle.
 */
export interface SubentryConfig {
  /** Calendar identifier, unique within its account */
  id: string

  /** Human-readable calendar name */
  name: string

  /** Ordered, non-empty list of name fields to try for event titles */
  displayNamePreference: NameField[]

  /** Only contacts in this group; all contacts when absent */
  groupFilter?: string

  /** Include the age / anniversary count in titles */
  showYear: boolean

  /** Date kinds to materialize; every kind present on a contact when absent */
  dateKinds?: DateKind[]

  /** IANA zone used to decide what "today" is; system zone when absent */
  timezone?: string
}

/**
 * One whole-day event. Never mutated: each sync builds a new set.
 */
export interface CalendarEvent {
  /** `{contactId}#{dateKind}`, stable across refreshes */
  key: string
  contactId: string
  dateKind: DateKind
  title: string
  /** Occurrence date, `yyyy-MM-dd` */
  date: string
  allDay: true
}

/** Keys that changed between two materialized sets */
export interface ChangeSet {
  added: string[]
  removed: string[]
  updated: string[]
}

/**
 * Last successfully materialized state of one calendar.
 */
export interface SyncSnapshot {
  events: ReadonlyMap<string, CalendarEvent>
  /** Group-filtered contacts the events were built from */
  contacts: readonly Contact[]
  fetchedAt: Date | null
}

export type SyncState = 'idle' | 'fetching' | 'materializing' | 'stopped'

export interface SyncErrorState {
  kind: 'auth' | 'transient'
  message: string
  at: string
}

export interface SyncStatus {
  state: SyncState
  refreshIntervalMs: number
  lastAttemptAt: string | null
  lastSuccessAt: string | null
  nextRefreshAt: string | null
  eventCount: number
  contactCount: number
  /** Set after a failed cycle, cleared by the next successful one */
  error: SyncErrorState | null
}

export type SyncOutcome =
  | { status: 'updated'; changes: ChangeSet }
  | { status: 'unchanged' }
  | { status: 'failed'; error: SyncErrorState }
  | { status: 'skipped'; reason: string }

/** One significant date of a filtered contact, for listings */
export interface ContactDateSummary {
  contactId: string
  name: string
  dateKind: DateKind
  /** `yyyy-MM-dd`, or `--MM-dd` when the year is unknown */
  date: string
}

export interface SyncCoordinatorOptions {
  config: SubentryConfig
  credential: AccountCredential
  refreshIntervalMs?: number
  /** Last-known-good contacts across restarts; in memory only when absent */
  store?: ContactStore
  /** Clock, overridable in tests */
  now?: () => Date
}

// ─── Configuration ───

/**
 * One remote address book and the calendars derived from it.
 */
export interface AccountConfig {
  id: string
  /** CardDAV server root */
  serverUrl: string
  /** Address book display name or URL suffix; every address book when absent */
  addressBook?: string
  refreshIntervalMs: number
  timeoutMs: number
  calendars: SubentryConfig[]
}

export interface ContactDatesConfig {
  dataDir: string
  accounts: AccountConfig[]
}

/** Basic-auth credentials keyed by account id */
export type CredentialStore = Record<string, AccountCredential>
