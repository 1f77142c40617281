/**
 * Sync Coordinator
 *
 * Owns the refresh loop of one calendar: fetch from the contact source,
 * normalize, filter, materialize, diff against the last snapshot and
 * notify listeners of the delta only.
 *
 * State machine: idle → fetching → materializing → idle. A failed fetch
 * goes straight back to idle and keeps serving the last good snapshot.
 * With a ContactStore, that snapshot survives restarts: start() restores it
 * before the first fetch and every successful cycle saves it.
 *
 * @module calendar/sync-coordinator
 */

import { EventEmitter } from 'node:events'
import { ContactCache } from '../contacts/cache.js'
import { normalizeBatch } from '../contacts/normalizer.js'
import { AuthError, errorMessage } from '../contacts/errors.js'
import type { ContactStore, StoredContacts } from '../contacts/store.js'
import { filterByGroup } from './group-filter.js'
import {
  compareEvents,
  diffEvents,
  expandBetween,
  isEmptyChangeSet,
  materialize,
  summarizeContactDates,
} from './materializer.js'
import type { AccountCredential, Contact, ContactSource, RawContactPayload } from '../contacts/types.js'
import type {
  CalendarEvent,
  ChangeSet,
  ContactDateSummary,
  SubentryConfig,
  SyncCoordinatorOptions,
  SyncErrorState,
  SyncOutcome,
  SyncSnapshot,
  SyncState,
  SyncStatus,
} from './types.js'

export const DEFAULT_REFRESH_INTERVAL_MS = 30 * 60 * 1000 // 30 minutes

type SyncTrigger = 'initial' | 'timer' | 'manual' | 'credential'

export class SyncCoordinator extends EventEmitter {
  private source: ContactSource
  private config: SubentryConfig
  private credential: AccountCredential
  private refreshIntervalMs: number
  private now: () => Date
  private store: ContactStore | null
  private cache = new ContactCache()
  private snapshot: SyncSnapshot = { events: new Map(), contacts: [], fetchedAt: null }
  private snapshotConfig: SubentryConfig
  private timer: ReturnType<typeof setInterval> | null = null
  private inFlight: Promise<SyncOutcome> | null = null
  // Bumped by stop(); cycles started under an older generation publish nothing
  private generation = 0
  private state: SyncState = 'idle'
  private running = false
  private authSuspended = false
  private lastAttemptAt: Date | null = null
  private lastSuccessAt: Date | null = null
  private lastError: SyncErrorState | null = null

  constructor(source: ContactSource, options: SyncCoordinatorOptions) {
    super()
    this.source = source
    this.config = options.config
    this.snapshotConfig = options.config
    this.credential = options.credential
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS
    this.now = options.now ?? (() => new Date())
    this.store = options.store ?? null
  }

  private get tag(): string {
    return `[SyncCoordinator:${this.config.id}]`
  }

  // ─── Lifecycle ───

  /**
   * Start the refresh loop. Restores stored contacts, runs a first cycle
   * immediately and resolves with its outcome.
   */
  async start(): Promise<SyncOutcome> {
    if (this.running) {
      console.log(`${this.tag} Already running`)
      return { status: 'skipped', reason: 'Already running' }
    }

    this.running = true
    this.state = 'idle'
    console.log(`${this.tag} Starting with refresh interval ${this.refreshIntervalMs}ms`)

    if (this.store) {
      const generation = this.generation
      await this.restore(this.store)
      if (generation !== this.generation) {
        return { status: 'skipped', reason: 'Coordinator stopped during restore' }
      }
    }

    this.timer = setInterval(() => this.tick(), this.refreshIntervalMs)

    return this.runCycle('initial')
  }

  /**
   * Stop the refresh loop. An in-flight fetch is abandoned: it may still
   * complete, but its result is never published.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }

    this.generation++
    this.inFlight = null
    this.running = false
    this.state = 'stopped'
    console.log(`${this.tag} Stopped`)
  }

  // ─── Host interface ───

  /**
   * Events whose day intersects [start, end), ordered by date then key.
   * Empty before the first successful sync.
   */
  eventsBetween(start: Date, end: Date): CalendarEvent[] {
    if (!this.snapshot.fetchedAt) return []
    return expandBetween(this.snapshot.contacts, this.snapshotConfig, start, end)
  }

  /**
   * Register a listener for non-empty deltas. Returns an unsubscribe function.
   */
  onChange(callback: (changes: ChangeSet) => void): () => void {
    return this.subscribe('change', callback)
  }

  /**
   * Register a listener for error-state transitions (set or cleared).
   */
  onStatus(callback: (status: SyncStatus) => void): () => void {
    return this.subscribe('status', callback)
  }

  /**
   * Request an out-of-cycle sync. Joins the in-flight cycle when there is one.
   */
  forceRefresh(): Promise<SyncOutcome> {
    if (this.state === 'stopped') {
      return Promise.resolve({ status: 'skipped', reason: 'Coordinator stopped' })
    }
    return this.inFlight ?? this.runCycle('manual')
  }

  /**
   * Replace the credential after re-authentication and sync with it.
   */
  updateCredential(credential: AccountCredential): Promise<SyncOutcome> {
    this.credential = credential
    this.authSuspended = false
    if (this.state === 'stopped') {
      return Promise.resolve({ status: 'skipped', reason: 'Coordinator stopped' })
    }
    return this.inFlight ?? this.runCycle('credential')
  }

  /**
   * Swap the calendar configuration and rematerialize from cached contacts.
   * Waits for an in-flight cycle so a cycle never sees two configs.
   */
  async reconfigure(config: SubentryConfig): Promise<SyncOutcome> {
    if (this.inFlight) await this.inFlight

    this.config = config
    if (!this.cache.isPopulated) {
      return { status: 'unchanged' }
    }

    return this.publish(this.cache.all(), config, this.snapshot.fetchedAt ?? this.now())
  }

  // ─── Queries ───

  /**
   * Earliest upcoming event as of now, or null when there is none.
   */
  nextEvent(): CalendarEvent | null {
    if (!this.snapshot.fetchedAt) return null

    const upcoming = Array.from(materialize(this.snapshot.contacts, this.snapshotConfig, this.now()).values())
    upcoming.sort(compareEvents)
    return upcoming[0] ?? null
  }

  contactDates(): ContactDateSummary[] {
    return summarizeContactDates(this.snapshot.contacts, this.snapshotConfig)
  }

  getSnapshot(): SyncSnapshot {
    return this.snapshot
  }

  getConfig(): SubentryConfig {
    return this.config
  }

  getStatus(): SyncStatus {
    const nextRefreshAt =
      this.running && !this.authSuspended && this.lastAttemptAt
        ? new Date(this.lastAttemptAt.getTime() + this.refreshIntervalMs)
        : null

    return {
      state: this.state,
      refreshIntervalMs: this.refreshIntervalMs,
      lastAttemptAt: this.lastAttemptAt?.toISOString() ?? null,
      lastSuccessAt: this.lastSuccessAt?.toISOString() ?? null,
      nextRefreshAt: nextRefreshAt?.toISOString() ?? null,
      eventCount: this.snapshot.events.size,
      contactCount: this.snapshot.contacts.length,
      error: this.lastError ? { ...this.lastError } : null,
    }
  }

  // ─── Cycle ───

  private tick(): void {
    if (this.inFlight) {
      console.log(`${this.tag} Refresh still in flight, dropping timer tick`)
      return
    }
    if (this.authSuspended) {
      console.log(`${this.tag} Waiting for re-authentication, skipping timer tick`)
      return
    }

    this.runCycle('timer').catch((err) => {
      console.error(`${this.tag} Refresh error:`, err)
    })
  }

  private runCycle(trigger: SyncTrigger): Promise<SyncOutcome> {
    const cycle: Promise<SyncOutcome> = this.executeCycle(trigger, this.generation).finally(() => {
      if (this.inFlight === cycle) this.inFlight = null
    })
    this.inFlight = cycle
    return cycle
  }

  private async executeCycle(trigger: SyncTrigger, generation: number): Promise<SyncOutcome> {
    const config = this.config
    this.state = 'fetching'
    this.lastAttemptAt = this.now()
    console.log(`${this.tag} Refreshing contacts (${trigger})`)

    let payloads: RawContactPayload[]
    try {
      payloads = await this.source.fetchContacts(this.credential)
    } catch (err) {
      if (generation !== this.generation) {
        return { status: 'skipped', reason: 'Coordinator stopped during fetch' }
      }
      return this.recordFailure(err)
    }

    if (generation !== this.generation) {
      return { status: 'skipped', reason: 'Coordinator stopped during fetch' }
    }

    this.state = 'materializing'
    const fetchedAt = this.now()

    let outcome: SyncOutcome
    try {
      const { contacts, skipped } = normalizeBatch(payloads)
      for (const record of skipped) {
        console.warn(`${this.tag} Skipping contact record #${record.index}: ${record.reason}`)
      }

      const delta = this.cache.replace(contacts)
      console.log(
        `${this.tag} ${contacts.length} contacts (${delta.added} added, ${delta.updated} updated, ${delta.removed} removed)`,
      )

      outcome = this.publish(this.cache.all(), config, fetchedAt)
    } finally {
      // The previous snapshot stays published when anything above throws
      if (this.state === 'materializing') this.state = 'idle'
    }

    this.lastSuccessAt = fetchedAt
    this.authSuspended = false
    if (this.lastError) {
      this.lastError = null
      this.emitStatus()
    }

    if (this.store) await this.persist(this.store, fetchedAt)

    return outcome
  }

  // ─── Persistence ───

  private async restore(store: ContactStore): Promise<void> {
    let stored: StoredContacts | null
    try {
      stored = await store.load()
    } catch (err) {
      console.error(`${this.tag} Error loading stored contacts:`, err)
      return
    }

    // A cycle that already completed is newer than anything on disk
    if (!stored || this.cache.isPopulated) return

    this.cache.replace(stored.contacts)
    this.publish(this.cache.all(), this.config, stored.fetchedAt)
    console.log(`${this.tag} Restored ${stored.contacts.length} contacts fetched at ${stored.fetchedAt.toISOString()}`)
  }

  private async persist(store: ContactStore, fetchedAt: Date): Promise<void> {
    try {
      await store.save(this.cache.all(), fetchedAt)
    } catch (err) {
      console.error(`${this.tag} Error saving contacts:`, err)
    }
  }

  /**
   * Materialize, diff and swap the snapshot. Notifies only on a non-empty delta.
   */
  private publish(contacts: readonly Contact[], config: SubentryConfig, fetchedAt: Date): SyncOutcome {
    const filtered = filterByGroup(contacts, config.groupFilter)
    const events = materialize(filtered, config, this.now())
    const changes = diffEvents(this.snapshot.events, events)

    this.snapshot = { events, contacts: filtered, fetchedAt }
    this.snapshotConfig = config

    if (isEmptyChangeSet(changes)) {
      console.log(`${this.tag} ${events.size} events, unchanged`)
      return { status: 'unchanged' }
    }

    console.log(
      `${this.tag} ${events.size} events (${changes.added.length} added, ${changes.updated.length} updated, ${changes.removed.length} removed)`,
    )
    this.emit('change', changes)
    return { status: 'updated', changes }
  }

  private recordFailure(err: unknown): SyncOutcome {
    const isAuth = err instanceof AuthError
    const error: SyncErrorState = {
      kind: isAuth ? 'auth' : 'transient',
      message: errorMessage(err),
      at: this.now().toISOString(),
    }

    if (isAuth) {
      this.authSuspended = true
      console.error(`${this.tag} Credential rejected, automatic refresh suspended: ${error.message}`)
    } else {
      console.warn(`${this.tag} Refresh failed, retrying on next tick: ${error.message}`)
    }

    this.lastError = error
    this.state = 'idle'
    this.emitStatus()

    return { status: 'failed', error }
  }

  private emitStatus(): void {
    this.emit('status', this.getStatus())
  }

  private subscribe<T>(eventName: 'change' | 'status', callback: (payload: T) => void): () => void {
    // A throwing listener must not break the cycle that notified it
    const listener = (payload: T) => {
      try {
        callback(payload)
      } catch (err) {
        console.error(`${this.tag} Error in ${eventName} listener:`, err)
      }
    }

    this.on(eventName, listener)
    return () => {
      this.off(eventName, listener)
    }
  }
}
