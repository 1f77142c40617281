/**
 * Sync Coordinator Tests
 *
 * Drives the refresh loop against an in-process contact source:
 * - change notification carries only the delta
 * - failed fetches keep the last good snapshot
 * - auth failures suspend automatic refresh
 * - overlapping triggers share one fetch
 * - stored contacts are served across restarts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { SyncCoordinator } from '../src/calendar/sync-coordinator.js'
import { AuthError, TransientFetchError } from '../src/contacts/errors.js'
import { normalize } from '../src/contacts/normalizer.js'
import type { ContactStore } from '../src/contacts/store.js'
import type { ChangeSet, SubentryConfig } from '../src/calendar/types.js'
import { FakeContactSource, MemoryContactStore, TEST_CREDENTIAL, birthdayPayload, makeConfig } from './helpers.js'

const NOW = new Date('2026-01-01T00:00:00Z')
const WINDOW_START = new Date('2026-01-01T00:00:00Z')
const WINDOW_END = new Date('2027-01-01T00:00:00Z')

describe('SyncCoordinator', () => {
  let source: FakeContactSource
  let coordinators: SyncCoordinator[]

  function createCoordinator(
    config: SubentryConfig = makeConfig(),
    refreshIntervalMs = 60_000,
    store?: ContactStore,
  ): SyncCoordinator {
    const coordinator = new SyncCoordinator(source, {
      config,
      credential: TEST_CREDENTIAL,
      refreshIntervalMs,
      store,
      now: () => NOW,
    })
    coordinators.push(coordinator)
    return coordinator
  }

  beforeEach(() => {
    source = new FakeContactSource()
    source.payloads = [birthdayPayload('c1', 'Matt', '1999-03-15', ['Family'])]
    coordinators = []

    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    for (const coordinator of coordinators) coordinator.stop()
    vi.restoreAllMocks()
    vi.useRealTimers()
  })

  // ─── Publishing ───

  describe('publishing', () => {
    it('serves nothing before the first successful sync', () => {
      const coordinator = createCoordinator()
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toEqual([])
      expect(coordinator.nextEvent()).toBeNull()
    })

    it('publishes the materialized events after the first sync', async () => {
      const coordinator = createCoordinator()

      const outcome = await coordinator.start()

      expect(outcome).toEqual({
        status: 'updated',
        changes: { added: ['c1#birthday'], removed: [], updated: [] },
      })
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toEqual([
        {
          key: 'c1#birthday',
          contactId: 'c1',
          dateKind: 'birthday',
          title: "Matt's 27th Birthday",
          date: '2026-03-15',
          allDay: true,
        },
      ])
      expect(source.fetchContacts).toHaveBeenCalledWith(TEST_CREDENTIAL)
    })

    it('does not notify when a refresh changes nothing', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      const listener = vi.fn()
      coordinator.onChange(listener)

      const outcome = await coordinator.forceRefresh()

      expect(outcome).toEqual({ status: 'unchanged' })
      expect(listener).not.toHaveBeenCalled()
    })

    it('notifies listeners with the delta only', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      const changes: ChangeSet[] = []
      coordinator.onChange((delta) => changes.push(delta))

      source.payloads = [
        birthdayPayload('c1', 'Matty', '1999-03-15'),
        birthdayPayload('c2', 'Ann', '--06-01'),
      ]
      await coordinator.forceRefresh()

      expect(changes).toEqual([{ added: ['c2#birthday'], removed: [], updated: ['c1#birthday'] }])
    })

    it('stops notifying after unsubscribe', async () => {
      const coordinator = createCoordinator()
      const listener = vi.fn()
      const unsubscribe = coordinator.onChange(listener)
      unsubscribe()

      await coordinator.start()

      expect(listener).not.toHaveBeenCalled()
    })

    it('keeps going when a listener throws', async () => {
      const coordinator = createCoordinator()
      coordinator.onChange(() => {
        throw new Error('listener failure')
      })
      const second = vi.fn()
      coordinator.onChange(second)

      const outcome = await coordinator.start()

      expect(outcome.status).toBe('updated')
      expect(second).toHaveBeenCalledTimes(1)
      expect(console.error).toHaveBeenCalled()
    })

    it('handles name fields and date kinds named like Object members', async () => {
      source.payloads = [
        {
          id: 'c1',
          names: { 'full-name': 'Matt' },
          dates: [{ kind: 'constructor', date: '1999-03-15' }],
        },
      ]
      const coordinator = createCoordinator(makeConfig({ displayNamePreference: ['constructor'] }))

      const outcome = await coordinator.start()

      expect(outcome).toEqual({
        status: 'updated',
        changes: { added: ['c1#constructor'], removed: [], updated: [] },
      })
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END).map((e) => e.title)).toEqual([
        "Matt's 27th Constructor",
      ])
      expect(coordinator.getStatus().state).toBe('idle')
    })

    it('skips malformed records without aborting the cycle', async () => {
      source.payloads = [{ names: { 'full-name': 'No Id' } }, birthdayPayload('c1', 'Matt', '1999-03-15')]
      const coordinator = createCoordinator()

      await coordinator.start()

      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END).map((e) => e.key)).toEqual(['c1#birthday'])
      expect(console.warn).toHaveBeenCalledWith(
        '[SyncCoordinator:birthdays] Skipping contact record #0: Contact record has no usable id',
      )
    })
  })

  // ─── Failures ───

  describe('failures', () => {
    it('keeps the last snapshot and reports a transient failure', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      const statuses = vi.fn()
      coordinator.onStatus(statuses)

      source.failNext(new TransientFetchError('CardDAV fetch failed: boom'))
      const outcome = await coordinator.forceRefresh()

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'transient', message: 'CardDAV fetch failed: boom', at: '2026-01-01T00:00:00.000Z' },
      })
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toHaveLength(1)
      expect(coordinator.getStatus().error?.kind).toBe('transient')
      expect(statuses).toHaveBeenCalledTimes(1)

      await coordinator.forceRefresh()

      expect(coordinator.getStatus().error).toBeNull()
      expect(statuses).toHaveBeenCalledTimes(2)
      expect(statuses.mock.calls[1][0].error).toBeNull()
    })

    it('treats unexpected errors as transient', async () => {
      source.failNext(new Error('socket hang up'))
      const coordinator = createCoordinator()

      const outcome = await coordinator.start()

      expect(outcome.status).toBe('failed')
      expect(coordinator.getStatus().error).toEqual({
        kind: 'transient',
        message: 'socket hang up',
        at: '2026-01-01T00:00:00.000Z',
      })
    })

    it('returns to idle when a cycle throws after the fetch', async () => {
      source.payloads = [
        {
          get id(): string {
            throw new Error('broken record')
          },
        },
      ]
      const coordinator = createCoordinator()

      await expect(coordinator.start()).rejects.toThrow('broken record')
      expect(coordinator.getStatus().state).toBe('idle')
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toEqual([])

      source.payloads = [birthdayPayload('c1', 'Matt', '1999-03-15')]
      const outcome = await coordinator.forceRefresh()
      expect(outcome.status).toBe('updated')
      expect(coordinator.getStatus().state).toBe('idle')
    })

    it('suspends timer refreshes after an auth error until the credential changes', async () => {
      vi.useFakeTimers()
      source.failNext(new AuthError('CardDAV credentials rejected: 401'))
      const coordinator = createCoordinator(makeConfig(), 1000)

      const first = await coordinator.start()
      expect(first.status).toBe('failed')
      expect(coordinator.getStatus().error?.kind).toBe('auth')
      expect(coordinator.getStatus().nextRefreshAt).toBeNull()

      await vi.advanceTimersByTimeAsync(3000)
      expect(source.fetchContacts).toHaveBeenCalledTimes(1)

      const renewed = { username: 'test-user', password: 'new-test-secret' }
      const outcome = await coordinator.updateCredential(renewed)
      expect(outcome.status).toBe('updated')
      expect(source.fetchContacts).toHaveBeenLastCalledWith(renewed)

      await vi.advanceTimersByTimeAsync(1000)
      expect(source.fetchContacts).toHaveBeenCalledTimes(3)
    })

    it('retries a transient failure on the next tick', async () => {
      vi.useFakeTimers()
      source.failNext(new TransientFetchError('timeout'))
      const coordinator = createCoordinator(makeConfig(), 1000)

      await coordinator.start()
      await vi.advanceTimersByTimeAsync(1000)

      expect(source.fetchContacts).toHaveBeenCalledTimes(2)
      expect(coordinator.getStatus().error).toBeNull()
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toHaveLength(1)
    })
  })

  // ─── Concurrency ───

  describe('concurrency', () => {
    it('drops timer ticks while a fetch is in flight', async () => {
      vi.useFakeTimers()
      const release = source.holdNext()
      const coordinator = createCoordinator(makeConfig(), 1000)

      const started = coordinator.start()
      await vi.advanceTimersByTimeAsync(3500)
      expect(source.fetchContacts).toHaveBeenCalledTimes(1)

      release()
      await started
      await vi.advanceTimersByTimeAsync(1000)
      expect(source.fetchContacts).toHaveBeenCalledTimes(2)
    })

    it('joins an in-flight cycle on forceRefresh', async () => {
      const release = source.holdNext()
      const coordinator = createCoordinator()

      const started = coordinator.start()
      const forced = coordinator.forceRefresh()
      release()

      const [first, second] = await Promise.all([started, forced])
      expect(second).toBe(first)
      expect(source.fetchContacts).toHaveBeenCalledTimes(1)
    })

    it('publishes nothing from a fetch that completes after stop', async () => {
      const release = source.holdNext()
      const coordinator = createCoordinator()
      const listener = vi.fn()
      coordinator.onChange(listener)

      const started = coordinator.start()
      coordinator.stop()
      release()

      expect(await started).toEqual({ status: 'skipped', reason: 'Coordinator stopped during fetch' })
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toEqual([])
      expect(listener).not.toHaveBeenCalled()
      expect(coordinator.getStatus().state).toBe('stopped')
      expect(await coordinator.forceRefresh()).toEqual({ status: 'skipped', reason: 'Coordinator stopped' })
    })
  })

  // ─── Reconfiguration ───

  describe('reconfigure', () => {
    beforeEach(() => {
      source.payloads = [
        birthdayPayload('c1', 'Matt', '1999-03-15', ['Family']),
        birthdayPayload('c2', 'Ann', '--06-01', ['Coworkers']),
      ]
    })

    it('rematerializes from cached contacts and notifies the delta', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      const listener = vi.fn()
      coordinator.onChange(listener)

      const outcome = await coordinator.reconfigure(makeConfig({ groupFilter: 'family' }))

      expect(outcome).toEqual({ status: 'updated', changes: { added: [], removed: ['c2#birthday'], updated: [] } })
      expect(listener).toHaveBeenCalledTimes(1)
      expect(source.fetchContacts).toHaveBeenCalledTimes(1)
      expect(coordinator.getConfig().groupFilter).toBe('family')
    })

    it('updates titles when the year display changes', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()

      const outcome = await coordinator.reconfigure(makeConfig({ showYear: false }))

      expect(outcome).toEqual({ status: 'updated', changes: { added: [], removed: [], updated: ['c1#birthday'] } })
      expect(coordinator.nextEvent()?.title).toBe("Matt's Birthday")
    })

    it('only stores the config before the first sync', async () => {
      const coordinator = createCoordinator()
      expect(await coordinator.reconfigure(makeConfig({ groupFilter: 'Family' }))).toEqual({ status: 'unchanged' })

      await coordinator.start()
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END).map((e) => e.key)).toEqual(['c1#birthday'])
    })
  })

  // ─── Persistence ───

  describe('persistence', () => {
    const STORED_AT = new Date('2025-12-31T00:00:00Z')

    it('serves stored contacts before the first fetch completes', async () => {
      const store = new MemoryContactStore()
      store.stored = { contacts: [normalize(birthdayPayload('c1', 'Matt', '1999-03-15'))], fetchedAt: STORED_AT }
      const release = source.holdNext()
      const coordinator = createCoordinator(makeConfig(), 60_000, store)

      const started = coordinator.start()
      await vi.waitFor(() => expect(source.fetchContacts).toHaveBeenCalledTimes(1))

      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END).map((e) => e.title)).toEqual([
        "Matt's 27th Birthday",
      ])
      expect(coordinator.getSnapshot().fetchedAt).toEqual(STORED_AT)

      release()
      expect(await started).toEqual({ status: 'unchanged' })
      expect(coordinator.getSnapshot().fetchedAt).toEqual(NOW)
    })

    it('saves contacts after successful syncs only', async () => {
      const store = new MemoryContactStore()
      const coordinator = createCoordinator(makeConfig(), 60_000, store)

      await coordinator.start()
      expect(store.save).toHaveBeenCalledTimes(1)
      expect(store.stored?.contacts.map((contact) => contact.id)).toEqual(['c1'])
      expect(store.stored?.fetchedAt).toEqual(NOW)

      source.failNext(new TransientFetchError('timeout'))
      await coordinator.forceRefresh()
      expect(store.save).toHaveBeenCalledTimes(1)
    })

    it('keeps syncing when the store fails', async () => {
      const store = new MemoryContactStore()
      store.load.mockRejectedValueOnce(new Error('disk unavailable'))
      store.save.mockRejectedValueOnce(new Error('disk unavailable'))
      const coordinator = createCoordinator(makeConfig(), 60_000, store)

      const outcome = await coordinator.start()

      expect(outcome.status).toBe('updated')
      expect(coordinator.getStatus().state).toBe('idle')
      expect(coordinator.eventsBetween(WINDOW_START, WINDOW_END)).toHaveLength(1)
    })
  })

  // ─── Queries ───

  describe('queries', () => {
    beforeEach(() => {
      source.payloads = [
        birthdayPayload('c2', 'Ann', '--06-01'),
        birthdayPayload('c1', 'Matt', '1999-03-15'),
      ]
    })

    it('returns the earliest upcoming event', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      expect(coordinator.nextEvent()?.key).toBe('c1#birthday')
    })

    it('lists contact dates', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()
      expect(coordinator.contactDates()).toEqual([
        { contactId: 'c1', name: 'Matt', dateKind: 'birthday', date: '1999-03-15' },
        { contactId: 'c2', name: 'Ann', dateKind: 'birthday', date: '--06-01' },
      ])
    })

    it('reports status after a successful sync', async () => {
      const coordinator = createCoordinator()
      await coordinator.start()

      expect(coordinator.getStatus()).toEqual({
        state: 'idle',
        refreshIntervalMs: 60_000,
        lastAttemptAt: '2026-01-01T00:00:00.000Z',
        lastSuccessAt: '2026-01-01T00:00:00.000Z',
        nextRefreshAt: '2026-01-01T00:01:00.000Z',
        eventCount: 2,
        contactCount: 2,
        error: null,
      })
    })
  })
})
