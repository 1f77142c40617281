import { vi } from 'vitest'
import type { AccountCredential, Contact, ContactSource, PartialDate, RawContactPayload } from '../src/contacts/types.js'
import type { SubentryConfig } from '../src/calendar/types.js'
import type { ContactStore, StoredContacts } from '../src/contacts/store.js'

export const TEST_CREDENTIAL: AccountCredential = { username: 'test-user', password: 'test-secret' }

export function makeContact(
  id: string,
  options: {
    names?: Record<string, string>
    groups?: string[]
    dates?: Record<string, PartialDate>
  } = {},
): Contact {
  return {
    id,
    names: options.names ?? {},
    groups: new Set(options.groups ?? []),
    significantDates: options.dates ?? {},
  }
}

export function makeConfig(overrides: Partial<SubentryConfig> = {}): SubentryConfig {
  return {
    id: 'birthdays',
    name: 'Birthdays',
    displayNamePreference: ['nickname', 'full-name'],
    showYear: true,
    timezone: 'UTC',
    ...overrides,
  }
}

/**
 * Contact source whose next responses are queued by the test.
 */
export class FakeContactSource implements ContactSource {
  readonly name = 'fake'
  payloads: RawContactPayload[] = []
  private queue: Array<() => Promise<RawContactPayload[]>> = []
  readonly fetchContacts = vi.fn(async (_credential: AccountCredential): Promise<RawContactPayload[]> => {
    const next = this.queue.shift()
    if (next) return next()
    return this.payloads
  })

  /** Fail the next fetch with `error` */
  failNext(error: Error): void {
    this.queue.push(() => Promise.reject(error))
  }

  /** Hold the next fetch open until the returned function is called */
  holdNext(): (payloads?: RawContactPayload[]) => void {
    let release: (payloads?: RawContactPayload[]) => void = () => {}
    const pending = new Promise<RawContactPayload[]>((resolve) => {
      release = (payloads) => resolve(payloads ?? this.payloads)
    })
    this.queue.push(() => pending)
    return (payloads) => release(payloads)
  }
}

/**
 * Contact store that keeps the saved snapshot in memory.
 */
export class MemoryContactStore implements ContactStore {
  stored: StoredContacts | null = null
  readonly load = vi.fn(async (): Promise<StoredContacts | null> => this.stored)
  readonly save = vi.fn(async (contacts: readonly Contact[], fetchedAt: Date): Promise<void> => {
    this.stored = { contacts: [...contacts], fetchedAt }
  })
}

export function birthdayPayload(id: string, name: string, date: string, groups: string[] = []): RawContactPayload {
  return {
    id,
    names: { 'full-name': name },
    groups,
    dates: [{ kind: 'birthday', date }],
  }
}
