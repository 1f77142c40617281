import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { FileContactStore, toStoredPayload } from '../src/contacts/store.js'
import { makeContact } from './helpers.js'

const FETCHED_AT = new Date('2026-01-01T10:00:00.000Z')

describe('FileContactStore', () => {
  let tempDir: string
  let filePath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'contact-dates-test-'))
    filePath = path.join(tempDir, 'contacts', 'personal', 'family.json')
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('round-trips contacts and the fetch time', async () => {
    const matt = makeContact('c1', {
      names: { nickname: 'Matt', 'full-name': 'Matthew Smith' },
      groups: ['Work', 'Family'],
      dates: { birthday: { year: 1999, month: 3, day: 15 }, constructor: { month: 6, day: 1 } },
    })
    const store = new FileContactStore(filePath)

    await store.save([matt], FETCHED_AT)
    const loaded = await store.load()

    expect(loaded?.fetchedAt).toEqual(FETCHED_AT)
    expect(loaded?.contacts).toHaveLength(1)
    const [contact] = loaded?.contacts ?? []
    expect(contact.id).toBe('c1')
    expect(contact.names).toEqual({ nickname: 'Matt', 'full-name': 'Matthew Smith' })
    expect(Array.from(contact.groups)).toEqual(['Family', 'Work'])
    expect(Object.entries(contact.significantDates)).toEqual([
      ['birthday', { year: 1999, month: 3, day: 15 }],
      ['constructor', { month: 6, day: 1 }],
    ])
  })

  it('writes a versioned JSON document', async () => {
    await new FileContactStore(filePath).save([makeContact('c1', { names: { 'full-name': 'Ann' } })], FETCHED_AT)

    const document = JSON.parse(fs.readFileSync(filePath, 'utf-8'))
    expect(document).toMatchObject({
      version: 1,
      fetchedAt: '2026-01-01T10:00:00.000Z',
      contacts: [{ id: 'c1', names: { 'full-name': 'Ann' }, groups: [], dates: {} }],
    })
  })

  it('loads nothing when the file is missing', async () => {
    expect(await new FileContactStore(filePath).load()).toBeNull()
  })

  it('ignores unreadable and unknown documents', async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })

    fs.writeFileSync(filePath, '{ not json')
    expect(await new FileContactStore(filePath).load()).toBeNull()

    fs.writeFileSync(filePath, JSON.stringify({ version: 99, fetchedAt: FETCHED_AT.toISOString(), contacts: [] }))
    expect(await new FileContactStore(filePath).load()).toBeNull()
  })
})

describe('toStoredPayload', () => {
  it('sorts groups and keys dates by kind', () => {
    const contact = makeContact('c1', {
      names: { 'full-name': 'Matt' },
      groups: ['Work', 'Family'],
      dates: { birthday: { month: 3, day: 15 } },
    })

    expect(toStoredPayload(contact)).toEqual({
      id: 'c1',
      names: { 'full-name': 'Matt' },
      groups: ['Family', 'Work'],
      dates: { birthday: { month: 3, day: 15 } },
    })
  })
})
