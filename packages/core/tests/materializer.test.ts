import { describe, it, expect } from 'vitest'
import {
  dateKindLabel,
  diffEvents,
  expandBetween,
  formatTitle,
  isEmptyChangeSet,
  materialize,
  summarizeContactDates,
} from '../src/calendar/materializer.js'
import { makeConfig, makeContact } from './helpers.js'

const REFERENCE = new Date('2026-01-01T00:00:00Z')

const matt = makeContact('c1', {
  names: { nickname: 'Matt', 'full-name': 'Matthew Smith' },
  groups: ['Family'],
  dates: { birthday: { year: 1999, month: 3, day: 15 } },
})

const ann = makeContact('c2', {
  names: { 'full-name': 'Ann Lee' },
  groups: ['Friends'],
  dates: {
    birthday: { month: 6, day: 1 },
    anniversary: { year: 2010, month: 6, day: 1 },
  },
})

describe('materialize', () => {
  it('builds one titled all-day event per qualifying date', () => {
    const events = materialize([matt], makeConfig(), REFERENCE)

    expect(Array.from(events.values())).toEqual([
      {
        key: 'c1#birthday',
        contactId: 'c1',
        dateKind: 'birthday',
        title: "Matt's 27th Birthday",
        date: '2026-03-15',
        allDay: true,
      },
    ])
  })

  it('leaves the count out when years are hidden', () => {
    const events = materialize([matt], makeConfig({ showYear: false }), REFERENCE)
    expect(events.get('c1#birthday')?.title).toBe("Matt's Birthday")
  })

  it('produces nothing for a group nobody belongs to', () => {
    expect(materialize([matt, ann], makeConfig({ groupFilter: 'Coworkers' }), REFERENCE).size).toBe(0)
  })

  it('keeps same-day dates of different kinds as separate events', () => {
    const events = materialize([ann], makeConfig(), REFERENCE)

    expect(Array.from(events.keys())).toEqual(['c2#anniversary', 'c2#birthday'])
    expect(events.get('c2#anniversary')?.title).toBe("Ann Lee's 16th Anniversary")
    expect(events.get('c2#birthday')?.title).toBe("Ann Lee's Birthday")
    expect(events.get('c2#anniversary')?.date).toBe('2026-06-01')
    expect(events.get('c2#birthday')?.date).toBe('2026-06-01')
  })

  it('materializes only the configured date kinds', () => {
    const events = materialize([matt, ann], makeConfig({ dateKinds: ['anniversary'] }), REFERENCE)
    expect(Array.from(events.keys())).toEqual(['c2#anniversary'])
  })

  it('is idempotent for the same input', () => {
    const first = materialize([matt, ann], makeConfig(), REFERENCE)
    const second = materialize([ann, matt], makeConfig(), REFERENCE)

    expect(second).toEqual(first)
    expect(isEmptyChangeSet(diffEvents(first, second))).toBe(true)
  })

  it('keys events by contact id, not by title', () => {
    const twin = makeContact('c3', {
      names: { nickname: 'Matt' },
      dates: { birthday: { year: 1999, month: 3, day: 15 } },
    })

    const events = materialize([matt, twin], makeConfig(), REFERENCE)

    expect(Array.from(events.keys())).toEqual(['c1#birthday', 'c3#birthday'])
    expect(events.get('c3#birthday')?.title).toBe("Matt's 27th Birthday")
  })
})

describe('expandBetween', () => {
  it('orders events by date, then key', () => {
    const zoe = makeContact('c0', {
      names: { 'full-name': 'Zoe' },
      dates: { 'name-day': { month: 3, day: 15 } },
    })

    const events = expandBetween(
      [matt, ann, zoe],
      makeConfig(),
      new Date('2026-03-01T00:00:00Z'),
      new Date('2026-07-01T00:00:00Z'),
    )

    expect(events.map((e) => [e.date, e.key, e.title])).toEqual([
      ['2026-03-15', 'c0#name-day', "Zoe's Name Day"],
      ['2026-03-15', 'c1#birthday', "Matt's 27th Birthday"],
      ['2026-06-01', 'c2#anniversary', "Ann Lee's 16th Anniversary"],
      ['2026-06-01', 'c2#birthday', "Ann Lee's Birthday"],
    ])
  })

  it('repeats an occurrence for every year of a long window', () => {
    const events = expandBetween([matt], makeConfig(), REFERENCE, new Date('2028-01-01T00:00:00Z'))
    expect(events.map((e) => e.title)).toEqual(["Matt's 27th Birthday", "Matt's 28th Birthday"])
  })
})

describe('diffEvents', () => {
  it('reports added, updated and removed keys', () => {
    const previous = materialize([matt, ann], makeConfig(), REFERENCE)
    const renamed = makeContact('c1', {
      names: { nickname: 'Matty' },
      dates: { birthday: { year: 1999, month: 3, day: 15 } },
    })
    const newcomer = makeContact('c4', { dates: { birthday: { month: 9, day: 9 } } })
    const next = materialize([renamed, newcomer], makeConfig(), REFERENCE)

    expect(diffEvents(previous, next)).toEqual({
      added: ['c4#birthday'],
      removed: ['c2#anniversary', 'c2#birthday'],
      updated: ['c1#birthday'],
    })
  })
})

describe('summarizeContactDates', () => {
  it('lists the dates of filtered contacts', () => {
    expect(summarizeContactDates([matt, ann], makeConfig({ groupFilter: 'friends' }))).toEqual([
      { contactId: 'c2', name: 'Ann Lee', dateKind: 'anniversary', date: '2010-06-01' },
      { contactId: 'c2', name: 'Ann Lee', dateKind: 'birthday', date: '--06-01' },
    ])
  })
})

describe('titles', () => {
  it('labels known and custom date kinds', () => {
    expect(dateKindLabel('birthday')).toBe('Birthday')
    expect(dateKindLabel('name-day')).toBe('Name Day')
    expect(dateKindLabel('first_date')).toBe('First Date')
  })

  it('adds the ordinal only when there is a count', () => {
    expect(formatTitle('Matt', 'birthday', 21)).toBe("Matt's 21st Birthday")
    expect(formatTitle('Matt', 'birthday', null)).toBe("Matt's Birthday")
  })
})
