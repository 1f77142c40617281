import { DateTime } from 'luxon'
import { loadConfig, loadCredentials } from './calendar/config.js'
import { ContactCalendarManager, type ManagedCalendar } from './calendar/manager.js'
import { serializeIcs } from './calendar/ics.js'
import { errorMessage } from './contacts/errors.js'

const DEFAULT_UPCOMING_DAYS = 30
const ICS_WINDOW_DAYS = 365

function usage(): void {
  console.log('Usage:')
  console.log('  contact-dates upcoming [days]            Upcoming events of every calendar')
  console.log('  contact-dates ics <account>/<calendar>   ICS feed of one calendar on stdout')
}

function createManager(): ContactCalendarManager {
  return new ContactCalendarManager(loadConfig(), loadCredentials())
}

/**
 * Run one refresh without starting the timer. Returns false when it failed.
 */
async function refreshOnce(calendar: ManagedCalendar): Promise<boolean> {
  const outcome = await calendar.coordinator.forceRefresh()
  if (outcome.status === 'failed') {
    console.error(`${calendar.path}: ${outcome.error.message}`)
    return false
  }
  return true
}

async function upcoming(daysArg: string | undefined): Promise<void> {
  const days = daysArg === undefined ? DEFAULT_UPCOMING_DAYS : Number.parseInt(daysArg, 10)
  if (!Number.isInteger(days) || days < 1) {
    console.error(`Invalid number of days: ${daysArg}`)
    process.exit(1)
  }

  const manager = createManager()
  if (manager.size === 0) {
    console.log('No contact calendars configured.')
    return
  }

  const start = new Date()
  const end = DateTime.fromJSDate(start).plus({ days }).toJSDate()

  for (const calendar of manager.list()) {
    if (!(await refreshOnce(calendar))) continue

    const { name } = calendar.coordinator.getConfig()
    const events = calendar.coordinator.eventsBetween(start, end)
    console.log(`\n${name} (${calendar.path})`)
    if (events.length === 0) {
      console.log(`  Nothing in the next ${days} days`)
    }
    for (const event of events) {
      console.log(`  ${event.date}  ${event.title}`)
    }
  }
}

async function ics(path: string | undefined): Promise<void> {
  if (!path) {
    usage()
    process.exit(1)
  }

  // stdout carries the feed; progress logs go to stderr
  console.log = console.error.bind(console)

  const calendar = createManager().get(path)
  if (!calendar) {
    console.error(`Unknown calendar: ${path}`)
    process.exit(1)
  }

  if (!(await refreshOnce(calendar))) process.exit(1)

  const start = new Date()
  const end = DateTime.fromJSDate(start).plus({ days: ICS_WINDOW_DAYS }).toJSDate()
  process.stdout.write(
    serializeIcs(calendar.coordinator.eventsBetween(start, end), {
      calendarName: calendar.coordinator.getConfig().name,
      generatedAt: start,
    }),
  )
}

async function main(): Promise<void> {
  const [command, arg] = process.argv.slice(2)

  switch (command) {
    case 'upcoming':
      await upcoming(arg)
      break
    case 'ics':
      await ics(arg)
      break
    default:
      usage()
      if (command !== undefined && command !== 'help') process.exit(1)
  }
}

main().catch((err) => {
  console.error('Error:', errorMessage(err))
  process.exit(1)
})
