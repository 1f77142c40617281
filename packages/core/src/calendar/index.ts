/**
 * Contact Calendars
 *
 * Recurring birthday, anniversary and other significant-date calendars
 * derived from address book contacts.
 */

// Types
export type {
  SubentryConfig,
  CalendarEvent,
  ChangeSet,
  SyncSnapshot,
  SyncState,
  SyncStatus,
  SyncErrorState,
  SyncOutcome,
  ContactDateSummary,
  SyncCoordinatorOptions,
  AccountConfig,
  ContactDatesConfig,
  CredentialStore,
} from './types.js'

// Engine
export { filterByGroup } from './group-filter.js'
export { resolveName } from './name-resolver.js'
export { project, occurrencesBetween, occurrenceInYear, ordinal } from './date-projector.js'
export type { Occurrence, ProjectionOptions } from './date-projector.js'
export {
  materialize,
  expandBetween,
  diffEvents,
  isEmptyChangeSet,
  eventKey,
  formatTitle,
  dateKindLabel,
  compareEvents,
  summarizeContactDates,
} from './materializer.js'
export { SyncCoordinator, DEFAULT_REFRESH_INTERVAL_MS } from './sync-coordinator.js'

// Host plumbing
export { findDataDir, loadConfig, loadCredentials, parseConfig, credentialFor } from './config.js'
export { ContactCalendarManager, calendarPath, contactStorePath } from './manager.js'
export type { ManagedCalendar, ContactCalendarManagerOptions } from './manager.js'
export { serializeIcs, escapeICalText, foldLine } from './ics.js'
export type { IcsOptions } from './ics.js'
