// Public API for consumption by other packages (dashboard)

// Contacts
export type {
  Contact,
  ContactNames,
  SignificantDates,
  PartialDate,
  NameField,
  KnownNameField,
  DateKind,
  KnownDateKind,
  RawContactPayload,
  AccountCredential,
  ContactSource,
  ContactSyncErrorKind,
  NormalizedBatch,
  ContactCacheDelta,
  VCardRecord,
  CardDavSourceOptions,
  ContactStore,
  StoredContacts,
} from './contacts/index.js'
export {
  LAST_RESORT_NAME_FIELD,
  ContactSyncError,
  MalformedRecordError,
  AuthError,
  TransientFetchError,
  ConfigError,
  isContactSyncError,
  normalize,
  normalizeBatch,
  parsePartialDate,
  ContactCache,
  FileContactStore,
  parseVCards,
  resolveGroupMemberships,
  CardDavContactSource,
  createCardDavContactSource,
  classifyFetchError,
} from './contacts/index.js'

// Calendars
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
  Occurrence,
  ProjectionOptions,
  ManagedCalendar,
  ContactCalendarManagerOptions,
  IcsOptions,
} from './calendar/index.js'
export {
  filterByGroup,
  resolveName,
  project,
  occurrencesBetween,
  ordinal,
  materialize,
  expandBetween,
  diffEvents,
  eventKey,
  formatTitle,
  compareEvents,
  SyncCoordinator,
  DEFAULT_REFRESH_INTERVAL_MS,
  findDataDir,
  loadConfig,
  loadCredentials,
  parseConfig,
  ContactCalendarManager,
  calendarPath,
  contactStorePath,
  serializeIcs,
} from './calendar/index.js'
