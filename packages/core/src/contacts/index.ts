/**
 * Contacts
 *
 * Contact model, normalization boundary and the CardDAV source.
 */

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
} from './types.js'
export { LAST_RESORT_NAME_FIELD } from './types.js'

export {
  ContactSyncError,
  MalformedRecordError,
  AuthError,
  TransientFetchError,
  ConfigError,
  isContactSyncError,
} from './errors.js'
export type { ContactSyncErrorKind } from './errors.js'

export { normalize, normalizeBatch, parsePartialDate } from './normalizer.js'
export type { NormalizedBatch } from './normalizer.js'
export { ContactCache } from './cache.js'
export type { ContactCacheDelta } from './cache.js'
export { FileContactStore, toStoredPayload } from './store.js'
export type { ContactStore, StoredContacts } from './store.js'
export { parseVCards, resolveGroupMemberships } from './vcard.js'
export type { VCardRecord } from './vcard.js'
export { CardDavContactSource, createCardDavContactSource, classifyFetchError } from './carddav-source.js'
export type { CardDavSourceOptions } from './carddav-source.js'
