/**
 * Contact Types
 *
 * Strongly-typed contact model produced by the normalizer, plus the
 * collaborator interface that delivers raw address-book records.
 */

// ─────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────

/** Well-known name fields. Any other identifier is kept verbatim. */
export type KnownNameField =
  | 'nickname'
  | 'given-name'
  | 'family-name'
  | 'full-name'
  | 'full-name-last-first'

// `string & {}` keeps editor completion for the known fields
export type NameField = KnownNameField | (string & {})

/** Well-known date kinds. Custom labels from the address book are kept verbatim. */
export type KnownDateKind = 'birthday' | 'anniversary'

export type DateKind = KnownDateKind | (string & {})

/** Field used when none of the preferred name fields is present */
export const LAST_RESORT_NAME_FIELD: NameField = 'full-name'

// ─────────────────────────────────────────────────────────────────
// Model
// ─────────────────────────────────────────────────────────────────

/**
 * A month/day pair with an optional year.
 * (month, day) is always valid in a leap year, so Feb 29 is allowed.
 */
export interface PartialDate {
  month: number
  day: number
  year?: number
}

/** Non-empty name values keyed by NameField */
export type ContactNames = { readonly [field: string]: string }

/** One date per DateKind */
export type SignificantDates = { readonly [kind: string]: PartialDate }

/**
 * One address-book entry.
 * `id` is stable across refreshes and is the join key for event identity.
 */
export interface Contact {
  id: string
  names: ContactNames
  groups: ReadonlySet<string>
  significantDates: SignificantDates
}

// ─────────────────────────────────────────────────────────────────
// Source collaborator
// ─────────────────────────────────────────────────────────────────

/**
 * Raw record handed over by a source. Opaque until normalized:
 * expected keys are `id`, `names`, `groups` and `dates`, none of them trusted.
 */
export type RawContactPayload = Record<string, unknown>

/** Basic credentials for one remote account */
export interface AccountCredential {
  username: string
  password: string
}

/**
 * Delivers the raw contact list for an account.
 * Rejects with AuthError or TransientFetchError.
 */
export interface ContactSource {
  readonly name: string
  fetchContacts(credential: AccountCredential): Promise<RawContactPayload[]>
}
