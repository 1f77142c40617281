/**
 * Contact Sync Errors
 *
 * Every failure the engine distinguishes carries a `kind` so callers can
 * branch on it without instanceof chains across package boundaries.
 *
 * @module contacts/errors
 */

export type ContactSyncErrorKind = 'malformed-record' | 'auth' | 'transient' | 'config'

export abstract class ContactSyncError extends Error {
  abstract readonly kind: ContactSyncErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** A single record could not be normalized. The rest of the batch continues. */
export class MalformedRecordError extends ContactSyncError {
  readonly kind = 'malformed-record' as const
}

/** Credential rejected by the remote account. Not retried until re-authentication. */
export class AuthError extends ContactSyncError {
  readonly kind = 'auth' as const
}

/** Network failure, timeout or rate limit. Retried on the next scheduled tick. */
export class TransientFetchError extends ContactSyncError {
  readonly kind = 'transient' as const
}

/** Configuration rejected at acceptance time. */
export class ConfigError extends ContactSyncError {
  readonly kind = 'config' as const
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message)
    this.issues = issues
  }
}

export function isContactSyncError(err: unknown): err is ContactSyncError {
  return err instanceof ContactSyncError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
