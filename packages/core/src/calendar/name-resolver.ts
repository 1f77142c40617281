import { LAST_RESORT_NAME_FIELD, type Contact, type NameField } from '../contacts/types.js'

/**
 * Resolve the display name of a contact.
 *
 * Walks `preference` in order and returns the first non-empty field. Falls
 * back to the full name, then to the contact id, so a contact without any
 * name data still gets an event.
 */
export function resolveName(contact: Contact, preference: readonly NameField[]): string {
  for (const field of [...preference, LAST_RESORT_NAME_FIELD]) {
    if (!Object.hasOwn(contact.names, field)) continue
    const value = contact.names[field].trim()
    if (value) return value
  }
  return contact.id
}
