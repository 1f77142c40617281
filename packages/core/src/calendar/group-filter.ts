import type { Contact } from '../contacts/types.js'

/**
 * Keep the contacts that belong to `groupFilter`, compared without regard
 * to case. No filter means every contact; an unknown group yields none.
 */
export function filterByGroup(contacts: readonly Contact[], groupFilter?: string): Contact[] {
  const wanted = groupFilter?.trim().toLowerCase()
  if (!wanted) return [...contacts]

  return contacts.filter((contact) => {
    for (const group of contact.groups) {
      if (group.toLowerCase() === wanted) return true
    }
    return false
  })
}
