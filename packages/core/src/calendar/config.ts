/**
 * Calendar Configuration Loader
 *
 * Loads accounts and their contact calendars from <dataDir>/config.yaml and
 * Basic-auth credentials from <dataDir>/credentials.json. Everything is
 * validated here; the engine trusts what it receives.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { IANAZone } from 'luxon'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../contacts/errors.js'
import type { AccountCredential } from '../contacts/types.js'
import type { AccountConfig, ContactDatesConfig, CredentialStore, SubentryConfig } from './types.js'

export const DATA_DIR_NAME = '.contact-dates'
export const CONFIG_FILENAME = 'config.yaml'
export const CREDENTIALS_FILENAME = 'credentials.json'

export const DEFAULT_DISPLAY_NAME_PREFERENCE = ['nickname', 'full-name']
const DEFAULT_REFRESH_INTERVAL_MINUTES = 30
const DEFAULT_TIMEOUT_SECONDS = 10

// Ids end up in URLs and in "account/calendar" lookups
const ID_PATTERN = /^[A-Za-z0-9_-]+$/

// ─── Schemas ───

const idSchema = z.string().regex(ID_PATTERN, 'ids may only contain letters, digits, "-" and "_"')

const timezoneSchema = z
  .string()
  .refine((zone) => IANAZone.isValidZone(zone), (zone) => ({ message: `unknown time zone "${zone}"` }))

const calendarSchema = z.object({
  name: z.string().trim().min(1).optional(),
  displayNamePreference: z
    .array(z.string().trim().min(1))
    .min(1, 'must list at least one name field')
    .default(DEFAULT_DISPLAY_NAME_PREFERENCE),
  groupFilter: z.string().trim().min(1).optional(),
  showYear: z.boolean().default(true),
  dateKinds: z.array(z.string().trim().min(1)).min(1, 'must list at least one date kind').optional(),
  timezone: timezoneSchema.optional(),
})

const accountSchema = z.object({
  serverUrl: z.string().url(),
  addressBook: z.string().trim().min(1).optional(),
  refreshIntervalMinutes: z.number().positive().default(DEFAULT_REFRESH_INTERVAL_MINUTES),
  timeoutSeconds: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  timezone: timezoneSchema.optional(),
  calendars: z.record(idSchema, calendarSchema),
})

const configSchema = z.object({
  timezone: timezoneSchema.optional(),
  accounts: z.record(idSchema, accountSchema).default({}),
})

const credentialsSchema = z.record(
  idSchema,
  z.object({
    username: z.string().min(1),
    password: z.string().min(1),
  }),
)

// ─── Data directory ───

/**
 * Walk up from cwd looking for an existing .contact-dates/ directory,
 * falling back to one in cwd.
 */
export function findDataDir(cwd: string = process.cwd()): string {
  let dir = cwd
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, DATA_DIR_NAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  return path.resolve(cwd, DATA_DIR_NAME)
}

function resolveDataDir(dataDir?: string): string {
  return dataDir ?? process.env.CONTACT_DATES_DIR ?? findDataDir()
}

// ─── Loading ───

/**
 * Validate a parsed config document. Throws ConfigError listing every issue.
 */
export function parseConfig(document: unknown, dataDir: string): ContactDatesConfig {
  const result = configSchema.safeParse(document ?? {})
  if (!result.success) {
    throw new ConfigError(
      'Invalid contact calendar configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }

  const { timezone: defaultTimezone, accounts } = result.data

  return {
    dataDir,
    accounts: Object.entries(accounts).map(([accountId, account]): AccountConfig => {
      const accountTimezone = account.timezone ?? defaultTimezone
      const calendars = Object.entries(account.calendars).map(
        ([calendarId, calendar]): SubentryConfig => ({
          id: calendarId,
          name: calendar.name ?? calendarId,
          displayNamePreference: calendar.displayNamePreference,
          groupFilter: calendar.groupFilter,
          showYear: calendar.showYear,
          dateKinds: calendar.dateKinds,
          timezone: calendar.timezone ?? accountTimezone,
        }),
      )

      return {
        id: accountId,
        serverUrl: account.serverUrl,
        addressBook: account.addressBook,
        refreshIntervalMs: account.refreshIntervalMinutes * 60 * 1000,
        timeoutMs: account.timeoutSeconds * 1000,
        calendars,
      }
    }),
  }
}

/**
 * Load configuration from config.yaml. A missing file means no accounts.
 */
export function loadConfig(dataDir?: string): ContactDatesConfig {
  const dir = resolveDataDir(dataDir)
  const configPath = path.join(dir, CONFIG_FILENAME)

  if (!existsSync(configPath)) {
    console.warn(`[Config] No configuration at ${configPath}. No calendars configured.`)
    return { dataDir: dir, accounts: [] }
  }

  let document: unknown
  try {
    document = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}`, [errorMessage(err)])
  }

  return parseConfig(document, dir)
}

/**
 * Load Basic-auth credentials from credentials.json. A missing file means none.
 */
export function loadCredentials(dataDir?: string): CredentialStore {
  const dir = resolveDataDir(dataDir)
  const credentialsPath = path.join(dir, CREDENTIALS_FILENAME)

  if (!existsSync(credentialsPath)) {
    console.warn(`[Config] Credentials not found at ${credentialsPath}.`)
    return {}
  }

  let document: unknown
  try {
    document = JSON.parse(readFileSync(credentialsPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${credentialsPath}`, [errorMessage(err)])
  }

  const result = credentialsSchema.safeParse(document)
  if (!result.success) {
    throw new ConfigError(
      `Invalid credentials file ${credentialsPath}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

export function credentialFor(store: CredentialStore, accountId: string): AccountCredential {
  if (!Object.hasOwn(store, accountId)) {
    throw new ConfigError(`No credentials for account "${accountId}"`)
  }
  return store[accountId]
}
