/**
 * Satellite Inventory — Config Loader
 *
 * Loads config.yaml, validates it, and derives the API base URL and
 * cache file locations. Any problem with the file is fatal.
 */

import { readFileSync, existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { ZodIssue } from 'zod'
import { ConfigError, errorMessage } from '../errors.js'
import {
  API_PATH,
  CONFIG_ENV,
  CONFIG_FILENAME,
  HOSTS_CACHE_FILENAME,
  INVENTORY_CACHE_FILENAME,
} from './defaults.js'
import { ConfigFileSchema } from './schema.js'
import type { ConfigFile, InventoryConfig } from './types.js'
import { inventoryHome } from './paths.js'

/** --config wins, then $SATELLITE_INVENTORY_CONFIG, then the home dir */
export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return resolve(explicit)
  const fromEnv = env[CONFIG_ENV]
  if (fromEnv) return resolve(fromEnv)
  return inventoryHome(CONFIG_FILENAME)
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/** Join the configured host with the API prefix, ignoring a trailing slash */
export function apiBaseUrl(host: string): string {
  return `${host.replace(/\/+$/, '')}/${API_PATH}`
}

/** Turn a validated config file into the settings the program runs on */
export function resolveConfig(file: ConfigFile, source: string): InventoryConfig {
  const cacheDir = resolve(file.cache.path)
  return {
    source,
    satellite: file.satellite,
    apiBase: apiBaseUrl(file.satellite.host),
    cache: {
      maxAge: file.cache.max_age,
      hostsFile: join(cacheDir, HOSTS_CACHE_FILENAME),
      inventoryFile: join(cacheDir, INVENTORY_CACHE_FILENAME),
    },
    sanitizeGroupNames: file.group_names.sanitize,
    log: file.log,
  }
}

/** Parse and validate YAML text; `source` only labels errors */
export function parseConfig(raw: string, source: string): InventoryConfig {
  let parsed: unknown
  try {
    parsed = parseYaml(raw)
  } catch (err) {
    throw new ConfigError(`Malformed config ${source}: ${errorMessage(err)}`, source, err)
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {})
  if (!result.success) {
    throw new ConfigError(`Invalid config ${source}: ${formatIssues(result.error.issues)}`, source, result.error)
  }
  return resolveConfig(result.data, source)
}

/** Load settings from the resolved config path */
export function loadConfig(path: string = resolveConfigPath()): InventoryConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`, path)
  }

  let raw: string
  try {
    raw = readFileSync(path, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Cannot read config ${path}: ${errorMessage(err)}`, path, err)
  }
  return parseConfig(raw, path)
}
