/**
 * Satellite Inventory — Context
 *
 * Everything one invocation works with, built once at startup and handed
 * to the builder and dispatcher.
 */

import { CacheStore } from './cache/store.js'
import type { InventoryConfig } from './config/types.js'
import { OrganizationNotFoundError } from './errors.js'
import { SatelliteClient } from './satellite/client.js'
import { createDebugClient } from './satellite/debug-client.js'
import type { Organization, SatelliteApi } from './satellite/types.js'

export type InventoryContext = {
  config: InventoryConfig
  api: SatelliteApi
  store: CacheStore
  organization: Organization
}

export type ContextOptions = {
  /** Replaces the HTTP client */
  api?: SatelliteApi
  /** Request log directory when `log` is on */
  logDir?: string
  now?: () => number
}

/** Build the API client, resolve the organization, and open the cache */
export async function createContext(config: InventoryConfig, options: ContextOptions = {}): Promise<InventoryContext> {
  let api: SatelliteApi = options.api ?? new SatelliteClient(config.apiBase, config.satellite)
  if (config.log) {
    api = createDebugClient(api, options.logDir)
  }

  const organization = await api.findOrganization(config.satellite.organization)
  if (!organization) {
    throw new OrganizationNotFoundError(config.satellite.organization)
  }

  const store = new CacheStore(
    { hostsFile: config.cache.hostsFile, inventoryFile: config.cache.inventoryFile },
    config.cache.maxAge,
    options.now,
  )

  return { config, api, store, organization }
}
