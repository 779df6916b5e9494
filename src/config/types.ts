/**
 * Satellite Inventory — Config Types
 */

import type { z } from 'zod'
import type { ConfigFileSchema } from './schema.js'

/** Shape of config.yaml after validation and defaults */
export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type SatelliteConfig = ConfigFile['satellite']

export type CacheConfig = ConfigFile['cache']

/** Resolved settings the rest of the program works from */
export type InventoryConfig = {
  /** Path the settings were read from */
  source: string
  satellite: SatelliteConfig
  /** `{host}/api/v2/` */
  apiBase: string
  cache: {
    maxAge: number
    /** Host name → full host record */
    hostsFile: string
    /** Group name → host names */
    inventoryFile: string
  }
  sanitizeGroupNames: boolean
  log: boolean
}
